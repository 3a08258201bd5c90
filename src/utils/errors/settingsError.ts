// utils/errors/settingsError.ts
export interface SettingsIssue {
  path: string;
  message: string;
}

export class SettingsError extends Error {
  constructor(
    message: string,
    public readonly source: string,
    public readonly issues: SettingsIssue[] = [],
  ) {
    super(message);
    this.name = 'SettingsError';
  }
}
