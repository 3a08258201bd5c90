export * from './gameValidationError.js';
export { ShoeEmptyError } from './shoeEmptyError.js';
export { SettingsError, type SettingsIssue } from './settingsError.js';
