import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import logger from '../utils/logger.js';
import { SettingsError } from '../utils/errors/index.js';
import { PlayerNameSchema } from '../utils/validator/game.validator.js';

export const BotSettingsSchema = z.object({
  name: PlayerNameSchema,
  strategy: z.enum(['threshold', 'table']).default('threshold'),
});

export const GameSettingsSchema = z
  .object({
    numDecks: z.number().int().min(1).max(8).default(1),
    startingBalance: z.number().nonnegative().default(100),
    defaultBet: z.number().int().positive().default(10),
    capBotBet: z.boolean().default(true),
    minimumBalance: z.number().nonnegative().default(1),
    dealDelayMs: z.number().int().nonnegative().default(0),
    showOutput: z.boolean().default(true),
    logRounds: z.boolean().default(true),
    logDir: z.string().min(1).default('logs'),
    showMetrics: z.boolean().default(false),
    godMode: z.boolean().default(false),
    seed: z.number().int().optional(),
    maxRounds: z.number().int().positive().optional(),
    bots: z.array(BotSettingsSchema).default([]),
  })
  .refine((s) => new Set(s.bots.map((b) => b.name.toLowerCase())).size === s.bots.length, {
    message: 'Bot names must be unique',
    path: ['bots'],
  });

export type GameSettings = z.infer<typeof GameSettingsSchema>;

export function parseSettings(raw: unknown, source = 'settings'): GameSettings {
  const parsed = GameSettingsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SettingsError(
      `Invalid settings in ${source}`,
      source,
      parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    );
  }
  return parsed.data;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Reads and validates the settings file; a missing file means all defaults. */
export async function loadSettings(path: string): Promise<GameSettings> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    if (isMissingFile(err)) {
      logger.warn(`[CONFIG] ${path} not found, using default settings`);
      return parseSettings({}, path);
    }
    throw new SettingsError(`Cannot read ${path}: ${err instanceof Error ? err.message : String(err)}`, path);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new SettingsError(`Failed to parse ${path}: ${err instanceof Error ? err.message : String(err)}`, path);
  }
  const settings = parseSettings(raw, path);
  logger.info(`[CONFIG] Loaded settings from ${path}`, { numDecks: settings.numDecks, bots: settings.bots.length });
  return settings;
}
