import { z } from 'zod';

const ACTION_HOTKEYS: Record<string, string> = { '1': 'hit', '2': 'stand', '3': 'double', '4': 'split' };

export const PlayerActionSchema = z.enum(['hit', 'stand', 'double', 'split']);

/** Raw prompt text: a hotkey (1-4) or the action name, any case. */
export const ActionInputSchema = z
  .string()
  .trim()
  .toLowerCase()
  .transform((raw) => ACTION_HOTKEYS[raw] ?? raw)
  .pipe(PlayerActionSchema);

/** Raw bet text: a whole number. Range checks belong to the participant. */
export const BetInputSchema = z
  .string()
  .trim()
  .regex(/^-?\d+$/, 'Bet must be a number')
  .transform((raw) => parseInt(raw, 10));

export const PlayerNameSchema = z.string().trim().min(1, 'Name cannot be empty').max(32);

export const YesNoSchema = z.string().trim().toLowerCase().pipe(z.enum(['yes', 'no']));

export const EditBalanceSchema = z.object({
  name: PlayerNameSchema,
  balance: z.coerce.number({ error: 'Balance must be a number' }).nonnegative('Balance cannot be negative'),
});

const TableActionSchema = z.enum(['hit', 'stand', 'double']);

/** dealer up-card value (2-11) -> own hand value (4-21) -> action */
export const StrategyTableSchema = z.record(
  z.string().regex(/^(?:[2-9]|1[01])$/),
  z.record(z.string().regex(/^(?:[4-9]|1\d|2[01])$/), TableActionSchema),
);

export type StrategyTable = z.infer<typeof StrategyTableSchema>;
export type TableAction = z.infer<typeof TableActionSchema>;
