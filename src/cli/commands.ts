// src/cli/commands.ts
import type { Session } from '../game/state/Session.js';
import { EditBalanceSchema } from '../utils/validator/game.validator.js';

export type Command =
  | { kind: 'help' }
  | { kind: 'exit' }
  | { kind: 'showbalance' }
  | { kind: 'editbalance'; name: string; balance: number }
  | { kind: 'shuffle' }
  | { kind: 'godmode'; on: boolean };

export type ParsedCommand = { ok: true; command: Command } | { ok: false; error: string };

export const HELP_LINES = [
  'Available commands:',
  '  /help                            Show this help',
  '  /exit                            Leave the table',
  '  /showbalance                     Show every balance',
  '  /editbalance <name> <amount>     Set a balance',
  '  /shuffle                         Reshuffle the shoe',
  '  /godmode on|off                  Deal blackjack to human players',
] as const;

const EDIT_USAGE = 'Usage: /editbalance <name> <amount>';

/** Parses a line that starts with "/". The name of /editbalance may contain spaces. */
export function parseCommand(line: string): ParsedCommand {
  const parts = line.trim().replace(/^\//, '').split(/\s+/);
  const keyword = parts[0]?.toLowerCase() ?? '';

  switch (keyword) {
    case 'help':
      return { ok: true, command: { kind: 'help' } };
    case 'exit':
      return { ok: true, command: { kind: 'exit' } };
    case 'showbalance':
      return { ok: true, command: { kind: 'showbalance' } };
    case 'shuffle':
      return { ok: true, command: { kind: 'shuffle' } };
    case 'editbalance': {
      if (parts.length < 3) return { ok: false, error: EDIT_USAGE };
      const parsed = EditBalanceSchema.safeParse({
        name: parts.slice(1, -1).join(' '),
        balance: parts[parts.length - 1],
      });
      if (!parsed.success) return { ok: false, error: parsed.error.issues[0]?.message ?? EDIT_USAGE };
      return { ok: true, command: { kind: 'editbalance', ...parsed.data } };
    }
    case 'godmode': {
      const flag = parts[1]?.toLowerCase();
      if (parts.length !== 2 || (flag !== 'on' && flag !== 'off')) return { ok: false, error: 'Usage: /godmode on|off' };
      return { ok: true, command: { kind: 'godmode', on: flag === 'on' } };
    }
    default:
      return { ok: false, error: `Unknown command '/${keyword}'. Type /help for a list of commands.` };
  }
}

/** Runs a command between rounds; false means the session should stop. */
export async function runCommand(session: Session, command: Command, write: (line: string) => void): Promise<boolean> {
  switch (command.kind) {
    case 'help':
      HELP_LINES.forEach((line) => write(line));
      return true;
    case 'exit':
      return false;
    case 'showbalance':
      for (const { name, balance } of session.balances()) {
        write(`${name}: $${balance}`);
      }
      return true;
    case 'editbalance': {
      const change = session.editBalance(command.name, command.balance);
      if (!change) {
        write(`[ERR] Player '${command.name}' not found.`);
      } else {
        write(`${change.name}'s balance changed from $${change.previous} to $${change.balance}`);
      }
      return true;
    }
    case 'shuffle':
      await session.reshuffle();
      write('Shoe reshuffled.');
      return true;
    case 'godmode':
      session.setGodMode(command.on);
      write(`God mode ${command.on ? 'enabled' : 'disabled'}.`);
      return true;
  }
}
