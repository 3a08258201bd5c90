// src/cli/app.ts
import chalk, { type ChalkInstance } from 'chalk';
import type { Session } from '../game/state/Session.js';
import logger from '../utils/logger.js';
import { YesNoSchema } from '../utils/validator/game.validator.js';
import { parseCommand, runCommand } from './commands.js';
import type { Prompter } from './terminal.js';

export interface TableLoopOptions {
  autoplay: boolean;
  chalk?: ChalkInstance;
}

/**
 * Plays rounds until the session says stop, or the table is asked to.
 * Between rounds a human may answer yes/no or run a /command.
 * Final balances are printed even when a round fails.
 */
export async function runTable(session: Session, prompter: Prompter, options: TableLoopOptions): Promise<number> {
  const c = options.chalk ?? chalk;

  try {
    while (session.canContinue()) {
      await session.playRound();
      if (options.autoplay) continue;
      if (!(await askPlayAgain(session, prompter, c))) break;
    }
  } finally {
    printBalances(session, (line) => prompter.write(line), c);
  }

  logger.info(`[SESSION] Table closed after ${session.roundsPlayed} rounds`);
  return session.roundsPlayed;
}

async function askPlayAgain(session: Session, prompter: Prompter, c: ChalkInstance): Promise<boolean> {
  for (;;) {
    const answer = (await prompter.question('\nPlay another round? (yes/no): ')).trim();

    if (answer.startsWith('/')) {
      const parsed = parseCommand(answer);
      if (!parsed.ok) {
        prompter.write(c.red(`[ERR] ${parsed.error}`));
        continue;
      }
      if (!(await runCommand(session, parsed.command, (line) => prompter.write(line)))) return false;
      continue;
    }

    const reply = YesNoSchema.safeParse(answer);
    if (reply.success) return reply.data === 'yes';
    prompter.write(c.red("[ERR] Please answer 'yes' or 'no' (or /help)"));
  }
}

/** Final balances, one line per participant. */
export function printBalances(session: Session, write: (line: string) => void, c: ChalkInstance = chalk) {
  write(c.bold('\n=== Final balances ==='));
  for (const { name, balance } of session.balances()) {
    write(`${name}: $${balance}`);
  }
}
