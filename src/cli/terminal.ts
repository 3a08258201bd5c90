import { createInterface } from 'node:readline/promises';
import chalk, { type ChalkInstance } from 'chalk';
import type { PlayerAction } from '../types/index.js';
import type { BetContext, DecisionContext } from '../game/logic/strategy.js';
import type { HumanInput } from '../game/state/Session.js';
import { ActionInputSchema, BetInputSchema, PlayerNameSchema } from '../utils/validator/game.validator.js';

export interface Prompter {
  question(query: string): Promise<string>;
  write(line: string): void;
}

export interface ClosablePrompter extends Prompter {
  close(): void;
}

export function createReadlinePrompter(): ClosablePrompter {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  // readline swallows ctrl-c while a question is open
  rl.on('SIGINT', () => process.kill(process.pid, 'SIGINT'));
  return {
    question: (query) => rl.question(query),
    write: (line) => {
      process.stdout.write(`${line}\n`);
    },
    close: () => rl.close(),
  };
}

/**
 * Human seats read their bets and decisions here. Bad input is re-asked
 * before anything reaches the engine.
 */
export class TerminalInput implements HumanInput {
  constructor(
    private readonly prompter: Prompter,
    private readonly c: ChalkInstance = chalk,
  ) {}

  async askAction(ctx: DecisionContext): Promise<PlayerAction> {
    const split = ctx.handCount > 1 ? ` (hand ${ctx.handIndex + 1} of ${ctx.handCount})` : '';
    this.prompter.write(`\n\t${ctx.participant}${split} | Current hand: [${ctx.hand.labels.join(', ')}] | Value: ${ctx.hand.value}`);

    for (;;) {
      const answer = await this.prompter.question('\tChoose action (1=hit / 2=stand / 3=double / 4=split): ');
      const parsed = ActionInputSchema.safeParse(answer);
      if (parsed.success) return parsed.data;
      this.prompter.write(this.c.red('\tInvalid action. Try again.'));
    }
  }

  async askBet(ctx: BetContext): Promise<number> {
    for (;;) {
      const answer = await this.prompter.question(
        `${this.c.bold(ctx.participant)}, Enter bet amount ($${ctx.balance} available, 0 to sit out): `,
      );
      const parsed = BetInputSchema.safeParse(answer);
      if (parsed.success) return parsed.data;
      this.prompter.write(this.c.red(`[ERR] ${parsed.error.issues[0]?.message ?? 'Invalid bet'}`));
    }
  }

  reportRejection(message: string) {
    this.prompter.write(this.c.red(`\t[ERR] ${message}`));
  }

  /** Names until "done"; at least one is required. `reserved` names (the bots) are refused. */
  async askNames(reserved: readonly string[] = []): Promise<string[]> {
    const names: string[] = [];
    const taken = (name: string) =>
      [...reserved, ...names].some((n) => n.toLowerCase() === name.toLowerCase());
    for (;;) {
      const answer = await this.prompter.question(`Input player ${names.length + 1}'s name ('done' to continue): `);
      if (answer.trim().toLowerCase() === 'done') {
        if (names.length > 0) return names;
        this.prompter.write(this.c.red('[ERR] Must be at least one player'));
        continue;
      }

      const parsed = PlayerNameSchema.safeParse(answer);
      if (!parsed.success) {
        this.prompter.write(this.c.red(`[ERR] ${parsed.error.issues[0]?.message ?? 'Invalid name'}`));
      } else if (taken(parsed.data)) {
        this.prompter.write(this.c.red(`[ERR] ${parsed.data} is already seated`));
      } else {
        names.push(parsed.data);
      }
    }
  }
}
