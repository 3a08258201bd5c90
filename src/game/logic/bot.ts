// bot.ts
import { readFileSync } from 'node:fs';
import type { PlayerAction } from '../../types/index.js';
import { StrategyTableSchema, type StrategyTable, type TableAction } from '../../utils/validator/game.validator.js';
import { SettingsError } from '../../utils/errors/index.js';
import { upCardValue } from './deck.js';
import type { BetContext, BetSource, DecisionContext, HandSnapshot, Strategy } from './strategy.js';

export const BASIC_STRATEGY_PATH = new URL('../../../data/basicStrategy.json', import.meta.url);

export const DEFAULT_HIT_THRESHOLD = 16;

/** Hits up to and including `threshold`, ignores the dealer, never splits or doubles. */
export class ThresholdStrategy implements Strategy {
  readonly name = 'threshold';
  readonly interactive = false;

  constructor(private readonly threshold = DEFAULT_HIT_THRESHOLD) {}

  decide(ctx: DecisionContext): PlayerAction {
    return ctx.hand.value <= this.threshold ? 'hit' : 'stand';
  }

  splitEligible(_hand: HandSnapshot): boolean {
    return false;
  }
}

export function loadBasicStrategy(path: URL | string = BASIC_STRATEGY_PATH): StrategyTable {
  const source = String(path);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (err) {
    throw new SettingsError(`Cannot read strategy table: ${err instanceof Error ? err.message : String(err)}`, source);
  }

  const parsed = StrategyTableSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SettingsError(
      'Invalid strategy table',
      source,
      parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    );
  }
  return parsed.data;
}

/**
 * Basic strategy lookup keyed by dealer up-card value (ace = 11) and own hand value.
 * Anything the table does not cover stands.
 */
export class TableStrategy implements Strategy {
  readonly name = 'table';
  readonly interactive = false;
  private readonly table: StrategyTable;

  constructor(table?: StrategyTable) {
    this.table = table ?? loadBasicStrategy();
  }

  lookup(dealerValue: number, handValue: number): TableAction {
    return this.table[String(dealerValue)]?.[String(handValue)] ?? 'stand';
  }

  decide(ctx: DecisionContext): PlayerAction {
    const action = this.lookup(upCardValue(ctx.dealerUpCard), ctx.hand.value);
    if (action === 'double' && !ctx.canDouble) return 'hit';
    return action;
  }

  splitEligible(_hand: HandSnapshot): boolean {
    return false;
  }
}

/** Bot betting: the default bet, optionally capped at what is left. */
export class DefaultBetSource implements BetSource {
  readonly interactive = false;

  constructor(
    private readonly defaultBet: number,
    private readonly capAtBalance = true,
  ) {}

  requestBet(ctx: BetContext): number {
    return this.capAtBalance ? Math.min(this.defaultBet, Math.floor(ctx.balance)) : this.defaultBet;
  }
}

export type BotStrategyName = 'threshold' | 'table';

export function createBotStrategy(name: BotStrategyName): Strategy {
  switch (name) {
    case 'threshold':
      return new ThresholdStrategy();
    case 'table':
      return new TableStrategy();
  }
}
