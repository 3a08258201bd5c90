import type { PlayerAction } from '../../types/index.js';
import type { GameValidationError } from '../../utils/errors/index.js';
import type { BetContext, BetSource, DecisionContext, HandSnapshot, Strategy } from './strategy.js';

/** Where a human's decisions come from (a terminal, a test script...) */
export interface DecisionInput {
  askAction(ctx: DecisionContext): Promise<PlayerAction>;
  reportRejection(message: string): void | Promise<void>;
}

export interface BetInput {
  askBet(ctx: BetContext): Promise<number>;
  reportRejection(message: string): void | Promise<void>;
}

export class PromptStrategy implements Strategy {
  readonly name = 'human';
  readonly interactive = true;

  constructor(private readonly input: DecisionInput) {}

  decide(ctx: DecisionContext): Promise<PlayerAction> {
    return this.input.askAction(ctx);
  }

  splitEligible(hand: HandSnapshot): boolean {
    return hand.pair;
  }

  onRejected(_action: PlayerAction, error: GameValidationError): void | Promise<void> {
    return this.input.reportRejection(error.message);
  }
}

export class PromptBetSource implements BetSource {
  readonly interactive = true;

  constructor(private readonly input: BetInput) {}

  requestBet(ctx: BetContext): Promise<number> {
    return this.input.askBet(ctx);
  }

  onRejected(_amount: number, error: GameValidationError): void | Promise<void> {
    return this.input.reportRejection(error.message);
  }
}
