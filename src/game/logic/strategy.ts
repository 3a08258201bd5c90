import type { Card, PlayerAction } from '../../types/index.js';
import type { GameValidationError } from '../../utils/errors/index.js';
import type { Hand } from './hand.js';

/** Read-only view of a hand handed to decision code */
export interface HandSnapshot {
  cards: readonly Card[];
  labels: string[];
  value: number;
  soft: boolean;
  pair: boolean;
}

export interface DecisionContext {
  participant: string;
  hand: HandSnapshot;
  handIndex: number;
  handCount: number;
  cardCount: number;
  dealerUpCard: Card;
  balance: number;
  currentBet: number;
  canDouble: boolean;
  canSplit: boolean;
}

/**
 * One decision policy per seat. The engine never looks past this interface,
 * so humans, fixed bots and table bots are interchangeable.
 */
export interface Strategy {
  readonly name: string;
  /** Interactive strategies are asked again after a rejected action; bots get a fallback. */
  readonly interactive: boolean;
  decide(ctx: DecisionContext): PlayerAction | Promise<PlayerAction>;
  splitEligible(hand: HandSnapshot): boolean;
  onRejected?(action: PlayerAction, error: GameValidationError): void | Promise<void>;
}

export interface BetContext {
  participant: string;
  balance: number;
  round: number;
}

export interface BetSource {
  readonly interactive: boolean;
  /** 0 sits the round out */
  requestBet(ctx: BetContext): number | Promise<number>;
  onRejected?(amount: number, error: GameValidationError): void | Promise<void>;
}

export function snapshotHand(hand: Hand): HandSnapshot {
  return {
    cards: [...hand.cards],
    labels: hand.labels(),
    value: hand.value,
    soft: hand.isSoft(),
    pair: hand.canSplit(),
  };
}
