import type { Card, PlayerAction, Rank, RoundEvent, Suit } from '../src/types/index.js';
import { createCard, type CardSource } from '../src/game/logic/deck.js';
import type { BetSource, DecisionContext, HandSnapshot, Strategy } from '../src/game/logic/strategy.js';
import type { RoundObserver, ShoeFactory } from '../src/game/state/RoundEngine.js';
import { ShoeEmptyError, type GameValidationError } from '../src/utils/errors/index.js';

export const card = (rank: Rank, suit: Suit = 'Hearts'): Card => createCard(rank, suit);

/** Deals the given cards in order, front first. */
export class ScriptedShoe implements CardSource {
  private index = 0;

  constructor(
    private readonly cards: readonly Card[],
    public readonly numDecks = 1,
  ) {}

  get remaining(): number {
    return this.cards.length - this.index;
  }

  draw(): Card {
    if (this.index >= this.cards.length) throw new ShoeEmptyError(this.numDecks);
    return this.cards[this.index++];
  }
}

export const scriptedShoes =
  (cards: readonly Card[]): ShoeFactory =>
  (numDecks) =>
    new ScriptedShoe(cards, numDecks);

export class ScriptedStrategy implements Strategy {
  readonly name = 'scripted';
  readonly contexts: DecisionContext[] = [];
  readonly rejections: string[] = [];

  constructor(
    private readonly actions: PlayerAction[],
    readonly interactive = true,
  ) {}

  decide(ctx: DecisionContext): PlayerAction {
    this.contexts.push(ctx);
    return this.actions.shift() ?? 'stand';
  }

  splitEligible(hand: HandSnapshot): boolean {
    return hand.pair;
  }

  onRejected(_action: PlayerAction, error: GameValidationError) {
    this.rejections.push(error.code);
  }
}

export class ScriptedBets implements BetSource {
  readonly rejections: string[] = [];

  constructor(
    private readonly amounts: number[],
    readonly interactive = true,
  ) {}

  requestBet(): number {
    return this.amounts.shift() ?? 0;
  }

  onRejected(_amount: number, error: GameValidationError) {
    this.rejections.push(error.code);
  }
}

export class EventLog implements RoundObserver {
  readonly events: RoundEvent[] = [];

  onEvent(event: RoundEvent) {
    this.events.push(event);
  }

  types(): string[] {
    return this.events.map((e) => e.type);
  }
}
