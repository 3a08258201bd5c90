import type { Card } from '../../types/index.js';
import { cardLabel } from './deck.js';
import { BLACKJACK, handTotals } from './score.js';

export class Hand {
  private readonly _cards: Card[];
  public bet: number;

  constructor(cards: readonly Card[] = [], bet = 0) {
    this._cards = [...cards];
    this.bet = bet;
  }

  get cards(): readonly Card[] {
    return this._cards;
  }

  get size(): number {
    return this._cards.length;
  }

  addCard(card: Card): void {
    this._cards.push(card);
  }

  get value(): number {
    return handTotals(this._cards).best();
  }

  isBlackjack(): boolean {
    return this._cards.length === 2 && this.value === BLACKJACK;
  }

  isBusted(): boolean {
    return this.value > BLACKJACK;
  }

  /** Best value only reachable with an ace counted as 11 */
  isSoft(): boolean {
    const totals = handTotals(this._cards);
    return !this.isBusted() && totals.best() !== totals.min();
  }

  canSplit(): boolean {
    return this._cards.length === 2 && this._cards[0].rank === this._cards[1].rank;
  }

  labels(): string[] {
    return this._cards.map(cardLabel);
  }

  toString(): string {
    return `[${this.labels().join(', ')}] | Value: ${this.value}`;
  }
}
