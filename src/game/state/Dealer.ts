// src/game/state/Dealer.ts
import type { Card } from '../../types/index.js';
import { cardLabel } from '../logic/deck.js';
import { Hand } from '../logic/hand.js';

export const DEALER_STANDS_ON = 17;
export const HIDDEN_CARD = 'Hidden';

export class Dealer {
  public readonly name = 'Dealer';
  private _hand = new Hand();

  get hand(): Hand {
    return this._hand;
  }

  /** First dealt card; the second stays face down until the dealer plays. */
  get upCard(): Card | undefined {
    return this._hand.cards[0];
  }

  resetHand() {
    this._hand = new Hand();
  }

  dealCard(card: Card) {
    this._hand.addCard(card);
  }

  // stands on every 17, soft or hard
  shouldHit(): boolean {
    return this._hand.value < DEALER_STANDS_ON;
  }

  getHand(hidden = true): string[] {
    const labels = this._hand.cards.map(cardLabel);
    if (hidden && labels.length > 0) {
      return [labels[0], ...labels.slice(1).map(() => HIDDEN_CARD)];
    }
    return labels;
  }
}
