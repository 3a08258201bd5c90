import type { Card } from '../../types/index.js';
import { cardValues } from './deck.js';

export const BLACKJACK = 21;

// 0..21 plus one bust total
const MAX_TOTALS = 23;

/**
 * Distinct running totals of a hand, in a fixed buffer.
 * Totals above 21 only ever grow, so apart from the smallest one they are dropped on insert.
 */
export class TotalSet {
  private readonly totals = new Int16Array(MAX_TOTALS);
  private count = 0;

  static of(...values: number[]): TotalSet {
    const set = new TotalSet();
    values.forEach((v) => set.add(v));
    return set;
  }

  get size(): number {
    return this.count;
  }

  has(total: number): boolean {
    for (let i = 0; i < this.count; i++) {
      if (this.totals[i] === total) return true;
    }
    return false;
  }

  add(total: number): void {
    if (this.has(total)) return;

    if (total > BLACKJACK) {
      const bust = this.bustIndex();
      if (bust === -1) {
        this.push(total);
      } else if (total < this.totals[bust]) {
        this.totals[bust] = total;
      }
      return;
    }
    this.push(total);
  }

  /** Folds a card's value set into every total. */
  fold(values: readonly number[]): TotalSet {
    const next = new TotalSet();
    for (let i = 0; i < this.count; i++) {
      for (const v of values) next.add(this.totals[i] + v);
    }
    return next;
  }

  /** Largest total <= 21, or the smallest total when every total busts. */
  best(): number {
    let best = -1;
    let min = Number.POSITIVE_INFINITY;
    for (let i = 0; i < this.count; i++) {
      const t = this.totals[i];
      if (t <= BLACKJACK && t > best) best = t;
      if (t < min) min = t;
    }
    if (best >= 0) return best;
    return this.count === 0 ? 0 : min;
  }

  min(): number {
    let min = Number.POSITIVE_INFINITY;
    for (let i = 0; i < this.count; i++) {
      if (this.totals[i] < min) min = this.totals[i];
    }
    return this.count === 0 ? 0 : min;
  }

  values(): number[] {
    return Array.from(this.totals.subarray(0, this.count)).sort((a, b) => a - b);
  }

  private bustIndex(): number {
    for (let i = 0; i < this.count; i++) {
      if (this.totals[i] > BLACKJACK) return i;
    }
    return -1;
  }

  private push(total: number): void {
    if (this.count >= MAX_TOTALS) {
      throw new RangeError(`TotalSet capacity ${MAX_TOTALS} exceeded`);
    }
    this.totals[this.count++] = total;
  }
}

export function handTotals(hand: readonly Card[]): TotalSet {
  return hand.reduce((totals, card) => totals.fold(cardValues(card)), TotalSet.of(0));
}

/** Best value of a hand; an empty hand is worth 0 */
export function calculateScore(hand: readonly Card[]): number {
  return handTotals(hand).best();
}
