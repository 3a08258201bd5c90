import type { Card, Rank, Suit } from '../../types/index.js';
import { ShoeEmptyError } from '../../utils/errors/index.js';
import type { Rng } from './rng.js';

export const SUITS: readonly Suit[] = ['Hearts', 'Diamonds', 'Clubs', 'Spades'];
export const RANKS: readonly Rank[] = ['2', '3', '4', '5', '6', '7', '8', '9', '10', 'J', 'Q', 'K', 'A'];

const RANK_NAMES: Record<Rank, string> = {
  '2': '2',
  '3': '3',
  '4': '4',
  '5': '5',
  '6': '6',
  '7': '7',
  '8': '8',
  '9': '9',
  '10': '10',
  J: 'Jack',
  Q: 'Queen',
  K: 'King',
  A: 'Ace',
};

export function createCard(rank: Rank, suit: Suit = 'Hearts'): Card {
  return Object.freeze({ rank, suit });
}

/** Every value a single card can count as. */
export function cardValues(card: Card): readonly number[] {
  if (card.rank === 'A') return [1, 11];
  if (card.rank === 'J' || card.rank === 'Q' || card.rank === 'K') return [10];
  return [parseInt(card.rank, 10)];
}

/** Value of a dealer up-card for table lookups: Ace counts 11. */
export function upCardValue(card: Card): number {
  const values = cardValues(card);
  return values[values.length - 1];
}

export function cardLabel(card: Card): string {
  return `${RANK_NAMES[card.rank]} of ${card.suit}`;
}

export function generateDeck(): Card[] {
  const deck: Card[] = [];
  for (const suit of SUITS) {
    for (const rank of RANKS) {
      deck.push(createCard(rank, suit));
    }
  }
  return deck;
}

/** What the round engine draws from */
export interface CardSource {
  readonly numDecks: number;
  readonly remaining: number;
  draw(): Card;
}

/**
 * Shoe
 * ----
 * `numDecks` full decks shuffled with the injected rng. Cards are drawn from the end,
 * so a draw never repeats a card until the shoe is replaced.
 */
export class Shoe implements CardSource {
  private cards: Card[] = [];
  public readonly size: number;

  constructor(
    public readonly numDecks: number,
    private readonly rng: Rng,
  ) {
    for (let d = 0; d < numDecks; d++) {
      this.cards.push(...generateDeck());
    }
    this.size = this.cards.length;
    this.shuffle();
  }

  get remaining(): number {
    return this.cards.length;
  }

  /** Fisher-Yates over the cards still in the shoe */
  shuffle(): void {
    for (let i = this.cards.length - 1; i > 0; i--) {
      const j = Math.floor(this.rng() * (i + 1));
      [this.cards[i], this.cards[j]] = [this.cards[j], this.cards[i]];
    }
  }

  draw(): Card {
    const card = this.cards.pop();
    if (!card) {
      throw new ShoeEmptyError(this.numDecks);
    }
    return card;
  }
}
