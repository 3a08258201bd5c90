// src/game/state/Participant.ts
import type { ActionLogEntry, Card, PlayerAction, PlayerResult, Settlement } from '../../types/index.js';
import {
  InsufficientBalanceError,
  InvalidBetError,
  NotDoubleableError,
  NotSplittableError,
} from '../../utils/errors/index.js';
import { Hand } from '../logic/hand.js';

/**
 * A seated player or bot. Every mutator validates first and mutates after,
 * so a rejected action leaves the participant exactly as it was.
 */
export class Participant {
  private _balance: number;
  private _hands: Hand[] = [new Hand()];
  private _currentBet = 0;
  private _actionLog: ActionLogEntry[] = [];
  private _result: PlayerResult = null;
  private activeIndex = 0;
  private splitThisRound = false;
  private readonly settled = new Set<number>();

  constructor(
    public readonly name: string,
    balance: number,
  ) {
    if (balance < 0) throw new RangeError(`Balance cannot be negative: ${balance}`);
    this._balance = balance;
  }

  get balance(): number {
    return this._balance;
  }

  get hands(): readonly Hand[] {
    return this._hands;
  }

  get currentBet(): number {
    return this._currentBet;
  }

  get actionLog(): readonly ActionLogEntry[] {
    return this._actionLog;
  }

  get result(): PlayerResult {
    return this._result;
  }

  get hasSplit(): boolean {
    return this.splitThisRound;
  }

  get activeHandIndex(): number {
    return this.activeIndex;
  }

  get activeHand(): Hand {
    return this._hands[this.activeIndex];
  }

  placeBet(amount: number) {
    if (!Number.isInteger(amount) || amount <= 0) {
      throw new InvalidBetError('Bet amount must be greater than zero.', { participant: this.name, amount });
    }
    if (amount > this._balance) {
      throw new InsufficientBalanceError('Bet amount exceeds available balance.', {
        participant: this.name,
        amount,
        balance: this._balance,
      });
    }

    this._balance -= amount;
    this._currentBet = amount;
    this.activeHand.bet = amount;
  }

  hit(card: Card, handIndex = this.activeIndex) {
    const hand = this._hands[handIndex];
    if (!hand) throw new RangeError(`${this.name} has no hand ${handIndex}`);
    hand.addCard(card);
  }

  split() {
    const hand = this.activeHand;
    if (this.splitThisRound) {
      throw new NotSplittableError('Cannot split more than once.', { participant: this.name, cards: hand.labels() });
    }
    if (!hand.canSplit()) {
      throw new NotSplittableError('Cannot split: Hand must have exactly two cards of the same rank.', {
        participant: this.name,
        cards: hand.labels(),
      });
    }
    if (hand.bet > this._balance) {
      throw new InsufficientBalanceError('Insufficient balance to split.', {
        participant: this.name,
        amount: hand.bet,
        balance: this._balance,
      });
    }

    const [first, second] = hand.cards;
    this._hands.splice(this.activeIndex, 1, new Hand([first], hand.bet), new Hand([second], hand.bet));
    this._balance -= hand.bet;
    this._currentBet += hand.bet;
    this.splitThisRound = true;
  }

  /** Throws the same errors `doubleDown` would, without touching anything. */
  assertCanDouble() {
    const hand = this.activeHand;
    if (hand.bet > this._balance) {
      throw new InsufficientBalanceError('Insufficient balance to double down.', {
        participant: this.name,
        amount: hand.bet,
        balance: this._balance,
      });
    }
    if (hand.size !== 2) {
      throw new NotDoubleableError('Cannot double down after a hit.', { participant: this.name, cards: hand.labels() });
    }
  }

  doubleDown(card: Card) {
    this.assertCanDouble();
    const hand = this.activeHand;
    this._balance -= hand.bet;
    this._currentBet += hand.bet;
    hand.bet *= 2;
    hand.addCard(card);
  }

  /** Moves play to the next split hand; false when there is none. */
  nextHand(): boolean {
    if (this.activeIndex + 1 >= this._hands.length) return false;
    this.activeIndex++;
    return true;
  }

  logAction(action: PlayerAction, dealerVisibleCard: string) {
    const hand = this.activeHand;
    this._actionLog.push({
      action,
      hand: hand.labels(),
      handValue: hand.value,
      dealerVisibleCard,
    });
  }

  applySettlement(handIndex: number, settlement: Settlement) {
    if (this.settled.has(handIndex)) {
      throw new Error(`Hand ${handIndex} of ${this.name} is already settled`);
    }
    this.settled.add(handIndex);
    this._balance += settlement.payout;
    this._result = settlement.result;
  }

  setBalance(balance: number) {
    if (balance < 0) throw new RangeError(`Balance cannot be negative: ${balance}`);
    this._balance = balance;
  }

  resetForNewRound() {
    this._hands = [new Hand()];
    this._currentBet = 0;
    this._actionLog = [];
    this._result = null;
    this.activeIndex = 0;
    this.splitThisRound = false;
    this.settled.clear();
  }
}
