// src/game/state/RoundEngine.ts
import type {
  Card,
  HandSettlement,
  PlayerAction,
  PlayerRoundRecord,
  RoundEvent,
  RoundPhase,
  RoundRecord,
} from '../../types/index.js';
import logger from '../../utils/logger.js';
import { ErrorHandler } from '../../middleware/errorHandler.js';
import { type CardSource, Shoe, cardLabel, createCard } from '../logic/deck.js';
import { createRng, type Rng } from '../logic/rng.js';
import { resolveOutcome } from '../logic/winner.js';
import { snapshotHand, type BetSource, type DecisionContext, type Strategy } from '../logic/strategy.js';
import { Dealer } from './Dealer.js';
import type { Participant } from './Participant.js';

export interface Seat {
  participant: Participant;
  strategy: Strategy;
  bets: BetSource;
}

export interface RoundObserver {
  onEvent(event: RoundEvent): void | Promise<void>;
}

export type ShoeFactory = (numDecks: number, rng: Rng) => CardSource;

export interface RoundEngineOptions {
  numDecks: number;
  rng?: Rng;
  godMode?: boolean;
  shoeFactory?: ShoeFactory;
}

// cards per seat (dealer included) that must be left before a deal
export const RESHUFFLE_CARDS_PER_SEAT = 3;

const FALLBACK_ACTION: Record<PlayerAction, PlayerAction> = {
  hit: 'hit',
  stand: 'stand',
  double: 'hit',
  split: 'hit',
};

const FORCED_HAND: readonly Card[] = [createCard('A', 'Hearts'), createCard('K', 'Hearts')];

const defaultShoeFactory: ShoeFactory = (numDecks, rng) => new Shoe(numDecks, rng);

/**
 * RoundEngine
 * -----------
 * Owns the shoe, the dealer and the seats. One call to `playRound` walks
 * reshuffle check -> setup -> betting -> deal -> player turns -> dealer turn -> settlement.
 */
export class RoundEngine {
  private readonly seats: Seat[] = [];
  private readonly observers: RoundObserver[] = [];
  private readonly dealer = new Dealer();
  private readonly rng: Rng;
  private readonly shoeFactory: ShoeFactory;
  private _shoe: CardSource;
  private _phase: RoundPhase = 'idle';
  private roundNumber = 0;

  public readonly numDecks: number;
  public godMode: boolean;

  constructor(options: RoundEngineOptions) {
    this.numDecks = options.numDecks;
    this.rng = options.rng ?? createRng();
    this.godMode = options.godMode ?? false;
    this.shoeFactory = options.shoeFactory ?? defaultShoeFactory;
    this._shoe = this.shoeFactory(this.numDecks, this.rng);
  }

  get shoe(): CardSource {
    return this._shoe;
  }

  get phase(): RoundPhase {
    return this._phase;
  }

  get round(): number {
    return this.roundNumber;
  }

  get participants(): Participant[] {
    return this.seats.map((s) => s.participant);
  }

  addSeat(seat: Seat) {
    this.assertIdle('addSeat');
    if (this.findParticipant(seat.participant.name)) {
      throw new Error(`Participant ${seat.participant.name} is already seated`);
    }
    this.seats.push(seat);
    logger.info(`[SESSION] Seated ${seat.participant.name} (${seat.strategy.name})`);
  }

  subscribe(observer: RoundObserver) {
    this.observers.push(observer);
  }

  findParticipant(name: string): Participant | undefined {
    const wanted = name.toLowerCase();
    return this.participants.find((p) => p.name.toLowerCase() === wanted);
  }

  /** Admin balance change; only between rounds. */
  setBalance(name: string, balance: number): Participant | undefined {
    this.assertIdle('setBalance');
    const participant = this.findParticipant(name);
    participant?.setBalance(balance);
    return participant;
  }

  /** Replaces the shoe when fewer than (seats + 1) * 3 cards are left, or when forced. */
  async checkShoe(force = false): Promise<boolean> {
    const threshold = (this.seats.length + 1) * RESHUFFLE_CARDS_PER_SEAT;
    if (!force && this._shoe.remaining >= threshold) return false;

    logger.info(`[SHOE] Reshuffling deck`, { remaining: this._shoe.remaining, threshold, forced: force });
    this._shoe = this.shoeFactory(this.numDecks, this.rng);
    await this.emit({ type: 'shuffle', remaining: this._shoe.remaining, forced: force });
    return true;
  }

  async forceReshuffle(): Promise<void> {
    this.assertIdle('forceReshuffle');
    await this.checkShoe(true);
  }

  async playRound(): Promise<RoundRecord> {
    this.assertIdle('playRound');
    try {
      this._phase = 'reshuffle_check';
      await this.checkShoe();

      this._phase = 'setup';
      this.setupRound();

      this._phase = 'betting';
      const bettors = await this.collectBets();

      this._phase = 'deal';
      await this.deal(bettors);

      this._phase = 'player_turn';
      for (const seat of bettors) {
        await this.playTurn(seat);
      }

      this._phase = 'dealer_turn';
      await this.playDealer();

      this._phase = 'settlement';
      const settlements = await this.settle(bettors);

      const record = this.buildRecord(settlements);
      logger.info(`[ROUND] Round ${this.roundNumber} finished`, { dealer: record.dealer.finalValue });
      await this.emit({ type: 'roundEnd', record });
      return record;
    } finally {
      this._phase = 'idle';
    }
  }

  private setupRound() {
    for (const seat of this.seats) {
      seat.participant.resetForNewRound();
    }
    this.dealer.resetHand();
    this.roundNumber++;
    logger.info(`[ROUND] Starting round ${this.roundNumber}`, { players: this.participants.map((p) => p.name) });
  }

  private async collectBets(): Promise<Seat[]> {
    const bettors: Seat[] = [];
    for (const seat of this.seats) {
      if (await this.takeBet(seat)) bettors.push(seat);
    }
    return bettors;
  }

  private async takeBet(seat: Seat): Promise<boolean> {
    const { participant, bets } = seat;
    for (;;) {
      const amount = await bets.requestBet({
        participant: participant.name,
        balance: participant.balance,
        round: this.roundNumber,
      });
      if (amount === 0) {
        logger.info(`[BET] ${participant.name} sits out round ${this.roundNumber}`);
        return false;
      }

      try {
        participant.placeBet(amount);
        logger.info(`[BET] ${participant.name} bets ${amount}`, { balance: participant.balance });
        return true;
      } catch (err) {
        const rejection = ErrorHandler.handleActionError(err, {
          operation: 'bet',
          participant: participant.name,
          round: this.roundNumber,
        });
        await this.emit({
          type: 'rejected',
          player: participant.name,
          action: 'bet',
          code: rejection.code,
          message: rejection.message,
          interactive: bets.interactive,
        });
        await bets.onRejected?.(amount, rejection);
        if (!bets.interactive) return false;
      }
    }
  }

  // all first cards, dealer's up card, all second cards, dealer's hole card
  private async deal(bettors: Seat[]) {
    for (let pass = 0; pass < 2; pass++) {
      for (const seat of bettors) {
        // god mode: interactive seats get Ace + King instead of a draw
        const card = this.godMode && seat.strategy.interactive ? FORCED_HAND[pass] : this._shoe.draw();
        seat.participant.hit(card);
        await this.emit({ type: 'deal', target: seat.participant.name, card, handIndex: 0, hidden: false });
      }
      const card = this._shoe.draw();
      this.dealer.dealCard(card);
      await this.emit({ type: 'deal', target: this.dealer.name, card, handIndex: 0, hidden: pass === 1 });
    }
  }

  private upCard(): Card {
    const card = this.dealer.upCard;
    if (!card) throw new Error('Dealer has no visible card before player turns');
    return card;
  }

  private decisionContext(seat: Seat): DecisionContext {
    const { participant, strategy } = seat;
    const hand = participant.activeHand;
    const snapshot = snapshotHand(hand);
    return {
      participant: participant.name,
      hand: snapshot,
      handIndex: participant.activeHandIndex,
      handCount: participant.hands.length,
      cardCount: hand.size,
      dealerUpCard: this.upCard(),
      balance: participant.balance,
      currentBet: participant.currentBet,
      canDouble: hand.size === 2 && hand.bet <= participant.balance,
      canSplit: !participant.hasSplit && hand.bet <= participant.balance && strategy.splitEligible(snapshot),
    };
  }

  private async playTurn(seat: Seat) {
    const { participant } = seat;
    do {
      await this.playHand(seat);
    } while (participant.nextHand());
  }

  private async playHand(seat: Seat) {
    const { participant } = seat;
    const handIndex = participant.activeHandIndex;
    const start = participant.activeHand;
    await this.emit({ type: 'turn', player: participant.name, handIndex, hand: start.labels(), value: start.value });

    for (;;) {
      const hand = participant.activeHand;
      if (hand.isBlackjack() || hand.isBusted()) return;
      if (await this.takeAction(seat)) return;
    }
  }

  /** One decision; true once the active hand is finished. */
  private async takeAction(seat: Seat): Promise<boolean> {
    const { participant, strategy } = seat;
    const action = await strategy.decide(this.decisionContext(seat));
    if (!strategy.interactive) {
      logger.debug(`[BOT] ${participant.name} decided to ${action}`);
    }

    try {
      return await this.applyAction(participant, action);
    } catch (err) {
      const rejection = ErrorHandler.handleActionError(err, {
        operation: action,
        participant: participant.name,
        round: this.roundNumber,
      });
      await this.emit({
        type: 'rejected',
        player: participant.name,
        action,
        code: rejection.code,
        message: rejection.message,
        interactive: strategy.interactive,
      });
      await strategy.onRejected?.(action, rejection);
      if (strategy.interactive) return false;

      const fallback = FALLBACK_ACTION[action];
      logger.info(`[BOT] ${participant.name} cannot ${action}, falling back to ${fallback}`);
      return this.applyAction(participant, fallback);
    }
  }

  private async applyAction(participant: Participant, action: PlayerAction): Promise<boolean> {
    const upCard = cardLabel(this.upCard());
    const handIndex = participant.activeHandIndex;

    switch (action) {
      case 'hit': {
        const card = this._shoe.draw();
        participant.hit(card);
        participant.logAction('hit', upCard);
        await this.emitAction(participant, action);
        return false;
      }
      case 'stand':
        participant.logAction('stand', upCard);
        await this.emitAction(participant, action);
        return true;
      case 'double': {
        participant.assertCanDouble();
        participant.doubleDown(this._shoe.draw());
        participant.logAction('double', upCard);
        await this.emitAction(participant, action);
        return true;
      }
      case 'split': {
        participant.split();
        participant.hit(this._shoe.draw(), handIndex);
        participant.hit(this._shoe.draw(), handIndex + 1);
        participant.logAction('split', upCard);
        await this.emitAction(participant, action);
        return false;
      }
    }
  }

  private emitAction(participant: Participant, action: PlayerAction) {
    const hand = participant.activeHand;
    return this.emit({
      type: 'action',
      player: participant.name,
      handIndex: participant.activeHandIndex,
      action,
      hand: hand.labels(),
      value: hand.value,
    });
  }

  private async playDealer() {
    logger.info(`[DEALER] Dealer turn started`);
    await this.emit({ type: 'dealerReveal', hand: this.dealer.getHand(false), value: this.dealer.hand.value });

    while (this.dealer.shouldHit()) {
      const card = this._shoe.draw();
      this.dealer.dealCard(card);
      await this.emit({ type: 'dealerHit', card, value: this.dealer.hand.value });
    }
    logger.info(`[DEALER] Dealer stands`, { hand: this.dealer.getHand(false), score: this.dealer.hand.value });
  }

  private async settle(bettors: Seat[]): Promise<Map<Participant, HandSettlement[]>> {
    const settlements = new Map<Participant, HandSettlement[]>();
    const dealerHand = this.dealer.hand;

    for (const { participant } of bettors) {
      const rows: HandSettlement[] = [];
      for (const [handIndex, hand] of participant.hands.entries()) {
        const settlement = resolveOutcome(hand, dealerHand, hand.bet);
        participant.applySettlement(handIndex, settlement);
        rows.push({ handIndex, cards: hand.labels(), value: hand.value, bet: hand.bet, ...settlement });
        await this.emit({
          type: 'result',
          player: participant.name,
          handIndex,
          value: hand.value,
          bet: hand.bet,
          result: settlement.result,
          payout: settlement.payout,
          balance: participant.balance,
        });
      }
      settlements.set(participant, rows);
    }
    return settlements;
  }

  private buildRecord(settlements: Map<Participant, HandSettlement[]>): RoundRecord {
    const dealerHand = this.dealer.getHand(false);
    const players: PlayerRoundRecord[] = this.participants.map((p) => {
      const first = p.hands[0];
      return {
        name: p.name,
        bet: p.currentBet,
        actions: [...p.actionLog],
        finalHand: first.labels(),
        finalValue: first.value,
        hands: settlements.get(p) ?? [],
        result: p.result,
        balance: p.balance,
      };
    });

    return {
      gameNumber: this.roundNumber,
      timestamp: new Date().toISOString(),
      dealer: {
        initialHand: this.dealer.getHand(true).slice(0, 2),
        finalHand: dealerHand,
        finalValue: this.dealer.hand.value,
      },
      players,
    };
  }

  private async emit(event: RoundEvent) {
    for (const observer of this.observers) {
      await observer.onEvent(event);
    }
  }

  private assertIdle(operation: string) {
    if (this._phase !== 'idle') {
      throw new Error(`${operation} is not allowed while a round is in progress (${this._phase})`);
    }
  }
}
