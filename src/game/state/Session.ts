// src/game/state/Session.ts
import type { RoundRecord } from '../../types/index.js';
import type { GameSettings } from '../../config/settings.js';
import logger from '../../utils/logger.js';
import { ErrorHandler } from '../../middleware/errorHandler.js';
import { createBotStrategy, DefaultBetSource } from '../logic/bot.js';
import { PromptBetSource, PromptStrategy, type BetInput, type DecisionInput } from '../logic/human.js';
import { createRng } from '../logic/rng.js';
import { Participant } from './Participant.js';
import { RoundEngine, type RoundEngineOptions, type RoundObserver } from './RoundEngine.js';

export interface HumanInput extends DecisionInput, BetInput {}

export interface SessionOptions {
  minimumBalance: number;
  maxRounds?: number;
}

export interface BalanceLine {
  name: string;
  balance: number;
}

/** A table: the engine, its seats, and the rules for when play stops. */
export class Session {
  constructor(
    public readonly engine: RoundEngine,
    private readonly options: SessionOptions,
  ) {}

  static create(
    settings: GameSettings,
    humans: string[],
    input?: HumanInput,
    engineOverrides: Partial<RoundEngineOptions> = {},
  ): Session {
    const engine = new RoundEngine({
      numDecks: settings.numDecks,
      rng: createRng(settings.seed),
      godMode: settings.godMode,
      ...engineOverrides,
    });

    if (humans.length > 0) {
      if (!input) throw new Error('Human players need an input source');
      for (const name of humans) {
        engine.addSeat({
          participant: new Participant(name, settings.startingBalance),
          strategy: new PromptStrategy(input),
          bets: new PromptBetSource(input),
        });
      }
    }
    for (const bot of settings.bots) {
      engine.addSeat({
        participant: new Participant(bot.name, settings.startingBalance),
        strategy: createBotStrategy(bot.strategy),
        bets: new DefaultBetSource(settings.defaultBet, settings.capBotBet),
      });
    }

    return new Session(engine, { minimumBalance: settings.minimumBalance, maxRounds: settings.maxRounds });
  }

  get roundsPlayed(): number {
    return this.engine.round;
  }

  subscribe(observer: RoundObserver) {
    this.engine.subscribe(observer);
  }

  canContinue(): boolean {
    const { maxRounds, minimumBalance } = this.options;
    if (maxRounds !== undefined && this.engine.round >= maxRounds) {
      logger.info(`[SESSION] Round limit ${maxRounds} reached`);
      return false;
    }
    if (!this.engine.participants.some((p) => p.balance >= minimumBalance)) {
      logger.info(`[SESSION] No participant holds the minimum balance of ${minimumBalance}`);
      return false;
    }
    return true;
  }

  playRound(): Promise<RoundRecord> {
    return ErrorHandler.monitorPerformance(`round ${this.engine.round + 1}`, () => this.engine.playRound());
  }

  balances(): BalanceLine[] {
    return this.engine.participants.map((p) => ({ name: p.name, balance: p.balance }));
  }

  /** Returns the previous balance, or undefined when nobody has that name. */
  editBalance(name: string, balance: number): { name: string; previous: number; balance: number } | undefined {
    const participant = this.engine.findParticipant(name);
    if (!participant) return undefined;
    const previous = participant.balance;
    this.engine.setBalance(participant.name, balance);
    logger.info(`[SESSION] ${participant.name}'s balance set`, { previous, balance });
    return { name: participant.name, previous, balance };
  }

  reshuffle(): Promise<void> {
    return this.engine.forceReshuffle();
  }

  setGodMode(on: boolean) {
    this.engine.godMode = on;
    logger.info(`[SESSION] God mode ${on ? 'on' : 'off'}`);
  }
}
