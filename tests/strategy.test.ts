import { describe, expect, it } from 'vitest';
import type { Card } from '../src/types/index.js';
import { Hand } from '../src/game/logic/hand.js';
import {
  createBotStrategy,
  DefaultBetSource,
  loadBasicStrategy,
  TableStrategy,
  ThresholdStrategy,
} from '../src/game/logic/bot.js';
import { snapshotHand, type DecisionContext } from '../src/game/logic/strategy.js';
import { SettingsError } from '../src/utils/errors/index.js';
import { card } from './helpers.js';

function context(cards: Card[], dealerUpCard: Card, overrides: Partial<DecisionContext> = {}): DecisionContext {
  const hand = new Hand(cards, 10);
  return {
    participant: 'Bot',
    hand: snapshotHand(hand),
    handIndex: 0,
    handCount: 1,
    cardCount: hand.size,
    dealerUpCard,
    balance: 90,
    currentBet: 10,
    canDouble: hand.size === 2,
    canSplit: false,
    ...overrides,
  };
}

describe('ThresholdStrategy', () => {
  const bot = new ThresholdStrategy();

  it('hits up to 16 and stands from 17', () => {
    expect(bot.decide(context([card('10'), card('6')], card('K')))).toBe('hit');
    expect(bot.decide(context([card('10'), card('7')], card('2')))).toBe('stand');
  });

  it('reads a soft hand by its best value', () => {
    expect(bot.decide(context([card('A'), card('6')], card('5')))).toBe('stand');
  });

  it('never asks to split', () => {
    expect(bot.splitEligible(snapshotHand(new Hand([card('8'), card('8', 'Clubs')])))).toBe(false);
  });
});

describe('TableStrategy', () => {
  const bot = new TableStrategy();

  it('looks up dealer value against hand value', () => {
    expect(bot.lookup(10, 11)).toBe('double');
    expect(bot.lookup(2, 12)).toBe('hit');
    expect(bot.lookup(4, 12)).toBe('stand');
    expect(bot.lookup(7, 16)).toBe('hit');
  });

  it('stands on anything the table does not cover', () => {
    expect(bot.lookup(5, 3)).toBe('stand');
    expect(bot.lookup(12, 10)).toBe('stand');
  });

  it('counts an ace up-card as 11', () => {
    expect(bot.decide(context([card('5'), card('6')], card('A')))).toBe('hit');
    expect(bot.decide(context([card('5'), card('6')], card('K')))).toBe('double');
  });

  it('hits instead of doubling when a double is not allowed', () => {
    expect(bot.decide(context([card('5'), card('6')], card('K'), { canDouble: false }))).toBe('hit');
  });

  it('reports an unreadable table file', () => {
    expect(() => loadBasicStrategy('/nonexistent/strategy.json')).toThrow(SettingsError);
  });
});

describe('bot betting', () => {
  it('bets the default amount', () => {
    expect(new DefaultBetSource(10).requestBet({ participant: 'Bot', balance: 100, round: 1 })).toBe(10);
  });

  it('caps the bet at the whole balance', () => {
    expect(new DefaultBetSource(10).requestBet({ participant: 'Bot', balance: 7.5, round: 1 })).toBe(7);
    expect(new DefaultBetSource(10, false).requestBet({ participant: 'Bot', balance: 7, round: 1 })).toBe(10);
  });

  it('builds bots by name', () => {
    expect(createBotStrategy('threshold').name).toBe('threshold');
    expect(createBotStrategy('table').name).toBe('table');
  });
});
