import { describe, expect, it } from 'vitest';
import type { Card } from '../src/types/index.js';
import { DefaultBetSource, TableStrategy, ThresholdStrategy } from '../src/game/logic/bot.js';
import { cardLabel } from '../src/game/logic/deck.js';
import { createRng } from '../src/game/logic/rng.js';
import { Participant } from '../src/game/state/Participant.js';
import { RoundEngine } from '../src/game/state/RoundEngine.js';
import { ShoeEmptyError } from '../src/utils/errors/index.js';
import { card, EventLog, ScriptedBets, ScriptedStrategy, scriptedShoes } from './helpers.js';

const padding = [card('2', 'Clubs'), card('3', 'Clubs'), card('4', 'Clubs'), card('5', 'Clubs')];

function table(cards: Card[], godMode = false) {
  const engine = new RoundEngine({ numDecks: 1, godMode, shoeFactory: scriptedShoes(cards) });
  const log = new EventLog();
  engine.subscribe(log);
  return { engine, log };
}

function seat(engine: RoundEngine, name: string, strategy: ScriptedStrategy, bets = new ScriptedBets([10]), balance = 100) {
  const participant = new Participant(name, balance);
  engine.addSeat({ participant, strategy, bets });
  return participant;
}

describe('RoundEngine deal', () => {
  it('deals round-robin with the dealer second card face down', async () => {
    const { engine, log } = table([
      card('10'),
      card('10', 'Diamonds'),
      card('7', 'Clubs'),
      card('9'),
      card('8', 'Diamonds'),
      card('10', 'Spades'),
      ...padding,
    ]);
    const alice = seat(engine, 'Alice', new ScriptedStrategy(['stand']));
    const bob = seat(engine, 'Bob', new ScriptedStrategy(['stand']));

    const record = await engine.playRound();

    const deals = log.events.flatMap((e) => (e.type === 'deal' ? [[e.target, e.hidden]] : []));
    expect(deals).toEqual([
      ['Alice', false],
      ['Bob', false],
      ['Dealer', false],
      ['Alice', false],
      ['Bob', false],
      ['Dealer', true],
    ]);
    expect(log.types()).toEqual([
      'deal',
      'deal',
      'deal',
      'deal',
      'deal',
      'deal',
      'turn',
      'action',
      'turn',
      'action',
      'dealerReveal',
      'result',
      'result',
      'roundEnd',
    ]);
    expect(record.dealer).toEqual({
      initialHand: ['7 of Clubs', 'Hidden'],
      finalHand: ['7 of Clubs', '10 of Spades'],
      finalValue: 17,
    });
    expect(alice.balance).toBe(110);
    expect(bob.balance).toBe(110);
    expect(record.players[0]).toEqual({
      name: 'Alice',
      bet: 10,
      actions: [{ action: 'stand', hand: ['10 of Hearts', '9 of Hearts'], handValue: 19, dealerVisibleCard: '7 of Clubs' }],
      finalHand: ['10 of Hearts', '9 of Hearts'],
      finalValue: 19,
      hands: [{ handIndex: 0, cards: ['10 of Hearts', '9 of Hearts'], value: 19, bet: 10, result: 'win', payout: 20 }],
      result: 'win',
      balance: 110,
    });
    expect(engine.phase).toBe('idle');
    expect(engine.round).toBe(1);
  });

  it('hands the strategy what it needs to decide', async () => {
    const { engine } = table([card('10'), card('7', 'Clubs'), card('9'), card('10', 'Spades'), ...padding]);
    const strategy = new ScriptedStrategy(['stand']);
    seat(engine, 'Alice', strategy);

    await engine.playRound();

    const [ctx] = strategy.contexts;
    expect(ctx.dealerUpCard).toEqual(card('7', 'Clubs'));
    expect(ctx.hand.value).toBe(19);
    expect(ctx.cardCount).toBe(2);
    expect(ctx.balance).toBe(90);
    expect(ctx.canDouble).toBe(true);
    expect(ctx.canSplit).toBe(false);
  });
});

describe('RoundEngine actions', () => {
  it('plays both split hands in order, doubling the first', async () => {
    const { engine } = table([
      card('8'),
      card('6', 'Clubs'),
      card('8', 'Diamonds'),
      card('10', 'Spades'),
      card('3'),
      card('2', 'Diamonds'),
      card('10'),
      card('9', 'Clubs'),
      card('10', 'Diamonds'),
    ]);
    const strategy = new ScriptedStrategy(['split', 'double', 'hit', 'stand']);
    const alice = seat(engine, 'Alice', strategy);

    const record = await engine.playRound();

    expect(strategy.contexts.map((c) => [c.handIndex, c.handCount, c.hand.value])).toEqual([
      [0, 1, 16],
      [0, 2, 11],
      [1, 2, 10],
      [1, 2, 19],
    ]);
    expect(alice.currentBet).toBe(30);
    expect(alice.balance).toBe(130);
    expect(record.dealer.finalValue).toBe(26);
    expect(record.players[0].hands).toEqual([
      {
        handIndex: 0,
        cards: ['8 of Hearts', '3 of Hearts', '10 of Hearts'],
        value: 21,
        bet: 20,
        result: 'win',
        payout: 40,
      },
      {
        handIndex: 1,
        cards: ['8 of Diamonds', '2 of Diamonds', '9 of Clubs'],
        value: 19,
        bet: 10,
        result: 'win',
        payout: 20,
      },
    ]);
    expect(record.players[0].actions.map((a) => a.action)).toEqual(['split', 'double', 'hit', 'stand']);
  });

  it('keeps asking on a three-card 21', async () => {
    const { engine } = table([card('7'), card('10', 'Clubs'), card('7', 'Diamonds'), card('9', 'Spades'), card('7', 'Clubs'), card('2', 'Clubs')]);
    const strategy = new ScriptedStrategy(['hit', 'stand']);
    const alice = seat(engine, 'Alice', strategy);

    await engine.playRound();

    expect(strategy.contexts).toHaveLength(2);
    expect(strategy.contexts[1].hand.value).toBe(21);
    expect(alice.balance).toBe(110);
  });

  it('re-asks a human after a rejected double without drawing', async () => {
    const { engine, log } = table([card('5'), card('10', 'Clubs'), card('6'), card('7', 'Spades'), card('2', 'Diamonds'), card('3', 'Clubs')]);
    const strategy = new ScriptedStrategy(['hit', 'double', 'stand']);
    const alice = seat(engine, 'Alice', strategy);

    const record = await engine.playRound();

    expect(strategy.rejections).toEqual(['NOT_DOUBLEABLE']);
    expect(log.events.find((e) => e.type === 'rejected')).toEqual({
      type: 'rejected',
      player: 'Alice',
      action: 'double',
      code: 'NOT_DOUBLEABLE',
      message: 'Cannot double down after a hit.',
      interactive: true,
    });
    expect(engine.shoe.remaining).toBe(1);
    expect(record.players[0].actions.map((a) => a.action)).toEqual(['hit', 'stand']);
    expect(alice.balance).toBe(90);
    expect(alice.result).toBe('lose');
  });

  it('falls back to a hit when a bot cannot split', async () => {
    const { engine } = table([card('5'), card('10', 'Clubs'), card('6'), card('7', 'Spades'), card('9', 'Diamonds'), card('2', 'Clubs')]);
    const strategy = new ScriptedStrategy(['split'], false);
    const bot = seat(engine, 'Bot', strategy, new ScriptedBets([10], false));

    const record = await engine.playRound();

    expect(strategy.rejections).toEqual(['NOT_SPLITTABLE']);
    expect(record.players[0].actions.map((a) => a.action)).toEqual(['hit', 'stand']);
    expect(record.players[0].finalValue).toBe(20);
    expect(bot.balance).toBe(110);
  });

  it('falls back to a hit when a bot cannot afford to double', async () => {
    const { engine } = table([card('5'), card('10', 'Clubs'), card('6'), card('7', 'Spades'), card('9', 'Diamonds'), card('2', 'Clubs')]);
    const strategy = new ScriptedStrategy(['double'], false);
    const bot = seat(engine, 'Bot', strategy, new ScriptedBets([10], false), 15);

    await engine.playRound();

    expect(strategy.rejections).toEqual(['INSUFFICIENT_BALANCE']);
    expect(bot.activeHand.bet).toBe(10);
    expect(bot.balance).toBe(25);
  });
});

describe('RoundEngine betting', () => {
  const dealtToAliceOnly = [card('10'), card('7', 'Clubs'), card('9'), card('10', 'Spades'), ...padding, card('6', 'Clubs')];

  it('re-asks a human bet and lets a zero bet sit out', async () => {
    const { engine, log } = table(dealtToAliceOnly);
    const aliceBets = new ScriptedBets([500, 10]);
    const alice = seat(engine, 'Alice', new ScriptedStrategy(['stand']), aliceBets);
    const bob = seat(engine, 'Bob', new ScriptedStrategy([]), new ScriptedBets([0]));

    const record = await engine.playRound();

    expect(aliceBets.rejections).toEqual(['INSUFFICIENT_BALANCE']);
    expect(alice.balance).toBe(110);
    expect(bob.balance).toBe(100);
    expect(log.events.filter((e) => e.type === 'deal')).toHaveLength(4);
    expect(record.players[1]).toEqual({
      name: 'Bob',
      bet: 0,
      actions: [],
      finalHand: [],
      finalValue: 0,
      hands: [],
      result: null,
      balance: 100,
    });
  });

  it('sits a bot out after a rejected bet', async () => {
    const { engine } = table(dealtToAliceOnly);
    seat(engine, 'Alice', new ScriptedStrategy(['stand']));
    const botBets = new ScriptedBets([500], false);
    const bot = seat(engine, 'Bot', new ScriptedStrategy([], false), botBets);

    const record = await engine.playRound();

    expect(botBets.rejections).toEqual(['INSUFFICIENT_BALANCE']);
    expect(bot.balance).toBe(100);
    expect(record.players[1].hands).toEqual([]);
  });

  it('deals a blackjack to humans in god mode', async () => {
    const { engine, log } = table([card('9', 'Clubs'), card('7', 'Spades'), card('5', 'Diamonds'), ...padding], true);
    const strategy = new ScriptedStrategy([]);
    const alice = seat(engine, 'Alice', strategy);

    const record = await engine.playRound();

    expect(strategy.contexts).toHaveLength(0);
    expect(log.events.flatMap((e) => (e.type === 'deal' ? [[e.target, cardLabel(e.card)]] : []))).toEqual([
      ['Alice', 'Ace of Hearts'],
      ['Dealer', '9 of Clubs'],
      ['Alice', 'King of Hearts'],
      ['Dealer', '7 of Spades'],
    ]);
    expect(record.players[0].finalHand).toEqual(['Ace of Hearts', 'King of Hearts']);
    expect(record.players[0].result).toBe('blackjack');
    expect(record.dealer.finalValue).toBe(21);
    expect(alice.balance).toBe(115);
  });
});

describe('RoundEngine shoe and lifecycle', () => {
  it('reshuffles exactly when fewer than (seats + 1) * 3 cards are left', async () => {
    const engine = new RoundEngine({ numDecks: 1, rng: createRng(5) });
    const log = new EventLog();
    engine.subscribe(log);
    seat(engine, 'Alice', new ScriptedStrategy([]));

    for (let i = 0; i < 46; i++) engine.shoe.draw();
    expect(await engine.checkShoe()).toBe(false);
    expect(engine.shoe.remaining).toBe(6);

    engine.shoe.draw();
    expect(await engine.checkShoe()).toBe(true);
    expect(engine.shoe.remaining).toBe(52);
    expect(log.events).toEqual([{ type: 'shuffle', remaining: 52, forced: false }]);
  });

  it('fails the round when the shoe runs dry mid-turn', async () => {
    const { engine } = table([card('2'), card('10', 'Clubs'), card('3'), card('7', 'Spades'), card('4'), card('5')]);
    const strategy = new ScriptedStrategy(['hit', 'hit', 'hit']);
    const alice = seat(engine, 'Alice', strategy);

    await expect(engine.playRound()).rejects.toThrow(ShoeEmptyError);

    expect(strategy.contexts).toHaveLength(3);
    expect(engine.shoe.remaining).toBe(0);
    expect(alice.activeHand.value).toBe(14);
    expect(alice.balance).toBe(90);
    expect(engine.phase).toBe('idle');
  });

  it('keeps the dealer drawing to at least 17', async () => {
    const engine = new RoundEngine({ numDecks: 8, rng: createRng(11) });
    engine.addSeat({
      participant: new Participant('Low', 100),
      strategy: new ThresholdStrategy(),
      bets: new DefaultBetSource(5),
    });
    engine.addSeat({
      participant: new Participant('Book', 100),
      strategy: new TableStrategy(),
      bets: new DefaultBetSource(5),
    });

    for (let round = 0; round < 25; round++) {
      const record = await engine.playRound();
      expect(record.dealer.finalValue).toBeGreaterThanOrEqual(17);
      for (const player of record.players) {
        expect(player.balance).toBeGreaterThanOrEqual(0);
      }
    }
  });

  it('waits for async observers before moving on', async () => {
    const { engine, log } = table([card('10'), card('7', 'Clubs'), card('9'), card('10', 'Spades'), ...padding]);
    const slow: string[] = [];
    engine.subscribe({
      onEvent: async (event) => {
        await new Promise((resolve) => setTimeout(resolve, 1));
        slow.push(event.type);
      },
    });
    seat(engine, 'Alice', new ScriptedStrategy(['stand']));

    await engine.playRound();

    expect(slow).toEqual(log.types());
  });

  it('refuses admin changes mid-round and returns to idle', async () => {
    const { engine } = table([card('10'), card('7', 'Clubs'), card('9'), card('10', 'Spades'), ...padding]);
    seat(engine, 'Alice', new ScriptedStrategy(['stand']));
    engine.subscribe({ onEvent: () => void engine.setBalance('Alice', 500) });

    await expect(engine.playRound()).rejects.toThrow('setBalance is not allowed while a round is in progress (deal)');
    expect(engine.phase).toBe('idle');
  });

  it('refuses a second seat with the same name', () => {
    const { engine } = table(padding);
    seat(engine, 'Alice', new ScriptedStrategy([]));
    expect(() => seat(engine, 'alice', new ScriptedStrategy([]))).toThrow('Participant alice is already seated');
  });
});
