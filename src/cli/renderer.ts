// src/cli/renderer.ts
import { setTimeout as sleep } from 'node:timers/promises';
import chalk, { type ChalkInstance } from 'chalk';
import type { HandResult, RoundEvent } from '../types/index.js';
import { cardLabel } from '../game/logic/deck.js';
import type { RoundObserver } from '../game/state/RoundEngine.js';

export interface RendererOptions {
  dealDelayMs: number;
  showOutput: boolean;
  write?: (line: string) => void;
  chalk?: ChalkInstance;
}

const hand = (cards: string[], value: number) => `[${cards.join(', ')}] | Value: ${value}`;

/**
 * TableRenderer
 * -------------
 * Prints the table as the engine emits events. Deals and dealer hits wait
 * `dealDelayMs` so a human can follow along.
 */
export class TableRenderer implements RoundObserver {
  private readonly write: (line: string) => void;
  private readonly c: ChalkInstance;
  private resultsShown = false;

  constructor(private readonly options: RendererOptions) {
    this.write = options.write ?? ((line) => process.stdout.write(`${line}\n`));
    this.c = options.chalk ?? chalk;
  }

  async onEvent(event: RoundEvent) {
    if (!this.options.showOutput) return;

    switch (event.type) {
      case 'shuffle':
        this.write(this.c.magenta(`[i] Reshuffling deck (${event.remaining} cards)`));
        break;
      case 'deal':
        this.write(`\t${event.target} is dealt ${event.hidden ? '[Hidden]' : cardLabel(event.card)}`);
        await this.pause();
        break;
      case 'turn': {
        const which = event.handIndex > 0 ? ` (hand ${event.handIndex + 1})` : '';
        this.write(this.c.bold(`\n${event.player}'s turn${which}:`));
        this.write(`\tCurrent hand: ${hand(event.hand, event.value)}`);
        if (event.value === 21 && event.hand.length === 2) this.write(this.c.green('\tBlackjack!'));
        break;
      }
      case 'action':
        this.write(`\t${event.player} ${event.action}s: ${hand(event.hand, event.value)}`);
        if (event.value > 21) this.write(this.c.red('\tBusted!'));
        break;
      case 'rejected':
        // humans see the message from their prompt
        if (!event.interactive) this.write(this.c.blue(`\t[i] ${event.player} cannot ${event.action}: ${event.message}`));
        break;
      case 'dealerReveal':
        this.write(this.c.bold(`\nDealer's turn:`));
        this.write(`\tCurrent hand: ${hand(event.hand, event.value)}`);
        break;
      case 'dealerHit':
        this.write(`\tDealer hits: ${cardLabel(event.card)} | Value: ${event.value}`);
        if (event.value > 21) this.write(this.c.green('\tDealer busted!'));
        await this.pause();
        break;
      case 'result':
        if (!this.resultsShown) {
          this.write(this.c.bold('\n=== Results ==='));
          this.resultsShown = true;
        }
        this.write(`${event.player}${event.handIndex > 0 ? ` (hand ${event.handIndex + 1})` : ''}: ${this.describe(event.result, event.payout, event.bet)}`);
        break;
      case 'roundEnd':
        this.resultsShown = false;
        break;
    }
  }

  private describe(result: HandResult, payout: number, bet: number): string {
    switch (result) {
      case 'blackjack':
        return this.c.green(`Blackjack! Won $${payout - bet}`);
      case 'win':
        return this.c.green(`Win! Won $${payout - bet}`);
      case 'push':
        return this.c.yellow(`Push. $${bet} returned`);
      case 'lose':
        return this.c.red(`Lose. Lost $${bet}`);
      case 'busted':
        return this.c.red(`Busted. Lost $${bet}`);
    }
  }

  private async pause() {
    if (this.options.dealDelayMs > 0) await sleep(this.options.dealDelayMs);
  }
}
