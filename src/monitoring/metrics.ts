// monitoring/metrics.ts
import { Counter, Registry } from 'prom-client';
import type { RoundEvent } from '../types/index.js';
import type { RoundObserver } from '../game/state/RoundEngine.js';

/**
 * Per-session counters fed from round events. Each session owns its registry,
 * so two tables never share numbers.
 */
export class SessionMetrics implements RoundObserver {
  public readonly registry = new Registry();

  public readonly roundsTotal = new Counter({
    name: 'blackjack_rounds_total',
    help: 'Total number of rounds played',
    registers: [this.registry],
  });

  public readonly actionsTotal = new Counter({
    name: 'blackjack_actions_total',
    help: 'Player actions applied, by action',
    labelNames: ['action'] as const,
    registers: [this.registry],
  });

  public readonly rejectedTotal = new Counter({
    name: 'blackjack_rejected_actions_total',
    help: 'Actions and bets rejected by validation, by error code',
    labelNames: ['code'] as const,
    registers: [this.registry],
  });

  public readonly handResultsTotal = new Counter({
    name: 'blackjack_hand_results_total',
    help: 'Settled hands, by result',
    labelNames: ['result'] as const,
    registers: [this.registry],
  });

  public readonly reshufflesTotal = new Counter({
    name: 'blackjack_reshuffles_total',
    help: 'Shoe replacements',
    registers: [this.registry],
  });

  onEvent(event: RoundEvent) {
    switch (event.type) {
      case 'action':
        this.actionsTotal.inc({ action: event.action });
        break;
      case 'rejected':
        this.rejectedTotal.inc({ code: event.code });
        break;
      case 'result':
        this.handResultsTotal.inc({ result: event.result });
        break;
      case 'shuffle':
        this.reshufflesTotal.inc();
        break;
      case 'roundEnd':
        this.roundsTotal.inc();
        break;
      default:
        break;
    }
  }

  /** Prometheus text exposition of every counter */
  summary(): Promise<string> {
    return this.registry.metrics();
  }
}
