import type { Settlement } from '../../types/index.js';
import type { Hand } from './hand.js';

export const BLACKJACK_PAYOUT = 2.5;
export const WIN_PAYOUT = 2;

/**
 * Settles one hand against the dealer's final hand. The stake was taken at bet time,
 * so `payout` is the full amount credited back (0 on a loss).
 */
export function resolveOutcome(hand: Hand, dealerHand: Hand, bet: number): Settlement {
  if (hand.isBusted()) {
    return { result: 'busted', payout: 0 };
  }
  if (hand.isBlackjack()) {
    return { result: 'blackjack', payout: bet * BLACKJACK_PAYOUT };
  }

  const playerScore = hand.value;
  const dealerScore = dealerHand.value;

  if (dealerHand.isBusted() || playerScore > dealerScore) {
    return { result: 'win', payout: bet * WIN_PAYOUT };
  }
  if (playerScore === dealerScore) {
    return { result: 'push', payout: bet };
  }
  return { result: 'lose', payout: 0 };
}
