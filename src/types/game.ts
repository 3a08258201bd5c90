export type Suit = 'Hearts' | 'Diamonds' | 'Clubs' | 'Spades';

export type Rank = '2' | '3' | '4' | '5' | '6' | '7' | '8' | '9' | '10' | 'J' | 'Q' | 'K' | 'A';

export interface Card {
  readonly suit: Suit;
  readonly rank: Rank;
}

export type PlayerAction = 'hit' | 'stand' | 'double' | 'split';

export type HandResult = 'blackjack' | 'win' | 'push' | 'lose' | 'busted';

export type PlayerResult = HandResult | null;

export interface ActionLogEntry {
  action: PlayerAction;
  hand: string[];
  handValue: number;
  dealerVisibleCard: string;
}

export interface Settlement {
  result: HandResult;
  payout: number;
}

export interface HandSettlement extends Settlement {
  handIndex: number;
  cards: string[];
  value: number;
  bet: number;
}

export type RoundPhase = 'idle' | 'reshuffle_check' | 'setup' | 'betting' | 'deal' | 'player_turn' | 'dealer_turn' | 'settlement';

export type RoundEvent =
  | { type: 'shuffle'; remaining: number; forced: boolean }
  | { type: 'deal'; target: string; card: Card; handIndex: number; hidden: boolean }
  | { type: 'turn'; player: string; handIndex: number; hand: string[]; value: number }
  | { type: 'action'; player: string; handIndex: number; action: PlayerAction; hand: string[]; value: number }
  | { type: 'rejected'; player: string; action: PlayerAction | 'bet'; code: string; message: string; interactive: boolean }
  | { type: 'dealerReveal'; hand: string[]; value: number }
  | { type: 'dealerHit'; card: Card; value: number }
  | {
      type: 'result';
      player: string;
      handIndex: number;
      value: number;
      bet: number;
      result: HandResult;
      payout: number;
      balance: number;
    }
  | { type: 'roundEnd'; record: RoundRecord };

export interface PlayerRoundRecord {
  name: string;
  bet: number;
  actions: ActionLogEntry[];
  finalHand: string[];
  finalValue: number;
  hands: HandSettlement[];
  result: PlayerResult;
  balance: number;
}

export interface RoundRecord {
  gameNumber: number;
  timestamp: string;
  dealer: {
    initialHand: string[];
    finalHand: string[];
    finalValue: number;
  };
  players: PlayerRoundRecord[];
}
