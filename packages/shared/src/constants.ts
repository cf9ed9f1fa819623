export const SUITS = ['Hearts', 'Diamonds', 'Clubs', 'Spades'] as const;
export const RANKS = ['2', '3', '4', '5', '6', '7', '8', '9', '10', 'Jack', 'Queen', 'King', 'Ace'] as const;
export const FACE_RANKS = ['Jack', 'Queen', 'King'] as const;
export const SLAP_TARGET_RANK = 'Jack';

export const STANDARD_DECK_SIZE = SUITS.length * RANKS.length;

export const BLACKJACK_TARGET = 21;
export const DEALER_STAND_SCORE = 17;
export const BLACKJACK_DEAL_CARDS = 4;

export const FLIP_INTERVAL_MS = 1500;
export const REACTION_WINDOW_OPTIONS_MS = [1000, 1500, 2000, 2500, 3000] as const;
export const DEFAULT_REACTION_WINDOW_MS = 2000;

export const PLAYER_NAME = 'Player 1';
export const HIGH_CARD_PLAYER_NAME = 'Player';
export const DEALER_NAME = 'Dealer';
