import { FACE_RANKS, RANKS, SLAP_TARGET_RANK, SUITS } from '@card-table/shared';
import type { Card, Rank, Suit } from '@card-table/shared';

export const createCard = (suit: Suit, rank: Rank): Card => Object.freeze({ suit, rank });

/** Suit-major order: every rank of Hearts, then Diamonds, Clubs and Spades, each from 2 up to Ace. */
export const createStandardDeck = (): Card[] => SUITS.flatMap((suit) => createSuitDeck(suit));

export const createSuitDeck = (suit: Suit): Card[] => RANKS.map((rank) => createCard(suit, rank));

export const formatCard = (card: Card): string => `${card.rank} of ${card.suit}`;

export const isFaceRank = (rank: Rank): boolean => (FACE_RANKS as readonly string[]).includes(rank);

export const isSlapTarget = (card: Card): boolean => card.rank === SLAP_TARGET_RANK;

export const sameCard = (a: Card, b: Card): boolean => a.suit === b.suit && a.rank === b.rank;
