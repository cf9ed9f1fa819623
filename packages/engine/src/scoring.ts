import { BLACKJACK_TARGET } from '@card-table/shared';
import type { Card, Rank, RoundWinner } from '@card-table/shared';
import { isFaceRank } from './card';

const ACE_HIGH = 11;
const ACE_REDUCTION = 10;
const FACE_VALUE = 10;

export const blackjackCardValue = (rank: Rank): number => {
  if (rank === 'Ace') {
    return ACE_HIGH;
  }
  if (isFaceRank(rank)) {
    return FACE_VALUE;
  }
  return Number(rank);
};

/** Aces start at 11 and drop to 1, one at a time, while the hand would otherwise bust. */
export const scoreBlackjackHand = (cards: readonly Card[]): number => {
  let score = 0;
  let highAces = 0;

  for (const card of cards) {
    score += blackjackCardValue(card.rank);
    if (card.rank === 'Ace') {
      highAces += 1;
    }
  }

  while (score > BLACKJACK_TARGET && highAces > 0) {
    score -= ACE_REDUCTION;
    highAces -= 1;
  }

  return score;
};

export const isBust = (cards: readonly Card[]): boolean => scoreBlackjackHand(cards) > BLACKJACK_TARGET;

const HIGH_CARD_FACE_VALUES: Partial<Record<Rank, number>> = {
  Jack: 11,
  Queen: 12,
  King: 13,
  Ace: 14,
};

export const highCardValue = (rank: Rank): number => HIGH_CARD_FACE_VALUES[rank] ?? Number(rank);

export const compareHighCard = (player: Card, dealer: Card): RoundWinner => {
  const playerValue = highCardValue(player.rank);
  const dealerValue = highCardValue(dealer.rank);
  if (playerValue > dealerValue) {
    return 'PLAYER';
  }
  if (dealerValue > playerValue) {
    return 'DEALER';
  }
  return 'TIE';
};

export const settleBlackjack = (playerScore: number, dealerScore: number): RoundWinner => {
  if (dealerScore > BLACKJACK_TARGET || playerScore > dealerScore) {
    return 'PLAYER';
  }
  if (playerScore < dealerScore) {
    return 'DEALER';
  }
  return 'TIE';
};

export const matchesGuess = (guess: string, card: Card): boolean =>
  guess.trim().toLowerCase() === card.rank.toLowerCase();
