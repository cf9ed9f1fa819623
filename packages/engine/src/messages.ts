import { DEALER_NAME, PLAYER_NAME, STANDARD_DECK_SIZE } from '@card-table/shared';
import type { Card, RoundWinner, SlapjackGameOverReason, Suit } from '@card-table/shared';
import { formatCard } from './card';

export const messages = {
  notEnoughCards: 'Not enough cards. Please shuffle or reset.',
  deckEmpty: 'No cards left. Please shuffle or reset.',
  roundInProgress: 'Finish the current hand before dealing again.',
  deckShuffled: 'Deck shuffled!',
  deckReset: `Deck reset to full ${STANDARD_DECK_SIZE} cards.`,
  playerBust: `${PLAYER_NAME} busts! ${DEALER_NAME} wins.`,
  playerAlreadyDrew: 'Player already drew a card!',
  dealerAlreadyDrew: 'Dealer already drew a card!',
  playerMustDrawFirst: 'Player must draw first!',
  noRematchOffered: 'The current round is not over yet.',
  emptyGuess: 'Please enter a rank to guess.',
  guessRoundOver: 'This card has already been revealed.',
  slapjackStarted: 'Game started! Watch for Jacks and SLAP!',
  slapjackRestarted: 'New game started! Watch for Jacks and SLAP!',
  jackRevealed: 'JACK! SLAP NOW!',
  greatSlap: 'Great slap! +1 point',
  falseSlap: 'No Jack to slap! -1 point penalty',
} as const;

export const blackjackOutcomeMessage = (winner: RoundWinner): string => {
  switch (winner) {
    case 'PLAYER':
      return `${PLAYER_NAME} wins!`;
    case 'DEALER':
      return `${DEALER_NAME} wins!`;
    case 'TIE':
      return "It's a tie!";
  }
};

export const highCardOutcomeMessage = (winner: RoundWinner, playerCard: Card, dealerCard: Card): string => {
  switch (winner) {
    case 'PLAYER':
      return `Player wins with ${formatCard(playerCard)} vs ${formatCard(dealerCard)}!`;
    case 'DEALER':
      return `Dealer wins with ${formatCard(dealerCard)} vs ${formatCard(playerCard)}!`;
    case 'TIE':
      return `It's a tie! Both have ${playerCard.rank}!`;
  }
};

export const guessOutcomeMessage = (correct: boolean, card: Card): string =>
  `${correct ? 'Correct!' : 'Wrong!'} It was: ${formatCard(card)}`;

export const cardFlippedMessage = (card: Card): string => `Card flipped: ${formatCard(card)}`;

export const suitAdvancedMessage = (suit: Suit): string => `Moving to ${suit} suit!`;

export const currentSuitMessage = (suit: Suit): string => `Current suit: ${suit}`;

export const slapjackOverMessage = (reason: SlapjackGameOverReason): string =>
  reason === 'MISSED_JACK' ? 'Too slow! You missed the Jack!' : 'All suits completed! Game Over!';
