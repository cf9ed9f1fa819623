export { BlackjackEngine } from './blackjack';
export type { BlackjackOptions } from './blackjack';
export { HighCardEngine } from './high-card';
export type { HighCardOptions } from './high-card';
export { SlapjackEngine } from './slapjack';
export type { SlapjackOptions } from './slapjack';
export { GuessTheCardRound, chooseCard, playGuessTheCard } from './guess-the-card';
export { Deck, shuffleCards } from './deck';
export { Hand, handView } from './hand';
export { createCard, createStandardDeck, createSuitDeck, formatCard, isSlapTarget, sameCard } from './card';
export {
  blackjackCardValue,
  compareHighCard,
  highCardValue,
  isBust,
  matchesGuess,
  scoreBlackjackHand,
  settleBlackjack,
} from './scoring';
export { currentSuitMessage, messages } from './messages';
export { createSeededRandom, defaultRandom } from './random';
export type { RandomSource } from './random';
export type {
  BlackjackEffect,
  EngineOptions,
  EngineResult,
  GameEngine,
  GuessTheCardEffect,
  HighCardEffect,
  SlapjackEffect,
  ValidationResult,
} from './types';
