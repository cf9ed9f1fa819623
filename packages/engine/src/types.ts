import type {
  Card,
  EngineError,
  ErrorCode,
  Participant,
  ReactionWindowMs,
  RoundWinner,
  SlapjackGameOverReason,
  Suit,
} from '@card-table/shared';
import type { RandomSource } from './random';

export type BlackjackEffect =
  | { type: 'CARD_DEALT'; to: Participant; card: Card }
  | { type: 'PLAYER_BUST'; playerScore: number; message: string }
  | { type: 'ROUND_SETTLED'; winner: RoundWinner; playerScore: number; dealerScore: number; message: string }
  | { type: 'DECK_SHUFFLED'; message: string }
  | { type: 'DECK_RESET'; deckSize: number; message: string };

export type HighCardEffect =
  | { type: 'CARD_DEALT'; to: Participant; card: Card }
  | { type: 'DECK_RECYCLED'; deckSize: number }
  | {
      type: 'ROUND_SETTLED';
      winner: RoundWinner;
      playerCard: Card;
      dealerCard: Card;
      rematchOffered: true;
      message: string;
    }
  | { type: 'REMATCH_STARTED' };

export type SlapjackEffect =
  | { type: 'CARD_FLIPPED'; card: Card; message: string }
  | { type: 'JACK_REVEALED'; card: Card; windowId: number; durationMs: ReactionWindowMs; message: string }
  | { type: 'SUIT_ADVANCED'; suit: Suit; suitIndex: number; message: string }
  | { type: 'SLAP_SUCCESS'; card: Card; score: number; message: string }
  | { type: 'SLAP_PENALTY'; score: number; message: string }
  | { type: 'REACTION_WINDOW_CHANGED'; durationMs: ReactionWindowMs }
  | {
      type: 'GAME_FINISHED';
      reason: SlapjackGameOverReason;
      score: number;
      cardsCollected: number;
      message: string;
    }
  | { type: 'GAME_STARTED'; suit: Suit; message: string };

export type GuessTheCardEffect = {
  type: 'GUESS_SETTLED';
  correct: boolean;
  card: Card;
  message: string;
};

export type ValidationResult = { ok: true } | { ok: false; code: ErrorCode; message: string };

export interface EngineResult<TEffect> {
  effects: TEffect[];
  error?: EngineError;
}

/** What every game variant offers a presentation layer beside its own actions. */
export interface GameEngine<TView> {
  readonly version: number;
  view(): TView;
}

export interface EngineOptions {
  random?: RandomSource;
}
