import type { REACTION_WINDOW_OPTIONS_MS, RANKS, SUITS } from './constants';
import type { ErrorCode } from './errors';

export type Suit = (typeof SUITS)[number];
export type Rank = (typeof RANKS)[number];
export type ReactionWindowMs = (typeof REACTION_WINDOW_OPTIONS_MS)[number];

export interface Card {
  readonly suit: Suit;
  readonly rank: Rank;
}

export type GameKind = 'BLACKJACK' | 'HIGH_CARD' | 'GUESS_THE_CARD' | 'SLAPJACK';
export type Participant = 'PLAYER' | 'DEALER';
export type RoundWinner = Participant | 'TIE';

export type BlackjackPhase = 'AWAITING_DEAL' | 'PLAYER_TURN' | 'DEALER_TURN' | 'ROUND_OVER';
export type HighCardPhase = 'IDLE' | 'PLAYER_DRAWN' | 'ROUND_OVER';
export type SlapjackPhase = 'RUNNING' | 'SUIT_EXHAUSTED' | 'GAME_OVER';
export type SlapjackGameOverReason = 'ALL_SUITS_COMPLETE' | 'MISSED_JACK';

export interface EngineError {
  code: ErrorCode;
  message: string;
  details?: unknown | undefined;
}

export interface HandView {
  name: string;
  cards: Card[];
}

export interface ScoredHandView extends HandView {
  score: number;
}

export interface BlackjackView {
  phase: BlackjackPhase;
  playerTurn: boolean;
  player: ScoredHandView;
  dealer: ScoredHandView;
  deckSize: number;
  outcome?: RoundWinner | undefined;
  version: number;
}

export interface HighCardView {
  phase: HighCardPhase;
  player: HandView;
  dealer: HandView;
  deckSize: number;
  outcome?: RoundWinner | undefined;
  rematchOffered: boolean;
  version: number;
}

export interface ReactionWindowState {
  windowId: number;
  durationMs: number;
}

export interface SlapjackView {
  phase: SlapjackPhase;
  suit: Suit;
  suitIndex: number;
  currentCard?: Card | undefined;
  jackLive: boolean;
  armedWindow?: ReactionWindowState | undefined;
  reactionWindowMs: ReactionWindowMs;
  score: number;
  collected: Card[];
  cardsLeftInSuit: number;
  gameOverReason?: SlapjackGameOverReason | undefined;
  version: number;
}

export interface GuessTheCardView {
  settled: boolean;
  correct?: boolean | undefined;
  revealedCard?: Card | undefined;
  version: number;
}
