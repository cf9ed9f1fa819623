export const ERROR_CODES = [
  'NOT_ENOUGH_CARDS',
  'DECK_EMPTY',
  'ROUND_IN_PROGRESS',
  'PLAYER_ALREADY_DREW',
  'DEALER_ALREADY_DREW',
  'PLAYER_MUST_DRAW_FIRST',
  'NO_REMATCH_OFFERED',
  'EMPTY_GUESS',
  'ROUND_OVER',
  'GAME_OVER',
  'INVALID_REACTION_WINDOW',
  'INVALID_COMMAND',
  'NO_ACTIVE_GAME',
  'INTERNAL_ERROR',
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];
