import { z } from 'zod';
import { RANKS, REACTION_WINDOW_OPTIONS_MS, SUITS } from './constants';
import { ERROR_CODES } from './errors';
import type { ReactionWindowMs } from './types';

export const suitSchema = z.enum(SUITS);
export const rankSchema = z.enum(RANKS);

export const cardSchema = z.object({
  suit: suitSchema,
  rank: rankSchema,
});

export const guessSchema = z.string().trim().min(1, 'guess must not be blank');

const isReactionWindowMs = (value: number): value is ReactionWindowMs =>
  (REACTION_WINDOW_OPTIONS_MS as readonly number[]).includes(value);

export const reactionWindowMsSchema = z
  .number()
  .int()
  .refine(isReactionWindowMs, {
    message: `reaction window must be one of ${REACTION_WINDOW_OPTIONS_MS.join(', ')} ms`,
  });

// "2.5" on the command line means 2500 ms
export const reactionWindowSecondsSchema = z.coerce
  .number()
  .finite()
  .transform((seconds) => Math.round(seconds * 1000))
  .pipe(reactionWindowMsSchema);

export const engineErrorSchema = z.object({
  code: z.enum(ERROR_CODES),
  message: z.string(),
  details: z.unknown().optional(),
});

export const menuCommandSchema = z.tuple([
  z.enum(['blackjack', 'highcard', 'guess', 'slapjack', 'menu', 'help', 'quit']),
]);

// Guess the Card takes free text, so it has no fixed command table.
export const gameCommandSchemas = {
  BLACKJACK: z.tuple([z.enum(['deal', 'hit', 'stand', 'shuffle', 'reset'])]),
  HIGH_CARD: z.tuple([z.enum(['draw', 'dealer', 'yes', 'no'])]),
  SLAPJACK: z.union([
    z.tuple([z.enum(['slap', 'yes', 'no'])]).transform(([name]) => ({ name })),
    z
      .tuple([z.literal('timer'), reactionWindowSecondsSchema])
      .transform(([name, durationMs]) => ({ name, durationMs })),
  ]),
} as const;

export type MenuCommand = z.infer<typeof menuCommandSchema>;
export type GameCommandName = keyof typeof gameCommandSchemas;
export type GameCommand<T extends GameCommandName> = z.infer<(typeof gameCommandSchemas)[T]>;
