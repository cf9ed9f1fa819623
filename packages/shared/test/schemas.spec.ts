import { describe, expect, it } from 'vitest';
import {
  cardSchema,
  engineErrorSchema,
  gameCommandSchemas,
  guessSchema,
  menuCommandSchema,
  reactionWindowSecondsSchema,
} from '../src';

describe('card and guess schemas', () => {
  it('accepts a known card and rejects an unknown rank', () => {
    expect(cardSchema.safeParse({ suit: 'Spades', rank: 'Queen' }).success).toBe(true);
    expect(cardSchema.safeParse({ suit: 'Spades', rank: '1' }).success).toBe(false);
  });

  it('trims a guess and refuses a blank one', () => {
    expect(guessSchema.parse('  king ')).toBe('king');
    const blank = guessSchema.safeParse('   ');
    expect(blank.success).toBe(false);
    expect(blank.error?.issues[0]?.message).toBe('guess must not be blank');
  });

  it('validates an engine error payload', () => {
    expect(engineErrorSchema.safeParse({ code: 'DECK_EMPTY', message: 'empty' }).success).toBe(true);
    expect(engineErrorSchema.safeParse({ code: 'NOT_A_CODE', message: 'x' }).success).toBe(false);
  });
});

describe('reaction window schemas', () => {
  it('converts seconds on the menu to milliseconds', () => {
    expect(reactionWindowSecondsSchema.parse('1.5')).toBe(1500);
    expect(reactionWindowSecondsSchema.parse(3)).toBe(3000);
  });

  it('rejects a window off the menu', () => {
    const parsed = reactionWindowSecondsSchema.safeParse('1.2');
    expect(parsed.success).toBe(false);
    expect(parsed.error?.issues[0]?.message).toBe('reaction window must be one of 1000, 1500, 2000, 2500, 3000 ms');
  });
});

describe('command schemas', () => {
  it('parses menu choices', () => {
    expect(menuCommandSchema.parse(['slapjack'])).toEqual(['slapjack']);
    expect(menuCommandSchema.safeParse(['slapjack', 'now']).success).toBe(false);
  });

  it('parses slapjack commands into named actions', () => {
    expect(gameCommandSchemas.SLAPJACK.parse(['slap'])).toEqual({ name: 'slap' });
    expect(gameCommandSchemas.SLAPJACK.parse(['timer', '2'])).toEqual({ name: 'timer', durationMs: 2000 });
    expect(gameCommandSchemas.SLAPJACK.safeParse(['timer']).success).toBe(false);
  });

  it('rejects a blackjack command from another game', () => {
    expect(gameCommandSchemas.BLACKJACK.safeParse(['draw']).success).toBe(false);
  });
});
