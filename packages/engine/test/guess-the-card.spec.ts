import { describe, expect, it } from 'vitest';
import { Deck, GuessTheCardRound, chooseCard, createStandardDeck, formatCard, playGuessTheCard } from '../src';

// the standard deck starts with Hearts 2..Ace, so index 12 (0.24 * 52 = 12.48) is the Ace of Hearts
const pickAceOfHearts = () => 0.24;

describe('guess the card', () => {
  it('picks the card at the drawn index', () => {
    expect(formatCard(chooseCard(new Deck(createStandardDeck()), pickAceOfHearts))).toBe('Ace of Hearts');
    expect(formatCard(chooseCard(new Deck(createStandardDeck()), () => 0))).toBe('2 of Hearts');
  });

  it('accepts a lowercase guess of the right rank', () => {
    const round = new GuessTheCardRound({ random: pickAceOfHearts });
    const result = round.submitGuess('ace');

    expect(result.error).toBeUndefined();
    expect(result.effects).toEqual([
      {
        type: 'GUESS_SETTLED',
        correct: true,
        card: { suit: 'Hearts', rank: 'Ace' },
        message: 'Correct! It was: Ace of Hearts',
      },
    ]);
    expect(round.view()).toEqual({
      settled: true,
      correct: true,
      revealedCard: { suit: 'Hearts', rank: 'Ace' },
      version: 2,
    });
  });

  it('reveals the card on a wrong guess', () => {
    const round = new GuessTheCardRound({ random: pickAceOfHearts });
    expect(round.submitGuess('King').effects[0]).toMatchObject({
      correct: false,
      message: 'Wrong! It was: Ace of Hearts',
    });
  });

  it('rejects a blank guess and keeps the round open', () => {
    const round = new GuessTheCardRound({ random: pickAceOfHearts });
    const blank = round.submitGuess('   ');

    expect(blank.error?.code).toBe('EMPTY_GUESS');
    expect(blank.effects).toEqual([]);
    expect(round.view()).toEqual({ settled: false, version: 1 });

    expect(round.submitGuess('ACE').effects[0]).toMatchObject({ correct: true });
  });

  it('refuses a second guess once the card is revealed', () => {
    const round = new GuessTheCardRound({ random: pickAceOfHearts });
    round.submitGuess('2');

    expect(round.submitGuess('ace').error?.code).toBe('ROUND_OVER');
    expect(round.view().correct).toBe(false);
  });

  it('counts a cancelled prompt as a wrong guess', () => {
    const round = new GuessTheCardRound({ random: pickAceOfHearts });
    expect(round.cancel().effects[0]).toMatchObject({ correct: false, message: 'Wrong! It was: Ace of Hearts' });
    expect(round.cancel().error?.code).toBe('ROUND_OVER');
  });

  it('plays a whole round in one call', () => {
    expect(playGuessTheCard('2', () => 0).effects[0]).toMatchObject({
      correct: true,
      message: 'Correct! It was: 2 of Hearts',
    });
    expect(playGuessTheCard('', () => 0).error?.code).toBe('EMPTY_GUESS');
  });
});
