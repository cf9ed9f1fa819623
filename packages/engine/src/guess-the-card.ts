import { guessSchema, type Card, type GuessTheCardView } from '@card-table/shared';
import { createStandardDeck } from './card';
import { Deck } from './deck';
import { guessOutcomeMessage, messages } from './messages';
import { defaultRandom, randomIndex, type RandomSource } from './random';
import { matchesGuess } from './scoring';
import type { EngineOptions, EngineResult, GameEngine, GuessTheCardEffect } from './types';

type GuessResult = EngineResult<GuessTheCardEffect>;

export const chooseCard = (deck: Deck<Card>, random: RandomSource = defaultRandom): Card => {
  const cards = deck.toArray();
  const chosen = cards[randomIndex(cards.length, random)];
  if (!chosen) {
    throw new Error('cannot choose a card from an empty deck');
  }
  return chosen;
};

/** One hidden card from a fresh standard deck and a single guess at its rank. */
export class GuessTheCardRound implements GameEngine<GuessTheCardView> {
  private readonly chosen: Card;
  private outcome: boolean | undefined;
  private revision = 1;

  constructor(options: EngineOptions = {}) {
    const random = options.random ?? defaultRandom;
    this.chosen = chooseCard(new Deck(createStandardDeck(), random), random);
  }

  get version(): number {
    return this.revision;
  }

  get settled(): boolean {
    return this.outcome !== undefined;
  }

  submitGuess(text: string): GuessResult {
    if (this.outcome !== undefined) {
      return { effects: [], error: { code: 'ROUND_OVER', message: messages.guessRoundOver } };
    }

    const parsed = guessSchema.safeParse(text);
    if (!parsed.success) {
      return {
        effects: [],
        error: { code: 'EMPTY_GUESS', message: messages.emptyGuess, details: parsed.error.issues },
      };
    }

    return this.settle(matchesGuess(parsed.data, this.chosen));
  }

  /** Dismissing the prompt reveals the card and counts as a wrong guess. */
  cancel(): GuessResult {
    if (this.outcome !== undefined) {
      return { effects: [], error: { code: 'ROUND_OVER', message: messages.guessRoundOver } };
    }
    return this.settle(false);
  }

  private settle(correct: boolean): GuessResult {
    this.outcome = correct;
    this.revision += 1;
    return {
      effects: [
        {
          type: 'GUESS_SETTLED',
          correct,
          card: this.chosen,
          message: guessOutcomeMessage(correct, this.chosen),
        },
      ],
    };
  }

  view(): GuessTheCardView {
    return {
      settled: this.settled,
      ...(this.outcome !== undefined ? { correct: this.outcome, revealedCard: this.chosen } : {}),
      version: this.revision,
    };
  }
}

/** Runs a whole round in one call; a blank guess is still refused. */
export const playGuessTheCard = (guess: string, random: RandomSource = defaultRandom): GuessResult =>
  new GuessTheCardRound({ random }).submitGuess(guess);
