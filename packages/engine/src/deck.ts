import type { Card } from '@card-table/shared';
import { defaultRandom, type RandomSource } from './random';

/** Fisher-Yates over a copy; the input is left untouched. */
export const shuffleCards = <T>(cards: readonly T[], random: RandomSource = defaultRandom): T[] => {
  const deck = [...cards];

  for (let i = deck.length - 1; i > 0; i -= 1) {
    const j = Math.floor(random() * (i + 1));
    [deck[i], deck[j]] = [deck[j] as T, deck[i] as T];
  }

  return deck;
};

/**
 * Ordered pile of cards dealt from the front.
 *
 * Games only ever draw sequentially, so the deck is a thin queue over an array.
 * An exhausted deck is refilled through `reset` rather than refusing play.
 */
export class Deck<T = Card> {
  private cards: T[];

  constructor(
    cards: readonly T[],
    private readonly random: RandomSource = defaultRandom,
  ) {
    this.cards = [...cards];
  }

  shuffle(): void {
    this.cards = shuffleCards(this.cards, this.random);
  }

  /** Removes and returns the front card, or `undefined` when the deck is empty. */
  dealCard(): T | undefined {
    return this.cards.shift();
  }

  peek(): T | undefined {
    return this.cards[0];
  }

  isEmpty(): boolean {
    return this.cards.length === 0;
  }

  size(): number {
    return this.cards.length;
  }

  reset(newCards: readonly T[]): void {
    this.cards = [...newCards];
  }

  toArray(): T[] {
    return [...this.cards];
  }
}
