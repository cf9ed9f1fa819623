import type { Card, HandView } from '@card-table/shared';

export class Hand<T = Card> {
  private readonly held: T[] = [];

  constructor(readonly name: string) {}

  addCard(card: T): void {
    this.held.push(card);
  }

  clear(): void {
    this.held.length = 0;
  }

  get cards(): readonly T[] {
    return this.held;
  }

  first(): T | undefined {
    return this.held[0];
  }

  size(): number {
    return this.held.length;
  }

  isEmpty(): boolean {
    return this.held.length === 0;
  }
}

export const handView = (hand: Hand<Card>): HandView => ({
  name: hand.name,
  cards: [...hand.cards],
});
