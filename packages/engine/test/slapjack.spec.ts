import { describe, expect, it } from 'vitest';
import { SlapjackEngine, createSeededRandom, formatCard, type SlapjackEffect } from '../src';

// with shuffle off every suit runs 2..10, Jack, Queen, King, Ace, so the 10th flip is the Jack
const JACK_FLIP = 10;

const flip = (engine: SlapjackEngine, times: number): SlapjackEffect[] => {
  const effects: SlapjackEffect[] = [];
  for (let i = 0; i < times; i += 1) {
    effects.push(...engine.advanceFlipClock().effects);
  }
  return effects;
};

describe('slapjack engine', () => {
  it('starts on Hearts with a full sub-deck', () => {
    const view = new SlapjackEngine({ shuffle: false }).view();

    expect(view.phase).toBe('RUNNING');
    expect(view.suit).toBe('Hearts');
    expect(view.cardsLeftInSuit).toBe(13);
    expect(view.score).toBe(0);
    expect(view.jackLive).toBe(false);
    expect(view.reactionWindowMs).toBe(2000);
  });

  it('arms a reaction window when a Jack is flipped', () => {
    const engine = new SlapjackEngine({ shuffle: false });
    flip(engine, JACK_FLIP - 1);
    const result = engine.advanceFlipClock();

    expect(result.effects).toEqual([
      { type: 'CARD_FLIPPED', card: { suit: 'Hearts', rank: 'Jack' }, message: 'Card flipped: Jack of Hearts' },
      {
        type: 'JACK_REVEALED',
        card: { suit: 'Hearts', rank: 'Jack' },
        windowId: 1,
        durationMs: 2000,
        message: 'JACK! SLAP NOW!',
      },
    ]);
    expect(engine.view().armedWindow).toEqual({ windowId: 1, durationMs: 2000 });
  });

  it('scores a slap on a live Jack and moves it to the pile', () => {
    const engine = new SlapjackEngine({ shuffle: false });
    flip(engine, JACK_FLIP);
    const result = engine.slap();

    expect(result.effects).toEqual([
      { type: 'SLAP_SUCCESS', card: { suit: 'Hearts', rank: 'Jack' }, score: 1, message: 'Great slap! +1 point' },
    ]);
    const view = engine.view();
    expect(view.score).toBe(1);
    expect(view.collected.map(formatCard)).toEqual(['Jack of Hearts']);
    expect(view.jackLive).toBe(false);
    expect(view.armedWindow).toBeUndefined();
  });

  it('penalises a slap on a Queen without going below zero', () => {
    const engine = new SlapjackEngine({ shuffle: false });
    flip(engine, JACK_FLIP);
    engine.slap();
    flip(engine, 1);
    expect(engine.view().currentCard).toEqual({ suit: 'Hearts', rank: 'Queen' });

    expect(engine.slap().effects).toEqual([
      { type: 'SLAP_PENALTY', score: 0, message: 'No Jack to slap! -1 point penalty' },
    ]);
    expect(engine.slap().effects).toEqual([
      { type: 'SLAP_PENALTY', score: 0, message: 'No Jack to slap! -1 point penalty' },
    ]);
    expect(engine.view().score).toBe(0);
    expect(engine.view().collected).toHaveLength(1);
  });

  it('penalises a second slap on an already collected Jack', () => {
    const engine = new SlapjackEngine({ shuffle: false });
    flip(engine, JACK_FLIP);
    engine.slap();
    engine.slap();

    expect(engine.view().score).toBe(0);
    expect(engine.view().collected).toHaveLength(1);
  });

  it('ends the game when the reaction window elapses on a live Jack', () => {
    const engine = new SlapjackEngine({ shuffle: false });
    flip(engine, JACK_FLIP);
    const result = engine.advanceReactionClock();

    expect(result.effects).toEqual([
      {
        type: 'GAME_FINISHED',
        reason: 'MISSED_JACK',
        score: 0,
        cardsCollected: 0,
        message: 'Too slow! You missed the Jack!',
      },
    ]);
    expect(engine.phase).toBe('GAME_OVER');
    expect(engine.advanceFlipClock()).toEqual({ effects: [] });
    expect(engine.slap()).toEqual({ effects: [] });
  });

  it('ignores the reaction clock when no Jack is live', () => {
    const engine = new SlapjackEngine({ shuffle: false });
    flip(engine, 1);
    expect(engine.advanceReactionClock()).toEqual({ effects: [] });

    flip(engine, JACK_FLIP - 1);
    engine.slap();
    expect(engine.advanceReactionClock(1)).toEqual({ effects: [] });
    expect(engine.phase).toBe('RUNNING');
  });

  it('ignores a stale timeout from an earlier window', () => {
    const engine = new SlapjackEngine({ shuffle: false });
    flip(engine, JACK_FLIP);
    engine.slap();
    flip(engine, 3);
    expect(engine.phase).toBe('SUIT_EXHAUSTED');
    flip(engine, 1 + JACK_FLIP);
    expect(engine.view().armedWindow).toEqual({ windowId: 2, durationMs: 2000 });

    expect(engine.advanceReactionClock(1)).toEqual({ effects: [] });
    expect(engine.phase).toBe('RUNNING');

    expect(engine.advanceReactionClock(2).effects[0]).toMatchObject({
      reason: 'MISSED_JACK',
      score: 1,
      cardsCollected: 1,
    });
  });

  it('plays the suits in order and finishes after Spades', () => {
    const engine = new SlapjackEngine({ shuffle: false });
    const effects = flip(engine, 4 * 13 + 3);

    expect(effects.flatMap((effect) => (effect.type === 'SUIT_ADVANCED' ? [effect.message] : []))).toEqual([
      'Moving to Diamonds suit!',
      'Moving to Clubs suit!',
      'Moving to Spades suit!',
    ]);
    expect(effects.filter((effect) => effect.type === 'CARD_FLIPPED')).toHaveLength(52);
    expect(engine.phase).toBe('SUIT_EXHAUSTED');
    expect(engine.view().suit).toBe('Spades');

    expect(engine.advanceFlipClock().effects).toEqual([
      {
        type: 'GAME_FINISHED',
        reason: 'ALL_SUITS_COMPLETE',
        score: 0,
        cardsCollected: 0,
        message: 'All suits completed! Game Over!',
      },
    ]);
    expect(engine.view().gameOverReason).toBe('ALL_SUITS_COMPLETE');
  });

  it('deals each suit from its own shuffled 13-card sub-deck', () => {
    const engine = new SlapjackEngine({ random: createSeededRandom('hearts') });
    const flipped = flip(engine, 13).flatMap((effect) => (effect.type === 'CARD_FLIPPED' ? [effect.card] : []));

    expect(flipped).toHaveLength(13);
    expect(flipped.every((card) => card.suit === 'Hearts')).toBe(true);
    expect(new Set(flipped.map((card) => card.rank)).size).toBe(13);
  });

  it('applies a new reaction window from the next Jack only', () => {
    const engine = new SlapjackEngine({ shuffle: false });
    flip(engine, JACK_FLIP);

    expect(engine.setReactionWindow(2500).effects).toEqual([{ type: 'REACTION_WINDOW_CHANGED', durationMs: 2500 }]);
    expect(engine.view().armedWindow).toEqual({ windowId: 1, durationMs: 2000 });
    expect(engine.view().reactionWindowMs).toBe(2500);

    engine.slap();
    flip(engine, 3 + 1 + JACK_FLIP);
    expect(engine.view().armedWindow).toEqual({ windowId: 2, durationMs: 2500 });
  });

  it('rejects a reaction window outside the menu', () => {
    const engine = new SlapjackEngine({ shuffle: false });
    const result = engine.setReactionWindow(1234);

    expect(result.error?.code).toBe('INVALID_REACTION_WINDOW');
    expect(engine.view().reactionWindowMs).toBe(2000);
    expect(() => new SlapjackEngine({ reactionWindowMs: 700 })).toThrow('invalid reaction window: 700');
  });

  it('restarts from Hearts with a clean score', () => {
    const engine = new SlapjackEngine({ shuffle: false });
    flip(engine, JACK_FLIP);
    engine.slap();
    flip(engine, 3);
    engine.advanceReactionClock();
    flip(engine, 1);

    const result = engine.restart();
    expect(result.effects).toEqual([
      { type: 'GAME_STARTED', suit: 'Hearts', message: 'New game started! Watch for Jacks and SLAP!' },
    ]);
    const view = engine.view();
    expect(view.phase).toBe('RUNNING');
    expect(view.suit).toBe('Hearts');
    expect(view.cardsLeftInSuit).toBe(13);
    expect(view.score).toBe(0);
    expect(view.collected).toEqual([]);
    expect(view.currentCard).toBeUndefined();
  });
});
