import {
  DEFAULT_REACTION_WINDOW_MS,
  HIGH_CARD_PLAYER_NAME,
  SUITS,
  reactionWindowMsSchema,
  type Card,
  type ReactionWindowMs,
  type ReactionWindowState,
  type SlapjackGameOverReason,
  type SlapjackPhase,
  type SlapjackView,
  type Suit,
} from '@card-table/shared';
import { createSuitDeck, isSlapTarget } from './card';
import { Deck } from './deck';
import { Hand } from './hand';
import {
  cardFlippedMessage,
  messages,
  slapjackOverMessage,
  suitAdvancedMessage,
} from './messages';
import { defaultRandom } from './random';
import type { EngineOptions, EngineResult, GameEngine, SlapjackEffect } from './types';

export interface SlapjackOptions extends EngineOptions {
  reactionWindowMs?: number;
  /** When false each suit is played in rank order, 2 up to Ace. */
  shuffle?: boolean;
}

type SlapjackResult = EngineResult<SlapjackEffect>;

const ignored = (): SlapjackResult => ({ effects: [] });

const firstSuit: Suit = SUITS[0];

/**
 * Slapjack over the four suits in turn, one 13-card sub-deck each.
 *
 * Time is modelled as two logical clocks. `advanceFlipClock` reveals the next
 * card on every cadence tick, and `advanceReactionClock` reports that the
 * countdown armed by the last Jack has elapsed. Callers own the real timers.
 */
export class SlapjackEngine implements GameEngine<SlapjackView> {
  private readonly deck: Deck<Card>;
  private readonly pile = new Hand<Card>(HIGH_CARD_PLAYER_NAME);
  private readonly shuffleSuits: boolean;
  private currentPhase: SlapjackPhase = 'RUNNING';
  private suitIndex = 0;
  private currentCard: Card | undefined;
  private jackLive = false;
  private armedWindow: ReactionWindowState | undefined;
  private reactionWindowMs: ReactionWindowMs;
  private nextWindowId = 1;
  private score = 0;
  private gameOverReason: SlapjackGameOverReason | undefined;
  private revision = 1;

  constructor(options: SlapjackOptions = {}) {
    const parsed = reactionWindowMsSchema.safeParse(options.reactionWindowMs ?? DEFAULT_REACTION_WINDOW_MS);
    if (!parsed.success) {
      throw new Error(`invalid reaction window: ${options.reactionWindowMs}`);
    }
    this.reactionWindowMs = parsed.data;
    this.shuffleSuits = options.shuffle ?? true;
    this.deck = new Deck<Card>([], options.random ?? defaultRandom);
    this.loadSuit(firstSuit);
  }

  get phase(): SlapjackPhase {
    return this.currentPhase;
  }

  get version(): number {
    return this.revision;
  }

  get suit(): Suit {
    return SUITS[this.suitIndex] ?? firstSuit;
  }

  private loadSuit(suit: Suit): void {
    this.deck.reset(createSuitDeck(suit));
    if (this.shuffleSuits) {
      this.deck.shuffle();
    }
  }

  private finish(reason: SlapjackGameOverReason): SlapjackResult {
    this.currentPhase = 'GAME_OVER';
    this.gameOverReason = reason;
    this.jackLive = false;
    this.armedWindow = undefined;
    this.revision += 1;
    return {
      effects: [
        {
          type: 'GAME_FINISHED',
          reason,
          score: this.score,
          cardsCollected: this.pile.size(),
          message: slapjackOverMessage(reason),
        },
      ],
    };
  }

  advanceFlipClock(): SlapjackResult {
    if (this.currentPhase === 'GAME_OVER') {
      return ignored();
    }

    if (this.deck.isEmpty()) {
      const nextSuit = SUITS[this.suitIndex + 1];
      if (!nextSuit) {
        return this.finish('ALL_SUITS_COMPLETE');
      }
      // the live flag survives a suit change; only a flip or a slap clears it
      this.suitIndex += 1;
      this.loadSuit(nextSuit);
      this.currentPhase = 'RUNNING';
      this.revision += 1;
      return {
        effects: [
          { type: 'SUIT_ADVANCED', suit: nextSuit, suitIndex: this.suitIndex, message: suitAdvancedMessage(nextSuit) },
        ],
      };
    }

    const card = this.deck.dealCard();
    if (!card) {
      return ignored();
    }

    this.currentCard = card;
    this.jackLive = isSlapTarget(card);
    const effects: SlapjackEffect[] = [{ type: 'CARD_FLIPPED', card, message: cardFlippedMessage(card) }];

    if (this.jackLive) {
      const window: ReactionWindowState = { windowId: this.nextWindowId, durationMs: this.reactionWindowMs };
      this.nextWindowId += 1;
      this.armedWindow = window;
      effects.push({
        type: 'JACK_REVEALED',
        card,
        windowId: window.windowId,
        durationMs: this.reactionWindowMs,
        message: messages.jackRevealed,
      });
    } else {
      this.armedWindow = undefined;
    }

    if (this.deck.isEmpty()) {
      this.currentPhase = 'SUIT_EXHAUSTED';
    }
    this.revision += 1;
    return { effects };
  }

  /**
   * The countdown armed for `windowId` has elapsed. Without an id the current
   * window is assumed; an id that is no longer armed is a stale timeout and is ignored.
   */
  advanceReactionClock(windowId?: number): SlapjackResult {
    if (this.currentPhase === 'GAME_OVER' || !this.jackLive || !this.armedWindow) {
      return ignored();
    }
    if (windowId !== undefined && windowId !== this.armedWindow.windowId) {
      return ignored();
    }
    return this.finish('MISSED_JACK');
  }

  slap(): SlapjackResult {
    if (this.currentPhase === 'GAME_OVER') {
      return ignored();
    }

    const card = this.currentCard;
    if (!this.jackLive || !card) {
      this.score = Math.max(0, this.score - 1);
      this.revision += 1;
      return { effects: [{ type: 'SLAP_PENALTY', score: this.score, message: messages.falseSlap }] };
    }

    this.armedWindow = undefined;
    this.jackLive = false;
    this.pile.addCard(card);
    this.score += 1;
    this.revision += 1;
    return { effects: [{ type: 'SLAP_SUCCESS', card, score: this.score, message: messages.greatSlap }] };
  }

  /** Takes effect from the next Jack; a window that is already armed keeps its duration. */
  setReactionWindow(durationMs: number): SlapjackResult {
    const parsed = reactionWindowMsSchema.safeParse(durationMs);
    if (!parsed.success) {
      return {
        effects: [],
        error: {
          code: 'INVALID_REACTION_WINDOW',
          message: parsed.error.issues[0]?.message ?? 'invalid reaction window',
          details: parsed.error.issues,
        },
      };
    }

    this.reactionWindowMs = parsed.data;
    this.revision += 1;
    return { effects: [{ type: 'REACTION_WINDOW_CHANGED', durationMs: parsed.data }] };
  }

  restart(): SlapjackResult {
    this.suitIndex = 0;
    this.loadSuit(firstSuit);
    this.pile.clear();
    this.score = 0;
    this.currentCard = undefined;
    this.jackLive = false;
    this.armedWindow = undefined;
    this.gameOverReason = undefined;
    this.currentPhase = 'RUNNING';
    this.revision += 1;
    return { effects: [{ type: 'GAME_STARTED', suit: firstSuit, message: messages.slapjackRestarted }] };
  }

  view(): SlapjackView {
    return {
      phase: this.currentPhase,
      suit: this.suit,
      suitIndex: this.suitIndex,
      ...(this.currentCard ? { currentCard: this.currentCard } : {}),
      jackLive: this.jackLive,
      ...(this.armedWindow ? { armedWindow: { ...this.armedWindow } } : {}),
      reactionWindowMs: this.reactionWindowMs,
      score: this.score,
      collected: [...this.pile.cards],
      cardsLeftInSuit: this.deck.size(),
      ...(this.gameOverReason ? { gameOverReason: this.gameOverReason } : {}),
      version: this.revision,
    };
  }
}
