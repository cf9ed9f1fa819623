import {
  DEALER_NAME,
  HIGH_CARD_PLAYER_NAME,
  type Card,
  type ErrorCode,
  type HighCardPhase,
  type HighCardView,
  type RoundWinner,
} from '@card-table/shared';
import { createStandardDeck } from './card';
import { Deck } from './deck';
import { Hand, handView } from './hand';
import { highCardOutcomeMessage, messages } from './messages';
import { defaultRandom, type RandomSource } from './random';
import { compareHighCard } from './scoring';
import type { EngineOptions, EngineResult, GameEngine, HighCardEffect } from './types';

export interface HighCardOptions extends EngineOptions {
  /** Starting deck order, front first. Defaults to a shuffled standard deck. */
  cards?: Card[];
}

type HighCardResult = EngineResult<HighCardEffect>;

const refused = (code: ErrorCode, message: string): HighCardResult => ({
  effects: [],
  error: { code, message },
});

/**
 * One card each, highest rank wins. An exhausted deck is swapped for a fresh
 * shuffled one so play can continue indefinitely.
 */
export class HighCardEngine implements GameEngine<HighCardView> {
  private readonly random: RandomSource;
  private readonly deck: Deck<Card>;
  private readonly player = new Hand<Card>(HIGH_CARD_PLAYER_NAME);
  private readonly dealer = new Hand<Card>(DEALER_NAME);
  private currentPhase: HighCardPhase = 'IDLE';
  private outcome: RoundWinner | undefined;
  private revision = 1;

  constructor(options: HighCardOptions = {}) {
    this.random = options.random ?? defaultRandom;
    this.deck = new Deck(options.cards ?? createStandardDeck(), this.random);
    if (!options.cards) {
      this.deck.shuffle();
    }
  }

  get phase(): HighCardPhase {
    return this.currentPhase;
  }

  get version(): number {
    return this.revision;
  }

  private drawCard(effects: HighCardEffect[]): Card | undefined {
    if (this.deck.isEmpty()) {
      this.deck.reset(createStandardDeck());
      this.deck.shuffle();
      effects.push({ type: 'DECK_RECYCLED', deckSize: this.deck.size() });
    }
    return this.deck.dealCard();
  }

  drawForPlayer(): HighCardResult {
    if (this.currentPhase === 'PLAYER_DRAWN') {
      return refused('PLAYER_ALREADY_DREW', messages.playerAlreadyDrew);
    }

    const effects: HighCardEffect[] = [];
    const card = this.drawCard(effects);
    if (!card) {
      return refused('DECK_EMPTY', messages.deckEmpty);
    }

    this.player.clear();
    this.dealer.clear();
    this.outcome = undefined;
    this.player.addCard(card);
    effects.push({ type: 'CARD_DEALT', to: 'PLAYER', card });

    this.currentPhase = 'PLAYER_DRAWN';
    this.revision += 1;
    return { effects };
  }

  drawForDealer(): HighCardResult {
    if (this.currentPhase === 'IDLE') {
      return refused('PLAYER_MUST_DRAW_FIRST', messages.playerMustDrawFirst);
    }
    if (this.currentPhase === 'ROUND_OVER') {
      return refused('DEALER_ALREADY_DREW', messages.dealerAlreadyDrew);
    }

    const playerCard = this.player.first();
    if (!playerCard) {
      return refused('PLAYER_MUST_DRAW_FIRST', messages.playerMustDrawFirst);
    }

    const effects: HighCardEffect[] = [];
    const dealerCard = this.drawCard(effects);
    if (!dealerCard) {
      return refused('DECK_EMPTY', messages.deckEmpty);
    }
    this.dealer.addCard(dealerCard);
    effects.push({ type: 'CARD_DEALT', to: 'DEALER', card: dealerCard });

    const winner = compareHighCard(playerCard, dealerCard);
    this.currentPhase = 'ROUND_OVER';
    this.outcome = winner;
    this.revision += 1;
    effects.push({
      type: 'ROUND_SETTLED',
      winner,
      playerCard,
      dealerCard,
      rematchOffered: true,
      message: highCardOutcomeMessage(winner, playerCard, dealerCard),
    });
    return { effects };
  }

  /** Accepts the rematch offered when a round settles. */
  rematch(): HighCardResult {
    if (this.currentPhase !== 'ROUND_OVER') {
      return refused('NO_REMATCH_OFFERED', messages.noRematchOffered);
    }

    this.player.clear();
    this.dealer.clear();
    this.outcome = undefined;
    this.currentPhase = 'IDLE';
    this.revision += 1;
    return { effects: [{ type: 'REMATCH_STARTED' }] };
  }

  view(): HighCardView {
    return {
      phase: this.currentPhase,
      player: handView(this.player),
      dealer: handView(this.dealer),
      deckSize: this.deck.size(),
      ...(this.outcome ? { outcome: this.outcome } : {}),
      rematchOffered: this.currentPhase === 'ROUND_OVER',
      version: this.revision,
    };
  }
}
