import {
  BLACKJACK_DEAL_CARDS,
  DEALER_NAME,
  DEALER_STAND_SCORE,
  PLAYER_NAME,
  type BlackjackPhase,
  type BlackjackView,
  type Card,
  type ErrorCode,
  type Participant,
  type RoundWinner,
} from '@card-table/shared';
import { createStandardDeck } from './card';
import { Deck } from './deck';
import { Hand } from './hand';
import { blackjackOutcomeMessage, messages } from './messages';
import { defaultRandom } from './random';
import { isBust, scoreBlackjackHand, settleBlackjack } from './scoring';
import type { BlackjackEffect, EngineOptions, EngineResult, GameEngine, ValidationResult } from './types';

export interface BlackjackOptions extends EngineOptions {
  /** Starting deck order, front first. Defaults to an ordered standard deck. */
  cards?: Card[];
  shuffle?: boolean;
}

type BlackjackResult = EngineResult<BlackjackEffect>;

const refused = (code: ErrorCode, message: string): BlackjackResult => ({
  effects: [],
  error: { code, message },
});

const ignored = (): BlackjackResult => ({ effects: [] });

export class BlackjackEngine implements GameEngine<BlackjackView> {
  private readonly deck: Deck<Card>;
  private readonly player = new Hand<Card>(PLAYER_NAME);
  private readonly dealer = new Hand<Card>(DEALER_NAME);
  private currentPhase: BlackjackPhase = 'AWAITING_DEAL';
  private outcome: RoundWinner | undefined;
  private revision = 1;

  constructor(options: BlackjackOptions = {}) {
    this.deck = new Deck(options.cards ?? createStandardDeck(), options.random ?? defaultRandom);
    if (options.shuffle) {
      this.deck.shuffle();
    }
  }

  get phase(): BlackjackPhase {
    return this.currentPhase;
  }

  get version(): number {
    return this.revision;
  }

  get playerTurn(): boolean {
    return this.currentPhase === 'PLAYER_TURN';
  }

  private validateDeal(): ValidationResult {
    if (this.currentPhase === 'PLAYER_TURN' || this.currentPhase === 'DEALER_TURN') {
      return { ok: false, code: 'ROUND_IN_PROGRESS', message: messages.roundInProgress };
    }
    if (this.deck.size() < BLACKJACK_DEAL_CARDS) {
      return { ok: false, code: 'NOT_ENOUGH_CARDS', message: messages.notEnoughCards };
    }
    return { ok: true };
  }

  private dealTo(participant: Participant): BlackjackEffect | undefined {
    const card = this.deck.dealCard();
    if (!card) {
      return undefined;
    }
    (participant === 'PLAYER' ? this.player : this.dealer).addCard(card);
    return { type: 'CARD_DEALT', to: participant, card };
  }

  deal(): BlackjackResult {
    const validation = this.validateDeal();
    if (!validation.ok) {
      return refused(validation.code, validation.message);
    }

    this.player.clear();
    this.dealer.clear();
    this.outcome = undefined;

    const effects: BlackjackEffect[] = [];
    for (const participant of ['PLAYER', 'DEALER', 'PLAYER', 'DEALER'] as const) {
      const dealt = this.dealTo(participant);
      if (dealt) {
        effects.push(dealt);
      }
    }

    this.currentPhase = 'PLAYER_TURN';
    this.revision += 1;
    return { effects };
  }

  hit(): BlackjackResult {
    if (this.currentPhase !== 'PLAYER_TURN') {
      return ignored();
    }

    const dealt = this.dealTo('PLAYER');
    if (!dealt) {
      return refused('DECK_EMPTY', messages.deckEmpty);
    }

    const effects: BlackjackEffect[] = [dealt];
    if (isBust(this.player.cards)) {
      this.currentPhase = 'ROUND_OVER';
      this.outcome = 'DEALER';
      effects.push({
        type: 'PLAYER_BUST',
        playerScore: scoreBlackjackHand(this.player.cards),
        message: messages.playerBust,
      });
    }

    this.revision += 1;
    return { effects };
  }

  stand(): BlackjackResult {
    if (this.currentPhase !== 'PLAYER_TURN') {
      return ignored();
    }

    this.currentPhase = 'DEALER_TURN';
    const effects: BlackjackEffect[] = [];

    while (scoreBlackjackHand(this.dealer.cards) < DEALER_STAND_SCORE) {
      const dealt = this.dealTo('DEALER');
      if (!dealt) {
        break;
      }
      effects.push(dealt);
    }

    const playerScore = scoreBlackjackHand(this.player.cards);
    const dealerScore = scoreBlackjackHand(this.dealer.cards);
    const winner = settleBlackjack(playerScore, dealerScore);

    this.currentPhase = 'ROUND_OVER';
    this.outcome = winner;
    this.revision += 1;
    effects.push({
      type: 'ROUND_SETTLED',
      winner,
      playerScore,
      dealerScore,
      message: blackjackOutcomeMessage(winner),
    });
    return { effects };
  }

  shuffle(): BlackjackResult {
    this.deck.shuffle();
    this.revision += 1;
    return { effects: [{ type: 'DECK_SHUFFLED', message: messages.deckShuffled }] };
  }

  resetDeck(): BlackjackResult {
    this.deck.reset(createStandardDeck());
    this.revision += 1;
    return { effects: [{ type: 'DECK_RESET', deckSize: this.deck.size(), message: messages.deckReset }] };
  }

  view(): BlackjackView {
    return {
      phase: this.currentPhase,
      playerTurn: this.playerTurn,
      player: {
        name: this.player.name,
        cards: [...this.player.cards],
        score: scoreBlackjackHand(this.player.cards),
      },
      dealer: {
        name: this.dealer.name,
        cards: [...this.dealer.cards],
        score: scoreBlackjackHand(this.dealer.cards),
      },
      deckSize: this.deck.size(),
      ...(this.outcome ? { outcome: this.outcome } : {}),
      version: this.revision,
    };
  }
}
