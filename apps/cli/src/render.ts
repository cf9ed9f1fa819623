import { formatCard } from '@card-table/engine';
import type { BlackjackView, HandView, HighCardView, ScoredHandView, SlapjackView } from '@card-table/shared';

const renderCards = (hand: HandView): string[] =>
  hand.cards.length === 0 ? ['  (no cards)'] : hand.cards.map((card) => `  ${formatCard(card)}`);

const renderScoredHand = (hand: ScoredHandView): string[] => [`${hand.name} Hand (${hand.score}):`, ...renderCards(hand)];

export const renderBlackjack = (view: BlackjackView): string[] => [
  ...renderScoredHand(view.player),
  ...renderScoredHand(view.dealer),
  `Cards left in deck: ${view.deckSize}`,
];

export const renderHighCard = (view: HighCardView): string[] => [
  `${view.player.name}'s card:`,
  ...renderCards(view.player),
  `${view.dealer.name}'s card:`,
  ...renderCards(view.dealer),
];

export const renderSlapjackSummary = (view: SlapjackView): string[] => [
  'Final Score:',
  `Your score: ${view.score} points`,
  `Cards collected: ${view.collected.length}`,
];

export const MENU_LINES = [
  'Card Game Menu',
  '  blackjack  Play Blackjack',
  '  highcard   Play High Card',
  '  guess      Play Guess the Card',
  '  slapjack   Play Slapjack',
  '  quit       Leave the table',
];

export const HELP_LINES: Record<string, string[]> = {
  MENU: MENU_LINES,
  BLACKJACK: ['Blackjack: deal, hit, stand, shuffle, reset, menu'],
  HIGH_CARD: ['High Card: draw (player), dealer, menu'],
  GUESS_THE_CARD: ['Guess the rank of the card (e.g. Ace, 2, King), or cancel'],
  SLAPJACK: ['Slapjack: slap, timer <seconds> (1, 1.5, 2, 2.5, 3), menu'],
};
