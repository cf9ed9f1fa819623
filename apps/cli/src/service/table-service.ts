import {
  BlackjackEngine,
  GuessTheCardRound,
  HighCardEngine,
  SlapjackEngine,
  createSeededRandom,
  currentSuitMessage,
  defaultRandom,
  messages,
  type EngineResult,
  type RandomSource,
  type SlapjackEffect,
} from '@card-table/engine';
import {
  gameCommandSchemas,
  menuCommandSchema,
  type EngineError,
  type ErrorCode,
  type GameKind,
  type SlapjackView,
} from '@card-table/shared';
import type { Logger } from 'pino';
import { v4 as uuidv4 } from 'uuid';
import type { AppConfig } from '../config';
import { HELP_LINES, MENU_LINES, renderBlackjack, renderHighCard, renderSlapjackSummary } from '../render';
import { SlapjackSession } from './slapjack-session';

export interface TableOutput {
  write(line: string): void;
}

type TableConfig = Pick<AppConfig, 'flipIntervalMs' | 'reactionWindowMs' | 'seed'>;

type ActiveGame =
  | { kind: 'MENU' }
  | { kind: 'BLACKJACK'; engine: BlackjackEngine; logger: Logger }
  | { kind: 'HIGH_CARD'; engine: HighCardEngine; logger: Logger }
  | { kind: 'GUESS_THE_CARD'; round: GuessTheCardRound; logger: Logger }
  | { kind: 'SLAPJACK'; session: SlapjackSession; logger: Logger };

export class ServiceError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly details?: unknown,
  ) {
    super(message);
  }
}

const PLAY_AGAIN_PROMPT = 'Would you like to play again? (yes/no)';
const GUESS_PROMPT = 'Guess the rank of the card (e.g., Ace, 2, King):';

const tokenize = (line: string): string[] =>
  line
    .trim()
    .split(/\s+/)
    .filter((token) => token.length > 0)
    .map((token) => token.toLowerCase());

/**
 * The text front end of the card table: one line in, engine action, rendered lines out.
 */
export class TableService {
  private game: ActiveGame = { kind: 'MENU' };
  private closed = false;
  private readonly random: RandomSource;

  constructor(
    private readonly output: TableOutput,
    private readonly config: TableConfig,
    private readonly logger: Logger,
  ) {
    this.random = config.seed ? createSeededRandom(config.seed) : defaultRandom;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get activeGame(): GameKind | 'MENU' {
    return this.game.kind;
  }

  open(): void {
    this.writeLines(MENU_LINES);
  }

  handleLine(line: string): void {
    if (this.closed) {
      return;
    }
    try {
      this.dispatch(line);
    } catch (error) {
      this.handleFailure(error);
    }
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.leaveGame();
    this.closed = true;
    this.logger.info('table closed');
  }

  handleFailure(error: unknown): void {
    if (error instanceof ServiceError) {
      this.logger.debug({ errorCode: error.code, details: error.details }, error.message);
      this.output.write(error.message);
      return;
    }

    this.logger.error({ error }, 'unexpected table failure');
    this.output.write('Something went wrong. Back to the menu.');
    this.leaveGame();
    this.writeLines(MENU_LINES);
  }

  private dispatch(line: string): void {
    const tokens = tokenize(line);
    const [head] = tokens;

    // the guess prompt takes free text, including blank lines
    if (this.game.kind === 'GUESS_THE_CARD' && head !== 'menu' && head !== 'quit' && head !== 'help') {
      this.playGuess(this.game, line);
      return;
    }
    if (!head) {
      return;
    }

    if (head === 'quit') {
      this.output.write('Goodbye!');
      this.close();
      return;
    }
    if (head === 'menu') {
      this.leaveGame();
      this.writeLines(MENU_LINES);
      return;
    }
    if (head === 'help') {
      this.writeLines(HELP_LINES[this.game.kind] ?? MENU_LINES);
      return;
    }

    switch (this.game.kind) {
      case 'MENU':
        this.chooseGame(tokens);
        return;
      case 'BLACKJACK':
        this.playBlackjack(this.game, tokens);
        return;
      case 'HIGH_CARD':
        this.playHighCard(this.game, tokens);
        return;
      case 'SLAPJACK':
        this.playSlapjack(this.game, tokens);
        return;
    }
  }

  private chooseGame(tokens: string[]): void {
    const parsed = menuCommandSchema.safeParse(tokens);
    if (!parsed.success) {
      throw new ServiceError('INVALID_COMMAND', `Unknown choice: ${tokens.join(' ')}. Type help for options.`);
    }

    const [choice] = parsed.data;
    const sessionId = uuidv4();
    switch (choice) {
      case 'blackjack': {
        const logger = this.logger.child({ sessionId, game: 'BLACKJACK' });
        this.game = { kind: 'BLACKJACK', engine: new BlackjackEngine({ random: this.random }), logger };
        this.writeLines(['Blackjack Simulator', ...(HELP_LINES.BLACKJACK ?? [])]);
        logger.info('game started');
        return;
      }
      case 'highcard': {
        const logger = this.logger.child({ sessionId, game: 'HIGH_CARD' });
        this.game = { kind: 'HIGH_CARD', engine: new HighCardEngine({ random: this.random }), logger };
        this.writeLines(['High Card', ...(HELP_LINES.HIGH_CARD ?? [])]);
        logger.info('game started');
        return;
      }
      case 'guess': {
        const logger = this.logger.child({ sessionId, game: 'GUESS_THE_CARD' });
        this.game = { kind: 'GUESS_THE_CARD', round: new GuessTheCardRound({ random: this.random }), logger };
        this.output.write(GUESS_PROMPT);
        logger.info('game started');
        return;
      }
      case 'slapjack':
        this.startSlapjack(sessionId);
        return;
      default:
        this.writeLines(HELP_LINES.MENU ?? MENU_LINES);
    }
  }

  private startSlapjack(sessionId: string): void {
    const logger = this.logger.child({ sessionId, game: 'SLAPJACK' });
    const engine = new SlapjackEngine({ random: this.random, reactionWindowMs: this.config.reactionWindowMs });
    const session = new SlapjackSession(
      engine,
      this.config.flipIntervalMs,
      (effects, view) => this.renderSlapjack(effects, view),
      logger,
    );
    this.game = { kind: 'SLAPJACK', session, logger };
    this.writeLines([
      `Slap Timer: ${this.config.reactionWindowMs / 1000} seconds`,
      messages.slapjackStarted,
      currentSuitMessage(engine.suit),
    ]);
    session.start();
    logger.info('game started');
  }

  private leaveGame(): void {
    if (this.game.kind === 'SLAPJACK') {
      this.game.session.stop();
    }
    if (this.game.kind !== 'MENU') {
      this.game.logger.info('game left');
    }
    this.game = { kind: 'MENU' };
  }

  private playBlackjack(game: Extract<ActiveGame, { kind: 'BLACKJACK' }>, tokens: string[]): void {
    const parsed = gameCommandSchemas.BLACKJACK.safeParse(tokens);
    if (!parsed.success) {
      throw new ServiceError('INVALID_COMMAND', `Unknown Blackjack command: ${tokens.join(' ')}`, parsed.error.issues);
    }

    const [command] = parsed.data;
    const { engine } = game;
    switch (command) {
      case 'deal':
        this.publish(game.logger, engine.deal(), () => renderBlackjack(engine.view()));
        return;
      case 'hit':
        this.publish(game.logger, engine.hit(), () => renderBlackjack(engine.view()));
        return;
      case 'stand':
        this.publish(game.logger, engine.stand(), () => renderBlackjack(engine.view()));
        return;
      case 'shuffle':
        this.publish(game.logger, engine.shuffle());
        return;
      case 'reset':
        this.publish(game.logger, engine.resetDeck());
        return;
    }
  }

  private playHighCard(game: Extract<ActiveGame, { kind: 'HIGH_CARD' }>, tokens: string[]): void {
    const parsed = gameCommandSchemas.HIGH_CARD.safeParse(tokens);
    if (!parsed.success) {
      throw new ServiceError('INVALID_COMMAND', `Unknown High Card command: ${tokens.join(' ')}`, parsed.error.issues);
    }

    const [command] = parsed.data;
    const { engine } = game;
    switch (command) {
      case 'draw':
        this.publish(game.logger, engine.drawForPlayer(), () => renderHighCard(engine.view()));
        return;
      case 'dealer': {
        const settled = this.publish(game.logger, engine.drawForDealer(), () => renderHighCard(engine.view()));
        if (settled) {
          this.output.write(PLAY_AGAIN_PROMPT);
        }
        return;
      }
      case 'yes':
        this.publish(game.logger, engine.rematch(), () => renderHighCard(engine.view()));
        return;
      case 'no':
        if (!engine.view().rematchOffered) {
          throw new ServiceError('NO_REMATCH_OFFERED', messages.noRematchOffered);
        }
        this.leaveGame();
        this.writeLines(MENU_LINES);
        return;
    }
  }

  private playGuess(game: Extract<ActiveGame, { kind: 'GUESS_THE_CARD' }>, line: string): void {
    const result = line.trim().toLowerCase() === 'cancel' ? game.round.cancel() : game.round.submitGuess(line);
    this.publish(game.logger, result);
    if (game.round.settled) {
      game.logger.info({ correct: game.round.view().correct }, 'guess settled');
      this.leaveGame();
      this.writeLines(MENU_LINES);
    }
  }

  private playSlapjack(game: Extract<ActiveGame, { kind: 'SLAPJACK' }>, tokens: string[]): void {
    const parsed = gameCommandSchemas.SLAPJACK.safeParse(tokens);
    if (!parsed.success) {
      throw new ServiceError('INVALID_COMMAND', `Unknown Slapjack command: ${tokens.join(' ')}`, parsed.error.issues);
    }

    const command = parsed.data;
    const { session } = game;
    switch (command.name) {
      case 'timer':
        this.reportError(game.logger, session.setReactionWindow(command.durationMs).error);
        return;
      case 'slap':
        session.slap();
        return;
      case 'yes':
      case 'no':
        if (session.view().phase !== 'GAME_OVER') {
          throw new ServiceError('ROUND_IN_PROGRESS', 'The game is still running. Type slap when you see a Jack!');
        }
        if (command.name === 'yes') {
          session.restart();
          this.output.write(currentSuitMessage(session.view().suit));
          return;
        }
        this.leaveGame();
        this.writeLines(MENU_LINES);
        return;
    }
  }

  private renderSlapjack(effects: SlapjackEffect[], view: SlapjackView): void {
    for (const effect of effects) {
      if ('message' in effect) {
        this.output.write(effect.message);
      }
      if (effect.type === 'REACTION_WINDOW_CHANGED') {
        this.output.write(`Slap Timer: ${effect.durationMs / 1000} seconds`);
      }
      if (effect.type === 'GAME_FINISHED') {
        this.writeLines([...renderSlapjackSummary(view), PLAY_AGAIN_PROMPT]);
      }
    }
  }

  /** Writes the rendered table and every effect message; returns whether the action took effect. */
  private publish<TEffect extends { type: string }>(
    logger: Logger,
    result: EngineResult<TEffect>,
    render?: () => string[],
  ): boolean {
    if (result.error) {
      this.reportError(logger, result.error);
      return false;
    }
    if (result.effects.length === 0) {
      return false;
    }

    if (render) {
      this.writeLines(render());
    }
    for (const effect of result.effects) {
      if ('message' in effect && typeof effect.message === 'string') {
        this.output.write(effect.message);
      }
    }
    logger.debug({ effects: result.effects.map((effect) => effect.type) }, 'engine action applied');
    return true;
  }

  private reportError(logger: Logger, error: EngineError | undefined): void {
    if (!error) {
      return;
    }
    logger.debug({ errorCode: error.code }, 'engine refused action');
    this.output.write(error.message);
  }

  private writeLines(lines: readonly string[]): void {
    for (const line of lines) {
      this.output.write(line);
    }
  }
}
