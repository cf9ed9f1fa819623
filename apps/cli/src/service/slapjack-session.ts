import type { EngineResult, SlapjackEffect, SlapjackEngine } from '@card-table/engine';
import type { SlapjackView } from '@card-table/shared';
import type { Logger } from 'pino';

export type SlapjackListener = (effects: SlapjackEffect[], view: SlapjackView) => void;

type SlapjackResult = EngineResult<SlapjackEffect>;

/**
 * Drives a Slapjack engine on real time: a repeating flip cadence and a
 * single-shot reaction countdown armed on every Jack.
 *
 * Every callback checks the timer generation it was scheduled under, and the
 * countdown also carries the window id it was armed for, so a timeout that
 * fires after a slap or a restart cannot end the game.
 */
export class SlapjackSession {
  private flipTimer: NodeJS.Timeout | undefined;
  private reactionTimer: NodeJS.Timeout | undefined;
  private timerGeneration = 0;

  constructor(
    private readonly engine: SlapjackEngine,
    private readonly flipIntervalMs: number,
    private readonly onEffects: SlapjackListener,
    private readonly logger: Logger,
  ) {}

  get running(): boolean {
    return this.flipTimer !== undefined;
  }

  view(): SlapjackView {
    return this.engine.view();
  }

  start(): void {
    this.clearTimers();
    const generation = this.timerGeneration;
    this.flipTimer = setInterval(() => {
      this.runGuarded('flip', generation, () => this.engine.advanceFlipClock());
    }, this.flipIntervalMs);
    this.logger.debug({ flipIntervalMs: this.flipIntervalMs }, 'slapjack cadence started');
  }

  stop(): void {
    this.clearTimers();
  }

  slap(): SlapjackResult {
    const result = this.engine.slap();
    // cancel within the same turn so a pending countdown cannot fire after the slap
    if (result.effects.some((effect) => effect.type === 'SLAP_SUCCESS')) {
      this.clearReactionTimer();
    }
    this.publish(result);
    return result;
  }

  setReactionWindow(durationMs: number): SlapjackResult {
    const result = this.engine.setReactionWindow(durationMs);
    this.publish(result);
    return result;
  }

  restart(): SlapjackResult {
    const result = this.engine.restart();
    this.publish(result);
    this.start();
    return result;
  }

  private clearReactionTimer(): void {
    if (this.reactionTimer) {
      clearTimeout(this.reactionTimer);
      this.reactionTimer = undefined;
    }
  }

  private clearTimers(): void {
    this.timerGeneration += 1;
    if (this.flipTimer) {
      clearInterval(this.flipTimer);
      this.flipTimer = undefined;
    }
    this.clearReactionTimer();
  }

  private armReactionTimer(windowId: number, durationMs: number): void {
    this.clearReactionTimer();
    const generation = this.timerGeneration;
    this.reactionTimer = setTimeout(() => {
      this.reactionTimer = undefined;
      this.runGuarded('reaction', generation, () => this.engine.advanceReactionClock(windowId));
    }, durationMs);
  }

  private runGuarded(timer: 'flip' | 'reaction', generation: number, advance: () => SlapjackResult): void {
    if (generation !== this.timerGeneration) {
      return;
    }
    try {
      this.publish(advance());
    } catch (error) {
      this.logger.error({ timer, generation, error }, 'slapjack timer callback failed');
      this.stop();
    }
  }

  private publish(result: SlapjackResult): void {
    for (const effect of result.effects) {
      if (effect.type === 'JACK_REVEALED') {
        this.armReactionTimer(effect.windowId, effect.durationMs);
      }
      if (effect.type === 'GAME_FINISHED') {
        this.logger.info({ reason: effect.reason, score: effect.score }, 'slapjack game finished');
        this.stop();
      }
    }

    const view = this.engine.view();
    if (!view.armedWindow) {
      this.clearReactionTimer();
    }
    if (result.effects.length > 0) {
      this.onEffects(result.effects, view);
    }
  }
}
