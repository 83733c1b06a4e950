/**
 * Lives Engine
 *
 * Each wrong answer costs a life. Practice mode with zero configured lives
 * is unlimited. LIVES.DEPLETED fires once, on the step that reaches zero.
 */
import { Events, type AnswerSubmittedEvent } from '@cookie-division/shared-types';
import { log } from '@cookie-division/logger';
import type { EventBus } from '../bus/event-bus';

export class LivesEngine {
  private lives: number;
  private readonly unlimited: boolean;
  private paused = false;
  private depleted = false;
  private dispose: (() => void) | null = null;

  constructor(
    private readonly bus: EventBus,
    startingLives: number,
    isPracticeMode: boolean,
  ) {
    this.unlimited = isPracticeMode && startingLives === 0;
    this.lives = Math.max(0, startingLives);
  }

  get remainingLives(): number {
    return this.lives;
  }

  get isUnlimited(): boolean {
    return this.unlimited;
  }

  /** Attaches to wrong answers and announces the starting count. */
  subscribe(): void {
    this.unsubscribe();
    this.dispose = this.bus.subscribe(Events.Answer.SUBMITTED, this.onAnswer);
    this.bus.publish({ type: Events.Lives.UPDATED, remainingLives: this.lives });
  }

  unsubscribe(): void {
    this.dispose?.();
    this.dispose = null;
  }

  hasLives(): boolean {
    return this.unlimited || this.lives > 0;
  }

  loseLife(): void {
    if (this.unlimited || this.paused || this.lives === 0) return;

    this.lives--;
    this.bus.publish({ type: Events.Lives.UPDATED, remainingLives: this.lives });

    if (this.lives === 0 && !this.depleted) {
      this.depleted = true;
      log('info', 'LivesEngine', 'lives.depleted');
      this.bus.publish({ type: Events.Lives.DEPLETED });
    }
  }

  addLife(): void {
    if (this.unlimited) return;
    this.lives++;
    this.bus.publish({ type: Events.Lives.UPDATED, remainingLives: this.lives });
  }

  pause(): void {
    this.paused = true;
  }

  resume(): void {
    this.paused = false;
  }

  private readonly onAnswer = (event: AnswerSubmittedEvent): void => {
    if (!event.isCorrect) this.loseLife();
  };
}
