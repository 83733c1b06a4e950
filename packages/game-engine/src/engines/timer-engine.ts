/**
 * Timer Engine
 *
 * Session countdown, advanced only by tick deltas (seconds). Practice mode
 * with a zero limit never runs.
 */
import { Events } from '@cookie-division/shared-types';
import { log } from '@cookie-division/logger';
import type { EventBus } from '../bus/event-bus';

export class TimerEngine {
  private remaining: number;
  private active: boolean;
  private expired = false;
  readonly unlimited: boolean;

  constructor(
    private readonly bus: EventBus,
    timeLimit: number,
    isPracticeMode: boolean,
  ) {
    this.unlimited = isPracticeMode && timeLimit === 0;
    this.remaining = Math.max(0, timeLimit);
    this.active = !this.unlimited;
  }

  get remainingTime(): number {
    return this.remaining;
  }

  get isActive(): boolean {
    return this.active;
  }

  hasTime(): boolean {
    return this.unlimited || this.remaining > 0;
  }

  tick(deltaSeconds: number): void {
    if (!this.active || deltaSeconds <= 0) return;

    this.remaining = Math.max(0, this.remaining - deltaSeconds);
    this.bus.publish({ type: Events.Timer.UPDATED, remainingTime: this.remaining });

    if (this.remaining === 0) {
      this.active = false;
      this.expired = true;
      log('info', 'TimerEngine', 'timer.expired');
      this.bus.publish({ type: Events.Timer.EXPIRED });
    }
  }

  pause(): void {
    this.active = false;
  }

  resume(): void {
    if (this.unlimited || this.expired) return;
    this.active = true;
  }

  addTime(seconds: number): void {
    if (this.unlimited || this.expired || seconds <= 0) return;
    this.remaining += seconds;
    this.bus.publish({ type: Events.Timer.UPDATED, remainingTime: this.remaining });
  }
}
