/**
 * Distribution Validator
 *
 * Tracks cookie drops for the current question in CHOICE mode and judges
 * the distribution. Picking more distinct monsters than the divisor fails
 * the question on the spot; uneven counts are only judged at submit.
 */
import {
  DistributionPhases,
  Events,
  type AnswerSubmittedEvent,
  type CookieDroppedEvent,
  type DistributionPhase,
  type QuestionGeneratedEvent,
} from '@cookie-division/shared-types';
import { log } from '@cookie-division/logger';
import type { EventBus } from '../bus/event-bus';
import type { DistributionComponent } from '../contracts/distribution-component';

export interface DistributionValidatorOptions {
  maxMonsters: number;
  /** Session clock in seconds. */
  now: () => number;
}

export interface DistributionSnapshot {
  phase: DistributionPhase;
  divisor: number;
  quotient: number;
  monsterCookieCounts: ReadonlyMap<number, number>;
  monstersWithCookies: ReadonlySet<number>;
}

export class DistributionValidator implements DistributionComponent {
  private phase: DistributionPhase = DistributionPhases.IDLE;
  private divisor = 0;
  private quotient = 0;
  private startedAt = 0;
  private counts = new Map<number, number>();
  private chosen = new Set<number>();
  private disposers: Array<() => void> = [];

  constructor(
    private readonly bus: EventBus,
    private readonly options: DistributionValidatorOptions,
  ) {}

  subscribe(): void {
    this.unsubscribe();
    this.disposers = [
      this.bus.subscribe(Events.Question.GENERATED, this.onQuestion),
      this.bus.subscribe(Events.Distribution.COOKIE_DROPPED, this.onCookieDropped),
    ];
  }

  unsubscribe(): void {
    for (const dispose of this.disposers) dispose();
    this.disposers = [];
  }

  get state(): DistributionSnapshot {
    return {
      phase: this.phase,
      divisor: this.divisor,
      quotient: this.quotient,
      monsterCookieCounts: new Map(this.counts),
      monstersWithCookies: new Set(this.chosen),
    };
  }

  /** Judges the distribution. Returns `null` once the question is already decided. */
  submit(): AnswerSubmittedEvent | null {
    if (this.phase !== DistributionPhases.COLLECTING) {
      log('debug', 'DistributionValidator', 'submit.ignored', { phase: this.phase });
      return null;
    }

    const isCorrect =
      this.chosen.size === this.divisor &&
      [...this.chosen].every((id) => this.counts.get(id) === this.quotient);

    return this.finish(isCorrect);
  }

  /** Quotient entry belongs to ROUNDS mode. */
  submitQuotient(answer: number): AnswerSubmittedEvent | null {
    log('debug', 'DistributionValidator', 'submitQuotient.ignored', { answer });
    return null;
  }

  private readonly onQuestion = (event: QuestionGeneratedEvent): void => {
    this.divisor = event.divisor;
    this.quotient = event.quotient;
    this.counts = new Map();
    this.chosen = new Set();
    this.startedAt = this.options.now();
    this.phase = DistributionPhases.COLLECTING;
  };

  private readonly onCookieDropped = (event: CookieDroppedEvent): void => {
    const { monsterId } = event;
    if (!Number.isInteger(monsterId) || monsterId < 0 || monsterId >= this.options.maxMonsters) {
      log('warn', 'DistributionValidator', 'monster.unknown', { monsterId, maxMonsters: this.options.maxMonsters });
      return;
    }
    if (this.phase !== DistributionPhases.COLLECTING) return;

    if (!this.chosen.has(monsterId) && this.chosen.size >= this.divisor) {
      log('info', 'DistributionValidator', 'distribution.overselected', { monsterId, divisor: this.divisor });
      this.finish(false);
      return;
    }

    const cookieCount = (this.counts.get(monsterId) ?? 0) + 1;
    this.counts.set(monsterId, cookieCount);
    this.chosen.add(monsterId);

    this.bus.publish({
      type: Events.Distribution.UPDATED,
      monsterId,
      cookieCount,
      monstersWithCookies: this.chosen.size,
      divisor: this.divisor,
    });
  };

  private finish(isCorrect: boolean): AnswerSubmittedEvent {
    this.phase = isCorrect ? DistributionPhases.SUBMITTED_CORRECT : DistributionPhases.SUBMITTED_INCORRECT;
    const event: AnswerSubmittedEvent = {
      type: Events.Answer.SUBMITTED,
      isCorrect,
      submittedAnswer: isCorrect ? this.quotient : -1,
      correctAnswer: this.quotient,
      timeTaken: Math.max(0, this.options.now() - this.startedAt),
    };
    this.bus.publish(event);
    return event;
  }
}
