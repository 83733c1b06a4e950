/**
 * Round Distributor
 *
 * ROUNDS-mode distribution: each drop deals one cookie to every one of the
 * `divisor` monsters, and each full round scores `pointsPerRound`. Once the
 * pile is smaller than the divisor the player must type the quotient;
 * dropping again at that point is a remainder error.
 */
import {
  Events,
  type AnswerSubmittedEvent,
  type QuestionGeneratedEvent,
} from '@cookie-division/shared-types';
import { log } from '@cookie-division/logger';
import type { EventBus } from '../bus/event-bus';
import type { DistributionComponent } from '../contracts/distribution-component';
import type { ScoreEngine } from './score-engine';

export interface RoundDistributorOptions {
  pointsPerRound: number;
  /** Session clock in seconds. */
  now: () => number;
}

type RoundPhase = 'IDLE' | 'DISTRIBUTING' | 'AWAITING_ANSWER' | 'ANSWERED';

export interface RoundState {
  phase: RoundPhase;
  totalCookies: number;
  remainingCookies: number;
  divisor: number;
  roundNumber: number;
}

export class RoundDistributor implements DistributionComponent {
  private phase: RoundPhase = 'IDLE';
  private totalCookies = 0;
  private remaining = 0;
  private divisor = 0;
  private quotient = 0;
  private round = 0;
  private startedAt = 0;
  private disposers: Array<() => void> = [];

  constructor(
    private readonly bus: EventBus,
    private readonly score: ScoreEngine,
    private readonly options: RoundDistributorOptions,
  ) {}

  subscribe(): void {
    this.unsubscribe();
    this.disposers = [
      this.bus.subscribe(Events.Question.GENERATED, this.onQuestion),
      this.bus.subscribe(Events.Distribution.COOKIE_DROPPED, this.onDrop),
    ];
  }

  unsubscribe(): void {
    for (const dispose of this.disposers) dispose();
    this.disposers = [];
  }

  get state(): RoundState {
    return {
      phase: this.phase,
      totalCookies: this.totalCookies,
      remainingCookies: this.remaining,
      divisor: this.divisor,
      roundNumber: this.round,
    };
  }

  /** Cookies are dealt by rounds; the answer is typed, not submitted. */
  submit(): AnswerSubmittedEvent | null {
    log('debug', 'RoundDistributor', 'submit.ignored', { phase: this.phase });
    return null;
  }

  /** Judges the typed quotient. Accepted once per question. */
  submitQuotient(answer: number): AnswerSubmittedEvent | null {
    if (this.phase !== 'DISTRIBUTING' && this.phase !== 'AWAITING_ANSWER') {
      log('debug', 'RoundDistributor', 'submitQuotient.ignored', { phase: this.phase, answer });
      return null;
    }

    this.phase = 'ANSWERED';
    const isCorrect = answer === this.quotient;
    const event: AnswerSubmittedEvent = {
      type: Events.Answer.SUBMITTED,
      isCorrect,
      submittedAnswer: answer,
      correctAnswer: this.quotient,
      timeTaken: Math.max(0, this.options.now() - this.startedAt),
    };
    this.bus.publish(event);
    return event;
  }

  private readonly onQuestion = (event: QuestionGeneratedEvent): void => {
    this.totalCookies = event.dividend;
    this.remaining = event.dividend;
    this.divisor = event.divisor;
    this.quotient = event.quotient;
    this.round = 0;
    this.startedAt = this.options.now();
    this.phase = 'DISTRIBUTING';
    this.publishPile();
  };

  private readonly onDrop = (): void => {
    if (this.phase === 'AWAITING_ANSWER') {
      log('info', 'RoundDistributor', 'remainder.error', { remaining: this.remaining, divisor: this.divisor });
      this.bus.publish({
        type: Events.Distribution.REMAINDER_ERROR,
        remainingCookies: this.remaining,
        divisor: this.divisor,
      });
      this.bus.publish({ type: Events.Distribution.ANSWER_INPUT_REQUESTED });
      return;
    }
    if (this.phase !== 'DISTRIBUTING') return;

    this.remaining -= this.divisor;
    this.round++;
    this.score.addRoundScore(this.options.pointsPerRound);

    this.bus.publish({
      type: Events.Distribution.ROUND_COMPLETED,
      roundNumber: this.round,
      cookiesPerMonster: this.round,
      remainingCookies: this.remaining,
    });
    this.publishPile();

    if (this.remaining < this.divisor) {
      this.phase = 'AWAITING_ANSWER';
      this.bus.publish({ type: Events.Distribution.ANSWER_INPUT_REQUESTED });
    }
  };

  private publishPile(): void {
    this.bus.publish({
      type: Events.Distribution.PILE_UPDATED,
      remainingCookies: this.remaining,
      totalCookies: this.totalCookies,
    });
  }
}
