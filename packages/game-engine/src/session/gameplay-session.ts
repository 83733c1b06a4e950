/**
 * Gameplay Session
 *
 * One run of questions, from the first QUESTION.GENERATED to
 * SESSION.GAME_OVER. Owns the per-run engines and SessionState, and ends on
 * whichever comes first: lives depleted, timer expired, questions exhausted.
 *
 * Handlers registered here can still be invoked by a publish that began
 * before `stop()`, since the bus dispatches over a snapshot. Every handler
 * therefore checks the ended/stopped flags first.
 */
import {
  DistributionModes,
  Events,
  SessionEndReasons,
  type AnswerSubmittedEvent,
  type GameConfig,
  type SessionEndReason,
  type SessionResult,
  type SessionState,
} from '@cookie-division/shared-types';
import { log } from '@cookie-division/logger';
import type { EventBus } from '../bus/event-bus';
import type { DistributionComponent } from '../contracts/distribution-component';
import { DistributionValidator } from '../engines/distribution-validator';
import { LivesEngine } from '../engines/lives-engine';
import type { QuestionGenerator } from '../engines/question-generator';
import { RoundDistributor } from '../engines/round-distributor';
import { ScoreEngine, grade } from '../engines/score-engine';
import { TimerEngine } from '../engines/timer-engine';
import { FlowInvariantError } from '../errors';
import { TaskScheduler } from '../scheduler/task-scheduler';

export interface GameplaySessionOptions {
  bus: EventBus;
  config: GameConfig;
  generator: QuestionGenerator;
  isPracticeMode: boolean;
  onEnded?: (result: SessionResult) => void;
}

export class GameplaySession {
  readonly bus: EventBus;
  readonly config: GameConfig;
  readonly isPracticeMode: boolean;
  readonly score: ScoreEngine;
  readonly lives: LivesEngine;
  readonly timer: TimerEngine;
  readonly distribution: DistributionComponent;

  private readonly generator: QuestionGenerator;
  private readonly scheduler = new TaskScheduler();
  private readonly onEnded?: (result: SessionResult) => void;
  private readonly usedQuestions = new Set<string>();
  private disposers: Array<() => void> = [];

  private elapsed = 0;
  private questionNumber = 0;
  private totalQuestions: number;
  private currentScore = 0;
  private remainingLives: number;
  private remainingTime: number;

  private started = false;
  private stopped = false;
  private ended = false;
  private paused = false;
  private result: SessionResult | null = null;

  constructor(options: GameplaySessionOptions) {
    this.bus = options.bus;
    this.config = options.config;
    this.generator = options.generator;
    this.isPracticeMode = options.isPracticeMode;
    this.onEnded = options.onEnded;

    const { config, isPracticeMode } = options;
    this.score = new ScoreEngine(this.bus, config);
    this.lives = new LivesEngine(
      this.bus,
      isPracticeMode ? config.practiceModeLives : config.testModeLives,
      isPracticeMode,
    );
    this.timer = new TimerEngine(
      this.bus,
      isPracticeMode ? config.practiceModeTimeLimit : config.testModeTimeLimit,
      isPracticeMode,
    );

    const now = () => this.elapsed;
    this.distribution =
      config.distributionMode === DistributionModes.ROUNDS
        ? new RoundDistributor(this.bus, this.score, { pointsPerRound: config.pointsPerRound, now })
        : new DistributionValidator(this.bus, { maxMonsters: config.maxMonsters, now });

    this.totalQuestions = config.totalQuestions;
    this.remainingLives = this.lives.remainingLives;
    this.remainingTime = this.timer.remainingTime;
  }

  get isRunning(): boolean {
    return this.started && !this.stopped && !this.ended;
  }

  get endResult(): SessionResult | null {
    return this.result;
  }

  start(): void {
    if (this.stopped) throw new FlowInvariantError('cannot restart a stopped session');
    if (this.isRunning) {
      log('debug', 'GameplaySession', 'start.ignored', { questionNumber: this.questionNumber });
      return;
    }

    this.unsubscribeAll();
    this.started = true;

    const queued = this.generator.queue.total;
    this.totalQuestions = !this.isPracticeMode && queued > 0 ? queued : this.config.totalQuestions;

    // Order matters: score and lives settle before the session reacts to an answer.
    this.score.subscribe();
    this.lives.subscribe();
    this.distribution.subscribe();
    this.disposers = [
      () => this.score.unsubscribe(),
      () => this.lives.unsubscribe(),
      () => this.distribution.unsubscribe(),
      this.bus.subscribe(Events.Answer.SUBMITTED, this.onAnswer),
      this.bus.subscribe(Events.Lives.DEPLETED, () => this.end(SessionEndReasons.LIVES_DEPLETED)),
      this.bus.subscribe(Events.Timer.EXPIRED, () => this.end(SessionEndReasons.TIMER_EXPIRED)),
      this.bus.subscribe(Events.Score.UPDATED, (e) => { this.currentScore = e.newScore; }),
      this.bus.subscribe(Events.Score.ROUND_ADDED, (e) => { this.currentScore = e.totalScore; }),
      this.bus.subscribe(Events.Lives.UPDATED, (e) => { this.remainingLives = e.remainingLives; }),
      this.bus.subscribe(Events.Timer.UPDATED, (e) => { this.remainingTime = e.remainingTime; }),
    ];

    log('info', 'GameplaySession', 'session.started', {
      practice: this.isPracticeMode,
      totalQuestions: this.totalQuestions,
      mode: this.config.distributionMode,
    });
    this.advanceQuestion();
  }

  tick(deltaSeconds: number): void {
    if (!this.isRunning || this.paused || deltaSeconds <= 0) return;
    this.elapsed += deltaSeconds;
    this.timer.tick(deltaSeconds);
    this.scheduler.advance(deltaSeconds);
  }

  dropCookie(monsterId: number): void {
    if (!this.isRunning || this.paused) return;
    this.bus.publish({ type: Events.Distribution.COOKIE_DROPPED, monsterId });
  }

  submit(): AnswerSubmittedEvent | null {
    if (!this.isRunning || this.paused) return null;
    return this.distribution.submit();
  }

  submitQuotient(answer: number): AnswerSubmittedEvent | null {
    if (!this.isRunning || this.paused) return null;
    return this.distribution.submitQuotient(answer);
  }

  pause(): void {
    if (!this.isRunning) return;
    this.paused = true;
    this.timer.pause();
    this.lives.pause();
  }

  resume(): void {
    if (!this.isRunning || !this.paused) return;
    this.paused = false;
    this.timer.resume();
    this.lives.resume();
  }

  stop(): void {
    if (!this.started) throw new FlowInvariantError('stop() called on a session that never started');
    if (this.stopped) return;

    this.stopped = true;
    this.unsubscribeAll();
    this.scheduler.invalidate();
    this.timer.pause();
    log('info', 'GameplaySession', 'session.stopped', { questionNumber: this.questionNumber, ended: this.ended });
  }

  snapshot(): SessionState {
    return {
      questionNumber: this.questionNumber,
      totalQuestions: this.totalQuestions,
      score: this.currentScore,
      usedQuestions: [...this.usedQuestions],
      lives: this.remainingLives,
      remainingTime: this.remainingTime,
      isPracticeMode: this.isPracticeMode,
    };
  }

  private readonly onAnswer = (event: AnswerSubmittedEvent): void => {
    if (this.ended || this.stopped) return;
    log('debug', 'GameplaySession', 'answer.received', {
      questionNumber: this.questionNumber, correct: event.isCorrect, timeTaken: event.timeTaken,
    });
    this.scheduler.schedule(this.config.feedbackDelay, 'next-question', () => this.advanceQuestion());
  };

  private advanceQuestion(): void {
    if (this.ended || this.stopped) return;
    if (this.questionNumber >= this.totalQuestions) {
      this.end(SessionEndReasons.QUESTIONS_EXHAUSTED);
      return;
    }
    this.questionNumber++;
    this.generator.next(this.config, this.usedQuestions);
  }

  private end(reason: SessionEndReason): void {
    if (this.ended || this.stopped) return;
    this.ended = true;
    this.scheduler.invalidate();
    this.timer.pause();

    const accuracy = this.score.accuracy();
    const result: SessionResult = {
      reason,
      finalScore: this.score.currentScore,
      accuracy,
      grade: grade(accuracy),
      correctAnswers: this.score.correctAnswers,
      totalAnswered: this.score.totalAnswered,
      isPracticeMode: this.isPracticeMode,
    };
    this.result = result;

    log('info', 'GameplaySession', 'session.ended', { ...result });
    this.bus.publish({ type: Events.Session.GAME_OVER, finalScore: result.finalScore, accuracy });
    this.onEnded?.(result);
  }

  private unsubscribeAll(): void {
    for (const dispose of this.disposers) dispose();
    this.disposers = [];
  }
}
