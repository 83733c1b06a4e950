import { createActor, type Actor } from 'xstate';
import {
  Config,
  Events,
  FlowEvents,
  GameModes,
  Sounds,
  type AnswerSubmittedEvent,
  type GameConfig,
  type GameFlowState,
  type ScreenName,
  type SessionResult,
  type SessionState,
  type SoundName,
} from '@cookie-division/shared-types';
import {
  EventBus,
  GameplaySession,
  QuestionGenerator,
  resolveGameConfig,
  type Rng,
  type SubmissionResult,
} from '@cookie-division/game-engine';
import { log, flushLogs } from '@cookie-division/logger';
import { gameFlowMachine, toGameFlowState, type GameFlowContext, type GameFlowEvent } from './machines/game-flow';
import { MemoryHighScoreStore, recordHighScore, type HighScoreStore, type HighScoreUpdate } from './high-score';
import { createInspector } from './inspect';

/** Rendering, audio and UI live outside the host; this is all it asks of them. */
export interface PresentationPort {
  showScreen(screen: ScreenName): void;
  hideScreen(screen: ScreenName): void;
  /** `highScore` is null for practice runs, which are not recorded. */
  showResults?(result: SessionResult, highScore: HighScoreUpdate | null): void;
  playSound?(sound: SoundName): void;
}

const headlessPresentation: PresentationPort = {
  showScreen: () => {},
  hideScreen: () => {},
};

export interface GameHostOptions {
  /** Passed through the same correcting resolver as a loaded config file. */
  config?: GameConfig;
  presentation?: PresentationPort;
  highScores?: HighScoreStore;
  random?: Rng;
  withLoadingScreen?: boolean;
  /** Tags log lines from this host. */
  hostId?: string;
}

/**
 * Game Host
 *
 * Owns the flow actor and everything a run needs (bus, generator, stores),
 * one set per host. Executes the flow machine's effects: session lifecycle,
 * presentation calls and high-score persistence. Input from the UI layer
 * arrives through the `on*` entry points and the gameplay passthroughs.
 */
export class GameHost {
  readonly bus = new EventBus();
  readonly config: GameConfig;

  private readonly presentation: PresentationPort;
  private readonly highScores: HighScoreStore;
  private readonly generator: QuestionGenerator;
  private readonly hostId: string;
  private readonly actor: Actor<typeof gameFlowMachine>;
  private activeSession: GameplaySession | null = null;
  private lastHighScore: HighScoreUpdate | null = null;
  private disposeAnswerSounds: (() => void) | null = null;

  constructor(options: GameHostOptions = {}) {
    this.hostId = options.hostId ?? 'local';
    this.config = this.resolveConfig(options.config);
    this.presentation = options.presentation ?? headlessPresentation;
    this.highScores = options.highScores ?? new MemoryHighScoreStore();
    this.generator = new QuestionGenerator(this.bus, { random: options.random });

    const machine = gameFlowMachine.provide({
      actions: {
        present: (_, params) => this.presentation.showScreen(params.screen),
        dismiss: (_, params) => this.presentation.hideScreen(params.screen),
        startGameplay: ({ context }) => this.beginSession(context),
        stopGameplay: () => this.endSession(),
        persistHighScore: ({ context }) => {
          this.lastHighScore = context.result ? recordHighScore(this.highScores, context.result.finalScore) : null;
        },
        presentResults: ({ context }) => {
          if (!context.result) return;
          const highScore = context.result.isPracticeMode ? null : this.lastHighScore;
          this.presentation.showResults?.(context.result, highScore);
        },
        playResultSound: ({ context }) => {
          if (!context.result) return;
          const victory = context.result.accuracy >= Config.scoring.victoryAccuracy;
          this.presentation.playSound?.(victory ? Sounds.VICTORY : Sounds.GAME_OVER);
        },
      },
    });

    this.actor = createActor(machine, {
      input: { withLoadingScreen: options.withLoadingScreen ?? false },
      inspect: createInspector(this.hostId),
    });
  }

  // --- Lifecycle ---

  start(): void {
    this.disposeAnswerSounds = this.bus.subscribe(Events.Answer.SUBMITTED, this.onAnswerSound);
    this.actor.start();
    log('info', 'GameHost', 'host.started', { host: this.hostId });
  }

  async stop(): Promise<void> {
    this.endSession();
    this.actor.stop();
    this.disposeAnswerSounds?.();
    this.disposeAnswerSounds = null;
    this.bus.clear();
    log('info', 'GameHost', 'host.stopped', { host: this.hostId });
    await flushLogs();
  }

  get state(): GameFlowState {
    return toGameFlowState(this.actor.getSnapshot());
  }

  get session(): SessionState | null {
    return this.activeSession?.snapshot() ?? null;
  }

  // --- Flow entry points ---

  onLoaded(): void {
    this.send({ type: FlowEvents.LOADED });
  }

  onPracticeMode(): void {
    this.send({ type: FlowEvents.PRACTICE_MODE });
  }

  onTestMode(): void {
    this.send({ type: FlowEvents.TEST_MODE });
  }

  /**
   * Validates operator questions and starts a test run with the accepted
   * ones (an empty set means random questions). `null` outside the
   * submission screen.
   */
  onQuestionsSubmitted(questions: readonly unknown[]): SubmissionResult | null {
    if (!this.actor.getSnapshot().matches('questionSubmission')) {
      log('warn', 'GameHost', 'event.ignored', { host: this.hostId, eventType: FlowEvents.QUESTIONS_SUBMITTED });
      return null;
    }
    const result = this.generator.queue.submit(questions, this.config);
    this.send({ type: FlowEvents.QUESTIONS_SUBMITTED });
    return result;
  }

  onBackToMenu(): void {
    this.send({ type: FlowEvents.BACK });
  }

  onPlayAgain(): void {
    this.send({ type: FlowEvents.PLAY_AGAIN });
  }

  onMainMenu(): void {
    this.send({ type: FlowEvents.MAIN_MENU });
  }

  // --- Gameplay passthroughs ---

  dropCookie(monsterId: number): void {
    this.activeSession?.dropCookie(monsterId);
  }

  submitAnswer(): AnswerSubmittedEvent | null {
    return this.activeSession?.submit() ?? null;
  }

  submitQuotient(answer: number): AnswerSubmittedEvent | null {
    return this.activeSession?.submitQuotient(answer) ?? null;
  }

  tick(deltaSeconds: number): void {
    this.activeSession?.tick(deltaSeconds);
  }

  pause(): void {
    this.activeSession?.pause();
  }

  resume(): void {
    this.activeSession?.resume();
  }

  // --- Effects ---

  private resolveConfig(config: GameConfig | undefined): GameConfig {
    const { config: resolved, corrections } = resolveGameConfig(config);
    for (const correction of corrections) {
      log('warn', 'GameHost', 'config.corrected', { host: this.hostId, correction });
    }
    return resolved;
  }

  private send(event: GameFlowEvent): void {
    const snapshot = this.actor.getSnapshot();
    if (!snapshot.can(event)) {
      log('warn', 'GameHost', 'event.ignored', { host: this.hostId, eventType: event.type, state: toGameFlowState(snapshot).kind });
      return;
    }
    this.actor.send(event);
  }

  private beginSession(context: GameFlowContext): void {
    this.endSession();

    const isPracticeMode = context.mode === GameModes.PRACTICE;
    if (isPracticeMode) this.generator.queue.clear();
    else this.generator.queue.reset();

    const session = new GameplaySession({
      bus: this.bus,
      config: this.config,
      generator: this.generator,
      isPracticeMode,
      onEnded: (result) => {
        if (this.activeSession !== session) return;
        this.send({ type: FlowEvents.SESSION_ENDED, result });
      },
    });
    this.activeSession = session;

    log('info', 'GameHost', 'gameplay.started', { host: this.hostId, sessionId: context.sessionId, practice: isPracticeMode });
    this.presentation.playSound?.(Sounds.GAMEPLAY_MUSIC);
    session.start();
  }

  private endSession(): void {
    const session = this.activeSession;
    if (!session) return;
    this.activeSession = null;
    session.stop();
    // submitted questions belong to a single test run
    if (!session.isPracticeMode) this.generator.queue.clear();
  }

  private readonly onAnswerSound = (event: AnswerSubmittedEvent): void => {
    this.presentation.playSound?.(event.isCorrect ? Sounds.CORRECT_ANSWER : Sounds.WRONG_ANSWER);
  };
}
