/**
 * String constants for bus events, flow events, phases, screens and sounds.
 * Consumers import these instead of repeating raw strings.
 *
 * `as const` objects rather than TS enums, so zod's nativeEnum and literal
 * payload types can both read them.
 */

// --- BUS EVENT TYPE CONSTANTS ---

export const Events = {
  Question: {
    GENERATED: 'QUESTION.GENERATED',
    GENERATION_EXHAUSTED: 'QUESTION.GENERATION_EXHAUSTED',
  },
  Distribution: {
    COOKIE_DROPPED: 'DISTRIBUTION.COOKIE_DROPPED',
    UPDATED: 'DISTRIBUTION.UPDATED',
    ROUND_COMPLETED: 'DISTRIBUTION.ROUND_COMPLETED',
    PILE_UPDATED: 'DISTRIBUTION.PILE_UPDATED',
    REMAINDER_ERROR: 'DISTRIBUTION.REMAINDER_ERROR',
    ANSWER_INPUT_REQUESTED: 'DISTRIBUTION.ANSWER_INPUT_REQUESTED',
  },
  Answer: {
    SUBMITTED: 'ANSWER.SUBMITTED',
  },
  Score: {
    UPDATED: 'SCORE.UPDATED',
    ROUND_ADDED: 'SCORE.ROUND_ADDED',
  },
  Lives: {
    UPDATED: 'LIVES.UPDATED',
    DEPLETED: 'LIVES.DEPLETED',
  },
  Timer: {
    UPDATED: 'TIMER.UPDATED',
    EXPIRED: 'TIMER.EXPIRED',
  },
  Session: {
    GAME_OVER: 'SESSION.GAME_OVER',
  },
} as const;

// --- FLOW MACHINE EVENT CONSTANTS ---

export const FlowEvents = {
  LOADED: 'FLOW.LOADED',
  PRACTICE_MODE: 'FLOW.PRACTICE_MODE',
  TEST_MODE: 'FLOW.TEST_MODE',
  QUESTIONS_SUBMITTED: 'FLOW.QUESTIONS_SUBMITTED',
  BACK: 'FLOW.BACK',
  SESSION_ENDED: 'FLOW.SESSION_ENDED',
  PLAY_AGAIN: 'FLOW.PLAY_AGAIN',
  MAIN_MENU: 'FLOW.MAIN_MENU',
} as const;

// --- PHASE CONSTANTS ---

export const DistributionPhases = {
  IDLE: 'IDLE',
  COLLECTING: 'COLLECTING',
  SUBMITTED_CORRECT: 'SUBMITTED_CORRECT',
  SUBMITTED_INCORRECT: 'SUBMITTED_INCORRECT',
} as const;

export const GameModes = {
  PRACTICE: 'PRACTICE',
  TEST: 'TEST',
} as const;

export const DistributionModes = {
  CHOICE: 'CHOICE',
  ROUNDS: 'ROUNDS',
} as const;

export const SessionEndReasons = {
  LIVES_DEPLETED: 'LIVES_DEPLETED',
  TIMER_EXPIRED: 'TIMER_EXPIRED',
  QUESTIONS_EXHAUSTED: 'QUESTIONS_EXHAUSTED',
} as const;

export const Screens = {
  LOADING: 'LoadingScreen',
  MAIN_MENU: 'MainMenuScreen',
  QUESTION_SUBMISSION: 'QuestionSubmissionScreen',
  GAMEPLAY: 'GameplayScreen',
  GAME_OVER: 'GameOverScreen',
  PRACTICE_COMPLETE: 'PracticeCompleteScreen',
} as const;

export const Sounds = {
  GAMEPLAY_MUSIC: 'GameplayMusic',
  CORRECT_ANSWER: 'CorrectAnswer',
  WRONG_ANSWER: 'WrongAnswer',
  VICTORY: 'Victory',
  GAME_OVER: 'GameOver',
} as const;

export type DistributionPhase = typeof DistributionPhases[keyof typeof DistributionPhases];
export type GameMode = typeof GameModes[keyof typeof GameModes];
export type DistributionMode = typeof DistributionModes[keyof typeof DistributionModes];
export type SessionEndReason = typeof SessionEndReasons[keyof typeof SessionEndReasons];
export type ScreenName = typeof Screens[keyof typeof Screens];
export type SoundName = typeof Sounds[keyof typeof Sounds];

// --- BUS EVENT PAYLOADS ---

export interface QuestionGeneratedEvent {
  type: typeof Events.Question.GENERATED;
  dividend: number;
  divisor: number;
  quotient: number;
}

export interface QuestionGenerationExhaustedEvent {
  type: typeof Events.Question.GENERATION_EXHAUSTED;
  attempts: number;
}

export interface CookieDroppedEvent {
  type: typeof Events.Distribution.COOKIE_DROPPED;
  monsterId: number;
}

export interface DistributionUpdatedEvent {
  type: typeof Events.Distribution.UPDATED;
  monsterId: number;
  cookieCount: number;
  monstersWithCookies: number;
  divisor: number;
}

export interface DistributionRoundCompletedEvent {
  type: typeof Events.Distribution.ROUND_COMPLETED;
  roundNumber: number;
  cookiesPerMonster: number;
  remainingCookies: number;
}

export interface CookiePileUpdatedEvent {
  type: typeof Events.Distribution.PILE_UPDATED;
  remainingCookies: number;
  totalCookies: number;
}

export interface RemainderErrorEvent {
  type: typeof Events.Distribution.REMAINDER_ERROR;
  remainingCookies: number;
  divisor: number;
}

export interface AnswerInputRequestedEvent {
  type: typeof Events.Distribution.ANSWER_INPUT_REQUESTED;
}

export interface AnswerSubmittedEvent {
  type: typeof Events.Answer.SUBMITTED;
  isCorrect: boolean;
  /** Quotient the player demonstrated, or -1 when the distribution was invalid. */
  submittedAnswer: number;
  correctAnswer: number;
  /** Seconds since the question was published. */
  timeTaken: number;
}

export interface ScoreUpdatedEvent {
  type: typeof Events.Score.UPDATED;
  newScore: number;
  totalQuestions: number;
  correctAnswers: number;
  multiplier: number;
}

export interface RoundScoreAddedEvent {
  type: typeof Events.Score.ROUND_ADDED;
  roundScore: number;
  totalScore: number;
}

export interface LivesUpdatedEvent {
  type: typeof Events.Lives.UPDATED;
  remainingLives: number;
}

export interface LivesDepletedEvent {
  type: typeof Events.Lives.DEPLETED;
}

export interface TimerUpdatedEvent {
  type: typeof Events.Timer.UPDATED;
  remainingTime: number;
}

export interface TimerExpiredEvent {
  type: typeof Events.Timer.EXPIRED;
}

export interface GameOverEvent {
  type: typeof Events.Session.GAME_OVER;
  finalScore: number;
  accuracy: number;
}

export type GameEvent =
  | QuestionGeneratedEvent
  | QuestionGenerationExhaustedEvent
  | CookieDroppedEvent
  | DistributionUpdatedEvent
  | DistributionRoundCompletedEvent
  | CookiePileUpdatedEvent
  | RemainderErrorEvent
  | AnswerInputRequestedEvent
  | AnswerSubmittedEvent
  | ScoreUpdatedEvent
  | RoundScoreAddedEvent
  | LivesUpdatedEvent
  | LivesDepletedEvent
  | TimerUpdatedEvent
  | TimerExpiredEvent
  | GameOverEvent;

export type GameEventType = GameEvent['type'];

export type GameEventOf<T extends GameEventType> = Extract<GameEvent, { type: T }>;
