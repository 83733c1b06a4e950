// Errors
export { CookieGameError, ConfigurationError, FlowInvariantError } from './errors';

// Contracts
export type { DistributionComponent } from './contracts/distribution-component';

// Bus + scheduling
export { EventBus, type GameEventHandler } from './bus/event-bus';
export { TaskScheduler } from './scheduler/task-scheduler';

// Helpers
export { randomInt, pickRandom, seededRng, type Rng } from './helpers/random';
export { quotientRange, questionKey, type QuotientRange } from './helpers/quotient-range';
export { resolveGameConfig, type ResolvedGameConfig } from './helpers/game-config';

// Engines
export { QuestionGenerator, type QuestionGeneratorOptions } from './engines/question-generator';
export { SubmittedQuestionQueue, type SubmissionResult, type RejectedQuestion } from './engines/submitted-question-queue';
export { DistributionValidator, type DistributionValidatorOptions, type DistributionSnapshot } from './engines/distribution-validator';
export { RoundDistributor, type RoundDistributorOptions, type RoundState } from './engines/round-distributor';
export { ScoreEngine, accuracyMultiplier, grade } from './engines/score-engine';
export { LivesEngine } from './engines/lives-engine';
export { TimerEngine } from './engines/timer-engine';

// Session
export { GameplaySession, type GameplaySessionOptions } from './session/gameplay-session';
