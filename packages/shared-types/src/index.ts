import { z } from "zod";
import { Config } from "./config";
import { DistributionModes, GameModes, SessionEndReasons } from "./events";
import type { SessionEndReason } from "./events";

export * from "./events";
export { Config } from "./config";

// --- Enums ---

export const GradeSchema = z.enum(["A+", "A", "B+", "B", "C+", "C", "D", "F"]);
export type Grade = z.infer<typeof GradeSchema>;

export const GameModeSchema = z.nativeEnum(GameModes);
export const DistributionModeSchema = z.nativeEnum(DistributionModes);
export const SessionEndReasonSchema = z.nativeEnum(SessionEndReasons);

// --- Schemas (Configuration) ---

/**
 * Shape of a fully resolved game configuration. Times are in seconds.
 * Range rules (minimum lives, minimum time limit, divisor bounds) are
 * applied by the config resolver, which corrects instead of rejecting.
 */
export const GameConfigSchema = z.object({
  totalQuestions: z.number().int().min(1),
  maxMonsters: z.number().int().min(1),
  testModeTimeLimit: z.number().min(0),
  practiceModeTimeLimit: z.number().min(0), // 0 = unlimited
  testModeLives: z.number().int().min(0),
  practiceModeLives: z.number().int().min(0), // 0 = unlimited
  pointsPerCorrectAnswer: z.number().int().min(0),
  fastAnswerBonus: z.number().int().min(0),
  fastAnswerThreshold: z.number().min(0),
  minDividend: z.number().int(),
  maxDividend: z.number().int(),
  allowedDivisors: z.array(z.number().int()),
  distributionMode: DistributionModeSchema,
  pointsPerRound: z.number().int().min(0),
  feedbackDelay: z.number().min(0),
});

export type GameConfig = z.infer<typeof GameConfigSchema>;

export const DEFAULT_GAME_CONFIG: GameConfig = {
  totalQuestions: Config.game.totalQuestions,
  maxMonsters: Config.game.maxMonsters,
  testModeTimeLimit: Config.game.testModeTimeLimit,
  practiceModeTimeLimit: Config.game.practiceModeTimeLimit,
  testModeLives: Config.game.testModeLives,
  practiceModeLives: Config.game.practiceModeLives,
  pointsPerCorrectAnswer: Config.scoring.pointsPerCorrectAnswer,
  fastAnswerBonus: Config.scoring.fastAnswerBonus,
  fastAnswerThreshold: Config.scoring.fastAnswerThreshold,
  minDividend: Config.game.minDividend,
  maxDividend: Config.game.maxDividend,
  allowedDivisors: [...Config.game.allowedDivisors],
  distributionMode: Config.game.distributionMode,
  pointsPerRound: Config.scoring.pointsPerRound,
  feedbackDelay: Config.timing.feedbackDelay,
};

// --- Schemas (Questions) ---

export const QuestionSchema = z.object({
  dividend: z.number().int().positive(),
  divisor: z.number().int().positive(),
  quotient: z.number().int().positive(),
});

export const SubmittedQuestionSchema = z.object({
  dividend: z.number().int().positive(),
  divisor: z.number().int().positive(),
});

export type Question = z.infer<typeof QuestionSchema>;
export type SubmittedQuestion = z.infer<typeof SubmittedQuestionSchema>;

// --- Schemas (Persistence) ---

export const HighScoreTableSchema = z.record(z.string(), z.number().int().min(0));
export type HighScoreTable = z.infer<typeof HighScoreTableSchema>;

// --- Session Types ---

export interface SessionState {
  questionNumber: number;
  totalQuestions: number;
  score: number;
  usedQuestions: readonly string[];
  lives: number;
  remainingTime: number;
  isPracticeMode: boolean;
}

export interface SessionResult {
  reason: SessionEndReason;
  finalScore: number;
  accuracy: number;
  grade: Grade;
  correctAnswers: number;
  totalAnswered: number;
  isPracticeMode: boolean;
}

// --- Flow State (derived from the flow machine snapshot) ---

export type GameFlowState =
  | { kind: "Loading" }
  | { kind: "MainMenu" }
  | { kind: "QuestionSubmission" }
  | { kind: "Gameplay"; isPracticeMode: boolean; sessionId: number }
  | { kind: "GameOver"; finalScore: number; accuracy: number; grade: Grade; reason: SessionEndReason }
  | { kind: "PracticeComplete"; finalScore: number; accuracy: number; grade: Grade; reason: SessionEndReason };

export type GameFlowStateKind = GameFlowState["kind"];
