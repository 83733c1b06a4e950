import type { Grade } from './index';

export const Config = {
  game: {
    totalQuestions: 3,
    maxMonsters: 5,
    testModeTimeLimit: 60,
    practiceModeTimeLimit: 120,
    testModeLives: 3,
    practiceModeLives: 5,
    minDividend: 4,
    maxDividend: 20,
    allowedDivisors: [2, 3, 4, 5] as readonly number[],
    distributionMode: 'CHOICE',
  },
  scoring: {
    pointsPerCorrectAnswer: 10,
    fastAnswerBonus: 50,
    fastAnswerThreshold: 5,
    pointsPerRound: 100,
    multiplier: {
      perfect: 2.0,
      good: 1.5,
      normal: 1.0,
      goodAccuracyAbove: 0.8,
    },
    grades: [
      { minAccuracy: 0.95, grade: 'A+' },
      { minAccuracy: 0.9, grade: 'A' },
      { minAccuracy: 0.85, grade: 'B+' },
      { minAccuracy: 0.8, grade: 'B' },
      { minAccuracy: 0.75, grade: 'C+' },
      { minAccuracy: 0.7, grade: 'C' },
      { minAccuracy: 0.6, grade: 'D' },
    ] as readonly { minAccuracy: number; grade: Grade }[],
    failingGrade: 'F' as Grade,
    victoryAccuracy: 0.8,
  },
  generation: {
    maxAttempts: 50,
    maxQuotient: 6,
  },
  timing: {
    feedbackDelay: 1.5,
  },
  limits: {
    minTestModeTimeLimit: 10,
    minTestModeLives: 1,
    minDividendFloor: 2,
  },
  storage: {
    highScoreKey: 'HighScore',
  },
} as const;
