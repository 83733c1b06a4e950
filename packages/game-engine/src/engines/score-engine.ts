/**
 * Score Engine
 *
 * Running score, correct/total counters and the grade ladder. A correct
 * answer is worth `pointsPerCorrectAnswer` (plus `fastAnswerBonus` when
 * answered under `fastAnswerThreshold` seconds), scaled by an accuracy
 * multiplier.
 */
import { Config, Events, type AnswerSubmittedEvent, type GameConfig, type Grade } from '@cookie-division/shared-types';
import type { EventBus } from '../bus/event-bus';

const { multiplier: MULTIPLIER, grades: GRADES, failingGrade } = Config.scoring;

export function accuracyMultiplier(accuracy: number): number {
  if (accuracy >= 1) return MULTIPLIER.perfect;
  if (accuracy > MULTIPLIER.goodAccuracyAbove) return MULTIPLIER.good;
  return MULTIPLIER.normal;
}

export function grade(accuracy: number): Grade {
  return GRADES.find((g) => accuracy >= g.minAccuracy)?.grade ?? failingGrade;
}

type ScoringConfig = Pick<
  GameConfig,
  'pointsPerCorrectAnswer' | 'fastAnswerBonus' | 'fastAnswerThreshold'
>;

export class ScoreEngine {
  private score = 0;
  private correct = 0;
  private total = 0;
  private dispose: (() => void) | null = null;

  constructor(
    private readonly bus: EventBus,
    private readonly config: ScoringConfig,
  ) {}

  get currentScore(): number {
    return this.score;
  }

  get correctAnswers(): number {
    return this.correct;
  }

  get totalAnswered(): number {
    return this.total;
  }

  subscribe(): void {
    this.unsubscribe();
    this.dispose = this.bus.subscribe(Events.Answer.SUBMITTED, this.onAnswer);
  }

  unsubscribe(): void {
    this.dispose?.();
    this.dispose = null;
  }

  reset(): void {
    this.score = 0;
    this.correct = 0;
    this.total = 0;
  }

  accuracy(): number {
    return this.total === 0 ? 0 : this.correct / this.total;
  }

  addRoundScore(points: number): void {
    this.score += points;
    this.bus.publish({ type: Events.Score.ROUND_ADDED, roundScore: points, totalScore: this.score });
  }

  addAnswerScore(basePoints: number, accuracy: number): void {
    const multiplier = accuracyMultiplier(accuracy);
    this.score += Math.round(basePoints * multiplier);
    this.correct++;
    this.total++;
    this.publishScore(multiplier);
  }

  addWrongAnswer(): void {
    this.total++;
    this.publishScore(MULTIPLIER.normal);
  }

  private publishScore(multiplier: number): void {
    this.bus.publish({
      type: Events.Score.UPDATED,
      newScore: this.score,
      totalQuestions: this.total,
      correctAnswers: this.correct,
      multiplier,
    });
  }

  private readonly onAnswer = (event: AnswerSubmittedEvent): void => {
    if (!event.isCorrect) {
      this.addWrongAnswer();
      return;
    }
    const fast = event.timeTaken < this.config.fastAnswerThreshold;
    const base = this.config.pointsPerCorrectAnswer + (fast ? this.config.fastAnswerBonus : 0);
    const runningAccuracy = (this.correct + 1) / (this.total + 1);
    this.addAnswerScore(base, runningAccuracy);
  };
}
