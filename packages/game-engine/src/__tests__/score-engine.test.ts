import { describe, test, expect } from 'vitest';
import { DEFAULT_GAME_CONFIG, Events, type GameEvent } from '@cookie-division/shared-types';
import { EventBus } from '../bus/event-bus';
import { ScoreEngine, accuracyMultiplier, grade } from '../engines/score-engine';

function answer(bus: EventBus, isCorrect: boolean, timeTaken = 10) {
  bus.publish({
    type: Events.Answer.SUBMITTED,
    isCorrect,
    submittedAnswer: isCorrect ? 2 : -1,
    correctAnswer: 2,
    timeTaken,
  });
}

describe('ScoreEngine', () => {
  test('accuracy is 1.0 after n correct of n and the multiplier there is exactly 2.0', () => {
    const bus = new EventBus();
    const score = new ScoreEngine(bus, DEFAULT_GAME_CONFIG);
    score.subscribe();

    for (let i = 0; i < 4; i++) answer(bus, true);

    expect(score.accuracy()).toBe(1);
    expect(accuracyMultiplier(score.accuracy())).toBe(2);
  });

  test('accuracy is 0 before any answer', () => {
    expect(new ScoreEngine(new EventBus(), DEFAULT_GAME_CONFIG).accuracy()).toBe(0);
  });

  test('multiplier ladder', () => {
    expect(accuracyMultiplier(1)).toBe(2);
    expect(accuracyMultiplier(0.9)).toBe(1.5);
    expect(accuracyMultiplier(0.8)).toBe(1);
    expect(accuracyMultiplier(0)).toBe(1);
  });

  test('grade ladder boundaries', () => {
    expect(grade(1)).toBe('A+');
    expect(grade(0.95)).toBe('A+');
    expect(grade(0.9)).toBe('A');
    expect(grade(0.85)).toBe('B+');
    expect(grade(0.8)).toBe('B');
    expect(grade(0.75)).toBe('C+');
    expect(grade(0.7)).toBe('C');
    expect(grade(0.6)).toBe('D');
    expect(grade(0.59)).toBe('F');
    expect(grade(0)).toBe('F');
  });

  test('addAnswerScore rounds base times multiplier', () => {
    const score = new ScoreEngine(new EventBus(), DEFAULT_GAME_CONFIG);
    score.addAnswerScore(15, 0.9);

    expect(score.currentScore).toBe(23);
    expect(score.correctAnswers).toBe(1);
    expect(score.totalAnswered).toBe(1);
  });

  test('correct answers score base plus fast bonus with the running accuracy', () => {
    const bus = new EventBus();
    const updates: GameEvent[] = [];
    bus.subscribe(Events.Score.UPDATED, (e) => updates.push(e));
    const score = new ScoreEngine(bus, DEFAULT_GAME_CONFIG);
    score.subscribe();

    // fast and perfect: (10 + 50) * 2
    answer(bus, true, 2);
    // slow and wrong: +0
    answer(bus, false);
    // slow, accuracy 2/3: 10 * 1
    answer(bus, true, 8);

    expect(updates).toEqual([
      { type: Events.Score.UPDATED, newScore: 120, totalQuestions: 1, correctAnswers: 1, multiplier: 2 },
      { type: Events.Score.UPDATED, newScore: 120, totalQuestions: 2, correctAnswers: 1, multiplier: 1 },
      { type: Events.Score.UPDATED, newScore: 130, totalQuestions: 3, correctAnswers: 2, multiplier: 1 },
    ]);
  });

  test('wrong answers count toward accuracy but add no points', () => {
    const score = new ScoreEngine(new EventBus(), DEFAULT_GAME_CONFIG);
    score.addAnswerScore(10, 1);
    score.addWrongAnswer();

    expect(score.currentScore).toBe(20);
    expect(score.totalAnswered).toBe(2);
    expect(score.accuracy()).toBe(0.5);
  });

  test('round score publishes the running total', () => {
    const bus = new EventBus();
    const added: GameEvent[] = [];
    bus.subscribe(Events.Score.ROUND_ADDED, (e) => added.push(e));
    const score = new ScoreEngine(bus, DEFAULT_GAME_CONFIG);

    score.addRoundScore(100);
    score.addRoundScore(100);

    expect(added).toEqual([
      { type: Events.Score.ROUND_ADDED, roundScore: 100, totalScore: 100 },
      { type: Events.Score.ROUND_ADDED, roundScore: 100, totalScore: 200 },
    ]);
    expect(score.totalAnswered).toBe(0);
  });

  test('reset zeroes every counter', () => {
    const score = new ScoreEngine(new EventBus(), DEFAULT_GAME_CONFIG);
    score.addAnswerScore(10, 1);
    score.reset();

    expect([score.currentScore, score.correctAnswers, score.totalAnswered]).toEqual([0, 0, 0]);
  });
});
