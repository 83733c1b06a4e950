import { describe, test, expect } from 'vitest';
import { DEFAULT_GAME_CONFIG, Events, type GameEvent } from '@cookie-division/shared-types';
import { EventBus } from '../bus/event-bus';
import { RoundDistributor } from '../engines/round-distributor';
import { ScoreEngine } from '../engines/score-engine';

function setup() {
  const bus = new EventBus();
  const score = new ScoreEngine(bus, DEFAULT_GAME_CONFIG);
  const clock = { now: 0 };
  const rounds = new RoundDistributor(bus, score, { pointsPerRound: 100, now: () => clock.now });
  rounds.subscribe();

  const events: GameEvent[] = [];
  for (const type of [
    Events.Distribution.ROUND_COMPLETED,
    Events.Distribution.PILE_UPDATED,
    Events.Distribution.REMAINDER_ERROR,
    Events.Distribution.ANSWER_INPUT_REQUESTED,
    Events.Answer.SUBMITTED,
  ] as const) {
    bus.subscribe(type, (e) => events.push(e));
  }

  const ask = (dividend: number, divisor: number) =>
    bus.publish({ type: Events.Question.GENERATED, dividend, divisor, quotient: dividend / divisor });
  const drop = () => bus.publish({ type: Events.Distribution.COOKIE_DROPPED, monsterId: 0 });

  return { bus, score, clock, rounds, events, ask, drop };
}

describe('RoundDistributor', () => {
  test('each drop deals a full round and scores it', () => {
    const { events, score, ask, drop } = setup();
    ask(6, 3);
    drop();
    drop();

    expect(events).toEqual([
      { type: Events.Distribution.PILE_UPDATED, remainingCookies: 6, totalCookies: 6 },
      { type: Events.Distribution.ROUND_COMPLETED, roundNumber: 1, cookiesPerMonster: 1, remainingCookies: 3 },
      { type: Events.Distribution.PILE_UPDATED, remainingCookies: 3, totalCookies: 6 },
      { type: Events.Distribution.ROUND_COMPLETED, roundNumber: 2, cookiesPerMonster: 2, remainingCookies: 0 },
      { type: Events.Distribution.PILE_UPDATED, remainingCookies: 0, totalCookies: 6 },
      { type: Events.Distribution.ANSWER_INPUT_REQUESTED },
    ]);
    expect(score.currentScore).toBe(200);
  });

  test('dropping once the pile is below the divisor is a remainder error', () => {
    const { events, rounds, ask, drop } = setup();
    ask(2, 2);
    drop();
    events.length = 0;

    drop();

    expect(events).toEqual([
      { type: Events.Distribution.REMAINDER_ERROR, remainingCookies: 0, divisor: 2 },
      { type: Events.Distribution.ANSWER_INPUT_REQUESTED },
    ]);
    expect(rounds.state.roundNumber).toBe(1);
  });

  test('submitQuotient judges the typed answer once per question', () => {
    const { events, rounds, clock, ask, drop } = setup();
    ask(8, 4);
    drop();
    drop();
    clock.now = 3;

    expect(rounds.submitQuotient(2)).toEqual({
      type: Events.Answer.SUBMITTED,
      isCorrect: true,
      submittedAnswer: 2,
      correctAnswer: 2,
      timeTaken: 3,
    });
    expect(rounds.submitQuotient(2)).toBeNull();
    expect(events.filter((e) => e.type === Events.Answer.SUBMITTED)).toHaveLength(1);
  });

  test('a wrong quotient is reported with the typed value', () => {
    const { rounds, ask } = setup();
    ask(9, 3);

    expect(rounds.submitQuotient(4)).toMatchObject({ isCorrect: false, submittedAnswer: 4, correctAnswer: 3 });
  });

  test('submit() does nothing in rounds mode', () => {
    const { rounds, ask } = setup();
    ask(4, 2);

    expect(rounds.submit()).toBeNull();
    expect(rounds.state.phase).toBe('DISTRIBUTING');
  });
});
