import { describe, test, expect, vi } from 'vitest';
import { Events, type GameEvent } from '@cookie-division/shared-types';
import { EventBus } from '../bus/event-bus';

const dropped = (monsterId: number): GameEvent => ({ type: Events.Distribution.COOKIE_DROPPED, monsterId });

describe('EventBus', () => {
  test('subscribe then unsubscribe leaves zero invocations', () => {
    const bus = new EventBus();
    const handler = vi.fn();
    bus.subscribe(Events.Distribution.COOKIE_DROPPED, handler);
    bus.unsubscribe(Events.Distribution.COOKIE_DROPPED, handler);

    bus.publish(dropped(1));

    expect(handler).not.toHaveBeenCalled();
    expect(bus.listenerCount(Events.Distribution.COOKIE_DROPPED)).toBe(0);
  });

  test('the returned disposer unsubscribes', () => {
    const bus = new EventBus();
    const handler = vi.fn();
    const dispose = bus.subscribe(Events.Lives.DEPLETED, handler);
    dispose();
    dispose();

    bus.publish({ type: Events.Lives.DEPLETED });
    expect(handler).not.toHaveBeenCalled();
  });

  test('handlers run in registration order and only for their type', () => {
    const bus = new EventBus();
    const calls: string[] = [];
    bus.subscribe(Events.Distribution.COOKIE_DROPPED, (e) => calls.push(`a${e.monsterId}`));
    bus.subscribe(Events.Timer.EXPIRED, () => calls.push('timer'));
    bus.subscribe(Events.Distribution.COOKIE_DROPPED, (e) => calls.push(`b${e.monsterId}`));

    bus.publish(dropped(2));

    expect(calls).toEqual(['a2', 'b2']);
  });

  test('duplicate registrations are invoked twice and removed one at a time', () => {
    const bus = new EventBus();
    const handler = vi.fn();
    bus.subscribe(Events.Timer.EXPIRED, handler);
    bus.subscribe(Events.Timer.EXPIRED, handler);

    bus.publish({ type: Events.Timer.EXPIRED });
    expect(handler).toHaveBeenCalledTimes(2);

    bus.unsubscribe(Events.Timer.EXPIRED, handler);
    bus.publish({ type: Events.Timer.EXPIRED });
    expect(handler).toHaveBeenCalledTimes(3);
  });

  test('unsubscribing an unknown handler is a no-op', () => {
    const bus = new EventBus();
    const kept = vi.fn();
    bus.subscribe(Events.Timer.EXPIRED, kept);
    bus.unsubscribe(Events.Timer.EXPIRED, vi.fn());
    bus.unsubscribe(Events.Lives.DEPLETED, vi.fn());

    bus.publish({ type: Events.Timer.EXPIRED });
    expect(kept).toHaveBeenCalledOnce();
  });

  test('a handler unsubscribing a later one during dispatch does not skip it for that publish', () => {
    const bus = new EventBus();
    const second = vi.fn();
    bus.subscribe(Events.Timer.EXPIRED, () => bus.unsubscribe(Events.Timer.EXPIRED, second));
    bus.subscribe(Events.Timer.EXPIRED, second);

    bus.publish({ type: Events.Timer.EXPIRED });
    bus.publish({ type: Events.Timer.EXPIRED });

    expect(second).toHaveBeenCalledOnce();
  });

  test('a handler subscribed during dispatch only sees later publishes', () => {
    const bus = new EventBus();
    const late = vi.fn();
    let added = false;
    bus.subscribe(Events.Timer.EXPIRED, () => {
      if (!added) {
        added = true;
        bus.subscribe(Events.Timer.EXPIRED, late);
      }
    });

    bus.publish({ type: Events.Timer.EXPIRED });
    expect(late).not.toHaveBeenCalled();

    bus.publish({ type: Events.Timer.EXPIRED });
    expect(late).toHaveBeenCalledOnce();
  });

  test('reentrant publishes are delivered synchronously', () => {
    const bus = new EventBus();
    const order: string[] = [];
    bus.subscribe(Events.Answer.SUBMITTED, () => {
      order.push('answer');
      bus.publish({ type: Events.Lives.DEPLETED });
      order.push('answer:after');
    });
    bus.subscribe(Events.Lives.DEPLETED, () => order.push('depleted'));

    bus.publish({ type: Events.Answer.SUBMITTED, isCorrect: false, submittedAnswer: -1, correctAnswer: 2, timeTaken: 1 });

    expect(order).toEqual(['answer', 'depleted', 'answer:after']);
  });

  test('a throwing handler does not stop the rest', () => {
    const bus = new EventBus();
    const after = vi.fn();
    bus.subscribe(Events.Timer.EXPIRED, () => {
      throw new Error('boom');
    });
    bus.subscribe(Events.Timer.EXPIRED, after);

    expect(() => bus.publish({ type: Events.Timer.EXPIRED })).not.toThrow();
    expect(after).toHaveBeenCalledOnce();
  });

  test('clear drops every subscription', () => {
    const bus = new EventBus();
    bus.subscribe(Events.Timer.EXPIRED, vi.fn());
    bus.subscribe(Events.Lives.DEPLETED, vi.fn());
    bus.clear();

    expect(bus.listenerCount(Events.Timer.EXPIRED)).toBe(0);
    expect(bus.listenerCount(Events.Lives.DEPLETED)).toBe(0);
  });
});
