import { describe, test, expect, vi } from 'vitest';
import { TaskScheduler } from '../scheduler/task-scheduler';

describe('TaskScheduler', () => {
  test('runs a task once its delay has elapsed', () => {
    const scheduler = new TaskScheduler();
    const run = vi.fn();
    scheduler.schedule(1.5, 'next-question', run);

    scheduler.advance(1);
    expect(run).not.toHaveBeenCalled();

    scheduler.advance(0.5);
    expect(run).toHaveBeenCalledOnce();
    expect(scheduler.pending).toBe(0);

    scheduler.advance(10);
    expect(run).toHaveBeenCalledOnce();
  });

  test('due tasks run by due time, then by scheduling order', () => {
    const scheduler = new TaskScheduler();
    const order: string[] = [];
    scheduler.schedule(2, 'late', () => order.push('late'));
    scheduler.schedule(1, 'first', () => order.push('first'));
    scheduler.schedule(1, 'second', () => order.push('second'));

    scheduler.advance(5);

    expect(order).toEqual(['first', 'second', 'late']);
  });

  test('invalidate drops everything scheduled before it', () => {
    const scheduler = new TaskScheduler();
    const stale = vi.fn();
    const fresh = vi.fn();
    scheduler.schedule(1, 'stale', stale);

    scheduler.invalidate();
    scheduler.schedule(1, 'fresh', fresh);
    scheduler.advance(1);

    expect(stale).not.toHaveBeenCalled();
    expect(fresh).toHaveBeenCalledOnce();
    expect(scheduler.generation).toBe(1);
  });

  test('a task that invalidates suppresses the rest of its batch', () => {
    const scheduler = new TaskScheduler();
    const later = vi.fn();
    scheduler.schedule(1, 'ender', () => scheduler.invalidate());
    scheduler.schedule(1, 'later', later);

    scheduler.advance(1);

    expect(later).not.toHaveBeenCalled();
  });

  test('cancel removes a pending task', () => {
    const scheduler = new TaskScheduler();
    const run = vi.fn();
    const id = scheduler.schedule(1, 'cancelled', run);

    expect(scheduler.cancel(id)).toBe(true);
    expect(scheduler.cancel(id)).toBe(false);
    scheduler.advance(2);
    expect(run).not.toHaveBeenCalled();
  });

  test('a failing task is isolated', () => {
    const scheduler = new TaskScheduler();
    const after = vi.fn();
    scheduler.schedule(0, 'boom', () => {
      throw new Error('boom');
    });
    scheduler.schedule(0, 'after', after);

    expect(() => scheduler.advance(0)).not.toThrow();
    expect(after).toHaveBeenCalledOnce();
  });
});
