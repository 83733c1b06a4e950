/**
 * Task Scheduler
 *
 * Tick-driven delayed callbacks ("show the next question in 1.5s").
 * Every task is stamped with the scheduler's generation when scheduled;
 * `invalidate()` bumps the generation, so a task that outlives the state
 * that scheduled it is dropped instead of acting on a session that is gone.
 */
import { log, errorFields } from '@cookie-division/logger';

interface ScheduledTask {
  id: number;
  label: string;
  dueAt: number;
  generation: number;
  run: () => void;
}

export class TaskScheduler {
  private tasks: ScheduledTask[] = [];
  private elapsed = 0;
  private nextId = 1;
  private currentGeneration = 0;

  get generation(): number {
    return this.currentGeneration;
  }

  get pending(): number {
    return this.tasks.length;
  }

  schedule(delaySeconds: number, label: string, run: () => void): number {
    const task: ScheduledTask = {
      id: this.nextId++,
      label,
      dueAt: this.elapsed + Math.max(0, delaySeconds),
      generation: this.currentGeneration,
      run,
    };
    this.tasks.push(task);
    return task.id;
  }

  cancel(id: number): boolean {
    const before = this.tasks.length;
    this.tasks = this.tasks.filter((t) => t.id !== id);
    return this.tasks.length !== before;
  }

  /** Advances the clock and runs every task that came due, earliest first. */
  advance(deltaSeconds: number): void {
    this.elapsed += Math.max(0, deltaSeconds);

    const due = this.tasks
      .filter((t) => t.dueAt <= this.elapsed)
      .sort((a, b) => a.dueAt - b.dueAt || a.id - b.id);
    if (due.length === 0) return;

    const dueIds = new Set(due.map((t) => t.id));
    this.tasks = this.tasks.filter((t) => !dueIds.has(t.id));

    for (const task of due) {
      if (task.generation !== this.currentGeneration) {
        log('debug', 'Scheduler', 'task.stale', { label: task.label, scheduledIn: task.generation, current: this.currentGeneration });
        continue;
      }
      try {
        task.run();
      } catch (err) {
        log('error', 'Scheduler', 'task.failed', { label: task.label, ...errorFields(err) });
      }
    }
  }

  /** Cancels everything pending and retires the current generation. */
  invalidate(): void {
    this.currentGeneration++;
    this.tasks = [];
  }
}
