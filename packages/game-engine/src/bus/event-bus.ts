/**
 * Event Bus
 *
 * Type-keyed publish/subscribe registry. Handlers for a type run in
 * registration order. Each type's handler list is copy-on-write, so a
 * publish iterates the list as it was when the dispatch began even if a
 * handler subscribes, unsubscribes, or publishes reentrantly.
 */
import type { GameEvent, GameEventOf, GameEventType } from '@cookie-division/shared-types';
import { log, errorFields } from '@cookie-division/logger';

export type GameEventHandler<T extends GameEventType> = (event: GameEventOf<T>) => void;

interface Subscription {
  handler: object;
  invoke: (event: GameEvent) => void;
}

function isEventOfType<T extends GameEventType>(event: GameEvent, type: T): event is GameEventOf<T> {
  return event.type === type;
}

export class EventBus {
  private handlers = new Map<GameEventType, readonly Subscription[]>();

  /** Registers a handler. Returns a disposer equivalent to `unsubscribe(type, handler)`. */
  subscribe<T extends GameEventType>(type: T, handler: GameEventHandler<T>): () => void {
    const subscription: Subscription = {
      handler,
      invoke: (event) => {
        if (isEventOfType(event, type)) handler(event);
      },
    };
    this.handlers.set(type, [...(this.handlers.get(type) ?? []), subscription]);
    return () => this.unsubscribe(type, handler);
  }

  /** Removes the most recent registration of `handler`. No-op when absent. */
  unsubscribe<T extends GameEventType>(type: T, handler: GameEventHandler<T>): void {
    const current = this.handlers.get(type);
    if (!current) return;

    let index = -1;
    for (let i = current.length - 1; i >= 0; i--) {
      if (current[i].handler === handler) {
        index = i;
        break;
      }
    }
    if (index === -1) return;

    const next = [...current.slice(0, index), ...current.slice(index + 1)];
    if (next.length === 0) {
      this.handlers.delete(type);
    } else {
      this.handlers.set(type, next);
    }
  }

  publish(event: GameEvent): void {
    const snapshot = this.handlers.get(event.type);
    if (!snapshot) return;

    for (const subscription of snapshot) {
      try {
        subscription.invoke(event);
      } catch (err) {
        log('error', 'EventBus', 'handler.failed', { eventType: event.type, ...errorFields(err) });
      }
    }
  }

  listenerCount(type: GameEventType): number {
    return this.handlers.get(type)?.length ?? 0;
  }

  clear(): void {
    this.handlers.clear();
  }
}
