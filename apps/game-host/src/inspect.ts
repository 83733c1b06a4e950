import type { InspectionEvent } from 'xstate';
import { log } from '@cookie-division/logger';

/**
 * Flatten XState v5 state value to a readable dot-path.
 * e.g. { gameplay: {} } → "gameplay"
 */
function flattenValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'object' && value !== null) {
    return Object.entries(value)
      .map(([k, v]) => {
        const child = flattenValue(v);
        return child ? `${k}.${child}` : k;
      })
      .join(' | ');
  }
  return String(value);
}

/** Events that are XState bookkeeping, not flow input */
const SKIP_EVENTS = new Set(['xstate.init', 'xstate.stop']);

/**
 * Creates an XState inspect callback for runtime state transition tracing.
 *
 * Logs ONE entry per processed event on the root flow actor:
 * {
 *   host: "sim-1",
 *   eventType: "FLOW.SESSION_ENDED",
 *   from: "gameplay",
 *   to: "gameOver"
 * }
 *
 * Self-transitions go out at debug level; real moves at info.
 */
export function createInspector(hostId: string) {
  const previousState = new Map<string, string>();
  const pendingEvent = new Map<string, string>();

  return (inspEvent: InspectionEvent) => {
    const actorId = inspEvent.actorRef.sessionId;
    if (actorId !== inspEvent.rootId) return;

    if (inspEvent.type === '@xstate.event') {
      const eventType = inspEvent.event.type;
      if (SKIP_EVENTS.has(eventType)) return;
      pendingEvent.set(actorId, eventType);
      return;
    }

    if (inspEvent.type === '@xstate.snapshot') {
      const { snapshot } = inspEvent;
      if (!('value' in snapshot)) return;
      const toState = flattenValue(snapshot.value);
      const fromState = previousState.get(actorId) ?? '(init)';
      previousState.set(actorId, toState);

      const eventType = pendingEvent.get(actorId);
      if (!eventType) return;
      pendingEvent.delete(actorId);

      const level = fromState === toState ? 'debug' : 'info';
      log(level, 'XState', 'transition', { host: hostId, eventType, from: fromState, to: toState });
    }

    // @xstate.actor and @xstate.action: GameHost logs lifecycle itself
  };
}
