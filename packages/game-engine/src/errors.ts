/**
 * Error taxonomy for the game engine.
 *
 * Gameplay outcomes (wrong answers, over-selection) are never errors; they
 * travel as ANSWER.SUBMITTED events. Only misconfiguration and lifecycle
 * defects are thrown.
 */
export class CookieGameError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Unusable configuration, e.g. no divisor with a feasible quotient range. */
export class ConfigurationError extends CookieGameError {
  constructor(
    message: string,
    readonly field: string,
  ) {
    super(message);
  }
}

/** A lifecycle call that can only come from a programming defect. */
export class FlowInvariantError extends CookieGameError {}
