/**
 * Distribution Component Contract
 *
 * A session runs exactly one distribution component, chosen by
 * `GameConfig.distributionMode`:
 * - **CHOICE** (DistributionValidator): the player picks which monsters get
 *   cookies; the distribution is judged when the player submits, or at once
 *   on over-selection.
 * - **ROUNDS** (RoundDistributor): every drop deals one cookie to each of
 *   `divisor` monsters; the player then types the quotient.
 *
 * Both reset on QUESTION.GENERATED and publish exactly one ANSWER.SUBMITTED
 * per question.
 */
import type { AnswerSubmittedEvent } from '@cookie-division/shared-types';

export interface DistributionComponent {
  /** Attaches bus handlers. Calling twice never double-subscribes. */
  subscribe(): void;
  unsubscribe(): void;
  /** Judges a CHOICE-mode distribution. `null` when nothing was submitted. */
  submit(): AnswerSubmittedEvent | null;
  /** Judges a ROUNDS-mode quotient entry. `null` when nothing was submitted. */
  submitQuotient(answer: number): AnswerSubmittedEvent | null;
}
