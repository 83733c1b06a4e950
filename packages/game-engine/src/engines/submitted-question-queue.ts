/**
 * Operator-curated questions for test mode, served in submission order.
 */
import {
  Config,
  SubmittedQuestionSchema,
  type GameConfig,
  type Question,
  type SubmittedQuestion,
} from '@cookie-division/shared-types';
import { log } from '@cookie-division/logger';

export interface RejectedQuestion {
  input: unknown;
  reason: string;
}

export interface SubmissionResult {
  accepted: Question[];
  rejected: RejectedQuestion[];
}

function rejectionReason(q: SubmittedQuestion, config: GameConfig): string | null {
  if (q.divisor > config.maxMonsters) return `divisor ${q.divisor} exceeds ${config.maxMonsters} monsters`;
  if (q.dividend % q.divisor !== 0) return `${q.dividend} is not divisible by ${q.divisor}`;
  const quotient = q.dividend / q.divisor;
  if (quotient > Config.generation.maxQuotient) return `quotient ${quotient} exceeds ${Config.generation.maxQuotient}`;
  if (q.dividend < config.minDividend || q.dividend > config.maxDividend) {
    return `dividend ${q.dividend} outside ${config.minDividend}-${config.maxDividend}`;
  }
  return null;
}

export class SubmittedQuestionQueue {
  private questions: Question[] = [];
  private index = 0;

  /** Replaces the queue with the valid entries of `input`. */
  submit(input: readonly unknown[], config: GameConfig): SubmissionResult {
    this.clear();
    const rejected: RejectedQuestion[] = [];

    for (const entry of input) {
      const parsed = SubmittedQuestionSchema.safeParse(entry);
      if (!parsed.success) {
        rejected.push({ input: entry, reason: parsed.error.issues[0]?.message ?? 'invalid question' });
        continue;
      }
      const reason = rejectionReason(parsed.data, config);
      if (reason) {
        rejected.push({ input: entry, reason });
        continue;
      }
      const { dividend, divisor } = parsed.data;
      this.questions.push({ dividend, divisor, quotient: dividend / divisor });
    }

    for (const r of rejected) {
      log('warn', 'QuestionQueue', 'question.rejected', { reason: r.reason });
    }
    log('info', 'QuestionQueue', 'questions.submitted', { accepted: this.questions.length, rejected: rejected.length });

    return { accepted: [...this.questions], rejected };
  }

  hasMore(): boolean {
    return this.index < this.questions.length;
  }

  next(): Question | null {
    if (!this.hasMore()) return null;
    return this.questions[this.index++];
  }

  get total(): number {
    return this.questions.length;
  }

  /** Rewinds to the first question, keeping the submission. */
  reset(): void {
    this.index = 0;
  }

  clear(): void {
    this.questions = [];
    this.index = 0;
  }
}
