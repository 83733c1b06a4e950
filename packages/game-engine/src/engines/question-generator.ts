/**
 * Question Generator
 *
 * Produces the next division question for a session. Test mode drains the
 * operator-submitted queue first; everything else is random, constrained so
 * that `dividend = divisor * quotient` stays inside the configured range and
 * the quotient never exceeds the gameplay cap.
 */
import { Config, Events, type GameConfig, type Question } from '@cookie-division/shared-types';
import { log } from '@cookie-division/logger';
import type { EventBus } from '../bus/event-bus';
import { ConfigurationError } from '../errors';
import { pickRandom, randomInt, type Rng } from '../helpers/random';
import { questionKey, quotientRange } from '../helpers/quotient-range';
import { SubmittedQuestionQueue } from './submitted-question-queue';

export interface QuestionGeneratorOptions {
  random?: Rng;
  queue?: SubmittedQuestionQueue;
}

export class QuestionGenerator {
  private readonly random: Rng;
  readonly queue: SubmittedQuestionQueue;

  constructor(
    private readonly bus: EventBus,
    options: QuestionGeneratorOptions = {},
  ) {
    this.random = options.random ?? Math.random;
    this.queue = options.queue ?? new SubmittedQuestionQueue();
  }

  hasSubmittedQueue(): boolean {
    return this.queue.hasMore();
  }

  nextFromQueue(): Question | null {
    return this.queue.next();
  }

  /**
   * Random question avoiding pairs already in `used`. When the retry budget
   * runs out the set is cleared and the last candidate is accepted.
   */
  generateRandom(config: GameConfig, used: Set<string>): Question {
    const candidates = config.allowedDivisors.flatMap((divisor) => {
      const range = quotientRange(divisor, config.minDividend, config.maxDividend);
      return range ? [{ divisor, range }] : [];
    });
    if (candidates.length === 0) {
      throw new ConfigurationError(
        `no allowed divisor can produce a quotient for dividends ${config.minDividend}-${config.maxDividend}`,
        'allowedDivisors',
      );
    }

    const { maxAttempts } = Config.generation;
    let question: Question | null = null;
    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      const { divisor, range } = pickRandom(this.random, candidates);
      const quotient = randomInt(this.random, range.min, range.max);
      question = { dividend: divisor * quotient, divisor, quotient };
      if (!used.has(questionKey(question.dividend, question.divisor))) return question;
    }

    // maxAttempts >= 1, so the loop assigned at least once
    if (!question) throw new ConfigurationError('generation attempts must be positive', 'maxAttempts');

    log('warn', 'QuestionGenerator', 'generation.exhausted', {
      attempts: maxAttempts, used: used.size, dividend: question.dividend, divisor: question.divisor,
    });
    used.clear();
    this.bus.publish({ type: Events.Question.GENERATION_EXHAUSTED, attempts: maxAttempts });
    return question;
  }

  /** Next question for the session; records it in `used` and publishes it. */
  next(config: GameConfig, used: Set<string>): Question {
    const question = this.nextFromQueue() ?? this.generateRandom(config, used);
    used.add(questionKey(question.dividend, question.divisor));

    log('debug', 'QuestionGenerator', 'question.generated', { ...question });
    this.bus.publish({ type: Events.Question.GENERATED, ...question });
    return question;
  }
}
