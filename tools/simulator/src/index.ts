import { fileURLToPath } from 'node:url';
import { parseArgs } from 'node:util';
import { DistributionModes, Events, type Question } from '@cookie-division/shared-types';
import { seededRng, type Rng } from '@cookie-division/game-engine';
import { GameHost, MemoryHighScoreStore, loadGameConfig } from '@cookie-division/game-host';
import { log } from '@cookie-division/logger';

/**
 * Headless autoplayer: drives one full run through the GameHost at 60
 * ticks per second, answering each question after a short think time.
 *
 *   npm run simulate -- --mode test --accuracy 0.8 --seed 42
 */

const FRAME = 1 / 60;
const THINK_TIME = 1;
const MAX_SECONDS = 600;

const { values } = parseArgs({
  options: {
    mode: { type: 'string', default: 'test' },
    accuracy: { type: 'string', default: '1' },
    seed: { type: 'string', default: '1' },
    config: { type: 'string' },
  },
});

const seed = Number(values.seed);
const accuracy = Math.min(1, Math.max(0, Number(values.accuracy)));
const configPath = values.config ?? fileURLToPath(new URL('../../../apps/game-host/config/game-config.json', import.meta.url));

const config = loadGameConfig(configPath);
const random = seededRng(seed);
const botRandom: Rng = seededRng(seed + 1);

const host = new GameHost({ config, random, highScores: new MemoryHighScoreStore(), hostId: `sim-${seed}` });

let pending: { question: Question; waited: number } | null = null;
host.bus.subscribe(Events.Question.GENERATED, ({ dividend, divisor, quotient }) => {
  pending = { question: { dividend, divisor, quotient }, waited: 0 };
});

function answer(question: Question): void {
  const correct = botRandom() < accuracy;

  if (config.distributionMode === DistributionModes.ROUNDS) {
    for (let round = 0; round < question.quotient; round++) host.dropCookie(0);
    host.submitQuotient(correct ? question.quotient : question.quotient + 1);
    return;
  }

  if (correct) {
    for (let share = 0; share < question.quotient; share++) {
      for (let monster = 0; monster < question.divisor; monster++) host.dropCookie(monster);
    }
  }
  host.submitAnswer();
}

async function main(): Promise<void> {
  log('info', 'Simulator', 'simulation.started', { seed, accuracy, mode: values.mode, configPath });
  host.start();

  if (values.mode === 'practice') {
    host.onPracticeMode();
  } else {
    host.onTestMode();
    host.onQuestionsSubmitted([]);
  }

  let elapsed = 0;
  while (host.state.kind === 'Gameplay' && elapsed < MAX_SECONDS) {
    if (pending) {
      pending.waited += FRAME;
      if (pending.waited >= THINK_TIME) {
        const { question } = pending;
        pending = null;
        answer(question);
      }
    }
    host.tick(FRAME);
    elapsed += FRAME;
  }

  const finalState = host.state;
  log('info', 'Simulator', 'simulation.finished', { elapsed: Number(elapsed.toFixed(2)), ...finalState });
  await host.stop();
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
