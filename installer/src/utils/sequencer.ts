import { logger } from '../../../src/utils/logger.js';
import type { StepOrdinal } from './progress.js';

/**
 * One idempotent unit of the bootstrap
 */
export interface Step<C> {
  id: string;
  /** Shown while the step works */
  label: string;
  /** Side-effect free; true means the goal state already holds */
  check(ctx: C): boolean | Promise<boolean>;
  run(ctx: C): Promise<void>;
  /** Runs after either branch, e.g. to export a freshly installed runtime */
  settle?(ctx: C): Promise<void>;
  doneMessage: string;
  skipMessage: string;
}

export interface StepReporter {
  tick(label: string): void;
  done(message: string, ordinal?: StepOrdinal): void;
  skip(message: string, ordinal?: StepOrdinal): void;
}

export type StepStatus = 'done' | 'skipped';

export interface StepOutcome {
  id: string;
  status: StepStatus;
}

/**
 * Run the catalogue strictly in order. The first error aborts the run and
 * propagates; later steps never start.
 */
export async function runSteps<C>(steps: Step<C>[], ctx: C, reporter: StepReporter): Promise<StepOutcome[]> {
  const outcomes: StepOutcome[] = [];
  const total = steps.length;

  for (const [index, step] of steps.entries()) {
    const ordinal = { current: index + 1, total };
    reporter.tick(step.label);

    if (await step.check(ctx)) {
      reporter.skip(step.skipMessage, ordinal);
      logger.info('SETUP', 'Already configured', { step: step.id });
      outcomes.push({ id: step.id, status: 'skipped' });
    } else {
      const startedAt = Date.now();
      await step.run(ctx);
      reporter.done(step.doneMessage, ordinal);
      logger.timing('SETUP', 'Step complete', Date.now() - startedAt, { step: step.id });
      outcomes.push({ id: step.id, status: 'done' });
    }

    if (step.settle) {
      await step.settle(ctx);
    }
  }

  return outcomes;
}
