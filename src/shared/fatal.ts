import { logger } from '../utils/logger.js';
import { SetupError } from './errors.js';

export interface TextSink {
  write(text: string): unknown;
}

/**
 * Anything drawing on the terminal that must be cleared before the error
 * block is printed (the progress spinner)
 */
export interface Stoppable {
  stop(): void;
}

const RULE = '-'.repeat(50);

/**
 * Location of the first stack frame, standing in for a line number
 */
export function errorLocation(error: Error): string {
  const frame = (error.stack ?? '').split('\n').find((line) => line.trim().startsWith('at '));
  const match = frame?.match(/\(?([^\s()]+):(\d+):\d+\)?$/);
  if (!match) return 'unknown location';
  const file = match[1].split('/').pop() ?? match[1];
  return `${file}:${match[2]}`;
}

export function formatFatal(error: unknown): string[] {
  if (error instanceof SetupError) {
    return [
      RULE,
      `❌ ${error.headline()}`,
      ...error.hints.map((hint) => `   ${hint}`),
      RULE,
    ];
  }

  const cause = error instanceof Error ? error : new Error(String(error));
  return [
    RULE,
    `❌ Error occurred (${errorLocation(cause)}, Exit code: 1)`,
    `   ${cause.name}: ${cause.message}`,
    'Aborting script execution.',
    RULE,
  ];
}

/**
 * Stop any animation, print the delimited error block and return the exit
 * code the process should end with
 */
export function reportFatal(
  error: unknown,
  spinner?: Stoppable,
  output: TextSink = process.stderr
): number {
  spinner?.stop();
  logger.failure('SYSTEM', 'Run aborted', {}, error);
  output.write('\n' + formatFatal(error).join('\n') + '\n');
  return error instanceof SetupError ? error.exitCode : 1;
}

/**
 * Process-wide safety net for failures nothing else caught
 */
export function installFatalTrap(spinner?: Stoppable): void {
  const onFatal = (error: unknown): void => {
    process.exit(reportFatal(error, spinner));
  };
  process.on('uncaughtException', onFatal);
  process.on('unhandledRejection', onFatal);
}
