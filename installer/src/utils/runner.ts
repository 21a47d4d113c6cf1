import { spawn } from 'child_process';
import { closeSync, mkdirSync, openSync } from 'fs';
import { dirname } from 'path';
import { TaskFailedError } from '../../../src/shared/errors.js';
import { logger } from '../../../src/utils/logger.js';

export const POLL_INTERVAL_MS = 100;

/**
 * A launched command, observed by polling
 */
export interface ChildHandle {
  isAlive(): boolean;
  wait(): Promise<number>;
}

export type ProcessLauncher = (command: string, logPath?: string) => ChildHandle;

export interface Ticker {
  tick(label: string): void;
}

export interface CommandRunner {
  run(command: string, label: string, logPath?: string): Promise<void>;
}

export interface CommandRunnerOptions {
  launcher: ProcessLauncher;
  reporter: Ticker;
  pollIntervalMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Launch `bash -c command` with stdout and stderr going to `logPath`
 * (truncated first) or nowhere
 */
export function spawnLauncher(env: NodeJS.ProcessEnv = process.env): ProcessLauncher {
  return (command, logPath) => {
    let output: number | 'ignore' = 'ignore';
    if (logPath) {
      mkdirSync(dirname(logPath), { recursive: true });
      output = openSync(logPath, 'w');
    }

    const child = spawn('bash', ['-c', command], {
      env,
      stdio: ['ignore', output, output],
    });

    // The child holds its own copy of the descriptor
    if (typeof output === 'number') {
      closeSync(output);
    }

    let exitCode: number | null = null;
    const exited = new Promise<number>((resolve) => {
      child.once('error', (error) => {
        logger.error('RUNNER', 'Failed to launch command', { command }, error);
        exitCode = 127;
        resolve(exitCode);
      });
      child.once('close', (code, signal) => {
        if (exitCode !== null) return;
        exitCode = code ?? 1;
        if (signal) {
          logger.warn('RUNNER', 'Command terminated by signal', { command, signal });
        }
        resolve(exitCode);
      });
    });

    return {
      isAlive: () => exitCode === null,
      wait: () => exited,
    };
  };
}

export function createCommandRunner(options: CommandRunnerOptions): CommandRunner {
  const pollIntervalMs = options.pollIntervalMs ?? POLL_INTERVAL_MS;
  const sleep = options.sleep ?? defaultSleep;

  return {
    async run(command, label, logPath) {
      const startedAt = Date.now();
      logger.info('RUNNER', 'Task started', { label, logPath: logPath ?? 'none' });

      const child = options.launcher(command, logPath);
      while (child.isAlive()) {
        options.reporter.tick(label);
        await sleep(pollIntervalMs);
      }

      const exitCode = await child.wait();
      if (exitCode !== 0) {
        logger.failure('RUNNER', 'Task failed', { label, exitCode });
        throw new TaskFailedError(label, exitCode, logPath);
      }

      logger.timing('RUNNER', `Task finished: ${label}`, Date.now() - startedAt);
    },
  };
}
