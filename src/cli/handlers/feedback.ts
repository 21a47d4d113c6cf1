/**
 * Feedback Handler
 *
 * Collects the user's recent prompts from the CLI's session logs, asks the
 * CLI itself for improvement suggestions and keeps the answer as Markdown.
 */

import { execFile } from 'child_process';
import { mkdirSync, readFileSync, rmSync, statSync, writeFileSync } from 'fs';
import { join } from 'path';
import { globSync } from 'glob';
import type { TextSink } from '../../shared/fatal.js';
import { NotFoundError, TaskFailedError, ValidationError } from '../../shared/errors.js';
import { logger } from '../../utils/logger.js';

export const PROMPT_FILE = 'prompts.txt';
export const LOG_FILE_NAME = 'logs.json';

const HOUR_MS = 60 * 60 * 1000;
// Earliest instant a Date can hold
const EARLIEST_MS = -8.64e15;
const RULE = '-'.repeat(50);

export const META_PROMPT = [
  `Analyze each prompt below, taken from '${PROMPT_FILE}', in the following three steps and make suggestions.`,
  '',
  '1. **Original prompt**: (the prompt I wrote)',
  '2. **Suggested improvement**: (concrete advice on how to change it)',
  '3. **Improved prompt**: (a new prompt reflecting the advice from step 2)',
].join('\n');

export type CliAsker = (prompt: string) => Promise<string>;

export interface FeedbackOptions {
  /** Where the CLI keeps its session logs */
  logDir: string;
  feedbackDir: string;
  askCli: CliAsker;
  cwd?: string;
  now?: Date;
  output?: TextSink;
}

export interface FeedbackResult {
  promptsPath: string;
  outputPath: string;
  analysis: string;
}

export function parseHours(input: string): number {
  if (!/^[0-9]+$/.test(input)) {
    throw new ValidationError('A valid number must be entered.', [`Received: "${input}"`]);
  }
  return Number.parseInt(input, 10);
}

/**
 * Start of the analysis window in epoch ms. A window reaching past the
 * earliest representable date is unbounded.
 */
export function windowStart(hours: number, now: Date): number {
  const start = now.getTime() - hours * HOUR_MS;
  return start >= EARLIEST_MS ? start : -Infinity;
}

function modifiedAfter(file: string, cutoff: number): boolean {
  try {
    const stats = statSync(file);
    return stats.isFile() && stats.mtimeMs > cutoff;
  } catch (error) {
    logger.warn('FEEDBACK', 'Skipping log file that cannot be read', { file }, error);
    return false;
  }
}

/**
 * Regular `logs.json` files below `logDir` modified after `now - hours`
 */
export function findRecentLogFiles(logDir: string, hours: number, now: Date): string[] {
  const cutoff = windowStart(hours, now);
  let candidates: string[];
  try {
    candidates = globSync(`**/${LOG_FILE_NAME}`, { cwd: logDir, absolute: true, dot: true, nodir: true });
  } catch (error) {
    logger.warn('FEEDBACK', 'Log directory could not be scanned', { logDir }, error);
    return [];
  }
  return candidates.filter((file) => modifiedAfter(file, cutoff)).sort();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Messages of `type: "user"` entries stamped after `cutoff` (epoch ms). Files
 * that are unreadable or not a JSON array are logged and skipped.
 */
export function extractPrompts(files: string[], cutoff: number): string[] {
  const prompts: string[] = [];

  for (const file of files) {
    let entries: unknown;
    try {
      entries = JSON.parse(readFileSync(file, 'utf-8'));
    } catch (error) {
      logger.warn('FEEDBACK', 'Skipping unreadable log file', { file }, error);
      continue;
    }
    if (!Array.isArray(entries)) {
      logger.warn('FEEDBACK', 'Skipping log file that is not an array', { file });
      continue;
    }

    for (const entry of entries) {
      if (!isRecord(entry) || entry.type !== 'user') continue;
      const { timestamp, message } = entry;
      if (typeof timestamp !== 'string' || typeof message !== 'string') continue;
      if (Date.parse(timestamp) > cutoff) {
        prompts.push(message);
      }
    }
  }

  return prompts;
}

export function buildAnalysisPrompt(prompts: string[]): string {
  return `${META_PROMPT}\n\n${prompts.join('\n')}`;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `feedback_YYYY-MM-DD_HH-MM-SS.md`, local time
 */
export function feedbackFileName(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
  return `feedback_${day}_${time}.md`;
}

/**
 * Ask the wrapped CLI a one-shot question (`<bin> -p <prompt>`)
 */
export function createCliAsker(bin: string, env: NodeJS.ProcessEnv = process.env): CliAsker {
  const label = 'Requesting prompt improvement suggestions';
  return (prompt) =>
    new Promise((resolve, reject) => {
      execFile(bin, ['-p', prompt], { env, encoding: 'utf-8', maxBuffer: 32 * 1024 * 1024 }, (error, stdout) => {
        if (error) {
          const code = typeof error.code === 'number' ? error.code : 127;
          logger.error('FEEDBACK', 'CLI request failed', { bin, code }, error);
          reject(new TaskFailedError(label, code));
          return;
        }
        resolve(stdout);
      });
    });
}

export async function runFeedback(hoursInput: string, options: FeedbackOptions): Promise<FeedbackResult> {
  const hours = parseHours(hoursInput);
  const now = options.now ?? new Date();
  const output = options.output ?? process.stdout;
  const say = (line: string): void => {
    output.write(line + '\n');
  };

  mkdirSync(options.feedbackDir, { recursive: true });

  say(RULE);
  say(`✅ Starting analysis of the last ${hours} hour(s) of conversation logs...`);
  say(`🔍 Step 1: Looking for log files modified in the last ${hours} hour(s)...`);
  const files = findRecentLogFiles(options.logDir, hours, now);
  if (files.length === 0) {
    throw new NotFoundError(`Could not find any '${LOG_FILE_NAME}' file modified in the last ${hours} hour(s).`, [
      `Searched: ${options.logDir}`,
    ]);
  }
  say(`👍 Found ${files.length} log file(s) to analyze.`);
  logger.info('FEEDBACK', 'Recent log files found', { count: files.length, hours });

  say(`🔍 Step 2: Extracting prompts from the last ${hours} hour(s)...`);
  const promptsPath = join(options.cwd ?? process.cwd(), PROMPT_FILE);
  const prompts = extractPrompts(files, windowStart(hours, now));
  if (prompts.length === 0) {
    rmSync(promptsPath, { force: true });
    throw new NotFoundError('No prompts could be extracted from the given time range.', [
      "The log entries may lack a 'timestamp' field or use another format.",
      'Or no prompts were written in that time range.',
    ]);
  }
  writeFileSync(promptsPath, prompts.join('\n') + '\n', 'utf-8');
  say(`👍 Saved the extracted prompts to '${PROMPT_FILE}'.`);

  say('🤖 Asking for prompt improvement suggestions...');
  say('------------------- Analysis -------------------');
  const analysis = (await options.askCli(buildAnalysisPrompt(prompts))).replace(/\n+$/, '');
  say(analysis);

  const outputPath = join(options.feedbackDir, feedbackFileName(now));
  writeFileSync(outputPath, analysis + '\n', 'utf-8');
  logger.success('FEEDBACK', 'Feedback saved', { outputPath, prompts: prompts.length });

  say(RULE);
  say('✅ All done.');
  say(`   - '${PROMPT_FILE}' used for the analysis is kept in the current directory.`);
  say(`   - The analysis was saved to '${outputPath}'.`);

  return { promptsPath, outputPath, analysis };
}
