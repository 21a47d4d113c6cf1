import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { chmodSync, existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, symlinkSync, utimesSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  META_PROMPT,
  buildAnalysisPrompt,
  createCliAsker,
  extractPrompts,
  feedbackFileName,
  findRecentLogFiles,
  parseHours,
  runFeedback,
  windowStart,
  type FeedbackOptions,
} from '../../../src/cli/handlers/feedback.js';
import { NotFoundError, TaskFailedError, ValidationError } from '../../../src/shared/errors.js';

const MINUTE = 60 * 1000;
// Local time, so the output file name does not depend on the machine's zone
const NOW = new Date(2026, 0, 15, 9, 5, 3);

function ago(ms: number): Date {
  return new Date(NOW.getTime() - ms);
}

describe('feedback', () => {
  let dir: string;
  let logDir: string;
  let feedbackDir: string;
  let cwd: string;
  let output: string[];

  function writeLog(session: string, entries: unknown, modified: Date): string {
    const file = join(logDir, session, 'logs.json');
    mkdirSync(join(logDir, session), { recursive: true });
    writeFileSync(file, typeof entries === 'string' ? entries : JSON.stringify(entries));
    utimesSync(file, modified, modified);
    return file;
  }

  function options(askCli: FeedbackOptions['askCli']): FeedbackOptions {
    return {
      logDir,
      feedbackDir,
      askCli,
      cwd,
      now: NOW,
      output: { write: (text: string) => output.push(text) },
    };
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'feedback-test-'));
    logDir = join(dir, '.gemini', 'tmp');
    feedbackDir = join(dir, 'gemini_feedback');
    cwd = join(dir, 'work');
    mkdirSync(cwd, { recursive: true });
    output = [];
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('parseHours', () => {
    it('accepts digits only', () => {
      expect(parseHours('12')).toBe(12);
      expect(parseHours('007')).toBe(7);
      expect(parseHours('0')).toBe(0);
    });

    it.each(['', 'abc', '-1', '1.5', ' 3'])('rejects %j', (input) => {
      expect(() => parseHours(input)).toThrow(ValidationError);
    });
  });

  describe('findRecentLogFiles', () => {
    it('keeps files modified inside the window', () => {
      const recent = writeLog('session-a', [], ago(30 * MINUTE));
      writeLog('session-b', [], ago(5 * 60 * MINUTE));

      expect(findRecentLogFiles(logDir, 1, NOW)).toEqual([recent]);
    });

    it('skips dangling links and directories named logs.json', () => {
      const recent = writeLog('session-a', [], ago(30 * MINUTE));
      mkdirSync(join(logDir, 'session-b'), { recursive: true });
      symlinkSync(join(dir, 'nowhere.json'), join(logDir, 'session-b', 'logs.json'));
      mkdirSync(join(logDir, 'session-c', 'logs.json'), { recursive: true });

      expect(findRecentLogFiles(logDir, 1, NOW)).toEqual([recent]);
    });

    it('returns nothing for a missing directory', () => {
      expect(findRecentLogFiles(join(dir, 'missing'), 24, NOW)).toEqual([]);
    });
  });

  describe('windowStart', () => {
    it('subtracts the hours from now', () => {
      expect(windowStart(2, NOW)).toBe(NOW.getTime() - 120 * MINUTE);
    });

    it('is unbounded past the earliest representable date', () => {
      expect(windowStart(2_600_000_000, NOW)).toBe(-Infinity);
      expect(windowStart(Number.POSITIVE_INFINITY, NOW)).toBe(-Infinity);
    });
  });

  describe('extractPrompts', () => {
    it('keeps recent user messages and skips unusable files', () => {
      const good = writeLog(
        'a',
        [
          { type: 'user', timestamp: ago(10 * MINUTE).toISOString(), message: 'build a game' },
          { type: 'gemini', timestamp: ago(9 * MINUTE).toISOString(), message: 'here is a game' },
          { type: 'user', timestamp: ago(3 * 60 * MINUTE).toISOString(), message: 'too old' },
          { type: 'user', message: 'no timestamp' },
          { type: 'user', timestamp: ago(5 * MINUTE).toISOString(), message: 'fix the port' },
        ],
        NOW
      );
      const broken = writeLog('b', 'not json', NOW);
      const notArray = writeLog('c', { type: 'user' }, NOW);

      expect(extractPrompts([good, broken, notArray], ago(60 * MINUTE).getTime())).toEqual(['build a game', 'fix the port']);
    });
  });

  it('builds the analysis prompt from the meta prompt and the prompts', () => {
    expect(buildAnalysisPrompt(['one', 'two'])).toBe(`${META_PROMPT}\n\none\ntwo`);
  });

  it('names feedback files after the local time', () => {
    expect(feedbackFileName(NOW)).toBe('feedback_2026-01-15_09-05-03.md');
  });

  describe('runFeedback', () => {
    it('rejects bad input before scanning', async () => {
      const askCli = vi.fn(async () => 'unused');

      await expect(runFeedback('abc', options(askCli))).rejects.toBeInstanceOf(ValidationError);
      expect(askCli).not.toHaveBeenCalled();
      expect(existsSync(feedbackDir)).toBe(false);
      expect(output).toEqual([]);
    });

    it('fails when no log file is recent enough', async () => {
      writeLog('a', [{ type: 'user', timestamp: ago(MINUTE).toISOString(), message: 'hi' }], ago(30 * MINUTE));

      await expect(runFeedback('0', options(vi.fn(async () => 'unused')))).rejects.toBeInstanceOf(NotFoundError);
      expect(existsSync(join(cwd, 'prompts.txt'))).toBe(false);
    });

    it('removes prompts.txt when nothing was extracted', async () => {
      writeLog('a', [{ type: 'user', timestamp: ago(5 * 60 * MINUTE).toISOString(), message: 'old' }], ago(MINUTE));
      writeFileSync(join(cwd, 'prompts.txt'), 'stale\n');
      const askCli = vi.fn(async () => 'unused');

      await expect(runFeedback('1', options(askCli))).rejects.toThrow('No prompts could be extracted from the given time range.');
      expect(existsSync(join(cwd, 'prompts.txt'))).toBe(false);
      expect(askCli).not.toHaveBeenCalled();
    });

    it('treats a huge hour count as the whole history', async () => {
      writeLog('a', [{ type: 'user', timestamp: NOW.toISOString(), message: 'latest prompt' }], ago(MINUTE));
      const askCli = vi.fn(async (_prompt: string) => 'ok');

      await runFeedback('2600000000', options(askCli));

      expect(askCli).toHaveBeenCalledWith(`${META_PROMPT}\n\nlatest prompt`);
      expect(readFileSync(join(cwd, 'prompts.txt'), 'utf-8')).toBe('latest prompt\n');
    });

    it('asks the CLI and saves the analysis', async () => {
      writeLog(
        'a',
        [
          { type: 'user', timestamp: ago(10 * MINUTE).toISOString(), message: 'build a game' },
          { type: 'user', timestamp: ago(5 * MINUTE).toISOString(), message: 'fix the port' },
        ],
        ago(MINUTE)
      );
      const askCli = vi.fn(async (_prompt: string) => 'Suggestions here\n\n');

      const result = await runFeedback('1', options(askCli));

      const outputPath = join(feedbackDir, 'feedback_2026-01-15_09-05-03.md');
      expect(askCli).toHaveBeenCalledWith(`${META_PROMPT}\n\nbuild a game\nfix the port`);
      expect(result).toEqual({ promptsPath: join(cwd, 'prompts.txt'), outputPath, analysis: 'Suggestions here' });
      expect(readFileSync(join(cwd, 'prompts.txt'), 'utf-8')).toBe('build a game\nfix the port\n');
      expect(readFileSync(outputPath, 'utf-8')).toBe('Suggestions here\n');
      expect(output).toContain('Suggestions here\n');
      expect(output[output.length - 1]).toBe(`   - The analysis was saved to '${outputPath}'.\n`);
    });
  });

  describe('createCliAsker', () => {
    function fakeCli(body: string): string {
      const bin = join(dir, 'fake-cli');
      writeFileSync(bin, `#!/bin/bash\n${body}\n`);
      chmodSync(bin, 0o755);
      return bin;
    }

    it('passes the prompt after -p and returns stdout', async () => {
      const ask = createCliAsker(fakeCli('echo "$1|$2"'), { PATH: process.env.PATH });

      expect(await ask('improve this')).toBe('-p|improve this\n');
    });

    it('turns a failed CLI into a TaskFailedError', async () => {
      const ask = createCliAsker(fakeCli('exit 5'), { PATH: process.env.PATH });

      const failure = await ask('x').then(
        () => null,
        (error: unknown) => error
      );

      expect(failure).toBeInstanceOf(TaskFailedError);
      expect(failure instanceof TaskFailedError ? failure.childExitCode : null).toBe(5);
    });
  });
});
