import { existsSync } from 'fs';
import { delimiter, dirname, isAbsolute } from 'path';
import { LookupError } from '../../../src/shared/errors.js';
import type { NarniaPaths } from '../../../src/shared/paths.js';
import { logger } from '../../../src/utils/logger.js';
import { shellQuote, type ShellProbe } from './system.js';

export interface ReleaseLookup {
  latestNvmVersion(): Promise<string>;
}

const TAG_PATTERN = /^v?\d+(\.\d+)*[\w.-]*$/;

/**
 * `tag_name` of a GitHub release payload, or '' when absent or malformed
 */
export function readTagName(body: unknown): string {
  if (typeof body !== 'object' || body === null || !('tag_name' in body)) return '';
  const tag = body.tag_name;
  if (typeof tag !== 'string' || !TAG_PATTERN.test(tag)) return '';
  return tag;
}

/**
 * Latest nvm release from the GitHub API. An empty answer is fatal: nvm's
 * installer URL is built from it.
 */
export function createGitHubReleaseLookup(url: string, fetchImpl: typeof fetch = fetch): ReleaseLookup {
  return {
    async latestNvmVersion() {
      let tag = '';
      try {
        const response = await fetchImpl(url, {
          headers: { Accept: 'application/vnd.github+json', 'User-Agent': 'narnia-setup' },
        });
        if (response.ok) {
          tag = readTagName(await response.json());
        } else {
          logger.warn('SETUP', 'Release lookup returned an error status', { url, status: response.status });
        }
      } catch (error) {
        logger.warn('SETUP', 'Release lookup failed', { url }, error);
      }

      if (!tag) {
        throw new LookupError('Could not fetch the latest NVM version.', [
          'Please check your internet connection and try again.',
        ]);
      }
      logger.info('SETUP', 'Resolved latest nvm release', { tag });
      return tag;
    },
  };
}

/**
 * A bash command line with nvm loaded from `paths.nvmDir`
 */
export function nvmCommand(paths: NarniaPaths, command: string): string {
  return `export NVM_DIR=${shellQuote(paths.nvmDir)} && . "$NVM_DIR/nvm.sh" && ${command}`;
}

export function nvmInstallCommand(paths: NarniaPaths, version: string): string {
  const installer = `https://raw.githubusercontent.com/nvm-sh/nvm/${version}/install.sh`;
  const dir = shellQuote(paths.nvmDir);
  return `set -o pipefail && mkdir -p ${dir} && curl -fsSL ${installer} | NVM_DIR=${dir} bash`;
}

/**
 * Put `dir` first on PATH, without duplicating it
 */
export function prependPath(env: NodeJS.ProcessEnv, dir: string): void {
  const entries = (env.PATH ?? '').split(delimiter).filter((entry) => entry !== '');
  if (entries[0] === dir) return;
  env.PATH = [dir, ...entries.filter((entry) => entry !== dir)].join(delimiter);
}

/**
 * Export nvm's default runtime into `env` so later steps (and the commands
 * they launch) resolve `node`, `npm` and globally installed bins from it
 */
export async function activateNvm(paths: NarniaPaths, probe: ShellProbe, env: NodeJS.ProcessEnv): Promise<void> {
  env.NVM_DIR = paths.nvmDir;
  if (!existsSync(paths.nvmScript)) return;

  const result = await probe.capture(nvmCommand(paths, 'nvm which default'));
  const nodePath = result.stdout.trim().split('\n').pop() ?? '';
  if (result.exitCode !== 0 || !isAbsolute(nodePath)) {
    logger.debug('SETUP', 'No default nvm runtime to activate yet', { exitCode: result.exitCode });
    return;
  }

  prependPath(env, dirname(nodePath));
  logger.info('SETUP', 'Activated nvm default runtime', { bin: dirname(nodePath) });
}

/**
 * Names listed by `conda env list` (first column, comments skipped)
 */
export function parseCondaEnvNames(output: string): string[] {
  return output
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'))
    .map((line) => line.split(/\s+/)[0]);
}
