import * as p from '@clack/prompts';
import pc from 'picocolors';
import { homedir } from 'os';
import { logger } from '../../../src/utils/logger.js';
import { detectOS, isWSL } from '../utils/system.js';

export interface WelcomeOptions {
  procVersionPath?: string;
  home?: string;
  chdir?: (dir: string) => void;
}

/**
 * Greet the user and, under WSL, move to the home directory so relative
 * paths used by the installers land there
 */
export function runWelcome(options: WelcomeOptions = {}): { wsl: boolean } {
  p.intro(pc.bgCyan(pc.black(' narnia-setup ')));
  p.log.info(`Platform: ${detectOS()} (${process.arch})`);

  const wsl = isWSL(options.procVersionPath);
  if (wsl) {
    const home = options.home ?? homedir();
    if (options.chdir) options.chdir(home);
    else process.chdir(home);
    p.log.info('WSL environment detected.');
    logger.info('SETUP', 'WSL detected, working from home directory', { home });
  }

  return { wsl };
}
