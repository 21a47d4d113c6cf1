#!/usr/bin/env node
import { homedir } from 'os';
import { SettingsDefaultsManager } from '../../src/shared/SettingsDefaultsManager.js';
import { getSettingsPath, resolveEntryPoint, resolvePaths } from '../../src/shared/paths.js';
import { installFatalTrap, reportFatal } from '../../src/shared/fatal.js';
import { logger } from '../../src/utils/logger.js';
import { runWelcome } from './steps/welcome.js';
import { buildSteps } from './steps/index.js';
import { createInstallState, type InstallContext } from './steps/types.js';
import { runCompletion } from './steps/complete.js';
import { ProgressReporter } from './utils/progress.js';
import { createCommandRunner, spawnLauncher } from './utils/runner.js';
import { runSteps } from './utils/sequencer.js';
import { createShellProbe } from './utils/system.js';
import { createGitHubReleaseLookup } from './utils/dependencies.js';

const reporter = new ProgressReporter();

async function runInstaller(): Promise<void> {
  installFatalTrap(reporter);

  const home = homedir();
  const settings = SettingsDefaultsManager.loadFromFile(getSettingsPath(home));
  const paths = resolvePaths(settings, home);

  runWelcome({ home });
  logger.info('SETUP', 'Bootstrap started', { home, dataDir: paths.dataDir });

  // Steps export nvm's runtime here so later commands resolve node and npm
  const env = process.env;

  const ctx: InstallContext = {
    settings,
    paths,
    runner: createCommandRunner({ launcher: spawnLauncher(env), reporter }),
    probe: createShellProbe(env),
    releases: createGitHubReleaseLookup(settings.NARNIA_NVM_RELEASES_URL),
    env,
    launchers: {
      nodePath: process.execPath,
      nodeArgs: process.execArgv,
      setupEntry: resolveEntryPoint('narnia-setup'),
      customizeEntry: resolveEntryPoint('narnia-customize'),
      feedbackEntry: resolveEntryPoint('narnia-feedback'),
    },
    state: createInstallState(),
  };

  const outcomes = await runSteps(buildSteps(), ctx, reporter);
  reporter.stop();
  logger.success('SETUP', 'Bootstrap finished', { steps: outcomes.length });

  runCompletion(outcomes);
}

runInstaller().catch((error: unknown) => {
  process.exit(reportFatal(error, reporter));
});
