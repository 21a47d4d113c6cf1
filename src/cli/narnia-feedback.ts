#!/usr/bin/env node
import * as p from '@clack/prompts';
import { homedir } from 'os';
import { SettingsDefaultsManager } from '../shared/SettingsDefaultsManager.js';
import { getSettingsPath, resolvePaths } from '../shared/paths.js';
import { installFatalTrap, reportFatal } from '../shared/fatal.js';
import { createCliAsker, runFeedback } from './handlers/feedback.js';

async function main(): Promise<void> {
  installFatalTrap();

  const home = homedir();
  const settings = SettingsDefaultsManager.loadFromFile(getSettingsPath(home));
  const paths = resolvePaths(settings, home);

  const hours = await p.text({
    message: 'How many hours back should prompts be analyzed?',
    placeholder: '24',
  });
  if (p.isCancel(hours)) {
    p.cancel('Feedback cancelled.');
    process.exit(0);
  }

  await runFeedback(hours, {
    logDir: paths.cliLogDir,
    feedbackDir: paths.feedbackDir,
    askCli: createCliAsker(settings.NARNIA_CLI_BIN),
  });
}

main().catch((error: unknown) => {
  process.exit(reportFatal(error));
});
