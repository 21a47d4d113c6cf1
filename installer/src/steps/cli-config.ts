import { existsSync } from 'fs';
import { isMaterialized, materializeFile } from '../../../src/shared/materializer.js';
import { readTemplate } from '../../../src/shared/templates.js';
import { writeCliSettings } from '../utils/settings-writer.js';
import type { InstallStep } from './types.js';

export const cliSettingsStep: InstallStep = {
  id: 'cli-settings',
  label: 'Creating Narnia Package settings file...',
  doneMessage: 'Settings file creation complete.',
  skipMessage: 'Settings file already exists. (Skipping)',
  check: (ctx) => existsSync(ctx.paths.cliSettingsPath),
  async run(ctx) {
    writeCliSettings(ctx.paths.cliSettingsPath, ctx.settings.NARNIA_CLI_AUTH_TYPE);
  },
};

export const cliDocsStep: InstallStep = {
  id: 'cli-docs',
  label: 'Creating Narnia Package guide...',
  doneMessage: 'Guide creation complete.',
  skipMessage: 'Guide is already up to date. (Skipping)',
  check: (ctx) => isMaterialized(ctx.paths.cliDocsPath, readTemplate('GEMINI.md')),
  async run(ctx) {
    materializeFile(ctx.paths.cliDocsPath, readTemplate('GEMINI.md'));
  },
};

export const cliConfigSteps: InstallStep[] = [cliSettingsStep, cliDocsStep];
