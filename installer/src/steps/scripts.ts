import { isMaterialized, materializeFile } from '../../../src/shared/materializer.js';
import { shellQuote } from '../utils/system.js';
import type { InstallContext, InstallStep } from './types.js';

/**
 * Executable shim that starts a companion command on the Node.js runtime
 * that ran the bootstrap
 */
export function renderLauncher(nodePath: string, nodeArgs: string[], entry: string, description: string): string {
  const argv = [nodePath, ...nodeArgs, entry].map(shellQuote).join(' ');
  return `#!/bin/bash\n# ${description}\nexec ${argv} "$@"\n`;
}

export function customizeLauncher(ctx: InstallContext): string {
  const { nodePath, nodeArgs, customizeEntry } = ctx.launchers;
  return renderLauncher(nodePath, nodeArgs, customizeEntry, 'Narnia customization (refreshes the CLI branding)');
}

export function feedbackLauncher(ctx: InstallContext): string {
  const { nodePath, nodeArgs, feedbackEntry } = ctx.launchers;
  return renderLauncher(nodePath, nodeArgs, feedbackEntry, 'Narnia prompt feedback');
}

export function updateLauncher(ctx: InstallContext): string {
  const { nodePath, nodeArgs, setupEntry } = ctx.launchers;
  return renderLauncher(nodePath, nodeArgs, setupEntry, 'Narnia update (re-runs narnia-setup)');
}

export const customizeScriptStep: InstallStep = {
  id: 'customize-script',
  label: 'Creating Narnia customization script...',
  doneMessage: 'Narnia customization script creation complete.',
  skipMessage: 'Narnia customization script is already up to date. (Skipping)',
  check: (ctx) => isMaterialized(ctx.paths.customizeScript, customizeLauncher(ctx)),
  async run(ctx) {
    materializeFile(ctx.paths.customizeScript, customizeLauncher(ctx), { executable: true });
  },
};

export const feedbackScriptStep: InstallStep = {
  id: 'feedback-script',
  label: 'Creating Narnia prompt feedback script...',
  doneMessage: 'Narnia prompt feedback script creation complete.',
  skipMessage: 'Narnia prompt feedback script is already up to date. (Skipping)',
  check: (ctx) => isMaterialized(ctx.paths.feedbackScript, feedbackLauncher(ctx)),
  async run(ctx) {
    materializeFile(ctx.paths.feedbackScript, feedbackLauncher(ctx), { executable: true });
  },
};
