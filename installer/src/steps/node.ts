import { existsSync } from 'fs';
import { join } from 'path';
import { logger } from '../../../src/utils/logger.js';
import { activateNvm, nvmCommand, nvmInstallCommand } from '../utils/dependencies.js';
import { commandExists, shellQuote } from '../utils/system.js';
import type { InstallContext, InstallStep } from './types.js';

async function settleRuntime(ctx: InstallContext): Promise<void> {
  await activateNvm(ctx.paths, ctx.probe, ctx.env);
}

export const nvmStep: InstallStep = {
  id: 'nvm',
  label: 'Preparing Node.js version manager...',
  doneMessage: 'Node.js version manager installation complete.',
  skipMessage: 'Node.js version manager is already installed. (Skipping)',
  check: (ctx) => existsSync(ctx.paths.nvmScript),
  async run(ctx) {
    const version = await ctx.releases.latestNvmVersion();
    ctx.state.nvmVersion = version;
    await ctx.runner.run(
      nvmInstallCommand(ctx.paths, version),
      `Preparing Node.js version manager (${version})...`,
      join(ctx.paths.logsDir, 'nvm-install.log')
    );
  },
  settle: settleRuntime,
};

export const nodeLtsStep: InstallStep = {
  id: 'node-lts',
  label: 'Installing Node.js (LTS)...',
  doneMessage: 'Node.js (LTS) installation complete.',
  skipMessage: 'Node.js (LTS) is already installed. (Skipping)',
  async check(ctx) {
    if (!existsSync(ctx.paths.nvmScript)) {
      logger.warn('SETUP', 'nvm is not loadable, leaving Node.js alone', { step: 'node-lts', nvmScript: ctx.paths.nvmScript });
      return true;
    }
    const result = await ctx.probe.capture(nvmCommand(ctx.paths, 'nvm ls default'));
    return result.exitCode === 0 && result.stdout.includes('lts/');
  },
  async run(ctx) {
    await ctx.runner.run(
      nvmCommand(ctx.paths, `nvm install --lts && nvm use --lts && nvm alias default 'lts/*'`),
      this.label,
      join(ctx.paths.logsDir, 'node-install.log')
    );
  },
  settle: settleRuntime,
};

export const cliStep: InstallStep = {
  id: 'cli',
  label: 'Installing Narnia Package...',
  doneMessage: 'Narnia Package installation complete.',
  skipMessage: 'Narnia Package is already installed. (Skipping)',
  check: (ctx) => commandExists(ctx.probe, ctx.settings.NARNIA_CLI_BIN),
  async run(ctx) {
    await ctx.runner.run(
      `npm install -g ${shellQuote(ctx.settings.NARNIA_CLI_PACKAGE)}`,
      this.label,
      join(ctx.paths.logsDir, 'cli-install.log')
    );
  },
};

export const nodeSteps: InstallStep[] = [nvmStep, nodeLtsStep, cliStep];
