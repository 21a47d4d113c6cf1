import { existsSync } from 'fs';
import { join } from 'path';
import { materializeFile } from '../../../src/shared/materializer.js';
import { VerificationError } from '../../../src/shared/errors.js';
import { containsText } from '../utils/profile.js';
import { parseCondaEnvNames } from '../utils/dependencies.js';
import { shellQuote } from '../utils/system.js';
import type { InstallContext, InstallStep } from './types.js';

export const CONDA_INIT_MARKER = '>>> conda initialize >>>';

const TOS_CHANNELS = [
  'https://repo.anaconda.com/pkgs/main',
  'https://repo.anaconda.com/pkgs/r',
];

function conda(ctx: InstallContext): string {
  return shellQuote(ctx.paths.condaBin);
}

function logFile(ctx: InstallContext, name: string): string {
  return join(ctx.paths.logsDir, name);
}

export const minicondaStep: InstallStep = {
  id: 'miniconda',
  label: 'Configuring base Python environment (Miniconda)...',
  doneMessage: 'Base Python environment configuration complete.',
  skipMessage: 'Base Python environment is already installed. (Skipping)',
  check: (ctx) => existsSync(ctx.paths.condaDir),
  async run(ctx) {
    ctx.state.condaJustInstalled = true;
    const installer = shellQuote(ctx.paths.condaInstaller);
    await ctx.runner.run(
      `wget -q ${shellQuote(ctx.settings.NARNIA_CONDA_INSTALLER_URL)} -O ${installer}` +
        ` && bash ${installer} -b -p ${shellQuote(ctx.paths.condaDir)}` +
        ` && rm -f ${installer}`,
      this.label,
      logFile(ctx, 'miniconda-install.log')
    );

    if (!existsSync(ctx.paths.condaBin)) {
      throw new VerificationError('Miniconda installation failed.', [
        'The installation command failed to execute successfully.',
        `Expected ${ctx.paths.condaBin} to exist.`,
      ]);
    }
  },
};

export const condaInitStep: InstallStep = {
  id: 'conda-init',
  label: 'Setting up Conda in your shell environment...',
  doneMessage: 'Shell environment setup complete.',
  skipMessage: 'Conda is already set up in your shell environment. (Skipping)',
  check: (ctx) => containsText(ctx.paths.bashrc, CONDA_INIT_MARKER),
  async run(ctx) {
    await ctx.runner.run(`${conda(ctx)} init bash`, this.label);
  },
};

export const condaTosStep: InstallStep = {
  id: 'conda-tos',
  label: 'Processing Anaconda ToS agreement...',
  doneMessage: 'ToS agreement processing complete.',
  skipMessage: 'Anaconda ToS agreement is already accepted. (Skipping)',
  check: (ctx) => !ctx.state.condaJustInstalled && existsSync(ctx.paths.tosMarker),
  async run(ctx) {
    const accept = TOS_CHANNELS.map(
      (channel) => `${conda(ctx)} tos accept --override-channels --channel ${channel}`
    );
    await ctx.runner.run(
      `yes | ( ${conda(ctx)} config --set channel_priority strict && ${accept.join(' && ')} )`,
      this.label
    );
    materializeFile(ctx.paths.tosMarker, `${new Date().toISOString()}\n`);
  },
};

/**
 * Gated on the flag from the Miniconda step: a full base update is only
 * worth its time right after a fresh install
 */
export const condaUpdateStep: InstallStep = {
  id: 'conda-update',
  label: 'Updating Conda packages...',
  doneMessage: 'Conda package update complete.',
  skipMessage: 'Conda package update skipped for faster re-runs.',
  check: (ctx) => !ctx.state.condaJustInstalled,
  async run(ctx) {
    await ctx.runner.run(
      `${conda(ctx)} update -n base -c defaults conda -y --quiet`,
      this.label,
      logFile(ctx, 'conda-update.log')
    );
  },
};

export const condaEnvStep: InstallStep = {
  id: 'conda-env',
  label: 'Creating Narnia-Lab environment...',
  doneMessage: 'Narnia-Lab environment creation complete.',
  skipMessage: 'Narnia-Lab environment already exists. (Skipping)',
  async check(ctx) {
    const result = await ctx.probe.capture(`${conda(ctx)} env list`);
    return result.exitCode === 0 && parseCondaEnvNames(result.stdout).includes(ctx.settings.NARNIA_CONDA_ENV);
  },
  async run(ctx) {
    const env = shellQuote(ctx.settings.NARNIA_CONDA_ENV);
    const python = shellQuote(`python=${ctx.settings.NARNIA_PYTHON_VERSION}`);
    await ctx.runner.run(
      `${conda(ctx)} create -n ${env} -y ${python} --quiet`,
      this.label,
      logFile(ctx, 'conda-env.log')
    );
  },
};

export const pythonSteps: InstallStep[] = [
  minicondaStep,
  condaInitStep,
  condaTosStep,
  condaUpdateStep,
  condaEnvStep,
];
