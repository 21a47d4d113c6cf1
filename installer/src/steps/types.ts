import type { NarniaPaths } from '../../../src/shared/paths.js';
import type { SettingsDefaults } from '../../../src/shared/SettingsDefaultsManager.js';
import type { Step } from '../utils/sequencer.js';
import type { CommandRunner } from '../utils/runner.js';
import type { ReleaseLookup } from '../utils/dependencies.js';
import type { ShellProbe } from '../utils/system.js';

/**
 * Facts one step hands to a later one within the same run
 */
export interface InstallState {
  /** Miniconda was installed by this run (not merely present) */
  condaJustInstalled: boolean;
  nvmVersion?: string;
}

/**
 * How the companion launchers start Node.js
 */
export interface LauncherTarget {
  nodePath: string;
  nodeArgs: string[];
  setupEntry: string;
  customizeEntry: string;
  feedbackEntry: string;
}

export interface InstallContext {
  settings: SettingsDefaults;
  paths: NarniaPaths;
  runner: CommandRunner;
  probe: ShellProbe;
  releases: ReleaseLookup;
  /** Environment of this process; steps export into it */
  env: NodeJS.ProcessEnv;
  launchers: LauncherTarget;
  state: InstallState;
}

export type InstallStep = Step<InstallContext>;

export function createInstallState(): InstallState {
  return { condaJustInstalled: false };
}
