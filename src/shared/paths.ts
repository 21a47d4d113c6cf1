import { join, dirname, extname, sep } from 'path';
import { homedir } from 'os';
import { existsSync } from 'fs';
import { fileURLToPath } from 'url';
import type { SettingsDefaults } from './SettingsDefaultsManager.js';

/**
 * Filesystem layout produced and inspected by narnia-setup
 */
export interface NarniaPaths {
  home: string;
  // Data directory (~/.narnia)
  dataDir: string;
  logsDir: string;
  stateDir: string;
  customizeScript: string;
  feedbackScript: string;
  updateScript: string;
  // Miniconda
  condaDir: string;
  condaBin: string;
  condaInstaller: string;
  tosMarker: string;
  // nvm
  nvmDir: string;
  nvmScript: string;
  // Wrapped CLI
  cliConfigDir: string;
  cliSettingsPath: string;
  cliDocsPath: string;
  cliLogDir: string;
  feedbackDir: string;
  // Shell startup files
  bashrc: string;
  profile: string;
}

export function expandHome(filepath: string, home: string = homedir()): string {
  if (filepath === '~') return home;
  if (filepath.startsWith('~/')) {
    return join(home, filepath.slice(2));
  }
  return filepath;
}

/**
 * Render a path for a shell profile, keeping it relative to $HOME when possible
 */
export function shellPath(filepath: string, home: string): string {
  if (filepath.startsWith(home + sep)) {
    return `$HOME/${filepath.slice(home.length + 1)}`;
  }
  return filepath;
}

/**
 * Location of the settings file. It lives in the data directory, so only the
 * environment (never the file itself) can move it.
 */
export function getSettingsPath(home: string = homedir(), env: NodeJS.ProcessEnv = process.env): string {
  return join(expandHome(env.NARNIA_DATA_DIR || '~/.narnia', home), 'settings.json');
}

export function resolvePaths(settings: SettingsDefaults, home: string = homedir()): NarniaPaths {
  const dataDir = expandHome(settings.NARNIA_DATA_DIR, home);
  const condaDir = expandHome(settings.NARNIA_CONDA_DIR, home);
  const nvmDir = expandHome(settings.NARNIA_NVM_DIR, home);
  const cliConfigDir = expandHome(settings.NARNIA_CLI_CONFIG_DIR, home);

  return {
    home,
    dataDir,
    logsDir: join(dataDir, 'logs'),
    stateDir: join(dataDir, 'state'),
    customizeScript: join(dataDir, 'setting.sh'),
    feedbackScript: join(dataDir, 'prompt_feedback.sh'),
    updateScript: join(dataDir, 'update.sh'),
    condaDir,
    condaBin: join(condaDir, 'bin', 'conda'),
    condaInstaller: join(dataDir, 'miniconda.sh'),
    tosMarker: join(dataDir, 'state', 'conda-tos-accepted'),
    nvmDir,
    nvmScript: join(nvmDir, 'nvm.sh'),
    cliConfigDir,
    cliSettingsPath: join(cliConfigDir, 'settings.json'),
    cliDocsPath: join(cliConfigDir, 'GEMINI.md'),
    cliLogDir: join(cliConfigDir, 'tmp'),
    feedbackDir: expandHome(settings.NARNIA_FEEDBACK_DIR, home),
    bashrc: join(home, '.bashrc'),
    profile: join(home, '.profile'),
  };
}

const moduleFile = fileURLToPath(import.meta.url);

/**
 * Find the package root (the directory holding package.json and templates/).
 * Works from both the sources and the compiled dist/ tree.
 */
export function getPackageRoot(): string {
  let dir = dirname(moduleFile);
  while (dirname(dir) !== dir) {
    if (existsSync(join(dir, 'package.json')) && existsSync(join(dir, 'templates'))) {
      return dir;
    }
    dir = dirname(dir);
  }
  throw new Error(`Could not locate the narnia-setup package root from ${moduleFile}`);
}

export type EntryPoint = 'narnia-setup' | 'narnia-customize' | 'narnia-feedback';

// Relative to src/shared, without the extension
const ENTRY_POINTS: Record<EntryPoint, string[]> = {
  'narnia-setup': ['..', '..', 'installer', 'src', 'index'],
  'narnia-customize': ['..', 'cli', 'narnia-customize'],
  'narnia-feedback': ['..', 'cli', 'narnia-feedback'],
};

/**
 * Absolute path of a command's entry module, with the same extension as this
 * module (.ts when run from sources, .js from dist/)
 */
export function resolveEntryPoint(name: EntryPoint): string {
  return join(dirname(moduleFile), ...ENTRY_POINTS[name]) + extname(moduleFile);
}
