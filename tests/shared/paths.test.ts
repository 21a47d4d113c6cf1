import { describe, it, expect } from 'vitest';
import { join } from 'path';
import { existsSync } from 'fs';
import { SettingsDefaultsManager } from '../../src/shared/SettingsDefaultsManager.js';
import { expandHome, getPackageRoot, getSettingsPath, resolveEntryPoint, resolvePaths, shellPath } from '../../src/shared/paths.js';

const HOME = '/home/tester';

describe('paths', () => {
  it('expands a leading ~ only', () => {
    expect(expandHome('~', HOME)).toBe(HOME);
    expect(expandHome('~/miniconda', HOME)).toBe('/home/tester/miniconda');
    expect(expandHome('/opt/~/x', HOME)).toBe('/opt/~/x');
  });

  it('renders paths under home relative to $HOME', () => {
    expect(shellPath('/home/tester/.narnia/setting.sh', HOME)).toBe('$HOME/.narnia/setting.sh');
    expect(shellPath('/opt/narnia/setting.sh', HOME)).toBe('/opt/narnia/setting.sh');
  });

  it('places the settings file in the data directory', () => {
    expect(getSettingsPath(HOME, {})).toBe('/home/tester/.narnia/settings.json');
    expect(getSettingsPath(HOME, { NARNIA_DATA_DIR: '/srv/narnia' })).toBe('/srv/narnia/settings.json');
  });

  it('derives the layout from the defaults', () => {
    const paths = resolvePaths(SettingsDefaultsManager.getAllDefaults(), HOME);

    expect(paths.condaBin).toBe('/home/tester/miniconda/bin/conda');
    expect(paths.nvmScript).toBe('/home/tester/.nvm/nvm.sh');
    expect(paths.cliSettingsPath).toBe('/home/tester/.gemini/settings.json');
    expect(paths.cliDocsPath).toBe('/home/tester/.gemini/GEMINI.md');
    expect(paths.cliLogDir).toBe('/home/tester/.gemini/tmp');
    expect(paths.customizeScript).toBe('/home/tester/.narnia/setting.sh');
    expect(paths.feedbackScript).toBe('/home/tester/.narnia/prompt_feedback.sh');
    expect(paths.updateScript).toBe('/home/tester/.narnia/update.sh');
    expect(paths.tosMarker).toBe('/home/tester/.narnia/state/conda-tos-accepted');
    expect(paths.feedbackDir).toBe('/home/tester/gemini_feedback');
    expect(paths.bashrc).toBe('/home/tester/.bashrc');
    expect(paths.profile).toBe('/home/tester/.profile');
  });

  it('finds the package root and the companion entry points', () => {
    const root = getPackageRoot();

    expect(existsSync(join(root, 'templates', 'GEMINI.md'))).toBe(true);
    expect(resolveEntryPoint('narnia-customize')).toBe(join(root, 'src', 'cli', 'narnia-customize.ts'));
    expect(existsSync(resolveEntryPoint('narnia-feedback'))).toBe(true);
    expect(resolveEntryPoint('narnia-setup')).toBe(join(root, 'installer', 'src', 'index.ts'));
  });
});
