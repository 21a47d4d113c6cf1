#!/usr/bin/env node
import { homedir } from 'os';
import { SettingsDefaultsManager } from '../shared/SettingsDefaultsManager.js';
import { getSettingsPath, resolvePaths } from '../shared/paths.js';
import { reportFatal } from '../shared/fatal.js';
import { readTemplate } from '../shared/templates.js';
import { runCustomize } from './handlers/customize.js';

function main(): void {
  const home = homedir();
  const settings = SettingsDefaultsManager.loadFromFile(getSettingsPath(home));
  const paths = resolvePaths(settings, home);

  runCustomize({
    root: paths.nvmDir,
    logo: readTemplate('ascii-art.txt'),
    brandSearch: settings.NARNIA_BRAND_SEARCH,
    brandReplace: settings.NARNIA_BRAND_REPLACE,
  });
}

try {
  main();
} catch (error) {
  process.exit(reportFatal(error));
}
