/**
 * Customization Handler
 *
 * Rebrands the installed CLI in place: the banner module is replaced by the
 * Narnia logo and the startup warnings name the package instead of the CLI.
 * Runs before every `narnia` call, so it must be cheap on an already-branded tree.
 */

import type { TextSink } from '../../shared/fatal.js';
import { overwriteWith, patchFilesByName, replaceAllLiteral, type ContentTransform } from '../../shared/materializer.js';
import { logger } from '../../utils/logger.js';

export const BANNER_FILE = 'AsciiArt.js';
export const WARNINGS_FILE = 'userStartupWarnings.js';

export interface CustomizeOptions {
  /** Search root, the nvm directory holding the globally installed CLI */
  root: string;
  logo: string;
  brandSearch: string;
  brandReplace: string;
  errors?: TextSink;
}

export interface CustomizeTarget {
  fileName: string;
  transform: ContentTransform;
}

export interface CustomizeReport {
  fileName: string;
  matched: number;
  changed: number;
}

export function customizeTargets(options: CustomizeOptions): CustomizeTarget[] {
  return [
    { fileName: BANNER_FILE, transform: overwriteWith(options.logo) },
    { fileName: WARNINGS_FILE, transform: replaceAllLiteral(options.brandSearch, options.brandReplace) },
  ];
}

/**
 * Patch every target. A target with no file under the root is reported and
 * skipped; it never fails the command.
 */
export function runCustomize(options: CustomizeOptions): CustomizeReport[] {
  const errors = options.errors ?? process.stderr;
  const reports: CustomizeReport[] = [];

  for (const target of customizeTargets(options)) {
    const result = patchFilesByName(options.root, target.fileName, target.transform);
    if (result.matched.length === 0) {
      errors.write(`Error: Could not find '${target.fileName}' in the '${options.root}' directory.\n`);
      logger.warn('CUSTOMIZE', 'No file to patch', { fileName: target.fileName, root: options.root });
    }
    reports.push({ fileName: target.fileName, matched: result.matched.length, changed: result.changed.length });
  }

  return reports;
}
