/**
 * File Materializer
 *
 * Writes static payloads to fixed locations and patches files inside
 * third-party trees. Every write is a full overwrite (last writer wins).
 */

import { chmodSync, existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { escape, globSync } from 'glob';
import { logger } from '../utils/logger.js';

export interface WriteOptions {
  /** Grant execute permission (0755) after writing */
  executable?: boolean;
}

export function materializeFile(filepath: string, content: string, options: WriteOptions = {}): void {
  mkdirSync(dirname(filepath), { recursive: true });
  writeFileSync(filepath, content, 'utf-8');
  if (options.executable) {
    chmodSync(filepath, 0o755);
  }
  logger.debug('FILES', 'Materialized file', { path: filepath, executable: options.executable ?? false });
}

/**
 * Pre-check: the file already holds exactly this content
 */
export function isMaterialized(filepath: string, content: string): boolean {
  if (!existsSync(filepath)) return false;
  return readFileSync(filepath, 'utf-8') === content;
}

/**
 * A pure rewrite of one file's content
 */
export type ContentTransform = (content: string) => string;

export function overwriteWith(replacement: string): ContentTransform {
  return () => replacement;
}

export function replaceAllLiteral(search: string, replacement: string): ContentTransform {
  return (content) => content.replaceAll(search, replacement);
}

/**
 * Every regular file called `fileName` below `root`, hidden directories included
 */
export function findFilesByName(root: string, fileName: string): string[] {
  if (!existsSync(root)) return [];
  return globSync(`**/${escape(fileName)}`, {
    cwd: root,
    absolute: true,
    dot: true,
    nodir: true,
  }).sort();
}

export interface PatchResult {
  matched: string[];
  changed: string[];
}

/**
 * Apply `transform` to every file called `fileName` below `root`.
 * Files whose content would not change are left untouched.
 */
export function patchFilesByName(root: string, fileName: string, transform: ContentTransform): PatchResult {
  const matched = findFilesByName(root, fileName);
  const changed: string[] = [];

  for (const filepath of matched) {
    const current = readFileSync(filepath, 'utf-8');
    const next = transform(current);
    if (next === current) continue;
    writeFileSync(filepath, next, 'utf-8');
    changed.push(filepath);
  }

  logger.info('FILES', 'Patched files by name', { root, fileName, matched: matched.length, changed: changed.length });
  return { matched, changed };
}
