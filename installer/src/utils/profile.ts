/**
 * Shell-Profile Patcher
 *
 * Line-oriented edits of shell startup files: read every line, transform the
 * list in memory, write it back. A missing file reads as empty.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { logger } from '../../../src/utils/logger.js';

export function readLines(file: string): string[] {
  if (!existsSync(file)) return [];
  const content = readFileSync(file, 'utf-8');
  if (content === '') return [];
  const lines = content.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

export function writeLines(file: string, lines: string[]): void {
  mkdirSync(dirname(file), { recursive: true });
  writeFileSync(file, lines.length > 0 ? lines.join('\n') + '\n' : '', 'utf-8');
}

function splitBlock(block: string): string[] {
  const lines = block.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

/**
 * Exact-match line lookup (not a substring search)
 */
export function hasLine(file: string, line: string): boolean {
  return readLines(file).includes(line);
}

/**
 * Literal substring lookup across all lines
 */
export function containsText(file: string, text: string): boolean {
  return readLines(file).some((line) => line.includes(text));
}

export function ensureLine(file: string, line: string): boolean {
  const lines = readLines(file);
  if (lines.includes(line)) return false;
  lines.push(line);
  writeLines(file, lines);
  logger.info('PROFILE', 'Appended line', { file, line });
  return true;
}

export function appendLines(file: string, added: string[]): void {
  writeLines(file, [...readLines(file), ...added]);
  logger.info('PROFILE', 'Appended lines', { file, count: added.length });
}

export function removeMatching(file: string, pattern: string): number {
  const lines = readLines(file);
  const kept = lines.filter((line) => !line.includes(pattern));
  const removed = lines.length - kept.length;
  if (removed > 0) {
    writeLines(file, kept);
    logger.info('PROFILE', 'Removed matching lines', { file, pattern, removed });
  }
  return removed;
}

/**
 * Drop every range that opens on a line containing `startMarker` and closes
 * on the next line equal to `endMarker` (trimmed). An unclosed range runs to
 * the end of the file.
 */
export function removeBlocks(lines: string[], startMarker: string, endMarker: string): string[] {
  const kept: string[] = [];
  let inBlock = false;
  for (const line of lines) {
    if (inBlock) {
      if (line.trim() === endMarker) inBlock = false;
      continue;
    }
    if (line.includes(startMarker)) {
      inBlock = true;
      continue;
    }
    kept.push(line);
  }
  return kept;
}

/**
 * Replace-on-reinsert: every earlier copy of the block goes, the canonical
 * block is appended
 */
export function ensureBlock(file: string, startMarker: string, endMarker: string, block: string): void {
  const lines = removeBlocks(readLines(file), startMarker, endMarker);
  writeLines(file, [...lines, ...splitBlock(block)]);
  logger.info('PROFILE', 'Replaced block', { file, startMarker });
}

/**
 * True when the file holds the canonical block exactly once and no other
 * block opens with the same marker
 */
export function hasBlock(file: string, startMarker: string, block: string): boolean {
  const lines = readLines(file);
  const wanted = splitBlock(block);
  const starts = lines.filter((line) => line.includes(startMarker)).length;
  if (starts !== 1) return false;

  const at = lines.findIndex((line) => line.includes(startMarker));
  return wanted.every((line, offset) => lines[at + offset] === line);
}

/**
 * Remove every line containing `pattern`, then append `line`
 */
export function replaceMatching(file: string, pattern: string, line: string): void {
  removeMatching(file, pattern);
  appendLines(file, [line]);
}

/**
 * True when exactly one line contains `pattern` and it is `line`
 */
export function hasSingleMatch(file: string, pattern: string, line: string): boolean {
  const matches = readLines(file).filter((candidate) => candidate.includes(pattern));
  return matches.length === 1 && matches[0] === line;
}
