import { describe, it, expect } from 'vitest';
import { readdirSync, readFileSync } from 'fs';
import { dirname, join, relative } from 'path';
import { fileURLToPath } from 'url';

/**
 * Logger Usage Standards
 *
 * The terminal belongs to the spinner and the prompts: stray console output
 * would tear the progress line. Diagnostics go through the file logger.
 */

const PROJECT_ROOT = join(dirname(fileURLToPath(import.meta.url)), '..');
const SOURCE_DIRS = [join(PROJECT_ROOT, 'src'), join(PROJECT_ROOT, 'installer', 'src')];

// Files that change the machine and must leave a trace in the log
const HIGH_PRIORITY_PATTERNS = [
  /^installer\/src\/utils\/(runner|profile|sequencer|dependencies)\.ts$/,
  /^src\/shared\/(materializer|fatal)\.ts$/,
  /^src\/cli\/handlers\//,
];

function findTypeScriptFiles(dir: string): string[] {
  const files: string[] = [];
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...findTypeScriptFiles(fullPath));
    } else if (entry.isFile() && entry.name.endsWith('.ts')) {
      files.push(fullPath);
    }
  }
  return files;
}

const files = SOURCE_DIRS.flatMap(findTypeScriptFiles).map((path) => ({
  relativePath: relative(PROJECT_ROOT, path),
  content: readFileSync(path, 'utf-8'),
}));

describe('Logger Usage Standards', () => {
  it('should find source files to scan', () => {
    expect(files.length).toBeGreaterThan(0);
  });

  it('should NOT use console.* anywhere in the sources', () => {
    const offenders = files
      .filter((file) => /console\.(log|error|warn|info|debug)/.test(file.content))
      .map((file) => file.relativePath);

    expect(offenders).toEqual([]);
  });

  it('should import the logger in high-priority files', () => {
    const missing = files
      .filter((file) => HIGH_PRIORITY_PATTERNS.some((pattern) => pattern.test(file.relativePath)))
      .filter((file) => !/import\s+\{\s*logger\s*\}\s+from\s+['"].*logger\.js['"]/.test(file.content))
      .map((file) => file.relativePath);

    expect(missing).toEqual([]);
  });
});
