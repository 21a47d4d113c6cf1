import { readFileSync } from 'fs';
import { join } from 'path';
import { getPackageRoot } from './paths.js';

export type TemplateName = 'GEMINI.md' | 'ascii-art.txt';

const cache = new Map<TemplateName, string>();

/**
 * Read a static payload shipped in templates/. Payloads are written verbatim.
 */
export function readTemplate(name: TemplateName): string {
  const cached = cache.get(name);
  if (cached !== undefined) return cached;

  const content = readFileSync(join(getPackageRoot(), 'templates', name), 'utf-8');
  cache.set(name, content);
  return content;
}
