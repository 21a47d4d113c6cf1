import { materializeFile } from '../../../src/shared/materializer.js';

export interface CliSettings {
  selectedAuthType: string;
}

export function buildCliSettings(authType: string): CliSettings {
  return { selectedAuthType: authType };
}

export function renderCliSettings(authType: string): string {
  return JSON.stringify(buildCliSettings(authType), null, 2) + '\n';
}

/**
 * Write the wrapped CLI's settings file. Existing files are never merged:
 * the step that calls this only runs when the file is absent.
 */
export function writeCliSettings(settingsPath: string, authType: string): void {
  materializeFile(settingsPath, renderCliSettings(authType));
}
