/**
 * SettingsDefaultsManager
 *
 * Single source of truth for all default configuration values.
 * Values that name a location may start with `~`; paths.ts expands them.
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
// NOTE: logger.ts must never import this module; it reads its own settings
// file directly so that this import stays acyclic
import { logger } from '../utils/logger.js';

export interface SettingsDefaults {
  // System Configuration
  NARNIA_DATA_DIR: string;
  NARNIA_LOG_LEVEL: string;  // 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'SILENT'
  // Python distribution (Miniconda)
  NARNIA_CONDA_DIR: string;
  NARNIA_CONDA_INSTALLER_URL: string;
  NARNIA_CONDA_ENV: string;
  NARNIA_PYTHON_VERSION: string;
  // Node.js version manager
  NARNIA_NVM_DIR: string;
  NARNIA_NVM_RELEASES_URL: string;
  // Wrapped CLI tool
  NARNIA_CLI_PACKAGE: string;
  NARNIA_CLI_BIN: string;
  NARNIA_CLI_CONFIG_DIR: string;
  NARNIA_CLI_AUTH_TYPE: string;
  // Shell integration
  NARNIA_FEEDBACK_DIR: string;
  // Rebranding
  NARNIA_BRAND_SEARCH: string;
  NARNIA_BRAND_REPLACE: string;
}

export class SettingsDefaultsManager {
  /**
   * Default values for all settings
   */
  private static readonly DEFAULTS: SettingsDefaults = {
    NARNIA_DATA_DIR: '~/.narnia',
    NARNIA_LOG_LEVEL: 'INFO',
    NARNIA_CONDA_DIR: '~/miniconda',
    NARNIA_CONDA_INSTALLER_URL: 'https://repo.anaconda.com/miniconda/Miniconda3-latest-Linux-x86_64.sh',
    NARNIA_CONDA_ENV: 'Narnia-Lab',
    NARNIA_PYTHON_VERSION: '3.10',
    NARNIA_NVM_DIR: '~/.nvm',
    NARNIA_NVM_RELEASES_URL: 'https://api.github.com/repos/nvm-sh/nvm/releases/latest',
    NARNIA_CLI_PACKAGE: '@google/gemini-cli',
    NARNIA_CLI_BIN: 'gemini',
    NARNIA_CLI_CONFIG_DIR: '~/.gemini',
    NARNIA_CLI_AUTH_TYPE: 'oauth-personal',
    NARNIA_FEEDBACK_DIR: '~/gemini_feedback',
    NARNIA_BRAND_SEARCH: 'Gemini CLI',
    NARNIA_BRAND_REPLACE: 'Narnia Package',
  };

  static getAllDefaults(): SettingsDefaults {
    return { ...this.DEFAULTS };
  }

  /**
   * Get a default value (no environment variable override)
   */
  static get(key: keyof SettingsDefaults): string {
    return this.DEFAULTS[key];
  }

  private static keys(): Array<keyof SettingsDefaults> {
    return Object.keys(this.DEFAULTS) as Array<keyof SettingsDefaults>;
  }

  /**
   * Environment variables take highest priority over file and defaults
   */
  private static applyEnvOverrides(settings: SettingsDefaults, env: NodeJS.ProcessEnv): SettingsDefaults {
    const result = { ...settings };
    for (const key of this.keys()) {
      const value = env[key];
      if (value !== undefined) {
        result[key] = value;
      }
    }
    return result;
  }

  /**
   * Load settings with priority: environment > settings file > defaults.
   * A missing file is created with the defaults; a corrupt one is ignored.
   */
  static loadFromFile(settingsPath: string, env: NodeJS.ProcessEnv = process.env): SettingsDefaults {
    try {
      if (!existsSync(settingsPath)) {
        const defaults = this.getAllDefaults();
        try {
          mkdirSync(dirname(settingsPath), { recursive: true });
          writeFileSync(settingsPath, JSON.stringify(defaults, null, 2) + '\n', 'utf-8');
          logger.info('SYSTEM', 'Created settings file with defaults', { path: settingsPath });
        } catch (error) {
          logger.warn('SYSTEM', 'Failed to create settings file, using in-memory defaults', { path: settingsPath }, error);
        }
        return this.applyEnvOverrides(defaults, env);
      }

      const parsed: unknown = JSON.parse(readFileSync(settingsPath, 'utf-8'));
      const result: SettingsDefaults = this.getAllDefaults();
      if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
        const fileSettings = new Map<string, unknown>(Object.entries(parsed));
        for (const key of this.keys()) {
          const value = fileSettings.get(key);
          if (typeof value === 'string') {
            result[key] = value;
          }
        }
      }

      return this.applyEnvOverrides(result, env);
    } catch (error) {
      logger.warn('SYSTEM', 'Failed to load settings, using defaults', { path: settingsPath }, error);
      return this.applyEnvOverrides(this.getAllDefaults(), env);
    }
  }
}
