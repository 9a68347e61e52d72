/**
 * User Configuration
 *
 * Reads overrides from ~/.kiln/settings.json once at startup.
 * A missing file is normal; bad entries are skipped and logged.
 */

import * as fs from 'fs';
import * as path from 'path';
import { Settings, defaultSettings, type EditorSettings, type SettingKey } from './settings.ts';
import { debugLog } from '../debug.ts';
import { describeError } from '../errors.ts';

// ============================================
// Validation
// ============================================

type Validator = (value: number) => boolean;

const VALIDATORS: Record<SettingKey, Validator> = {
  'editor.tabStop': (v) => Number.isInteger(v) && v >= 1 && v <= 16,
  'editor.quitTimes': (v) => Number.isInteger(v) && v >= 0,
  'editor.statusMessageTimeout': (v) => v >= 0,
  'input.escapeTimeout': (v) => v >= 0,
};

function isSettingKey(key: string): key is SettingKey {
  return Object.prototype.hasOwnProperty.call(defaultSettings, key);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pick the valid entries out of parsed settings JSON.
 */
export function parseUserSettings(raw: unknown): Partial<EditorSettings> {
  const result: Partial<EditorSettings> = {};
  if (!isRecord(raw)) {
    debugLog('[UserConfig] settings.json is not an object, ignoring');
    return result;
  }

  for (const [key, value] of Object.entries(raw)) {
    if (!isSettingKey(key)) {
      debugLog(`[UserConfig] Unknown setting: ${key}`);
      continue;
    }
    if (typeof value !== 'number' || !Number.isFinite(value) || !VALIDATORS[key](value)) {
      debugLog(`[UserConfig] Invalid value for ${key}: ${JSON.stringify(value)}`);
      continue;
    }
    result[key] = value;
  }

  return result;
}

// ============================================
// User Config Manager
// ============================================

export class UserConfigManager {
  private settingsPath: string;

  constructor(configDir?: string) {
    const home = process.env.HOME || process.env.USERPROFILE || '';
    this.settingsPath = path.join(configDir ?? path.join(home, '.kiln'), 'settings.json');
  }

  getSettingsPath(): string {
    return this.settingsPath;
  }

  /**
   * Apply the user's settings file on top of the given settings.
   */
  async load(settings: Settings): Promise<void> {
    let content: string;
    try {
      content = await fs.promises.readFile(this.settingsPath, 'utf-8');
    } catch (error) {
      debugLog(`[UserConfig] No user settings at ${this.settingsPath}: ${describeError(error)}`);
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      debugLog(`[UserConfig] Malformed ${this.settingsPath}: ${describeError(error)}`);
      return;
    }

    const overrides = parseUserSettings(parsed);
    settings.update(overrides);
    debugLog(`[UserConfig] Applied ${Object.keys(overrides).length} setting(s)`);
  }
}
