/**
 * Settings Manager
 *
 * Typed editor settings with defaults and change listeners.
 */

export interface EditorSettings {
  'editor.tabStop': number;
  'editor.quitTimes': number;
  'editor.statusMessageTimeout': number;
  'input.escapeTimeout': number;
}

export type SettingKey = keyof EditorSettings;

export const defaultSettings: Readonly<EditorSettings> = {
  'editor.tabStop': 8,
  'editor.quitTimes': 3,
  'editor.statusMessageTimeout': 5000,
  'input.escapeTimeout': 100,
};

export const SETTING_KEYS: readonly SettingKey[] = [
  'editor.tabStop',
  'editor.quitTimes',
  'editor.statusMessageTimeout',
  'input.escapeTimeout',
];

type Listener<K extends SettingKey> = (value: EditorSettings[K]) => void;

export class Settings {
  private settings: EditorSettings;
  private listeners: { [K in SettingKey]?: Set<Listener<K>> } = {};

  constructor(initial: Partial<EditorSettings> = {}) {
    this.settings = { ...defaultSettings, ...initial };
  }

  /**
   * Get a setting value
   */
  get<K extends SettingKey>(key: K): EditorSettings[K] {
    return this.settings[key];
  }

  /**
   * Set a setting value
   */
  set<K extends SettingKey>(key: K, value: EditorSettings[K]): void {
    const oldValue = this.settings[key];
    this.settings[key] = value;

    if (oldValue !== value) {
      this.notifyListeners(key, value);
    }
  }

  /**
   * Get all settings
   */
  getAll(): EditorSettings {
    return { ...this.settings };
  }

  /**
   * Update multiple settings
   */
  update(partial: Partial<EditorSettings>): void {
    for (const key of SETTING_KEYS) {
      const value = partial[key];
      if (value !== undefined) {
        this.set(key, value);
      }
    }
  }

  /**
   * Reset to defaults
   */
  reset(): void {
    const previous = this.settings;
    this.settings = { ...defaultSettings };
    for (const key of SETTING_KEYS) {
      if (previous[key] !== this.settings[key]) {
        this.notifyListeners(key, this.settings[key]);
      }
    }
  }

  /**
   * Listen for changes to a specific setting
   */
  onChange<K extends SettingKey>(key: K, callback: Listener<K>): () => void {
    const existing = this.listeners[key];
    const keyListeners: Set<Listener<K>> = existing ?? new Set();
    if (!existing) {
      this.listeners[key] = keyListeners;
    }
    keyListeners.add(callback);

    return () => {
      keyListeners.delete(callback);
    };
  }

  private notifyListeners<K extends SettingKey>(key: K, value: EditorSettings[K]): void {
    const keyListeners = this.listeners[key];
    if (keyListeners) {
      for (const listener of keyListeners) {
        listener(value);
      }
    }
  }
}
