/**
 * Settings Tests
 */

import { describe, test, expect } from 'vitest';
import { Settings, defaultSettings, SETTING_KEYS } from '../../../src/config/settings.ts';

describe('Settings', () => {
  test('starts from the defaults', () => {
    const settings = new Settings();
    expect(settings.get('editor.tabStop')).toBe(8);
    expect(settings.get('editor.quitTimes')).toBe(3);
    expect(settings.get('editor.statusMessageTimeout')).toBe(5000);
    expect(settings.get('input.escapeTimeout')).toBe(100);
  });

  test('initial values override the defaults', () => {
    const settings = new Settings({ 'editor.tabStop': 4 });
    expect(settings.get('editor.tabStop')).toBe(4);
    expect(settings.get('editor.quitTimes')).toBe(3);
  });

  test('every default has a key', () => {
    expect([...SETTING_KEYS].sort()).toEqual(Object.keys(defaultSettings).sort());
  });

  test('notifies listeners only on change', () => {
    const settings = new Settings();
    const seen: number[] = [];
    settings.onChange('editor.tabStop', (value) => seen.push(value));

    settings.set('editor.tabStop', 8);
    settings.set('editor.tabStop', 2);

    expect(seen).toEqual([2]);
  });

  test('unsubscribe stops notifications', () => {
    const settings = new Settings();
    const seen: number[] = [];
    const off = settings.onChange('editor.quitTimes', (value) => seen.push(value));

    settings.set('editor.quitTimes', 1);
    off();
    settings.set('editor.quitTimes', 2);

    expect(seen).toEqual([1]);
  });

  test('update applies several values', () => {
    const settings = new Settings();
    settings.update({ 'editor.tabStop': 2, 'input.escapeTimeout': 50 });
    expect(settings.get('editor.tabStop')).toBe(2);
    expect(settings.get('input.escapeTimeout')).toBe(50);
  });

  test('reset restores defaults and notifies changed keys', () => {
    const settings = new Settings({ 'editor.tabStop': 2 });
    const seen: number[] = [];
    settings.onChange('editor.tabStop', (value) => seen.push(value));

    settings.reset();

    expect(settings.getAll()).toEqual(defaultSettings);
    expect(seen).toEqual([8]);
  });

  test('getAll returns a copy', () => {
    const settings = new Settings();
    const all = settings.getAll();
    all['editor.tabStop'] = 1;
    expect(settings.get('editor.tabStop')).toBe(8);
  });
});
