import { describe, it, expect } from 'vitest';
import {
  PREFERENCE_KEYS,
  createMemoryStore,
  hasStoredPreferences,
  loadPreferences,
  savePreferences,
  toggleDark,
  toggleEink,
} from '../preferences';

describe('display preferences', () => {
  it('should use defaults when nothing is stored', () => {
    const store = createMemoryStore();
    expect(loadPreferences(store)).toEqual({ dark: false, eink: false });
    expect(loadPreferences(store, { default_dark_mode: true })).toEqual({ dark: true, eink: false });
    expect(hasStoredPreferences(store)).toBe(false);
  });

  it('should let stored values win over defaults', () => {
    const store = createMemoryStore({ [PREFERENCE_KEYS.dark]: '0' });
    expect(loadPreferences(store, { default_dark_mode: true })).toEqual({ dark: false, eink: false });
    expect(hasStoredPreferences(store)).toBe(true);
  });

  it('should let e-ink win when both are on', () => {
    const store = createMemoryStore({ [PREFERENCE_KEYS.dark]: '1', [PREFERENCE_KEYS.eink]: '1' });
    expect(loadPreferences(store)).toEqual({ dark: false, eink: true });
  });

  it('should store flags as 1 and 0', () => {
    const store = createMemoryStore();
    savePreferences(store, { dark: true, eink: false });
    expect(store.getItem('printerpal_ui_dark')).toBe('1');
    expect(store.getItem('printerpal_ui_eink')).toBe('0');
  });

  it('should keep the modes exclusive when toggling', () => {
    expect(toggleDark({ dark: false, eink: true })).toEqual({ dark: true, eink: false });
    expect(toggleEink({ dark: true, eink: false })).toEqual({ dark: false, eink: true });
    expect(toggleDark({ dark: true, eink: false })).toEqual({ dark: false, eink: false });
    expect(toggleEink({ dark: false, eink: true })).toEqual({ dark: false, eink: false });
  });
});
