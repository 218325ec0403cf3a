/** Anything shaped like window.localStorage */
export interface KeyValueStore {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
}

export interface DisplayPreferences {
  readonly dark: boolean;
  readonly eink: boolean;
}

export interface PreferenceDefaults {
  readonly default_dark_mode?: boolean;
  readonly default_eink_mode?: boolean;
}

export const PREFERENCE_KEYS = {
  dark: 'printerpal_ui_dark',
  eink: 'printerpal_ui_eink',
} as const;

/** Stored values win over defaults; when both end up on, e-ink wins */
export function loadPreferences(store: KeyValueStore, defaults: PreferenceDefaults = {}): DisplayPreferences {
  const dark = store.getItem(PREFERENCE_KEYS.dark);
  const eink = store.getItem(PREFERENCE_KEYS.eink);
  const prefs = {
    dark: dark === null ? Boolean(defaults.default_dark_mode) : dark === '1',
    eink: eink === null ? Boolean(defaults.default_eink_mode) : eink === '1',
  };
  return prefs.eink ? { dark: false, eink: true } : prefs;
}

export function savePreferences(store: KeyValueStore, prefs: DisplayPreferences): void {
  store.setItem(PREFERENCE_KEYS.dark, prefs.dark ? '1' : '0');
  store.setItem(PREFERENCE_KEYS.eink, prefs.eink ? '1' : '0');
}

export function hasStoredPreferences(store: KeyValueStore): boolean {
  return store.getItem(PREFERENCE_KEYS.dark) !== null || store.getItem(PREFERENCE_KEYS.eink) !== null;
}

export function toggleDark(prefs: DisplayPreferences): DisplayPreferences {
  const dark = !prefs.dark;
  return { dark, eink: dark ? false : prefs.eink };
}

export function toggleEink(prefs: DisplayPreferences): DisplayPreferences {
  const eink = !prefs.eink;
  return { dark: eink ? false : prefs.dark, eink };
}

export function createMemoryStore(initial: Record<string, string> = {}): KeyValueStore {
  const values = new Map(Object.entries(initial));
  return {
    getItem: (key) => values.get(key) ?? null,
    setItem: (key, value) => {
      values.set(key, value);
    },
  };
}
