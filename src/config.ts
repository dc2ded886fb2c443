import type {
  CursorScope,
  KeyMappingOverlay,
  KeyTableOverlay,
} from "./key-mapping";
import {
  CURSOR_SCOPES,
  PANE_KINDS,
  PANE_MODIFIERS,
  VIM_MODES,
} from "./key-mapping";
import type {
  EditingMode,
  NavigationAction,
  PaneKind,
  PaneModifier,
  VimMode,
} from "./types";
import { NAVIGATION_ACTIONS } from "./types";
import { parseChord } from "./utils";

export interface NavigationConfig {
  defaultEditingMode: EditingMode;
  paneModifier: PaneModifier;
  defaultPane: PaneKind;
  keymap: KeyMappingOverlay;
}

export const DEFAULT_NAVIGATION_CONFIG: NavigationConfig = {
  defaultEditingMode: "vim",
  paneModifier: "Shift",
  defaultPane: "Connections",
  keymap: {},
};

export interface ConfigIssue {
  path: string;
  message: string;
}

const EDITING_MODES: readonly EditingMode[] = ["vim", "cursor"];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const pick = <T extends string>(
  allowed: readonly T[],
  value: unknown,
): T | undefined => allowed.find((candidate) => candidate === value);

const describe = (value: unknown): string =>
  typeof value === "string" ? `"${value}"` : String(value);

class ConfigReader {
  public readonly issues: ConfigIssue[] = [];

  public report(path: string, message: string): void {
    this.issues.push({ path, message });
  }

  public choice<T extends string>(
    raw: Record<string, unknown>,
    key: string,
    allowed: readonly T[],
    fallback: T,
  ): T {
    const value = raw[key];
    if (value === undefined) return fallback;
    const chosen = pick(allowed, value);
    if (chosen === undefined) {
      this.report(key, `expected one of ${allowed.join(", ")}, got ${describe(value)}`);
      return fallback;
    }
    return chosen;
  }

  public table(raw: unknown, path: string): KeyTableOverlay | undefined {
    if (raw === undefined) return undefined;
    if (!isRecord(raw)) {
      this.report(path, "expected a table of chord = action entries");
      return undefined;
    }
    const table: Record<string, NavigationAction | null> = {};
    const origin = new Map<string, string>();
    for (const [chord, value] of Object.entries(raw)) {
      const entryPath = `${path}.${chord}`;
      const canonical = parseChord(chord);
      if (canonical === null) {
        this.report(entryPath, `malformed chord "${chord}"`);
        continue;
      }
      const first = origin.get(canonical);
      if (first !== undefined) {
        this.report(entryPath, `chord "${chord}" duplicates "${first}" (${canonical})`);
        continue;
      }
      origin.set(canonical, chord);
      if (value === null) {
        table[canonical] = null;
        continue;
      }
      const action = pick(NAVIGATION_ACTIONS, value);
      if (action === undefined) {
        this.report(entryPath, `unknown action ${describe(value)}`);
        continue;
      }
      table[canonical] = action;
    }
    return table;
  }

  public group<K extends string>(
    raw: unknown,
    path: string,
    keys: readonly K[],
  ): Partial<Record<K, KeyTableOverlay>> | undefined {
    if (raw === undefined) return undefined;
    if (!isRecord(raw)) {
      this.report(path, "expected a table");
      return undefined;
    }
    const group: Partial<Record<K, KeyTableOverlay>> = {};
    for (const [name, value] of Object.entries(raw)) {
      const key = pick(keys, name);
      if (key === undefined) {
        this.report(`${path}.${name}`, `unknown section, expected one of ${keys.join(", ")}`);
        continue;
      }
      const table = this.table(value, `${path}.${name}`);
      if (table) group[key] = table;
    }
    return group;
  }
}

const TOP_LEVEL_KEYS = ["defaultEditingMode", "paneModifier", "defaultPane", "keymap"];
const KEYMAP_KEYS = ["global", "panes", "vim", "cursor"];

/**
 * Validates an already-loaded configuration object. Problems are returned as
 * issues and the offending entries fall back to defaults.
 */
export const parseNavigationConfig = (
  raw: unknown,
): { config: NavigationConfig; issues: ConfigIssue[] } => {
  const reader = new ConfigReader();
  if (raw === undefined || raw === null) {
    return { config: { ...DEFAULT_NAVIGATION_CONFIG }, issues: [] };
  }
  if (!isRecord(raw)) {
    reader.report("", "expected a configuration table");
    return { config: { ...DEFAULT_NAVIGATION_CONFIG }, issues: reader.issues };
  }

  for (const key of Object.keys(raw)) {
    if (!TOP_LEVEL_KEYS.includes(key)) reader.report(key, "unknown setting");
  }

  const keymap: KeyMappingOverlay = {};
  const rawKeymap = raw.keymap;
  if (rawKeymap !== undefined && !isRecord(rawKeymap)) {
    reader.report("keymap", "expected a table");
  } else if (rawKeymap !== undefined) {
    for (const key of Object.keys(rawKeymap)) {
      if (!KEYMAP_KEYS.includes(key)) reader.report(`keymap.${key}`, "unknown section");
    }
    const global = reader.table(rawKeymap.global, "keymap.global");
    const panes = reader.group<PaneKind>(rawKeymap.panes, "keymap.panes", PANE_KINDS);
    const vim = reader.group<VimMode>(rawKeymap.vim, "keymap.vim", VIM_MODES);
    const cursor = reader.group<CursorScope>(
      rawKeymap.cursor,
      "keymap.cursor",
      CURSOR_SCOPES,
    );
    if (global) keymap.global = global;
    if (panes) keymap.panes = panes;
    if (vim) keymap.vim = vim;
    if (cursor) keymap.cursor = cursor;
  }

  const defaults = DEFAULT_NAVIGATION_CONFIG;
  const config: NavigationConfig = {
    defaultEditingMode: reader.choice(
      raw,
      "defaultEditingMode",
      EDITING_MODES,
      defaults.defaultEditingMode,
    ),
    paneModifier: reader.choice(raw, "paneModifier", PANE_MODIFIERS, defaults.paneModifier),
    defaultPane: reader.choice(raw, "defaultPane", PANE_KINDS, defaults.defaultPane),
    keymap,
  };
  return { config, issues: reader.issues };
};
