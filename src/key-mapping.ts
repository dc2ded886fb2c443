import type { NavigationAction, PaneKind, PaneModifier, VimMode } from "./types";
import { parseChord } from "./utils";

export type KeyTable = ReadonlyMap<string, NavigationAction>;

export type CursorScope = "view" | "edit";

export interface KeyMapping {
  readonly paneModifier: PaneModifier;
  readonly global: KeyTable;
  readonly panes: Readonly<Record<PaneKind, KeyTable>>;
  readonly vim: Readonly<Record<VimMode, KeyTable>>;
  readonly cursor: Readonly<Record<CursorScope, KeyTable>>;
  /** Chords built from `paneModifier`; consulted after every other table. */
  readonly composed: KeyTable;
}

export type KeyTableOverlay = Readonly<Record<string, NavigationAction | null>>;

export interface KeyMappingOverlay {
  global?: KeyTableOverlay;
  panes?: Partial<Record<PaneKind, KeyTableOverlay>>;
  vim?: Partial<Record<VimMode, KeyTableOverlay>>;
  cursor?: Partial<Record<CursorScope, KeyTableOverlay>>;
}

export interface KeyCollision {
  chord: string;
  scope: string;
  kept: NavigationAction;
  shadowed: NavigationAction;
}

export const PANE_KINDS: readonly PaneKind[] = [
  "Connections",
  "QueryInput",
  "Results",
  "SchemaExplorer",
  "CommandLine",
];

export const VIM_MODES: readonly VimMode[] = [
  "normal",
  "insert",
  "visual",
  "command",
];

export const CURSOR_SCOPES: readonly CursorScope[] = ["view", "edit"];

export const PANE_MODIFIERS: readonly PaneModifier[] = ["Ctrl", "Alt", "Shift"];

export const PANE_MODIFIER_KEYS: Readonly<Record<string, NavigationAction>> = {
  h: "MoveLeft",
  j: "MoveDown",
  k: "MoveUp",
  l: "MoveRight",
  n: "NextPane",
  p: "PreviousPane",
  f: "FollowForeignKey",
};

export const tableFromRecord = (
  record: Readonly<Record<string, NavigationAction>>,
): KeyTable => {
  const table = new Map<string, NavigationAction>();
  for (const [chord, action] of Object.entries(record)) {
    const canonical = parseChord(chord);
    if (canonical !== null) table.set(canonical, action);
  }
  return table;
};

const overlayTable = (base: KeyTable, overlay?: KeyTableOverlay): KeyTable => {
  if (!overlay) return base;
  const merged = new Map(base);
  for (const [chord, action] of Object.entries(overlay)) {
    const canonical = parseChord(chord);
    if (canonical === null) continue;
    if (action === null) {
      merged.delete(canonical);
    } else {
      merged.set(canonical, action);
    }
  }
  return merged;
};

const overlayPanes = (
  base: Readonly<Record<PaneKind, KeyTable>>,
  overlay?: Partial<Record<PaneKind, KeyTableOverlay>>,
): Record<PaneKind, KeyTable> => ({
  Connections: overlayTable(base.Connections, overlay?.Connections),
  QueryInput: overlayTable(base.QueryInput, overlay?.QueryInput),
  Results: overlayTable(base.Results, overlay?.Results),
  SchemaExplorer: overlayTable(base.SchemaExplorer, overlay?.SchemaExplorer),
  CommandLine: overlayTable(base.CommandLine, overlay?.CommandLine),
});

const overlayVim = (
  base: Readonly<Record<VimMode, KeyTable>>,
  overlay?: Partial<Record<VimMode, KeyTableOverlay>>,
): Record<VimMode, KeyTable> => ({
  normal: overlayTable(base.normal, overlay?.normal),
  insert: overlayTable(base.insert, overlay?.insert),
  visual: overlayTable(base.visual, overlay?.visual),
  command: overlayTable(base.command, overlay?.command),
});

const overlayCursor = (
  base: Readonly<Record<CursorScope, KeyTable>>,
  overlay?: Partial<Record<CursorScope, KeyTableOverlay>>,
): Record<CursorScope, KeyTable> => ({
  view: overlayTable(base.view, overlay?.view),
  edit: overlayTable(base.edit, overlay?.edit),
});

export const mergeKeyMappings = (
  base: KeyMapping,
  overlay: KeyMappingOverlay,
): KeyMapping => {
  return Object.freeze({
    paneModifier: base.paneModifier,
    global: overlayTable(base.global, overlay.global),
    panes: Object.freeze(overlayPanes(base.panes, overlay.panes)),
    vim: Object.freeze(overlayVim(base.vim, overlay.vim)),
    cursor: Object.freeze(overlayCursor(base.cursor, overlay.cursor)),
    composed: base.composed,
  });
};

export const composePaneModifierChords = (
  paneModifier: PaneModifier,
): KeyTable => {
  const table = new Map<string, NavigationAction>();
  for (const [key, action] of Object.entries(PANE_MODIFIER_KEYS)) {
    const chord = parseChord(`${paneModifier}+${key}`);
    if (chord !== null) table.set(chord, action);
  }
  return table;
};

const scopedTables = (mapping: KeyMapping): Array<[string, KeyTable]> => {
  const tables: Array<[string, KeyTable]> = [["global", mapping.global]];
  for (const pane of PANE_KINDS) tables.push([`panes.${pane}`, mapping.panes[pane]]);
  for (const mode of VIM_MODES) tables.push([`vim.${mode}`, mapping.vim[mode]]);
  for (const scope of CURSOR_SCOPES) {
    tables.push([`cursor.${scope}`, mapping.cursor[scope]]);
  }
  return tables;
};

export const findCollisions = (mapping: KeyMapping): KeyCollision[] => {
  const collisions: KeyCollision[] = [];
  for (const [scope, table] of scopedTables(mapping)) {
    for (const [chord, shadowed] of mapping.composed) {
      const kept = table.get(chord);
      if (kept !== undefined && kept !== shadowed) {
        collisions.push({ chord, scope, kept, shadowed });
      }
    }
  }
  return collisions;
};
