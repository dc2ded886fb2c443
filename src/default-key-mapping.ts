import type { NavigationAction, PaneModifier } from "./types";
import type {
  KeyCollision,
  KeyMapping,
  KeyMappingOverlay,
  KeyTable,
} from "./key-mapping";
import {
  composePaneModifierChords,
  findCollisions,
  mergeKeyMappings,
  tableFromRecord,
} from "./key-mapping";

const EMPTY: KeyTable = new Map<string, NavigationAction>();

const ARROW_MOTIONS: Record<string, NavigationAction> = {
  Left: "CursorLeft",
  Right: "CursorRight",
  Up: "CursorUp",
  Down: "CursorDown",
  Home: "CursorLineStart",
  End: "CursorLineEnd",
};

const VIM_MOTIONS: Record<string, NavigationAction> = {
  ...ARROW_MOTIONS,
  h: "CursorLeft",
  j: "CursorDown",
  k: "CursorUp",
  l: "CursorRight",
  "0": "CursorLineStart",
  $: "CursorLineEnd",
  w: "CursorNextWord",
  b: "CursorPreviousWord",
  "Ctrl+Home": "CursorFirstLine",
  "Ctrl+End": "CursorLastLine",
};

const GLOBAL: Record<string, NavigationAction> = {
  c: "FocusConnections",
  q: "FocusQueryInput",
  r: "FocusResults",
  s: "FocusSchemaExplorer",
  ":": "FocusCommandLine",
  t: "FocusTextInput",
  d: "FocusDataTable",
  v: "FocusTreeView",
  l: "FocusListView",
  Tab: "NextBox",
  BackTab: "PreviousBox",
  Enter: "Confirm",
  Esc: "Cancel",
  "/": "Search",
  "Ctrl+q": "Quit",
  "Ctrl+c": "Copy",
  "Ctrl+v": "Paste",
  "Ctrl+x": "Cut",
  "Ctrl+e": "ToggleEditingStyle",
};

const RESULTS: Record<string, NavigationAction> = {
  g: "FirstPage",
  G: "LastPage",
  ",": "NextPage",
  ".": "PreviousPage",
  PageDown: "NextPage",
  PageUp: "PreviousPage",
  s: "SortByColumn",
  e: "ToggleViewEditMode",
};

const VIM_NORMAL: Record<string, NavigationAction> = {
  ...VIM_MOTIONS,
  i: "EnterInsertMode",
  a: "EnterAppendMode",
  o: "OpenLineBelow",
  O: "OpenLineAbove",
  v: "EnterVisualMode",
  ":": "EnterCommandMode",
  x: "DeleteChar",
  r: "ReplaceChar",
  d: "DeleteOperator",
  D: "DeleteLine",
  y: "YankOperator",
  Y: "CopyRow",
  p: "Paste",
  u: "Undo",
  "Ctrl+r": "Redo",
  Esc: "Cancel",
};

const VIM_INSERT: Record<string, NavigationAction> = {
  ...ARROW_MOTIONS,
  Esc: "Cancel",
  Backspace: "DeleteCharBefore",
  Delete: "DeleteChar",
  Enter: "InsertNewline",
};

const VIM_VISUAL: Record<string, NavigationAction> = {
  ...ARROW_MOTIONS,
  h: "CursorLeft",
  j: "CursorDown",
  k: "CursorUp",
  l: "CursorRight",
  $: "CursorLineEnd",
  w: "CursorNextWord",
  b: "CursorPreviousWord",
  v: "EnterVisualMode",
  y: "Copy",
  Y: "CopyRow",
  d: "Cut",
  x: "Cut",
  Esc: "Cancel",
};

const VIM_COMMAND: Record<string, NavigationAction> = {
  Esc: "Cancel",
  Enter: "Confirm",
  Backspace: "DeleteCharBefore",
};

const CURSOR_VIEW: Record<string, NavigationAction> = {
  ...ARROW_MOTIONS,
  h: "CursorLeft",
  j: "CursorDown",
  k: "CursorUp",
  l: "CursorRight",
  "Ctrl+Home": "CursorFirstLine",
  "Ctrl+End": "CursorLastLine",
  e: "ToggleViewEditMode",
};

const CURSOR_EDIT: Record<string, NavigationAction> = {
  ...ARROW_MOTIONS,
  Esc: "Cancel",
  Backspace: "DeleteCharBefore",
  Delete: "DeleteChar",
  Enter: "Confirm",
  "Ctrl+z": "Undo",
  "Ctrl+y": "Redo",
};

export const createDefaultKeyMapping = (
  paneModifier: PaneModifier = "Shift",
): KeyMapping => {
  return Object.freeze({
    paneModifier,
    global: tableFromRecord(GLOBAL),
    panes: Object.freeze({
      Connections: EMPTY,
      QueryInput: EMPTY,
      Results: tableFromRecord(RESULTS),
      SchemaExplorer: EMPTY,
      CommandLine: EMPTY,
    }),
    vim: Object.freeze({
      normal: tableFromRecord(VIM_NORMAL),
      insert: tableFromRecord(VIM_INSERT),
      visual: tableFromRecord(VIM_VISUAL),
      command: tableFromRecord(VIM_COMMAND),
    }),
    cursor: Object.freeze({
      view: tableFromRecord(CURSOR_VIEW),
      edit: tableFromRecord(CURSOR_EDIT),
    }),
    composed: composePaneModifierChords(paneModifier),
  });
};

export const buildKeyMapping = (
  overlay: KeyMappingOverlay = {},
  paneModifier: PaneModifier = "Shift",
): { mapping: KeyMapping; collisions: KeyCollision[] } => {
  const mapping = mergeKeyMappings(
    createDefaultKeyMapping(paneModifier),
    overlay,
  );
  return { mapping, collisions: findCollisions(mapping) };
};
