import type { CursorState } from "./cursor-state";

export type PaneKind =
  | "Connections"
  | "QueryInput"
  | "Results"
  | "SchemaExplorer"
  | "CommandLine";

export type BoxKind = "TextInput" | "DataTable" | "TreeView" | "ListView" | "Modal";

export type EditingMode = "vim" | "cursor";

export type VimMode = "normal" | "insert" | "visual" | "command";

export type Direction = "left" | "right" | "up" | "down";

export type PaneModifier = "Ctrl" | "Alt" | "Shift";

export type PendingOperator = "delete" | "yank";

export type PageDirection = "first" | "last" | "next" | "previous";

export const NAVIGATION_ACTIONS = [
  // pane focus
  "FocusConnections",
  "FocusQueryInput",
  "FocusResults",
  "FocusSchemaExplorer",
  "FocusCommandLine",
  // box focus
  "FocusTextInput",
  "FocusDataTable",
  "FocusTreeView",
  "FocusListView",
  "FocusModal",
  // spatial focus moves
  "MoveLeft",
  "MoveRight",
  "MoveUp",
  "MoveDown",
  "NextPane",
  "PreviousPane",
  "NextBox",
  "PreviousBox",
  // in-box motions
  "CursorLeft",
  "CursorRight",
  "CursorUp",
  "CursorDown",
  "CursorLineStart",
  "CursorLineEnd",
  "CursorNextWord",
  "CursorPreviousWord",
  "CursorFirstLine",
  "CursorLastLine",
  // modes
  "EnterInsertMode",
  "EnterAppendMode",
  "OpenLineBelow",
  "OpenLineAbove",
  "EnterVisualMode",
  "EnterCommandMode",
  "EnterNormalMode",
  "ToggleViewEditMode",
  "ToggleEditingStyle",
  // text editing
  "InsertChar",
  "InsertNewline",
  "DeleteCharBefore",
  "DeleteChar",
  "DeleteLine",
  "DeleteOperator",
  "ReplaceChar",
  "Undo",
  "Redo",
  // clipboard
  "Copy",
  "CopyRow",
  "YankOperator",
  "YankWord",
  "YankToLineEnd",
  "YankToLineStart",
  "Paste",
  "Cut",
  // results
  "FirstPage",
  "LastPage",
  "NextPage",
  "PreviousPage",
  "SortByColumn",
  "FollowForeignKey",
  // application
  "Search",
  "Confirm",
  "Cancel",
  "Quit",
] as const;

export type NavigationAction = (typeof NAVIGATION_ACTIONS)[number];

export interface KeyInput {
  key: string;
  ctrl?: boolean;
  alt?: boolean;
  shift?: boolean;
}

export interface ResolvedAction {
  action: NavigationAction;
  count: number;
  text: string | null;
}

export interface ResolveContext {
  pane: PaneKind;
  box: BoxKind | null;
  editingMode: EditingMode;
  vimMode: VimMode | null;
  viewMode: boolean;
  awaitingChar: boolean;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface CursorPosition {
  row: number;
  col: number;
}

export interface BufferAdapter {
  extractContent(): string;
  replaceContent(content: string): void;
  lineCount(): number;
  getLineText(row: number): string;
  getLineLength(row: number): number;
  setLineText(row: number, text: string): void;
  insertLineAfter(row: number, text: string): void;
  removeLine(row: number): void;
}

export interface EditorSnapshot {
  content: string;
  cursor: CursorPosition;
  mode: VimMode;
  anchor: CursorPosition | null;
}

export interface EditorState<TBuffer extends BufferAdapter = BufferAdapter> {
  mode: VimMode;
  cursor: CursorState;
  buffer: TBuffer;
  anchor: CursorPosition | null;
  commandLine: string;
  awaitingChar: boolean;
  pendingOperator: PendingOperator | null;
  executedCommand: string | null;
}

export type EditCommand<TState extends EditorState = EditorState> = (
  state: TState,
  text: string | null,
) => void;

export interface MotionDefinition<TState extends EditorState = EditorState> {
  action: NavigationAction;
  move: (state: TState) => void;
}

export interface CharacterRange {
  startRow: number;
  startCol: number;
  endRow: number;
  /** Exclusive. */
  endCol: number;
}

export interface FocusSnapshot {
  pane: PaneKind;
  box: BoxKind | null;
  boxId: string | null;
  editingMode: EditingMode | null;
  vimMode: VimMode | null;
  viewMode: boolean | null;
}
