import type {
  CharacterRange,
  CursorPosition,
  EditCommand,
  EditorSnapshot,
  EditorState,
  MotionDefinition,
  NavigationAction,
  PendingOperator,
  VimMode,
} from "./types";
import { CursorState } from "./cursor-state";
import { extractRange, getSelectionRange } from "./edit-text";
import { createCommandLineActions, createInsertActions } from "./insert-actions";
import { createMotions, lastColumn } from "./motions";
import { createNormalActions, createVisualActions } from "./normal-actions";
import { TextBuffer } from "./text-buffer";
import { UndoManager } from "./undo-manager";
import type { YankRegister } from "./yank-register";

export type EditResult =
  | { kind: "ignored" }
  | { kind: "unchanged" }
  | { kind: "cursor" }
  | { kind: "buffer" }
  | { kind: "mode"; mode: VimMode }
  | { kind: "command"; command: string };

type EditorCommandState = EditorState<TextBuffer>;

const OPERATOR_TARGETS: Record<
  PendingOperator,
  Partial<Record<NavigationAction, NavigationAction>>
> = {
  delete: { DeleteOperator: "Cut" },
  yank: {
    YankOperator: "CopyRow",
    CursorNextWord: "YankWord",
    CursorLineEnd: "YankToLineEnd",
    CursorLineStart: "YankToLineStart",
  },
};

const INSERT_SESSION_STARTS: ReadonlySet<NavigationAction> = new Set<NavigationAction>([
  "EnterInsertMode",
  "EnterAppendMode",
  "OpenLineBelow",
  "OpenLineAbove",
]);

export class VimEditor {
  private state: EditorCommandState;
  private undoManager: UndoManager<EditorCommandState>;
  private motions: Map<NavigationAction, MotionDefinition<EditorCommandState>>;
  private commands: Record<
    VimMode,
    Map<NavigationAction, EditCommand<EditorCommandState>>
  >;
  private undoCommand: EditCommand<EditorCommandState>;
  private redoCommand: EditCommand<EditorCommandState>;

  constructor(options: {
    register: YankRegister;
    initialContent?: string;
    undoManager?: UndoManager<EditorCommandState>;
  }) {
    const { register, initialContent = "", undoManager } = options;
    this.state = {
      mode: "normal",
      cursor: new CursorState(),
      buffer: new TextBuffer(initialContent),
      anchor: null,
      commandLine: "",
      awaitingChar: false,
      pendingOperator: null,
      executedCommand: null,
    };

    this.undoManager = undoManager ?? new UndoManager<EditorCommandState>();
    const normal = createNormalActions<EditorCommandState>(
      register,
      this.undoManager,
    );
    this.motions = createMotions<EditorCommandState>();
    this.commands = {
      normal: normal.normalCommands,
      insert: createInsertActions<EditorCommandState>(register),
      visual: createVisualActions<EditorCommandState>(register),
      command: createCommandLineActions<EditorCommandState>(),
    };
    this.undoCommand = normal.undoCommand;
    this.redoCommand = normal.redoCommand;
  }

  public getMode(): VimMode {
    return this.state.mode;
  }

  public getContent(): string {
    return this.state.buffer.extractContent();
  }

  public setContent(content: string, cursor?: CursorPosition): void {
    this.state.buffer.replaceContent(content);
    this.state.mode = "normal";
    this.state.anchor = null;
    this.state.commandLine = "";
    this.state.awaitingChar = false;
    this.state.pendingOperator = null;
    this.state.cursor.setPosition(cursor?.row ?? 0, cursor?.col ?? 0, this.state.buffer);
    this.undoManager.clear();
  }

  public getCursorPosition(): CursorPosition {
    return this.state.cursor.getPosition();
  }

  public getCursorOffset(): number {
    return this.state.cursor.getOffset(this.state.buffer);
  }

  public getBufferLength(): number {
    return this.state.buffer.length();
  }

  public getSelection(): CharacterRange | null {
    if (this.state.mode !== "visual") return null;
    return getSelectionRange(this.state);
  }

  public getSelectedText(): string | null {
    const range = this.getSelection();
    return range ? extractRange(this.state, range) : null;
  }

  public getCommandLine(): string {
    return this.state.commandLine;
  }

  public isAwaitingChar(): boolean {
    return this.state.awaitingChar;
  }

  public getPendingOperator(): PendingOperator | null {
    return this.state.pendingOperator;
  }

  public setMode(mode: "normal" | "insert"): EditResult {
    this.state.pendingOperator = null;
    if (this.state.mode === mode) return { kind: "unchanged" };
    if (this.state.mode !== "normal") this.apply("Cancel", null);
    if (mode === "insert") return this.apply("EnterInsertMode", null);
    return { kind: "mode", mode: this.state.mode };
  }

  public apply(requested: NavigationAction, text: string | null): EditResult {
    const before = this.createSnapshot();
    const mode = this.state.mode;
    let action = requested;

    if (this.state.awaitingChar && action !== "ReplaceChar") {
      this.state.awaitingChar = false;
      if (action === "Cancel") return { kind: "unchanged" };
    }

    const pending = this.state.pendingOperator;
    if (pending !== null) {
      this.state.pendingOperator = null;
      const target = OPERATOR_TARGETS[pending][action];
      if (!target) return { kind: "unchanged" };
      action = target;
    }

    if (mode !== "command") {
      const motion = this.motions.get(action);
      if (motion) {
        motion.move(this.state);
        this.normalizeCursor();
        return this.describe(before);
      }
    }

    if ((action === "Undo" || action === "Redo") && mode !== "command") {
      this.undoManager.commitCompoundIfChanged(this.state);
      const command = action === "Undo" ? this.undoCommand : this.redoCommand;
      command(this.state, text);
      this.normalizeCursor();
      return this.describe(before);
    }

    const command = this.commands[mode].get(action);
    if (!command) return { kind: "ignored" };

    if (mode === "normal" && INSERT_SESSION_STARTS.has(action)) {
      this.undoManager.beginCompound(this.state);
    }
    this.run(command, text, !this.undoManager.hasPendingCompound());

    if (mode === "insert" && this.state.mode !== "insert") {
      this.undoManager.commitCompoundIfChanged(this.state);
    }
    this.normalizeCursor();
    return this.describe(before);
  }

  private run(
    command: EditCommand<EditorCommandState>,
    text: string | null,
    recordUndo: boolean,
  ): void {
    const snapshot = recordUndo ? this.undoManager.createSnapshot(this.state) : null;
    command(this.state, text);
    if (snapshot) {
      this.undoManager.recordChange(snapshot, this.state);
    }
  }

  private normalizeCursor(): void {
    const { row, col } = this.state.cursor.getPosition();
    this.state.cursor.setPosition(
      row,
      Math.min(col, lastColumn(this.state, row)),
      this.state.buffer,
    );
  }

  private createSnapshot(): EditorSnapshot & { commandLine: string } {
    return {
      ...this.undoManager.createSnapshot(this.state),
      commandLine: this.state.commandLine,
    };
  }

  private describe(before: EditorSnapshot & { commandLine: string }): EditResult {
    const executed = this.state.executedCommand;
    if (executed !== null) {
      this.state.executedCommand = null;
      return { kind: "command", command: executed };
    }
    if (before.mode !== this.state.mode) {
      return { kind: "mode", mode: this.state.mode };
    }
    if (
      before.content !== this.state.buffer.extractContent() ||
      before.commandLine !== this.state.commandLine
    ) {
      return { kind: "buffer" };
    }
    const cursor = this.state.cursor.getPosition();
    if (cursor.row !== before.cursor.row || cursor.col !== before.cursor.col) {
      return { kind: "cursor" };
    }
    return { kind: "unchanged" };
  }
}
