import type {
  Box,
  DataTableBox,
  EditableBox,
  ListBox,
} from "./boxes";
import { createBox, listOf, supportsEditing } from "./boxes";
import type { Effect } from "./effects";
import { NONE } from "./effects";
import type { Layout } from "./layout";
import type { Logger } from "./logger";
import { silentLogger } from "./logger";
import type {
  BoxKind,
  EditingMode,
  NavigationAction,
  PaneKind,
  VimMode,
} from "./types";
import type { EditResult } from "./vim-editor";
import type { YankRegister } from "./yank-register";

const EDIT_ACTIONS: ReadonlySet<NavigationAction> = new Set<NavigationAction>([
  "EnterInsertMode",
  "EnterAppendMode",
  "OpenLineBelow",
  "OpenLineAbove",
  "EnterVisualMode",
  "EnterCommandMode",
  "EnterNormalMode",
  "ToggleViewEditMode",
  "ToggleEditingStyle",
  "InsertChar",
  "InsertNewline",
  "DeleteCharBefore",
  "DeleteChar",
  "DeleteLine",
  "DeleteOperator",
  "ReplaceChar",
  "Undo",
  "Redo",
  "YankOperator",
  "YankWord",
  "YankToLineEnd",
  "YankToLineStart",
  "Paste",
  "Cut",
]);

const VIM_MODE_ENTRY: ReadonlySet<NavigationAction> = new Set<NavigationAction>([
  "EnterInsertMode",
  "EnterAppendMode",
  "OpenLineBelow",
  "OpenLineAbove",
  "EnterVisualMode",
  "EnterCommandMode",
  "EnterNormalMode",
]);

export interface BoxContext {
  editingMode: EditingMode;
  vimMode: VimMode | null;
  viewMode: boolean;
  awaitingChar: boolean;
}

interface PaneBoxes {
  boxes: Box[];
  active: number;
}

export class BoxManager {
  private panes = new Map<PaneKind, PaneBoxes>();

  constructor(
    layout: Layout,
    private register: YankRegister,
    editingMode: EditingMode,
    private logger: Logger = silentLogger,
  ) {
    for (const pane of layout) {
      this.panes.set(pane.pane, {
        boxes: pane.boxes.map((spec) => createBox(spec, register, editingMode)),
        active: 0,
      });
    }
  }

  public getBoxes(pane: PaneKind): readonly Box[] {
    return this.panes.get(pane)?.boxes ?? [];
  }

  public getActiveBox(pane: PaneKind): Box | null {
    const entry = this.panes.get(pane);
    if (!entry) return null;
    return entry.boxes[entry.active] ?? null;
  }

  public findBox(id: string): { pane: PaneKind; box: Box } | null {
    for (const [pane, entry] of this.panes) {
      const box = entry.boxes.find((candidate) => candidate.id === id);
      if (box) return { pane, box };
    }
    return null;
  }

  public activate(pane: PaneKind, id: string): boolean {
    const entry = this.panes.get(pane);
    if (!entry) return false;
    const index = entry.boxes.findIndex((box) => box.id === id);
    if (index < 0) return false;
    entry.active = index;
    return true;
  }

  public focusKind(pane: PaneKind, kind: BoxKind): boolean {
    const entry = this.panes.get(pane);
    if (!entry) return false;
    const index = entry.boxes.findIndex((box) => box.kind === kind);
    if (index < 0 || index === entry.active) return false;
    entry.active = index;
    return true;
  }

  public cycle(pane: PaneKind, delta: number): boolean {
    const entry = this.panes.get(pane);
    if (!entry || entry.boxes.length < 2) return false;
    const count = entry.boxes.length;
    entry.active = (((entry.active + delta) % count) + count) % count;
    return true;
  }

  public context(box: Box): BoxContext {
    // browsing boxes have no modes, so letters stay free for global keys
    if (!supportsEditing(box)) {
      return {
        editingMode: box.editingMode,
        vimMode: null,
        viewMode: true,
        awaitingChar: false,
      };
    }
    return {
      editingMode: box.editingMode,
      vimMode: box.editingMode === "vim" ? box.editor.getMode() : null,
      viewMode: box.viewMode,
      awaitingChar: box.editor.isAwaitingChar(),
    };
  }

  public dispatch(
    action: NavigationAction,
    text: string | null,
    box: Box,
  ): Effect | null {
    if (!supportsEditing(box)) {
      return this.dispatchList(action, box);
    }
    if (action === "ToggleEditingStyle") {
      return this.toggleEditingStyle(box);
    }
    if (box.kind === "DataTable" && !box.editingCell) {
      return this.dispatchTable(action, box);
    }
    const effect =
      box.editingMode === "cursor"
        ? this.dispatchCursorStyle(action, text, box)
        : this.dispatchVimStyle(action, text, box);
    if (box.kind === "DataTable" && box.editingCell && box.editor.getMode() !== "insert") {
      return this.commitCell(box);
    }
    return effect;
  }

  public beginEditing(box: Box): void {
    if (!supportsEditing(box) || box.kind === "DataTable") return;
    box.editor.setMode("insert");
    box.viewMode = false;
  }

  private dispatchList(action: NavigationAction, box: ListBox): Effect | null {
    const list = listOf(box);
    switch (action) {
      case "CursorDown":
      case "CursorRight":
      case "CursorNextWord":
        return list.moveBy(1) ? this.cursorMoved(box) : NONE;
      case "CursorUp":
      case "CursorLeft":
      case "CursorPreviousWord":
        return list.moveBy(-1) ? this.cursorMoved(box) : NONE;
      case "CursorFirstLine":
      case "CursorLineStart":
        return list.moveBy(-list.getSelectedIndex()) ? this.cursorMoved(box) : NONE;
      case "CursorLastLine":
      case "CursorLineEnd":
        return list.moveBy(list.getItems().length) ? this.cursorMoved(box) : NONE;
      case "Copy":
      case "CopyRow":
      case "YankOperator": {
        const selected = list.getSelected();
        if (selected) this.register.set(selected.label);
        return NONE;
      }
      default:
        break;
    }
    if (EDIT_ACTIONS.has(action)) {
      this.logger.debug(`${action} ignored by non-editable box ${box.id}`);
      return NONE;
    }
    return null;
  }

  private dispatchTable(action: NavigationAction, box: DataTableBox): Effect | null {
    const { table } = box;
    const before = table.getCursor();
    switch (action) {
      case "CursorDown":
        table.moveBy(1, 0);
        break;
      case "CursorUp":
        table.moveBy(-1, 0);
        break;
      case "CursorRight":
      case "CursorNextWord":
        table.moveBy(0, 1);
        break;
      case "CursorLeft":
      case "CursorPreviousWord":
        table.moveBy(0, -1);
        break;
      case "CursorLineStart":
        table.moveToFirstColumn();
        break;
      case "CursorLineEnd":
        table.moveToLastColumn();
        break;
      case "CursorFirstLine":
        table.moveToFirstRow();
        break;
      case "CursorLastLine":
        table.moveToLastRow();
        break;
      case "Copy":
      case "YankOperator":
        this.register.set(table.cellText());
        return NONE;
      case "CopyRow":
        this.register.set(table.rowText());
        return NONE;
      case "EnterInsertMode":
      case "EnterAppendMode":
        return box.editingMode === "vim" ? this.loadCell(box) : NONE;
      case "ToggleViewEditMode":
        return this.loadCell(box);
      default:
        if (EDIT_ACTIONS.has(action)) {
          this.logger.debug(`${action} ignored outside a cell edit in ${box.id}`);
          return NONE;
        }
        return null;
    }
    const after = table.getCursor();
    if (after.row === before.row && after.col === before.col) return NONE;
    return this.cursorMoved(box);
  }

  private loadCell(box: DataTableBox): Effect {
    if (!box.table.cellRef()) return NONE;
    const previous = box.table.cellText();
    box.editor.setContent(previous, { row: 0, col: previous.length });
    box.editor.setMode("insert");
    box.editingCell = { previous };
    box.viewMode = false;
    return this.modeChanged(box);
  }

  private commitCell(box: DataTableBox): Effect {
    const previous = box.editingCell?.previous ?? "";
    const value = box.editor.getContent();
    box.editingCell = null;
    box.viewMode = true;
    box.editor.setMode("normal");
    if (value === previous) return this.modeChanged(box);
    box.table.setCellText(value);
    const cell = box.table.cellRef();
    if (!cell) return this.modeChanged(box);
    return { type: "RequestCellEdit", cell, previous };
  }

  private dispatchCursorStyle(
    action: NavigationAction,
    text: string | null,
    box: EditableBox,
  ): Effect | null {
    if (VIM_MODE_ENTRY.has(action)) {
      this.logger.debug(`${action} ignored in cursor style box ${box.id}`);
      return NONE;
    }
    if (action === "ToggleViewEditMode") {
      return this.setViewMode(box, !box.viewMode);
    }
    if (!box.viewMode && action === "Cancel") {
      return this.setViewMode(box, true);
    }
    if (action === "Confirm" && box.kind === "DataTable" && !box.viewMode) {
      return this.setViewMode(box, true);
    }
    const effect = this.fromResult(action, box, box.editor.apply(action, text));
    box.editor.setMode(box.viewMode ? "normal" : "insert");
    return effect;
  }

  private dispatchVimStyle(
    action: NavigationAction,
    text: string | null,
    box: EditableBox,
  ): Effect | null {
    if (action === "ToggleViewEditMode") {
      const target = box.editor.getMode() === "normal" ? "insert" : "normal";
      box.editor.setMode(target);
      box.viewMode = target === "normal";
      return this.modeChanged(box);
    }
    const result = box.editor.apply(action, text);
    box.viewMode = box.editor.getMode() !== "insert";
    return this.fromResult(action, box, result);
  }

  private setViewMode(box: EditableBox, viewMode: boolean): Effect {
    box.viewMode = viewMode;
    box.editor.setMode(viewMode ? "normal" : "insert");
    return this.modeChanged(box);
  }

  private toggleEditingStyle(box: EditableBox): Effect {
    if (box.editingMode === "vim") {
      box.editingMode = "cursor";
      box.viewMode = box.editor.getMode() !== "insert";
      box.editor.setMode(box.viewMode ? "normal" : "insert");
    } else {
      box.editingMode = "vim";
    }
    return this.modeChanged(box);
  }

  private fromResult(
    action: NavigationAction,
    box: EditableBox,
    result: EditResult,
  ): Effect | null {
    switch (result.kind) {
      case "ignored":
        if (EDIT_ACTIONS.has(action)) {
          this.logger.debug(`${action} ignored in ${box.id}`);
          return NONE;
        }
        return null;
      case "unchanged":
        return NONE;
      case "cursor":
        return this.cursorMoved(box);
      case "buffer":
        return { type: "BufferChanged", boxId: box.id };
      case "mode":
        return this.modeChanged(box);
      case "command":
        return { type: "RequestCommand", command: result.command };
    }
  }

  private cursorMoved(box: Box): Effect {
    return { type: "CursorMoved", boxId: box.id };
  }

  private modeChanged(box: EditableBox): Effect {
    return {
      type: "ModeChanged",
      boxId: box.id,
      vimMode: box.editingMode === "vim" ? box.editor.getMode() : null,
      viewMode: box.viewMode,
    };
  }
}
