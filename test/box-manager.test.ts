import { expect, test } from "vitest";
import type { DataTableBox, TextInputBox, TreeViewBox } from "../src/boxes";
import { BoxManager } from "../src/box-manager";
import { DEFAULT_LAYOUT } from "../src/layout";
import type { EditingMode } from "../src/types";
import { YankRegister } from "../src/yank-register";

function makeManager(editingMode: EditingMode = "vim", register = new YankRegister()) {
  return new BoxManager(DEFAULT_LAYOUT, register, editingMode);
}

function textInput(manager: BoxManager, id: string): TextInputBox {
  const found = manager.findBox(id)?.box;
  if (found?.kind !== "TextInput") throw new Error(`no text input ${id}`);
  return found;
}

function results(manager: BoxManager): DataTableBox {
  const found = manager.findBox("results")?.box;
  if (found?.kind !== "DataTable") throw new Error("no results table");
  found.table.setData({
    table: "users",
    columns: ["id", "name"],
    rows: [
      ["1", "Ada"],
      ["2", "Grace"],
    ],
  });
  return found;
}

function connections(manager: BoxManager): TreeViewBox {
  const found = manager.findBox("connections")?.box;
  if (found?.kind !== "TreeView") throw new Error("no connections tree");
  return found;
}

test("vim text inputs start in normal view mode", () => {
  const manager = makeManager("vim");
  expect(manager.context(textInput(manager, "where"))).toEqual({
    editingMode: "vim",
    vimMode: "normal",
    viewMode: true,
    awaitingChar: false,
  });
});

test("cursor text inputs start in edit mode", () => {
  const manager = makeManager("cursor");
  const box = textInput(manager, "where");
  expect(manager.context(box)).toEqual({
    editingMode: "cursor",
    vimMode: null,
    viewMode: false,
    awaitingChar: false,
  });
  expect(box.editor.getMode()).toBe("insert");
});

test("browsing boxes report cursor style with no vim mode", () => {
  const manager = makeManager("vim");
  expect(manager.context(connections(manager))).toEqual({
    editingMode: "cursor",
    vimMode: null,
    viewMode: true,
    awaitingChar: false,
  });
});

test("cursor style typing, cancel and toggle", () => {
  const manager = makeManager("cursor");
  const box = textInput(manager, "where");

  expect(manager.dispatch("InsertChar", "x", box)).toEqual({
    type: "BufferChanged",
    boxId: "where",
  });
  expect(manager.dispatch("Cancel", null, box)).toEqual({
    type: "ModeChanged",
    boxId: "where",
    vimMode: null,
    viewMode: true,
  });
  expect(manager.dispatch("EnterInsertMode", null, box)).toEqual({ type: "None" });
  expect(manager.dispatch("ToggleViewEditMode", null, box)).toEqual({
    type: "ModeChanged",
    boxId: "where",
    vimMode: null,
    viewMode: false,
  });
  expect(box.editor.getContent()).toBe("x");
});

test("vim toggle between view and edit follows normal and insert", () => {
  const manager = makeManager("vim");
  const box = textInput(manager, "where");
  expect(manager.dispatch("ToggleViewEditMode", null, box)).toEqual({
    type: "ModeChanged",
    boxId: "where",
    vimMode: "insert",
    viewMode: false,
  });
  expect(manager.dispatch("Cancel", null, box)).toEqual({
    type: "ModeChanged",
    boxId: "where",
    vimMode: "normal",
    viewMode: true,
  });
});

test("switching editing style keeps the text and leaves vim modes", () => {
  const manager = makeManager("vim");
  const box = textInput(manager, "where");
  expect(manager.dispatch("ToggleEditingStyle", null, box)).toEqual({
    type: "ModeChanged",
    boxId: "where",
    vimMode: null,
    viewMode: true,
  });
  expect(box.editingMode).toBe("cursor");
});

test("command line entries surface as command requests", () => {
  const manager = makeManager("vim");
  const box = textInput(manager, "where");
  expect(manager.dispatch("EnterCommandMode", null, box)).toEqual({
    type: "ModeChanged",
    boxId: "where",
    vimMode: "command",
    viewMode: true,
  });
  expect(manager.dispatch("InsertChar", "q", box)).toEqual({
    type: "BufferChanged",
    boxId: "where",
  });
  expect(manager.dispatch("Confirm", null, box)).toEqual({
    type: "RequestCommand",
    command: "q",
  });
});

test("actions a text input ignores fall through to navigation", () => {
  const manager = makeManager("vim");
  const box = textInput(manager, "where");
  expect(manager.dispatch("FocusResults", null, box)).toBeNull();
  expect(manager.dispatch("Confirm", null, box)).toBeNull();
});

test("list boxes move their selection and ignore edits", () => {
  const register = new YankRegister();
  const manager = makeManager("vim", register);
  const box = connections(manager);
  box.list.setItems([
    { id: "local", label: "local" },
    { id: "staging", label: "staging" },
  ]);

  expect(manager.dispatch("CursorDown", null, box)).toEqual({
    type: "CursorMoved",
    boxId: "connections",
  });
  expect(manager.dispatch("CursorDown", null, box)).toEqual({ type: "None" });
  expect(manager.dispatch("InsertChar", "z", box)).toEqual({ type: "None" });
  expect(manager.dispatch("Confirm", null, box)).toBeNull();

  manager.dispatch("Copy", null, box);
  expect(register.get()).toBe("staging");
});

test("table motions move the cell cursor and copy cells or rows", () => {
  const register = new YankRegister();
  const manager = makeManager("vim", register);
  const box = results(manager);

  expect(manager.dispatch("CursorRight", null, box)).toEqual({
    type: "CursorMoved",
    boxId: "results",
  });
  expect(manager.dispatch("CursorRight", null, box)).toEqual({ type: "None" });
  manager.dispatch("Copy", null, box);
  expect(register.get()).toBe("Ada");

  manager.dispatch("CursorLastLine", null, box);
  manager.dispatch("CopyRow", null, box);
  expect(register.get()).toBe("2\tGrace");
  expect(box.table.getCursor()).toEqual({ row: 1, col: 1 });
});

test("editing a cell in vim style emits a cell edit on leaving insert", () => {
  const manager = makeManager("vim");
  const box = results(manager);

  expect(manager.dispatch("EnterInsertMode", null, box)).toEqual({
    type: "ModeChanged",
    boxId: "results",
    vimMode: "insert",
    viewMode: false,
  });
  expect(manager.dispatch("InsertChar", "0", box)).toEqual({
    type: "BufferChanged",
    boxId: "results",
  });
  expect(manager.dispatch("Cancel", null, box)).toEqual({
    type: "RequestCellEdit",
    cell: { table: "users", column: "id", row: 0, value: "10" },
    previous: "1",
  });
  expect(box.table.cellText()).toBe("10");
  expect(box.editingCell).toBeNull();
  expect(box.viewMode).toBe(true);
});

test("leaving a cell unchanged only reports the mode", () => {
  const manager = makeManager("vim");
  const box = results(manager);
  manager.dispatch("EnterInsertMode", null, box);
  expect(manager.dispatch("Cancel", null, box)).toEqual({
    type: "ModeChanged",
    boxId: "results",
    vimMode: "normal",
    viewMode: true,
  });
});

test("cursor style cell edits commit on confirm", () => {
  const manager = makeManager("cursor");
  const box = results(manager);

  expect(manager.dispatch("EnterInsertMode", null, box)).toEqual({ type: "None" });
  expect(manager.dispatch("ToggleViewEditMode", null, box)).toEqual({
    type: "ModeChanged",
    boxId: "results",
    vimMode: null,
    viewMode: false,
  });
  manager.dispatch("InsertChar", "5", box);
  expect(manager.dispatch("Confirm", null, box)).toEqual({
    type: "RequestCellEdit",
    cell: { table: "users", column: "id", row: 0, value: "15" },
    previous: "1",
  });
});

test("an empty table has no cell to edit", () => {
  const manager = makeManager("vim");
  const found = manager.findBox("results")?.box;
  if (found?.kind !== "DataTable") throw new Error("no results table");
  expect(manager.dispatch("EnterInsertMode", null, found)).toEqual({ type: "None" });
  expect(found.editingCell).toBeNull();
});

test("boxes cycle within a pane and focus by kind", () => {
  const manager = makeManager("vim");
  expect(manager.getActiveBox("QueryInput")?.id).toBe("where");
  expect(manager.cycle("QueryInput", 1)).toBe(true);
  expect(manager.getActiveBox("QueryInput")?.id).toBe("order-by");
  expect(manager.cycle("QueryInput", 1)).toBe(true);
  expect(manager.getActiveBox("QueryInput")?.id).toBe("where");
  expect(manager.cycle("Results", 1)).toBe(false);

  expect(manager.focusKind("SchemaExplorer", "ListView")).toBe(true);
  expect(manager.focusKind("SchemaExplorer", "ListView")).toBe(false);
  expect(manager.getActiveBox("CommandLine")).toBeNull();
});
