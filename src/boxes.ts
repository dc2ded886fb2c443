import type { ListItem } from "./list-model";
import { ListModel } from "./list-model";
import { TableModel } from "./table-model";
import type { BoxKind, EditingMode, Rect } from "./types";
import { VimEditor } from "./vim-editor";
import type { YankRegister } from "./yank-register";

interface BoxBase {
  id: string;
  rect: Rect;
  editingMode: EditingMode;
  /** true = view, false = edit */
  viewMode: boolean;
}

export interface TextInputBox extends BoxBase {
  kind: "TextInput";
  editor: VimEditor;
}

export interface DataTableBox extends BoxBase {
  kind: "DataTable";
  editor: VimEditor;
  table: TableModel;
  editingCell: { previous: string } | null;
}

export interface TreeViewBox extends BoxBase {
  kind: "TreeView";
  list: ListModel;
}

export interface ListViewBox extends BoxBase {
  kind: "ListView";
  list: ListModel;
}

export interface ModalBox extends BoxBase {
  kind: "Modal";
  title: string;
  message: string;
  choices: ListModel;
}

export type Box = TextInputBox | DataTableBox | TreeViewBox | ListViewBox | ModalBox;

export type EditableBox = TextInputBox | DataTableBox;

export type ListBox = TreeViewBox | ListViewBox | ModalBox;

export interface ModalSpec {
  id: string;
  title: string;
  message: string;
  choices: string[];
}

export const MODAL_RECT: Rect = { x: 30, y: 10, width: 40, height: 10 };

export const supportsEditing = (box: Box): box is EditableBox =>
  box.kind === "TextInput" || box.kind === "DataTable";

export const listOf = (box: ListBox): ListModel =>
  box.kind === "Modal" ? box.choices : box.list;

export interface BoxSpec {
  id: string;
  kind: Exclude<BoxKind, "Modal">;
  rect: Rect;
}

export const createBox = (
  spec: BoxSpec,
  register: YankRegister,
  editingMode: EditingMode,
): Box => {
  const base = { id: spec.id, rect: { ...spec.rect }, editingMode };
  const browsing = { ...base, editingMode: "cursor" as const, viewMode: true };
  switch (spec.kind) {
    case "TextInput": {
      const editor = new VimEditor({ register });
      if (editingMode === "cursor") editor.setMode("insert");
      return {
        ...base,
        kind: "TextInput",
        viewMode: editingMode === "vim",
        editor,
      };
    }
    case "DataTable":
      return {
        ...base,
        kind: "DataTable",
        viewMode: true,
        editor: new VimEditor({ register }),
        table: new TableModel(),
        editingCell: null,
      };
    case "TreeView":
      return { ...browsing, kind: "TreeView", list: new ListModel() };
    case "ListView":
      return { ...browsing, kind: "ListView", list: new ListModel() };
  }
};

export const createModal = (spec: ModalSpec): ModalBox => {
  const choices: ListItem[] = spec.choices.map((label) => ({ id: label, label }));
  return {
    id: spec.id,
    rect: { ...MODAL_RECT },
    editingMode: "cursor",
    viewMode: true,
    kind: "Modal",
    title: spec.title,
    message: spec.message,
    choices: new ListModel(choices),
  };
};
