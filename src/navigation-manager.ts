import type { Box, ModalBox, ModalSpec } from "./boxes";
import { createModal, listOf, supportsEditing } from "./boxes";
import type { BoxManager } from "./box-manager";
import type { QueryResult, SchemaResult, TargetLocation } from "./completion-queue";
import type { Effect, QuerySpec } from "./effects";
import { NONE } from "./effects";
import type { Layout } from "./layout";
import { BOX_IDS, findNeighbor } from "./layout";
import type { Logger } from "./logger";
import { silentLogger } from "./logger";
import type { RequestTracker } from "./request-tracker";
import type {
  BoxKind,
  Direction,
  FocusSnapshot,
  NavigationAction,
  PageDirection,
  PaneKind,
} from "./types";

const PANE_FOCUS: Partial<Record<NavigationAction, PaneKind>> = {
  FocusConnections: "Connections",
  FocusQueryInput: "QueryInput",
  FocusResults: "Results",
  FocusSchemaExplorer: "SchemaExplorer",
  FocusCommandLine: "CommandLine",
};

const BOX_FOCUS: Partial<Record<NavigationAction, BoxKind>> = {
  FocusTextInput: "TextInput",
  FocusDataTable: "DataTable",
  FocusTreeView: "TreeView",
  FocusListView: "ListView",
};

const MOVES: Partial<Record<NavigationAction, Direction>> = {
  MoveLeft: "left",
  MoveRight: "right",
  MoveUp: "up",
  MoveDown: "down",
};

const PAGES: Partial<Record<NavigationAction, PageDirection>> = {
  FirstPage: "first",
  LastPage: "last",
  NextPage: "next",
  PreviousPage: "previous",
};

export class NavigationManager {
  private focusedPane: PaneKind;
  private modalStack: ModalBox[] = [];
  private connection: string | null = null;
  private schema: SchemaResult | null = null;
  private selectedTable: string | null = null;

  constructor(
    private layout: Layout,
    private boxes: BoxManager,
    private requests: RequestTracker,
    private options: {
      defaultPane: PaneKind;
      logger?: Logger;
    },
  ) {
    this.focusedPane = options.defaultPane;
  }

  private get logger(): Logger {
    return this.options.logger ?? silentLogger;
  }

  public getFocusedPane(): PaneKind {
    return this.focusedPane;
  }

  public targetBox(): Box | null {
    const modal = this.modalStack[this.modalStack.length - 1];
    if (modal) return modal;
    return this.boxes.getActiveBox(this.focusedPane);
  }

  public hasModal(): boolean {
    return this.modalStack.length > 0;
  }

  public currentFocus(): FocusSnapshot {
    const box = this.targetBox();
    if (!box) {
      return {
        pane: this.focusedPane,
        box: null,
        boxId: null,
        editingMode: null,
        vimMode: null,
        viewMode: null,
      };
    }
    const context = this.boxes.context(box);
    return {
      pane: this.focusedPane,
      box: box.kind,
      boxId: box.id,
      editingMode: context.editingMode,
      vimMode: context.vimMode,
      viewMode: context.viewMode,
    };
  }

  public pushModal(spec: ModalSpec): Effect {
    this.modalStack.push(createModal(spec));
    return this.focusChanged();
  }

  public setConnections(names: string[]): Effect {
    const found = this.boxes.findBox(BOX_IDS.connections);
    if (!found || found.box.kind !== "TreeView") return NONE;
    found.box.list.setItems(names.map((name) => ({ id: name, label: name })));
    return { type: "BufferChanged", boxId: found.box.id };
  }

  public dispatch(action: NavigationAction): Effect {
    if (this.hasModal()) return this.dispatchModal(action);

    const pane = PANE_FOCUS[action];
    if (pane) return this.focusPane(pane);

    const kind = BOX_FOCUS[action];
    if (kind) {
      return this.boxes.focusKind(this.focusedPane, kind) ? this.focusChanged() : NONE;
    }

    const direction = MOVES[action];
    if (direction) return this.move(direction);

    const page = PAGES[action];
    if (page) return { type: "RequestPageChange", direction: page };

    switch (action) {
      case "NextPane":
        return this.cyclePane(1);
      case "PreviousPane":
        return this.cyclePane(-1);
      case "NextBox":
        return this.boxes.cycle(this.focusedPane, 1) ? this.focusChanged() : NONE;
      case "PreviousBox":
        return this.boxes.cycle(this.focusedPane, -1) ? this.focusChanged() : NONE;
      case "Confirm":
        return this.confirm();
      case "Cancel":
        return { type: "RequestCancel", pane: this.focusedPane };
      case "Quit":
        return { type: "RequestQuit" };
      case "Search":
        return this.search();
      case "FollowForeignKey":
        return this.followForeignKey();
      case "SortByColumn":
        return this.sort();
      default:
        this.logger.debug(`${action} has no effect in ${this.focusedPane}`);
        return NONE;
    }
  }

  public applyQueryResult(result: QueryResult): Effect {
    const found = this.boxes.findBox(BOX_IDS.results);
    if (!found || found.box.kind !== "DataTable") return NONE;
    found.box.table.setData(result);
    return { type: "BufferChanged", boxId: found.box.id };
  }

  public applySchema(result: SchemaResult): Effect {
    this.schema = result;
    const found = this.boxes.findBox(BOX_IDS.schemaTables);
    if (!found || found.box.kind !== "TreeView") return NONE;
    found.box.list.setItems(result.tables.map((name) => ({ id: name, label: name })));
    return { type: "BufferChanged", boxId: found.box.id };
  }

  public applyLookup(target: TargetLocation): Effect {
    this.modalStack = [];
    this.focusedPane = target.pane;
    if (target.boxId) this.boxes.activate(target.pane, target.boxId);
    const box = this.boxes.getActiveBox(target.pane);
    if (box?.kind === "DataTable" && target.row !== undefined) {
      const columns = box.table.getColumns();
      const col = target.column ? Math.max(0, columns.indexOf(target.column)) : 0;
      box.table.setCursor(target.row, col);
    }
    if (target.table) this.selectedTable = target.table;
    return this.focusChanged();
  }

  private dispatchModal(action: NavigationAction): Effect {
    switch (action) {
      case "Confirm": {
        const modal = this.modalStack.pop();
        if (!modal) return NONE;
        return {
          type: "RequestConfirm",
          pane: this.focusedPane,
          boxId: modal.id,
          choice: listOf(modal).getSelected()?.label ?? null,
        };
      }
      case "Cancel":
        this.modalStack.pop();
        return this.focusChanged();
      case "Quit":
        return { type: "RequestQuit" };
      default:
        this.logger.debug(`${action} blocked by an open dialog`);
        return NONE;
    }
  }

  private focusPane(pane: PaneKind): Effect {
    if (pane === this.focusedPane) return NONE;
    this.focusedPane = pane;
    return this.focusChanged();
  }

  private cyclePane(delta: number): Effect {
    const order = this.layout.map((entry) => entry.pane);
    const index = order.indexOf(this.focusedPane);
    const count = order.length;
    const next = order[(((index + delta) % count) + count) % count];
    return next ? this.focusPane(next) : NONE;
  }

  private move(direction: Direction): Effect {
    const current = this.boxes.getActiveBox(this.focusedPane);
    if (current) {
      const siblings = this.boxes
        .getBoxes(this.focusedPane)
        .filter((box) => box !== current)
        .map((box) => ({ item: box, rect: box.rect }));
      const sibling = findNeighbor(current.rect, direction, siblings);
      if (sibling) {
        this.boxes.activate(this.focusedPane, sibling.id);
        return this.focusChanged();
      }
    }

    const origin = this.layout.find((entry) => entry.pane === this.focusedPane);
    if (!origin) return NONE;
    const candidates = this.layout
      .filter((entry) => entry.pane !== this.focusedPane)
      .map((entry) => ({ item: entry.pane, rect: entry.rect }));
    const target = findNeighbor(origin.rect, direction, candidates);
    if (!target) {
      this.logger.debug(`no pane ${direction} of ${this.focusedPane}`);
      return NONE;
    }
    return this.focusPane(target);
  }

  private confirm(): Effect {
    const box = this.boxes.getActiveBox(this.focusedPane);
    switch (this.focusedPane) {
      case "Connections": {
        const selected = box && box.kind === "TreeView" ? box.list.getSelected() : null;
        if (!selected) return NONE;
        this.connection = selected.id;
        return {
          type: "RequestSchema",
          requestId: this.requests.issue("schema"),
          connection: selected.id,
        };
      }
      case "SchemaExplorer":
        if (box?.id === BOX_IDS.schemaTables && box.kind === "TreeView") {
          const selected = box.list.getSelected();
          if (!selected) return NONE;
          this.selectTable(selected.id);
          return this.requestQuery();
        }
        break;
      case "QueryInput":
        return this.requestQuery();
      default:
        break;
    }
    return {
      type: "RequestConfirm",
      pane: this.focusedPane,
      boxId: box?.id ?? null,
      choice: box && box.kind !== "TextInput" && box.kind !== "DataTable"
        ? listOf(box).getSelected()?.label ?? null
        : null,
    };
  }

  private selectTable(table: string): void {
    this.selectedTable = table;
    const found = this.boxes.findBox(BOX_IDS.schemaColumns);
    if (!found || found.box.kind !== "ListView") return;
    const columns = this.schema?.columns[table] ?? [];
    found.box.list.setItems(columns.map((name) => ({ id: name, label: name })));
  }

  private requestQuery(): Effect {
    return {
      type: "RequestQuery",
      requestId: this.requests.issue("query"),
      connection: this.connection,
      query: this.buildQuery(),
    };
  }

  private buildQuery(): QuerySpec {
    const table = this.selectedTable;
    return {
      table,
      columns: table ? [...(this.schema?.columns[table] ?? [])] : [],
      where: this.textOf(BOX_IDS.where),
      orderBy: this.textOf(BOX_IDS.orderBy),
    };
  }

  private textOf(id: string): string {
    const found = this.boxes.findBox(id);
    if (!found || !supportsEditing(found.box)) return "";
    return found.box.editor.getContent();
  }

  private search(): Effect {
    const found = this.boxes.findBox(BOX_IDS.where);
    if (!found) return NONE;
    this.focusedPane = found.pane;
    this.boxes.activate(found.pane, found.box.id);
    this.boxes.beginEditing(found.box);
    return { type: "RequestSearch", text: this.textOf(BOX_IDS.where) };
  }

  private followForeignKey(): Effect {
    const box = this.boxes.getActiveBox(this.focusedPane);
    if (box?.kind !== "DataTable") return NONE;
    const cell = box.table.cellRef();
    if (!cell) return NONE;
    return {
      type: "RequestForeignKeyFollow",
      requestId: this.requests.issue("lookup"),
      cell,
    };
  }

  private sort(): Effect {
    const box = this.boxes.getActiveBox(this.focusedPane);
    if (box?.kind !== "DataTable") return NONE;
    const column = box.table.currentColumn();
    return column ? { type: "RequestSort", column } : NONE;
  }

  private focusChanged(): Effect {
    return { type: "FocusChanged", focus: this.currentFocus() };
  }
}
