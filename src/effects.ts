import type { CellRef } from "./table-model";
import type { FocusSnapshot, PageDirection, PaneKind, VimMode } from "./types";

export interface QuerySpec {
  table: string | null;
  columns: string[];
  where: string;
  orderBy: string;
}

export type ErrorSource = "query" | "lookup" | "schema";

/** Instructions for the application loop. The core never performs them itself. */
export type Effect =
  | { type: "None" }
  | { type: "FocusChanged"; focus: FocusSnapshot }
  | { type: "BufferChanged"; boxId: string }
  | { type: "CursorMoved"; boxId: string }
  | {
      type: "ModeChanged";
      boxId: string;
      vimMode: VimMode | null;
      viewMode: boolean;
    }
  | {
      type: "RequestQuery";
      requestId: number;
      connection: string | null;
      query: QuerySpec;
    }
  | { type: "RequestForeignKeyFollow"; requestId: number; cell: CellRef }
  | { type: "RequestSchema"; requestId: number; connection: string }
  | { type: "RequestCellEdit"; cell: CellRef; previous: string }
  | { type: "RequestPageChange"; direction: PageDirection }
  | { type: "RequestSort"; column: string }
  | { type: "RequestQuit" }
  | {
      type: "RequestConfirm";
      pane: PaneKind;
      boxId: string | null;
      choice: string | null;
    }
  | { type: "RequestCancel"; pane: PaneKind }
  | { type: "RequestSearch"; text: string }
  | { type: "RequestCommand"; command: string }
  | { type: "Error"; source: ErrorSource; message: string };

export const NONE: Effect = { type: "None" };

export const isNone = (effect: Effect): boolean => effect.type === "None";
