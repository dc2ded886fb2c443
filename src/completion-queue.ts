import type { RequestKind } from "./request-tracker";
import type { TableData } from "./table-model";
import type { PaneKind } from "./types";

export type QueryResult = TableData;

export interface TargetLocation {
  pane: PaneKind;
  boxId?: string;
  table?: string;
  row?: number;
  column?: string;
}

export interface SchemaResult {
  tables: string[];
  columns: Record<string, string[]>;
}

interface CompletionBase<K extends RequestKind, T> {
  kind: K;
  requestId: number;
  result: T | Error;
}

export type Completion =
  | CompletionBase<"query", QueryResult>
  | CompletionBase<"lookup", TargetLocation>
  | CompletionBase<"schema", SchemaResult>;

export class CompletionQueue {
  private pending: Completion[] = [];

  public post(completion: Completion): void {
    this.pending.push(completion);
  }

  public drain(): Completion[] {
    const drained = this.pending;
    this.pending = [];
    return drained;
  }
}
