export type RequestKind = "query" | "lookup" | "schema";

export class RequestTracker {
  private nextId = 1;
  private latest = new Map<RequestKind, number>();

  public issue(kind: RequestKind): number {
    const id = this.nextId;
    this.nextId += 1;
    this.latest.set(kind, id);
    return id;
  }

  public isCurrent(kind: RequestKind, id: number): boolean {
    return this.latest.get(kind) === id;
  }

  /** Marks a request as answered. Returns false when it was superseded. */
  public settle(kind: RequestKind, id: number): boolean {
    if (!this.isCurrent(kind, id)) return false;
    this.latest.delete(kind);
    return true;
  }
}
