import type { BoxSpec } from "./boxes";
import type { Direction, PaneKind, Rect } from "./types";

export interface PaneLayout {
  pane: PaneKind;
  rect: Rect;
  boxes: BoxSpec[];
}

export type Layout = readonly PaneLayout[];

export const DEFAULT_LAYOUT: Layout = [
  {
    pane: "Connections",
    rect: { x: 0, y: 0, width: 20, height: 12 },
    boxes: [
      {
        id: "connections",
        kind: "TreeView",
        rect: { x: 0, y: 0, width: 20, height: 12 },
      },
    ],
  },
  {
    pane: "QueryInput",
    rect: { x: 20, y: 0, width: 80, height: 6 },
    boxes: [
      { id: "where", kind: "TextInput", rect: { x: 20, y: 0, width: 80, height: 3 } },
      { id: "order-by", kind: "TextInput", rect: { x: 20, y: 3, width: 80, height: 3 } },
    ],
  },
  {
    pane: "Results",
    rect: { x: 20, y: 6, width: 80, height: 22 },
    boxes: [
      { id: "results", kind: "DataTable", rect: { x: 20, y: 6, width: 80, height: 22 } },
    ],
  },
  {
    pane: "SchemaExplorer",
    rect: { x: 0, y: 12, width: 20, height: 16 },
    boxes: [
      {
        id: "schema-tables",
        kind: "TreeView",
        rect: { x: 0, y: 12, width: 20, height: 10 },
      },
      {
        id: "schema-columns",
        kind: "ListView",
        rect: { x: 0, y: 22, width: 20, height: 6 },
      },
    ],
  },
  {
    pane: "CommandLine",
    rect: { x: 0, y: 28, width: 100, height: 2 },
    boxes: [],
  },
];

export interface Candidate<T> {
  item: T;
  rect: Rect;
}

const span = (rect: Rect, horizontal: boolean): [number, number] =>
  horizontal ? [rect.x, rect.x + rect.width] : [rect.y, rect.y + rect.height];

const centre = (rect: Rect, horizontal: boolean): number => {
  const [start, end] = span(rect, horizontal);
  return (start + end) / 2;
};

const gapInDirection = (from: Rect, to: Rect, direction: Direction): number | null => {
  const horizontal = direction === "left" || direction === "right";
  const [fromStart, fromEnd] = span(from, horizontal);
  const [toStart, toEnd] = span(to, horizontal);
  const forward = direction === "right" || direction === "down";
  const gap = forward ? toStart - fromEnd : fromStart - toEnd;
  return gap >= 0 ? gap : null;
};

const overlaps = (a: Rect, b: Rect, horizontal: boolean): boolean => {
  const [aStart, aEnd] = span(a, horizontal);
  const [bStart, bEnd] = span(b, horizontal);
  return Math.min(aEnd, bEnd) > Math.max(aStart, bStart);
};

/**
 * Nearest candidate in a direction. Candidates sharing the perpendicular
 * axis come first, then the smallest gap, then the smallest centre offset,
 * then declaration order. Never wraps around.
 */
export const findNeighbor = <T>(
  from: Rect,
  direction: Direction,
  candidates: readonly Candidate<T>[],
): T | null => {
  const perpendicularIsHorizontal = direction === "up" || direction === "down";
  let best: { item: T; key: [number, number, number] } | null = null;

  for (const candidate of candidates) {
    const gap = gapInDirection(from, candidate.rect, direction);
    if (gap === null) continue;
    const key: [number, number, number] = [
      overlaps(from, candidate.rect, perpendicularIsHorizontal) ? 0 : 1,
      gap,
      Math.abs(
        centre(from, perpendicularIsHorizontal) -
          centre(candidate.rect, perpendicularIsHorizontal),
      ),
    ];
    if (!best || compareKeys(key, best.key) < 0) {
      best = { item: candidate.item, key };
    }
  }

  return best ? best.item : null;
};

const compareKeys = (
  a: [number, number, number],
  b: [number, number, number],
): number => a[0] - b[0] || a[1] - b[1] || a[2] - b[2];

export const BOX_IDS = {
  connections: "connections",
  where: "where",
  orderBy: "order-by",
  results: "results",
  schemaTables: "schema-tables",
  schemaColumns: "schema-columns",
} as const;
