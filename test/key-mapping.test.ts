import { expect, test } from "vitest";
import {
  buildKeyMapping,
  createDefaultKeyMapping,
} from "../src/default-key-mapping";
import type { KeyMappingOverlay, KeyTable } from "../src/key-mapping";
import {
  PANE_MODIFIERS,
  composePaneModifierChords,
  mergeKeyMappings,
} from "../src/key-mapping";

function entries(table: KeyTable): Array<[string, string]> {
  return [...table.entries()].sort(([a], [b]) => a.localeCompare(b));
}

test("defaults carry the documented global bindings", () => {
  const mapping = createDefaultKeyMapping();
  expect(mapping.global.get("c")).toBe("FocusConnections");
  expect(mapping.global.get("Ctrl+q")).toBe("Quit");
  expect(mapping.panes.Results.get("Shift+g")).toBe("LastPage");
  expect(mapping.vim.normal.get("Shift+d")).toBe("DeleteLine");
});

test("user entries override defaults and null unbinds", () => {
  const base = createDefaultKeyMapping();
  const merged = mergeKeyMappings(base, {
    global: { "Ctrl+q": null, "ctrl+w": "Quit" },
    vim: { normal: { x: "DeleteLine" } },
  });

  expect(merged.global.get("Ctrl+q")).toBeUndefined();
  expect(merged.global.get("Ctrl+w")).toBe("Quit");
  expect(merged.vim.normal.get("x")).toBe("DeleteLine");
  expect(base.global.get("Ctrl+q")).toBe("Quit");
  expect(base.vim.normal.get("x")).toBe("DeleteChar");
});

test("applying the same overlay twice gives the same tables", () => {
  const overlay: KeyMappingOverlay = {
    global: { F2: "Search", "/": null },
    panes: { Results: { n: "NextPage" } },
    cursor: { edit: { "Ctrl+s": "Confirm" } },
  };
  const once = mergeKeyMappings(createDefaultKeyMapping(), overlay);
  const twice = mergeKeyMappings(once, overlay);

  expect(entries(twice.global)).toEqual(entries(once.global));
  expect(entries(twice.panes.Results)).toEqual(entries(once.panes.Results));
  expect(entries(twice.cursor.edit)).toEqual(entries(once.cursor.edit));
  expect(entries(twice.vim.normal)).toEqual(entries(once.vim.normal));
});

test("pane modifier composes the movement chords", () => {
  const composed = composePaneModifierChords("Ctrl");
  expect(composed.get("Ctrl+h")).toBe("MoveLeft");
  expect(composed.get("Ctrl+l")).toBe("MoveRight");
  expect(composed.get("Ctrl+n")).toBe("NextPane");
  expect(composed.get("Ctrl+f")).toBe("FollowForeignKey");
  expect(composed.size).toBe(7);
});

test("default tables collide with no pane modifier", () => {
  for (const modifier of PANE_MODIFIERS) {
    expect(buildKeyMapping({}, modifier).collisions).toEqual([]);
  }
});

test("explicit chords shadowing composed ones are reported", () => {
  const { collisions } = buildKeyMapping(
    { global: { "Shift+l": "Quit" } },
    "Shift",
  );
  expect(collisions).toEqual([
    { chord: "Shift+l", scope: "global", kept: "Quit", shadowed: "MoveRight" },
  ]);
});
