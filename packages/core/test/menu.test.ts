import { describe, expect, test } from "vitest";

import { buildJumpMenus, renderJumpMenu } from "../src/menu/emit.js";
import { makeLabels, numberedLabels } from "./helpers.js";

const OPTS = { mainLabel: "main_index", pagePrefix: "index_", pageSize: 20 };

function jumpTargets(text: string): string[] {
  return Array.from(text.matchAll(/^ {12}jump (\S+)$/gm), (m) => m[1] ?? "");
}

describe("renderJumpMenu", () => {
  test("renders one caption and jump per entry", () => {
    const text = renderJumpMenu("main_index", [
      { caption: "start", target: "start" },
      { caption: "Say \"hi\"", target: "hi" },
    ]);

    expect(text).toBe(
      [
        "label main_index:",
        "",
        "    menu:",
        '        "start":',
        "            jump start",
        "",
        '        "Say \\"hi\\"":',
        "            jump hi",
        "",
        "",
      ].join("\n"),
    );
  });

  test("renders pass for an empty menu", () => {
    expect(renderJumpMenu("main_index", [])).toBe("label main_index:\n\n    pass\n");
  });
});

describe("buildJumpMenus", () => {
  test("lists labels directly when they fit on one page", () => {
    const menus = buildJumpMenus(makeLabels(["start", "chapter_2", "ending"]), OPTS);

    expect(menus.pages).toEqual([]);
    expect(menus.generatedLabels).toEqual(["main_index"]);
    expect(jumpTargets(menus.main)).toEqual(["start", "chapter_2", "ending"]);
  });

  test("splits 25 labels into a main menu and two page files", () => {
    const menus = buildJumpMenus(numberedLabels(25), OPTS);

    expect(menus.generatedLabels).toEqual(["main_index", "index_1", "index_2"]);
    expect(menus.pages.map((p) => p.fileName)).toEqual(["index_1.rpy", "index_2.rpy"]);
    expect(menus.main).toBe(
      [
        "label main_index:",
        "",
        "    menu:",
        '        "label_1 - label_20":',
        "            jump index_1",
        "",
        '        "label_21 - label_25":',
        "            jump index_2",
        "",
        "",
      ].join("\n"),
    );

    const first = menus.pages[0]?.content ?? "";
    expect(first.startsWith('label index_1:\n\n    menu:\n        "< BACK":\n            jump main_index\n\n        "label_1":\n')).toBe(
      true,
    );
    expect(first.endsWith('        "NEXT >":\n            jump index_2\n\n')).toBe(true);
    expect(first).not.toContain("< PREV");

    const second = menus.pages[1]?.content ?? "";
    expect(jumpTargets(second)).toEqual(["main_index", "index_1", "label_21", "label_22", "label_23", "label_24", "label_25"]);
    expect(second).not.toContain("NEXT >");
  });

  test("uses the single name as caption of a one-label page", () => {
    const menus = buildJumpMenus(numberedLabels(21), OPTS);
    expect(menus.main).toContain('        "label_21":\n            jump index_2\n');
  });

  test("references every label exactly once across the menu tree", () => {
    for (const n of [1, 5, 20, 21, 45, 100]) {
      const labels = numberedLabels(n, "scene");
      const menus = buildJumpMenus(labels, { ...OPTS, pageSize: 7 });
      const navigation = new Set(menus.generatedLabels);
      const targets = [menus.main, ...menus.pages.map((p) => p.content)]
        .flatMap(jumpTargets)
        .filter((t) => !navigation.has(t));

      expect(targets).toEqual(labels.map((l) => l.name));
    }
  });
});
