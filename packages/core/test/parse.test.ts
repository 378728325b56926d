import { describe, expect, test } from "vitest";

import { StructuralOrderError } from "../src/errors.js";
import { classifyLine, parseScreenplay } from "../src/screenplay/parse.js";
import { sourceFile } from "./helpers.js";

describe("classifyLine", () => {
  test.each([
    ["", { kind: "blank" }],
    ["   ", { kind: "blank" }],
    ["# note to self", { kind: "comment" }],
    ["// note to self", { kind: "comment" }],
    ["== Chapter Two ==", { kind: "label", name: "Chapter_Two" }],
    ["=== 2nd act ===", { kind: "label", name: "label_2nd_act" }],
    ["@scene bg room", { kind: "directive", statement: "scene bg room" }],
    ["@play music \"theme.ogg\" fadein 1.0", { kind: "directive", statement: 'play music "theme.ogg" fadein 1.0' }],
    ["@return", { kind: "directive", statement: "return" }],
    ["INT. CLASSROOM - DAY", { kind: "heading", text: "INT. CLASSROOM - DAY" }],
    ["SCENE 3", { kind: "heading", text: "SCENE 3" }],
    ["Me: Hello.", { kind: "dialogue", speaker: "Me", text: "Hello." }],
    ["  Old  Man :   Get off my lawn!  ", { kind: "dialogue", speaker: "Old Man", text: "Get off my lawn!" }],
    ["Boy (V.O.): Hey.", { kind: "dialogue", speaker: "Boy", text: "Hey." }],
    ["Girl:", { kind: "dialogue", speaker: "Girl", text: "" }],
    [": The wind howls.", { kind: "dialogue", speaker: null, text: "The wind howls." }],
    [":", { kind: "blank" }],
    [":: ", { kind: "blank" }],
  ])("%j", (line, expected) => {
    expect(classifyLine(line)).toEqual(expected);
  });

  test.each([
    "It was 10:30 already.",
    "Everyone in the room slowly turned around to look: nobody spoke.",
    "...: hmm",
    "@dance wildly",
    "Interesting times.",
  ])("treats %j as free text", (line) => {
    expect(classifyLine(line)).toEqual({ kind: "text", text: line });
  });
});

describe("parseScreenplay", () => {
  test("keeps dialogue order and speakers", () => {
    const parsed = parseScreenplay(sourceFile("intro.txt", "Me: Hello.\nGirl: Hi!\n"), { implicitLabel: "intro" });

    expect(parsed.errors).toEqual([]);
    expect(parsed.speakers).toEqual(["Me", "Girl"]);
    expect(parsed.elements).toEqual([
      { kind: "dialogue", speaker: "Me", text: "Hello.", line: 1 },
      { kind: "dialogue", speaker: "Girl", text: "Hi!", line: 2 },
    ]);
  });

  test("joins unrecognised lines onto the open dialogue until a paragraph break", () => {
    const text = [
      "Me: Hello",
      "there, friend.",
      "",
      "A quiet room.",
      "It is late.",
      "@scene bg room",
      "The end.",
    ].join("\n");

    const parsed = parseScreenplay(sourceFile("a.txt", text), { implicitLabel: "a" });

    expect(parsed.elements).toEqual([
      { kind: "dialogue", speaker: "Me", text: "Hello there, friend.", line: 1 },
      { kind: "dialogue", speaker: null, text: "A quiet room. It is late.", line: 4 },
      { kind: "directive", statement: "scene bg room", line: 6 },
      { kind: "dialogue", speaker: null, text: "The end.", line: 7 },
    ]);
  });

  test("a bare colon emits nothing and ends the paragraph", () => {
    const parsed = parseScreenplay(sourceFile("a.txt", "Me: One\n:\ntwo"), { implicitLabel: "a" });
    expect(parsed.elements).toEqual([
      { kind: "dialogue", speaker: "Me", text: "One", line: 1 },
      { kind: "dialogue", speaker: null, text: "two", line: 3 },
    ]);
  });

  test("comments do not break a paragraph", () => {
    const parsed = parseScreenplay(sourceFile("a.txt", "Me: One\n# aside\ntwo"), { implicitLabel: "a" });
    expect(parsed.elements).toEqual([{ kind: "dialogue", speaker: "Me", text: "One two", line: 1 }]);
  });

  test("fills an empty line of dialogue from its continuation", () => {
    const parsed = parseScreenplay(sourceFile("a.txt", "Girl:\nWell..."), { implicitLabel: "a" });
    expect(parsed.elements).toEqual([{ kind: "dialogue", speaker: "Girl", text: "Well...", line: 1 }]);
  });

  test("label markers and headings close the open dialogue", () => {
    const text = ["Intro text.", "== Part Two ==", "more", "INT. HALL - NIGHT", "Girl: Hi", "Me: Yo"].join("\n");
    const parsed = parseScreenplay(sourceFile("a.txt", text), { implicitLabel: "a" });

    expect(parsed.elements).toEqual([
      { kind: "dialogue", speaker: null, text: "Intro text.", line: 1 },
      { kind: "label", name: "Part_Two", line: 2 },
      { kind: "dialogue", speaker: null, text: "more", line: 3 },
      { kind: "heading", text: "INT. HALL - NIGHT", line: 4 },
      { kind: "dialogue", speaker: "Girl", text: "Hi", line: 5 },
      { kind: "dialogue", speaker: "Me", text: "Yo", line: 6 },
    ]);
    expect(parsed.speakers).toEqual(["Girl", "Me"]);
  });

  test("without an implicit label, content before the first marker is a structural error", () => {
    const text = ["# header", "", "Me: too early", "still early", "== Start ==", "Me: fine"].join("\n");
    const parsed = parseScreenplay(sourceFile("act.txt", text), { implicitLabel: null });

    expect(parsed.errors).toHaveLength(1);
    expect(parsed.errors[0]).toBeInstanceOf(StructuralOrderError);
    expect(parsed.errors[0]?.location).toEqual({ file: "act.txt", line: 3 });
    expect(parsed.elements).toEqual([
      { kind: "label", name: "Start", line: 5 },
      { kind: "dialogue", speaker: "Me", text: "fine", line: 6 },
    ]);
  });

  test("without an implicit label, a file opening with a marker parses cleanly", () => {
    const parsed = parseScreenplay(sourceFile("act.txt", "== Start ==\nMe: fine\n"), { implicitLabel: null });
    expect(parsed.errors).toEqual([]);
    expect(parsed.elements.map((e) => e.kind)).toEqual(["label", "dialogue"]);
  });
});
