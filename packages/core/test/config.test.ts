import fs from "node:fs";
import path from "node:path";

import { afterEach, describe, expect, test } from "vitest";

import { InvalidConfigurationError } from "../src/errors.js";
import { loadScreenplayConfig, screenplayConfigFromDocument } from "../src/screenplay/config.js";
import { mkdtemp } from "./helpers.js";

const dirs: string[] = [];

afterEach(() => {
  for (const dir of dirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
});

function writeConfig(text: string): string {
  const dir = mkdtemp("renpy-scribe-config-");
  dirs.push(dir);
  const file = path.join(dir, "characters.yaml");
  fs.writeFileSync(file, text, "utf8");
  return file;
}

describe("loadScreenplayConfig", () => {
  test("reads the characters mapping in file order", () => {
    const file = writeConfig(['characters:', '  Boy: boy', '  "Old Man (V.O.)": old_man', ""].join("\n"));

    const config = loadScreenplayConfig(file);

    expect(config.filePath).toBe(file);
    expect([...config.characters]).toEqual([
      ["Boy", "boy"],
      ["Old Man", "old_man"],
    ]);
  });

  test("an empty file is an empty configuration", () => {
    const config = loadScreenplayConfig(writeConfig(""));
    expect(config.characters.size).toBe(0);
  });

  test("other top-level keys are ignored", () => {
    const config = loadScreenplayConfig(writeConfig("title: My Novel\ncharacters:\n  Me: me\n"));
    expect([...config.characters]).toEqual([["Me", "me"]]);
  });

  test("a missing file is a configuration error", () => {
    const dir = mkdtemp("renpy-scribe-config-");
    dirs.push(dir);
    expect(() => loadScreenplayConfig(path.join(dir, "nope.yaml"))).toThrow(/^Cannot read config: /);
  });

  test("malformed YAML names the file", () => {
    const file = writeConfig("characters:\n  Boy: [boy\n");
    let caught: unknown;
    try {
      loadScreenplayConfig(file);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InvalidConfigurationError);
    if (!(caught instanceof InvalidConfigurationError)) return;
    expect(caught.message).toMatch(/^Malformed YAML: /);
    expect(caught.location?.file).toBe(file);
  });
});

describe("screenplayConfigFromDocument", () => {
  test.each([
    [{ characters: { Boy: "9lives" } }, /must be a valid identifier/],
    [{ characters: { Boy: "narrator" } }, /is a reserved name/],
    [{ characters: { Boy: "voice" } }, /is a reserved name/],
    [{ characters: { Boy: 3 } }, /^Invalid config: characters\.Boy: /],
    [["Boy", "Girl"], /^Invalid config: /],
  ])("rejects %j", (doc, message) => {
    expect(() => screenplayConfigFromDocument(doc, null)).toThrow(message);
  });

  test("two names sharing an identifier are rejected", () => {
    expect(() => screenplayConfigFromDocument({ characters: { Boy: "kid", Girl: "kid" } }, "c.yaml")).toThrow(
      'Invalid config: characters "Boy" and "Girl" share the identifier "kid"',
    );
  });

  test("names that normalise to the same speaker are rejected", () => {
    expect(() => screenplayConfigFromDocument({ characters: { Boy: "a", "Boy (O.S.)": "b" } }, null)).toThrow(
      'Invalid config: character "Boy" is listed more than once',
    );
  });

  test("null characters is an empty mapping", () => {
    expect(screenplayConfigFromDocument({ characters: null }, null).characters.size).toBe(0);
  });
});
