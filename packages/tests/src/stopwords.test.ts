import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Effect } from "effect";
import { builtinStopwordLists, loadStopwords, parseStopwords } from "@lexcov/coverage";

describe("parseStopwords", () => {
  it("lowercases words and skips blanks and comments", () => {
    expect([...parseStopwords("# list\r\nThe\n\n  and  \n#x\nthe\n")]).toEqual(["the", "and"]);
  });
});

describe("loadStopwords", () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), "lexcov-stop-"));
    writeFileSync(join(dir, "stop.txt"), "a\nan\n");
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("lists the built-in lists", () => {
    expect(builtinStopwordLists()).toEqual(["ru"]);
  });

  it("loads the built-in Russian list", async () => {
    const words = await Effect.runPromise(loadStopwords("ru"));
    expect(words.has("и")).toBe(true);
    expect(words.has("что")).toBe(true);
    expect(words.has("# common russian function words")).toBe(false);
  });

  it("loads a file", async () => {
    const words = await Effect.runPromise(loadStopwords(join(dir, "stop.txt")));
    expect([...words]).toEqual(["a", "an"]);
  });

  it("fails with ConfigError for a missing file", async () => {
    const path = join(dir, "missing.txt");
    const err = await Effect.runPromise(Effect.flip(loadStopwords(path)));
    expect(err._tag).toBe("ConfigError");
    expect(err.message).toBe(`Failed to load stopword list "${path}"`);
  });
});
