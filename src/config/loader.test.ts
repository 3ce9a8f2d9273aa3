import { describe, it, expect, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadTokenizerConfig, saveTokenizerConfig } from "./loader.js";
import { parseConfig } from "./schema.js";

describe("tokenizer config files", () => {
  const dirs: string[] = [];

  function tempDir(): string {
    const dir = mkdtempSync(join(tmpdir(), "remi-config-"));
    dirs.push(dir);
    return dir;
  }

  afterEach(() => {
    for (const dir of dirs.splice(0)) rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("round-trips a config through JSON", () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const config = parseConfig({ tokens: { chord: true }, numBars: 16 });
    const path = join(tempDir(), "nested", "tokenizer.json");

    expect(saveTokenizerConfig(config, path)).toBe(path);
    expect(loadTokenizerConfig(path)).toEqual(config);
  });

  it("logs where it saved", () => {
    const log = vi.spyOn(console, "error").mockImplementation(() => {});
    const path = join(tempDir(), "tokenizer.json");
    saveTokenizerConfig(parseConfig({}), path);
    expect(log).toHaveBeenCalledWith(`Tokenizer config saved: ${path}`);
  });

  it("throws on a missing file", () => {
    const path = join(tempDir(), "missing.json");
    expect(() => loadTokenizerConfig(path)).toThrow(`Config not found: ${path}`);
  });

  it("throws on an invalid file", () => {
    const path = join(tempDir(), "bad.json");
    writeFileSync(path, JSON.stringify({ velocityBins: -1 }), "utf8");
    expect(() => loadTokenizerConfig(path)).toThrow("Invalid config bad.json:\n  velocityBins:");
  });
});
