// ─── Tokenizer Config Loader ─────────────────────────────────────────────────
//
// Reads and writes tokenizer params as JSON, so that a vocabulary can be
// rebuilt later from exactly the same settings.
// ─────────────────────────────────────────────────────────────────────────────

import { readFileSync, writeFileSync, existsSync, mkdirSync } from "node:fs";
import { basename, dirname } from "node:path";
import { TokenizerConfigSchema, type TokenizerConfig } from "./schema.js";

/**
 * Load and validate a tokenizer config from a JSON file.
 */
export function loadTokenizerConfig(filePath: string): TokenizerConfig {
  if (!existsSync(filePath)) {
    throw new Error(`Config not found: ${filePath}`);
  }

  const raw: unknown = JSON.parse(readFileSync(filePath, "utf8"));
  const result = TokenizerConfigSchema.safeParse(raw);

  if (!result.success) {
    const issues = result.error.issues
      .map(i => `  ${i.path.join(".") || "root"}: ${i.message}`)
      .join("\n");
    throw new Error(`Invalid config ${basename(filePath)}:\n${issues}`);
  }

  return result.data;
}

/**
 * Save a tokenizer config as JSON. Creates the parent directory if needed.
 * Returns the path written.
 */
export function saveTokenizerConfig(config: TokenizerConfig, filePath: string): string {
  const dir = dirname(filePath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  writeFileSync(filePath, JSON.stringify(config, null, 2) + "\n", "utf8");
  console.error(`Tokenizer config saved: ${filePath}`);
  return filePath;
}
