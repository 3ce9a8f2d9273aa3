// ─── Token Type Graph ────────────────────────────────────────────────────────
//
// Which token type may follow which. Used offline to score generated
// sequences; it never rejects or rewrites anything.
// ─────────────────────────────────────────────────────────────────────────────

import type { TokenFamilies } from "../config/schema.js";
import { isTokenType, type TokenType } from "../types.js";

export type TypeGraph = ReadonlyMap<TokenType, ReadonlySet<TokenType>>;

export interface TypeErrorReport {
  /** Adjacent pairs whose successor type is not allowed. */
  errors: number;
  /** errors / number of tokens checked (0 for an empty sequence). */
  ratio: number;
}

/**
 * Build the successor graph for the enabled token families.
 */
export function buildTypeGraph(families: TokenFamilies): TypeGraph {
  const graph = new Map<TokenType, TokenType[]>([
    ["Bar", ["Position", "Bar"]],
    ["Position", ["Program"]],
    ["Program", ["Pitch"]],
    ["Pitch", ["Velocity"]],
    ["Velocity", ["Duration"]],
    ["Duration", ["Program", "Position", "Bar"]],
  ]);

  // Every new bar carries a TimeSig, so it replaces Bar → Position.
  if (families.timeSignature) {
    graph.set("Bar", ["TimeSig", "Bar"]);
    graph.set("TimeSig", ["Position"]);
  }

  if (families.chord) {
    graph.set("Chord", ["Position"]);
    graph.get("Position")?.push("Chord");
  }

  if (families.tempo) {
    graph.set("Tempo", ["Position"]);
    graph.get("Position")?.push("Tempo");
  }

  return new Map([...graph].map(([type, next]) => [type, new Set(next)]));
}

/**
 * Count illegal adjacent type pairs in a token sequence.
 * Special tokens (`PAD_None`, `BOS_None`, …) are skipped.
 */
export function tokenTypeErrors(
  tokens: readonly string[],
  graph: TypeGraph,
  specialTokens: readonly string[] = [],
): TypeErrorReport {
  const specials = new Set(specialTokens);
  const types = tokens
    .map(tokenTypeOf)
    .filter(type => !specials.has(type));

  if (types.length === 0) return { errors: 0, ratio: 0 };

  let errors = 0;
  for (let i = 1; i < types.length; i++) {
    const prev = types[i - 1];
    const next = types[i];
    const allowed = isTokenType(prev) ? graph.get(prev) : undefined;
    if (!allowed || !isTokenType(next) || !allowed.has(next)) errors++;
  }

  return { errors, ratio: errors / types.length };
}

/** Type part of a `Type_Value` token (the whole string when there is no `_`). */
export function tokenTypeOf(token: string): string {
  const sep = token.indexOf("_");
  return sep === -1 ? token : token.slice(0, sep);
}
