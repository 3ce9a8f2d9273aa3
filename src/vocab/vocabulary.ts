// ─── Vocabulary ──────────────────────────────────────────────────────────────
//
// Enumerates the finite token alphabet from a config, and indexes it so
// tokens can be turned into integer ids and back. The order is fixed: any
// downstream merge learning relies on ids staying stable.
// ─────────────────────────────────────────────────────────────────────────────

import type { TokenizerConfig } from "../config/schema.js";
import { maxResolution } from "../config/schema.js";
import { CHORD_QUALITIES, UNKNOWN_CHORD_SIZES } from "../chord-detect.js";
import {
  durationBins,
  formatDuration,
  formatTimeSignature,
  tempoValues,
  timeSignatureValues,
  velocityValues,
} from "./bins.js";

/** Bar value used when the number of bars is unbounded. */
export const UNBOUNDED_BAR = "None";

/** Positions per bar in the vocabulary (a 4/4 bar at max resolution). */
export function positionCount(config: TokenizerConfig): number {
  return maxResolution(config) * 4;
}

/**
 * Build the base token alphabet, in its fixed order:
 * Bar, Pitch, Velocity, Duration, Position, TimeSig, Chord, Tempo, Program.
 */
export function buildVocabulary(config: TokenizerConfig): string[] {
  const vocab: string[] = [];

  if (config.numBars !== undefined) {
    for (let i = 0; i < config.numBars; i++) vocab.push(`Bar_${i}`);
  } else {
    vocab.push(`Bar_${UNBOUNDED_BAR}`);
  }

  for (let p = config.pitchRange.min; p <= config.pitchRange.max; p++) {
    vocab.push(`Pitch_${p}`);
  }

  for (const v of velocityValues(config)) vocab.push(`Velocity_${v}`);

  for (const bin of durationBins(config)) vocab.push(`Duration_${formatDuration(bin)}`);

  for (let i = 0; i < positionCount(config); i++) vocab.push(`Position_${i}`);

  if (config.tokens.timeSignature) {
    for (const ts of timeSignatureValues(config)) vocab.push(`TimeSig_${formatTimeSignature(ts)}`);
  }

  if (config.tokens.chord) {
    for (let n = UNKNOWN_CHORD_SIZES.min; n <= UNKNOWN_CHORD_SIZES.max; n++) {
      vocab.push(`Chord_${n}`);
    }
    for (const { quality } of CHORD_QUALITIES) vocab.push(`Chord_${quality}`);
  }

  if (config.tokens.tempo) {
    for (const t of tempoValues(config)) vocab.push(`Tempo_${t}`);
  }

  for (let program = -1; program < 128; program++) vocab.push(`Program_${program}`);

  return vocab;
}

/**
 * Token ↔ id index. Special tokens (`PAD_None`, …) take the first ids,
 * followed by the base alphabet.
 */
export class Vocabulary {
  readonly tokens: readonly string[];
  private readonly ids: Map<string, number>;

  constructor(config: TokenizerConfig) {
    this.tokens = [
      ...config.specialTokens.map(name => `${name}_None`),
      ...buildVocabulary(config),
    ];
    this.ids = new Map(this.tokens.map((token, id) => [token, id]));
  }

  get size(): number {
    return this.tokens.length;
  }

  has(token: string): boolean {
    return this.ids.has(token);
  }

  tokenToId(token: string): number | undefined {
    return this.ids.get(token);
  }

  idToToken(id: number): string | undefined {
    return this.tokens[id];
  }

  /** Throws on the first token that is not in the vocabulary. */
  tokensToIds(tokens: readonly string[]): number[] {
    return tokens.map(token => {
      const id = this.ids.get(token);
      if (id === undefined) {
        throw new Error(`Token not in vocabulary: "${token}"`);
      }
      return id;
    });
  }

  /** Throws on the first id outside the vocabulary. */
  idsToTokens(ids: readonly number[]): string[] {
    return ids.map(id => {
      const token = this.tokens[id];
      if (token === undefined) {
        throw new Error(`Id out of vocabulary range: ${id} (size ${this.tokens.length})`);
      }
      return token;
    });
  }
}
