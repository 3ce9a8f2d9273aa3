// ─── remi-tokens: REMI+ Tokenizer ────────────────────────────────────────────
//
// One object tying the pieces together for a given config:
//
//   score ──preprocess──▶ sorted notes ──encode──▶ tokens / ids
//   tokens / ids ──decode──▶ score
//
// The vocabulary and type graph are built once, at construction.
// ─────────────────────────────────────────────────────────────────────────────

import { detectChords } from "./chord-detect.js";
import {
  parseConfig,
  type TokenizerConfig,
  type TokenizerConfigInput,
} from "./config/schema.js";
import { decodeTokens } from "./decoder/decode.js";
import { encodeEvents } from "./encoder/encode.js";
import { eventToToken } from "./encoder/events.js";
import { preprocessScore } from "./encoder/preprocess.js";
import {
  buildTypeGraph,
  tokenTypeErrors,
  type TypeErrorReport,
  type TypeGraph,
} from "./grammar/type-graph.js";
import type { ChordEvent, Note, Score, TokenSequence } from "./types.js";
import { DEFAULT_TIME_DIVISION, DRUM_PROGRAM } from "./types.js";
import { Vocabulary } from "./vocab/vocabulary.js";

export interface EncodeOptions {
  /**
   * Chords to tokenize when Chord tokens are enabled. Detected from the
   * non-drum notes when omitted.
   */
  chords?: readonly ChordEvent[];
}

export class RemiPlusTokenizer {
  readonly config: TokenizerConfig;
  readonly vocabulary: Vocabulary;
  readonly typeGraph: TypeGraph;

  constructor(config: TokenizerConfigInput | TokenizerConfig = {}) {
    this.config = parseConfig(config);
    this.vocabulary = new Vocabulary(this.config);
    this.typeGraph = buildTypeGraph(this.config.tokens);
  }

  /** Quantize a score onto this tokenizer's grid and bins. */
  preprocess(score: Score): Score {
    return preprocessScore(score, this.config);
  }

  /**
   * Encode every track of a score into a single token stream.
   * Throws if a produced token is missing from the vocabulary (for
   * instance a bar index beyond `numBars`).
   */
  encode(score: Score, options: EncodeOptions = {}): TokenSequence {
    const prepared = this.preprocess(score);
    const notes = flattenNotes(prepared);

    let chords: readonly ChordEvent[] | undefined;
    if (this.config.tokens.chord) {
      chords = options.chords ?? detectChords(
        notes.filter(n => n.program !== DRUM_PROGRAM),
        prepared.timeDivision,
        { resolution: this.config.beatResolution[0].resolution },
      );
    }

    const events = encodeEvents(
      {
        notes,
        timeDivision: prepared.timeDivision,
        tempos: prepared.tempos,
        timeSignatures: prepared.timeSignatures,
        chords,
      },
      this.config,
    );
    const tokens = events.map(eventToToken);

    return { tokens, ids: this.vocabulary.tokensToIds(tokens), events };
  }

  /**
   * Decode tokens (strings or vocabulary ids) back into a score.
   */
  decode(
    tokens: readonly (string | number)[],
    timeDivision: number = DEFAULT_TIME_DIVISION,
  ): Score {
    const strings = tokens.map(t => (typeof t === "number" ? this.idToTokenOrThrow(t) : t));
    const specials = new Set(this.config.specialTokens.map(name => `${name}_None`));
    return decodeTokens(
      strings.filter(t => !specials.has(t)),
      this.config,
      timeDivision,
    );
  }

  /** Advisory grammar check; never throws on bad sequences. */
  tokenTypeErrors(tokens: readonly string[]): TypeErrorReport {
    return tokenTypeErrors(tokens, this.typeGraph, this.config.specialTokens);
  }

  /** Serializable params; `new RemiPlusTokenizer(t.params())` rebuilds it. */
  params(): TokenizerConfig {
    return structuredClone(this.config);
  }

  private idToTokenOrThrow(id: number): string {
    const token = this.vocabulary.idToToken(id);
    if (token === undefined) {
      throw new Error(`Id out of vocabulary range: ${id} (size ${this.vocabulary.size})`);
    }
    return token;
  }
}

/**
 * All notes of all tracks in one list, ordered by (startTick, pitch).
 */
export function flattenNotes(score: Score): Note[] {
  return score.tracks
    .flatMap(track => track.notes)
    .sort((a, b) => a.startTick - b.startTick || a.pitch - b.pitch);
}
