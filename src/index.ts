// ─── remi-tokens ─────────────────────────────────────────────────────────────
//
// REMI+ tokenizer for multi-track symbolic music: notes, tempos and time
// signatures to a flat `Type_Value` token stream and back.
//
// Usage:
//   import { RemiPlusTokenizer, readScore } from "remi-tokens";
//   const tokenizer = new RemiPlusTokenizer({ tokens: { tempo: true } });
//   const { tokens, ids } = tokenizer.encode(readScore(bytes));
//   const score = tokenizer.decode(ids, 480);
// ─────────────────────────────────────────────────────────────────────────────

// Core types
export type {
  Note,
  TempoChange,
  TimeSignatureChange,
  Track,
  Score,
  ChordEvent,
  TokenType,
  EventRole,
  Event,
  TokenSequence,
} from "./types.js";

export {
  DRUM_PROGRAM,
  DEFAULT_TEMPO,
  DEFAULT_TIME_SIGNATURE,
  DEFAULT_TIME_DIVISION,
  TOKEN_TYPES,
  isTokenType,
} from "./types.js";

// Tokenizer facade
export { RemiPlusTokenizer, flattenNotes } from "./tokenizer.js";
export type { EncodeOptions } from "./tokenizer.js";

// Config
export {
  TokenizerConfigSchema,
  BeatRangeSchema,
  PitchRangeSchema,
  TokenFamiliesSchema,
  TimeSignatureRangeSchema,
  validateConfig,
  parseConfig,
  maxResolution,
} from "./config/schema.js";
export type {
  TokenizerConfig,
  TokenizerConfigInput,
  BeatRange,
  TokenFamilies,
  ConfigError,
} from "./config/schema.js";
export { loadTokenizerConfig, saveTokenizerConfig } from "./config/loader.js";

// Vocabulary & bins
export { buildVocabulary, positionCount, Vocabulary, UNBOUNDED_BAR } from "./vocab/vocabulary.js";
export {
  durationBins,
  durationBinToTicks,
  durationToTicks,
  formatDuration,
  velocityValues,
  tempoValues,
  timeSignatureValues,
  reduceTimeSignature,
  formatTimeSignature,
  nearestIndex,
  nearestValue,
} from "./vocab/bins.js";
export type { DurationBin, TimeSignature } from "./vocab/bins.js";

// Grammar
export { buildTypeGraph, tokenTypeErrors, tokenTypeOf } from "./grammar/type-graph.js";
export type { TypeGraph, TypeErrorReport } from "./grammar/type-graph.js";

// Encoder
export { encodeEvents, encodeTokens } from "./encoder/encode.js";
export type { EncodeInput, ScanState } from "./encoder/encode.js";
export { sortEvents, eventToToken, TIE_BREAK_RANK } from "./encoder/events.js";
export { preprocessScore } from "./encoder/preprocess.js";

// Decoder
export { decodeTokens } from "./decoder/decode.js";
export type { DecodeState } from "./decoder/decode.js";
export { parseToken, parseTokens, TokenFormatError } from "./decoder/parse-token.js";
export type { ParsedToken } from "./decoder/parse-token.js";

// Chord detection
export { detectChords, chordLabel, CHORD_QUALITIES } from "./chord-detect.js";
export type { ChordDetectOptions } from "./chord-detect.js";

// MIDI adapters
export { readScore, DRUM_CHANNEL } from "./midi/ingest.js";
export { writeScore } from "./midi/export.js";
export { programName } from "./midi/programs.js";
