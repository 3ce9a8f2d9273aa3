// ─── remi-tokens: Core Types ────────────────────────────────────────────────
//
// Tick-based note, timeline and token types shared by the encoder, the
// decoder and the MIDI adapters. All times are absolute ticks; a score's
// timeDivision gives the number of ticks per quarter note.
// ─────────────────────────────────────────────────────────────────────────────

// ─── Constants ───────────────────────────────────────────────────────────────

/** Program number used for the drum / percussion bucket. */
export const DRUM_PROGRAM = -1;

/** Tempo assumed when a score or token stream carries none (bpm). */
export const DEFAULT_TEMPO = 120;

/** Time signature assumed when a score or token stream carries none. */
export const DEFAULT_TIME_SIGNATURE = { numerator: 4, denominator: 4 } as const;

/** Ticks per quarter note used when decoding without an explicit value. */
export const DEFAULT_TIME_DIVISION = 384;

// ─── Musical Data ────────────────────────────────────────────────────────────

/** A single note with absolute timing. */
export interface Note {
  /** MIDI note number 0-127. */
  pitch: number;
  /** Velocity 1-127. */
  velocity: number;
  startTick: number;
  /** Exclusive end tick. */
  endTick: number;
  /** General MIDI program 0-127, or -1 for drums. */
  program: number;
}

export interface TempoChange {
  /** Beats per minute. */
  tempo: number;
  tick: number;
}

export interface TimeSignatureChange {
  numerator: number;
  /** Always a power of two once reduced. */
  denominator: number;
  tick: number;
}

/** All notes of one program. Drums live in their own bucket. */
export interface Track {
  program: number;
  isDrum: boolean;
  name: string;
  notes: Note[];
}

/**
 * A multi-track score as exchanged with the MIDI source and sink.
 * Timelines are ordered by nondecreasing tick.
 */
export interface Score {
  timeDivision: number;
  tracks: Track[];
  tempos: TempoChange[];
  timeSignatures: TimeSignatureChange[];
  /** Largest note end tick across all tracks (0 when empty). */
  maxTick: number;
}

/** Output of the chord-detection collaborator. */
export interface ChordEvent {
  tick: number;
  /** Chord quality name (e.g. "maj") or note count for unknown chords. */
  label: string;
}

// ─── Tokens ──────────────────────────────────────────────────────────────────

export const TOKEN_TYPES = [
  "Bar",
  "Position",
  "Program",
  "Pitch",
  "Velocity",
  "Duration",
  "TimeSig",
  "Tempo",
  "Chord",
  "Rest",
] as const;

export type TokenType = (typeof TOKEN_TYPES)[number];

const TOKEN_TYPE_SET: ReadonlySet<string> = new Set(TOKEN_TYPES);

export function isTokenType(value: string): value is TokenType {
  return TOKEN_TYPE_SET.has(value);
}

/**
 * Tie-break tag of an encoder event. Position events come in three
 * flavours depending on what they anchor.
 */
export type EventRole =
  | "bar"
  | "time-signature"
  | "tempo-position"
  | "tempo"
  | "chord-position"
  | "chord"
  | "rest"
  | "note";

/** Intermediate, tick-stamped encoder event. */
export interface Event {
  type: TokenType;
  /** Token payload, already in its wire form. */
  value: string;
  tick: number;
  role: EventRole;
}

/** An encoded sequence in its three views. */
export interface TokenSequence {
  tokens: string[];
  ids: number[];
  events: Event[];
}
