// ─── remi-tokens: Chord Detection ────────────────────────────────────────────
//
// Default chord-detection collaborator. Groups notes with (near) identical
// onsets and names the group by its interval template. Callers with a
// better detector can pass their own ChordEvent list to the encoder.
//
// Usage:
//   import { detectChords } from "./chord-detect.js";
//   detectChords(notes, 384);  // → [{ tick: 0, label: "maj" }, ...]
// ─────────────────────────────────────────────────────────────────────────────

import type { ChordEvent, Note } from "./types.js";

/** Chord pattern: semitone offsets from the lowest note. */
export interface ChordPattern {
  quality: string;
  intervals: readonly number[];
}

/**
 * Known chord qualities in vocabulary order. A group matches a quality only
 * when its offsets equal the template exactly.
 */
export const CHORD_QUALITIES: readonly ChordPattern[] = [
  { quality: "min",      intervals: [0, 3, 7] },
  { quality: "maj",      intervals: [0, 4, 7] },
  { quality: "dim",      intervals: [0, 3, 6] },
  { quality: "aug",      intervals: [0, 4, 8] },
  { quality: "sus2",     intervals: [0, 2, 7] },
  { quality: "sus4",     intervals: [0, 5, 7] },
  { quality: "7dom",     intervals: [0, 4, 7, 10] },
  { quality: "7min",     intervals: [0, 3, 7, 10] },
  { quality: "7maj",     intervals: [0, 4, 7, 11] },
  { quality: "7halfdim", intervals: [0, 3, 6, 10] },
  { quality: "7dim",     intervals: [0, 3, 6, 9] },
  { quality: "7aug",     intervals: [0, 4, 8, 11] },
  { quality: "9maj",     intervals: [0, 4, 7, 10, 14] },
  { quality: "9min",     intervals: [0, 4, 7, 10, 13] },
];

/** Smallest and largest note counts of an unnamed chord. */
export const UNKNOWN_CHORD_SIZES = { min: 3, max: 5 } as const;

export interface ChordDetectOptions {
  /** Max onset spread inside one chord, in ticks. Default: one sample. */
  onsetOffset?: number;
  /** Samples per beat used to derive the default onset offset. */
  resolution?: number;
  /** Max notes considered per onset group. */
  simultaneousLimit?: number;
  /** Skip groups that match no known quality. */
  onlyKnownChords?: boolean;
}

const DEFAULT_RESOLUTION = 8;
const DEFAULT_SIMULTANEOUS_LIMIT = 20;

/**
 * Detect chords in a flat, non-drum note list.
 *
 * Notes are scanned by onset; every group of notes starting within the onset
 * offset of the group's first note forms a candidate. Candidates with fewer
 * than three distinct pitches are ignored.
 */
export function detectChords(
  notes: readonly Note[],
  timeDivision: number,
  options: ChordDetectOptions = {},
): ChordEvent[] {
  const resolution = options.resolution ?? DEFAULT_RESOLUTION;
  const onsetOffset = options.onsetOffset ?? Math.floor(timeDivision / resolution);
  const limit = options.simultaneousLimit ?? DEFAULT_SIMULTANEOUS_LIMIT;

  const sorted = [...notes].sort((a, b) => a.startTick - b.startTick || a.pitch - b.pitch);
  const chords: ChordEvent[] = [];

  let i = 0;
  while (i < sorted.length) {
    const first = sorted[i];
    const group: Note[] = [];
    for (let j = i; j < sorted.length && group.length < limit; j++) {
      if (sorted[j].startTick > first.startTick + onsetOffset) break;
      group.push(sorted[j]);
    }
    i += group.length;

    const pitches = [...new Set(group.map(n => n.pitch))].sort((a, b) => a - b);
    if (pitches.length < UNKNOWN_CHORD_SIZES.min) continue;

    const label = chordLabel(pitches);
    if (label === null) continue;
    if (options.onlyKnownChords && /^\d+$/.test(label)) continue;

    chords.push({ tick: first.startTick, label });
  }

  return chords;
}

/**
 * Name a set of ascending pitches: a known quality, else its size when the
 * size has a vocabulary token, else null.
 */
export function chordLabel(pitches: readonly number[]): string | null {
  const offsets = pitches.map(p => p - pitches[0]);
  for (const pattern of CHORD_QUALITIES) {
    if (matchesPattern(offsets, pattern.intervals)) return pattern.quality;
  }
  if (pitches.length >= UNKNOWN_CHORD_SIZES.min && pitches.length <= UNKNOWN_CHORD_SIZES.max) {
    return String(pitches.length);
  }
  return null;
}

function matchesPattern(offsets: readonly number[], pattern: readonly number[]): boolean {
  return offsets.length === pattern.length && pattern.every((p, i) => offsets[i] === p);
}
