// ─── MIDI → Score ────────────────────────────────────────────────────────────
//
// Source adapter: parses a standard MIDI file into the tick-based Score the
// tokenizer consumes. Notes from every track are bucketed by program; channel
// 10 is the drum bucket.
// ─────────────────────────────────────────────────────────────────────────────

import { parseMidi, type MidiData } from "midi-file";
import type { Note, Score, TempoChange, TimeSignatureChange, Track } from "../types.js";
import { DRUM_PROGRAM } from "../types.js";
import { programName } from "./programs.js";

// ─── Constants ───────────────────────────────────────────────────────────────

const DEFAULT_TICKS_PER_BEAT = 480;
export const DRUM_CHANNEL = 9;

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * Parse a MIDI buffer into a Score.
 */
export function readScore(midiBuffer: Uint8Array): Score {
  const midi = parseMidi(midiBuffer);
  const timeDivision = midi.header.ticksPerBeat ?? DEFAULT_TICKS_PER_BEAT;

  const notes = resolveNotes(midi);
  const tracks = bucketByProgram(notes);

  return {
    timeDivision,
    tracks,
    tempos: extractTempos(midi),
    timeSignatures: extractTimeSignatures(midi),
    maxTick: notes.reduce((max, n) => Math.max(max, n.endTick), 0),
  };
}

// ─── Internal: Extract Events ────────────────────────────────────────────────

function extractTempos(midi: MidiData): TempoChange[] {
  const events: TempoChange[] = [];
  for (const track of midi.tracks) {
    let tick = 0;
    for (const event of track) {
      tick += event.deltaTime;
      if (event.type === "setTempo") {
        events.push({ tick, tempo: 60_000_000 / event.microsecondsPerBeat });
      }
    }
  }
  events.sort((a, b) => a.tick - b.tick);
  return events;
}

function extractTimeSignatures(midi: MidiData): TimeSignatureChange[] {
  const events: TimeSignatureChange[] = [];
  for (const track of midi.tracks) {
    let tick = 0;
    for (const event of track) {
      tick += event.deltaTime;
      if (event.type === "timeSignature") {
        events.push({ tick, numerator: event.numerator, denominator: event.denominator });
      }
    }
  }
  events.sort((a, b) => a.tick - b.tick);
  return events;
}

// ─── Internal: Resolve Notes ─────────────────────────────────────────────────

/** Flatten all tracks into notes with absolute ticks and their program. */
function resolveNotes(midi: MidiData): Note[] {
  const notes: Note[] = [];
  let unterminated = 0;

  for (const track of midi.tracks) {
    let tick = 0;
    const programs = new Map<number, number>();
    const pending = new Map<string, { startTick: number; velocity: number; program: number }>();

    for (const event of track) {
      tick += event.deltaTime;

      if (event.type === "programChange") {
        programs.set(event.channel, event.programNumber);
      } else if (event.type === "noteOn" && event.velocity > 0) {
        pending.set(`${event.channel}:${event.noteNumber}`, {
          startTick: tick,
          velocity: event.velocity,
          program: event.channel === DRUM_CHANNEL ? DRUM_PROGRAM : programs.get(event.channel) ?? 0,
        });
      } else if (
        event.type === "noteOff" ||
        (event.type === "noteOn" && event.velocity === 0)
      ) {
        const key = `${event.channel}:${event.noteNumber}`;
        const start = pending.get(key);
        if (start) {
          notes.push({
            pitch: event.noteNumber,
            velocity: start.velocity,
            startTick: start.startTick,
            endTick: tick,
            program: start.program,
          });
          pending.delete(key);
        }
      }
    }

    unterminated += pending.size;
  }

  if (unterminated > 0) {
    console.error(`  SKIP ${unterminated} note(s) without a note-off`);
  }

  notes.sort((a, b) => a.startTick - b.startTick || a.pitch - b.pitch);
  return notes;
}

/** Group notes by program, buckets ordered by first appearance. */
function bucketByProgram(notes: Note[]): Track[] {
  const buckets = new Map<number, Track>();
  for (const note of notes) {
    let track = buckets.get(note.program);
    if (!track) {
      track = {
        program: note.program,
        isDrum: note.program === DRUM_PROGRAM,
        name: programName(note.program),
        notes: [],
      };
      buckets.set(note.program, track);
    }
    track.notes.push(note);
  }
  return [...buckets.values()];
}
