// ─── Score → MIDI ────────────────────────────────────────────────────────────
//
// Sink adapter: writes a decoded Score as a format-1 MIDI file. Track 0
// carries tempo and time-signature meta events; each program bucket gets
// its own track and channel (drums on channel 10).
// ─────────────────────────────────────────────────────────────────────────────

import { writeMidi, type MidiEvent } from "midi-file";
import type { Score, Track } from "../types.js";
import { DRUM_CHANNEL } from "./ingest.js";

const MAX_CHANNELS = 16;

interface TimedEvent {
  tick: number;
  /** Lower sorts first among events sharing a tick. */
  order: number;
  event: MidiEvent;
}

/**
 * Serialize a Score to MIDI bytes.
 */
export function writeScore(score: Score): Uint8Array {
  const tracks: MidiEvent[][] = [conductorTrack(score)];

  let nextChannel = 0;
  for (const track of score.tracks) {
    let channel = DRUM_CHANNEL;
    if (!track.isDrum) {
      if (nextChannel === DRUM_CHANNEL) nextChannel++;
      if (nextChannel >= MAX_CHANNELS) {
        throw new Error(`Too many melodic tracks for ${MAX_CHANNELS} MIDI channels`);
      }
      channel = nextChannel++;
    }
    tracks.push(noteTrack(track, channel));
  }

  return Uint8Array.from(
    writeMidi({
      header: { format: 1, numTracks: tracks.length, ticksPerBeat: score.timeDivision },
      tracks,
    }),
  );
}

// ─── Internal: Tracks ────────────────────────────────────────────────────────

function conductorTrack(score: Score): MidiEvent[] {
  const timed: TimedEvent[] = [];
  for (const ts of score.timeSignatures) {
    timed.push({
      tick: ts.tick,
      order: 0,
      event: {
        deltaTime: 0,
        meta: true,
        type: "timeSignature",
        numerator: ts.numerator,
        denominator: ts.denominator,
        metronome: 24,
        thirtyseconds: 8,
      },
    });
  }
  for (const t of score.tempos) {
    timed.push({
      tick: t.tick,
      order: 1,
      event: {
        deltaTime: 0,
        meta: true,
        type: "setTempo",
        microsecondsPerBeat: Math.round(60_000_000 / t.tempo),
      },
    });
  }
  return withDeltaTimes(timed);
}

function noteTrack(track: Track, channel: number): MidiEvent[] {
  const timed: TimedEvent[] = [
    {
      tick: 0,
      order: 0,
      event: {
        deltaTime: 0,
        type: "programChange",
        channel,
        programNumber: track.isDrum ? 0 : track.program,
      },
    },
  ];

  for (const note of track.notes) {
    timed.push(
      {
        tick: note.startTick,
        order: 2,
        event: { deltaTime: 0, type: "noteOn", channel, noteNumber: note.pitch, velocity: note.velocity },
      },
      {
        tick: note.endTick,
        order: 1,
        event: { deltaTime: 0, type: "noteOff", channel, noteNumber: note.pitch, velocity: 0 },
      },
    );
  }

  return withDeltaTimes(timed);
}

/** Sort by tick, convert absolute ticks to deltas, close the track. */
function withDeltaTimes(timed: TimedEvent[]): MidiEvent[] {
  timed.sort((a, b) => a.tick - b.tick || a.order - b.order);

  const events: MidiEvent[] = [];
  let previous = 0;
  for (const { tick, event } of timed) {
    event.deltaTime = tick - previous;
    previous = tick;
    events.push(event);
  }
  events.push({ deltaTime: 0, meta: true, type: "endOfTrack" });
  return events;
}
