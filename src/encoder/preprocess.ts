// ─── Score Preprocessing ─────────────────────────────────────────────────────
//
// Snaps a score onto the tokenizer's grid before encoding: note times to
// the sample grid, velocities and tempos to their bins, signatures to the
// supported set. Afterwards every value the encoder emits has a token.
// ─────────────────────────────────────────────────────────────────────────────

import type { TokenizerConfig } from "../config/schema.js";
import { maxResolution } from "../config/schema.js";
import type {
  Note,
  Score,
  TempoChange,
  TimeSignatureChange,
  Track,
} from "../types.js";
import { DEFAULT_TEMPO, DEFAULT_TIME_SIGNATURE } from "../types.js";
import {
  nearestValue,
  reduceTimeSignature,
  tempoValues,
  velocityValues,
} from "../vocab/bins.js";

/**
 * Return a quantized copy of the score. Empty tracks are dropped; empty
 * timelines get the default tempo / signature at tick 0.
 */
export function preprocessScore(score: Score, config: TokenizerConfig): Score {
  const ticksPerSample = score.timeDivision / maxResolution(config);

  const tracks = score.tracks
    .map(track => preprocessTrack(track, config, ticksPerSample))
    .filter(track => track.notes.length > 0);

  return {
    timeDivision: score.timeDivision,
    tracks,
    tempos: preprocessTempos(score.tempos, config, ticksPerSample),
    timeSignatures: preprocessTimeSignatures(score.timeSignatures, config, ticksPerSample),
    maxTick: tracks.reduce(
      (max, t) => t.notes.reduce((m, n) => Math.max(m, n.endTick), max),
      0,
    ),
  };
}

// ─── Notes ───────────────────────────────────────────────────────────────────

function preprocessTrack(track: Track, config: TokenizerConfig, ticksPerSample: number): Track {
  const velocities = velocityValues(config);
  const { min, max } = config.pitchRange;
  const seen = new Set<string>();
  const notes: Note[] = [];

  for (const note of track.notes) {
    if (note.pitch < min || note.pitch > max) continue;

    const startTick = quantize(note.startTick, ticksPerSample);
    let endTick = quantize(note.endTick, ticksPerSample);
    if (endTick <= startTick) endTick = startTick + Math.round(ticksPerSample);

    const key = `${note.pitch}:${startTick}:${endTick}`;
    if (seen.has(key)) continue;
    seen.add(key);

    notes.push({
      ...note,
      startTick,
      endTick,
      velocity: nearestValue(velocities, note.velocity),
    });
  }

  notes.sort((a, b) => a.startTick - b.startTick || a.pitch - b.pitch);
  return { ...track, notes };
}

// ─── Timelines ───────────────────────────────────────────────────────────────

function preprocessTempos(
  tempos: readonly TempoChange[],
  config: TokenizerConfig,
  ticksPerSample: number,
): TempoChange[] {
  const bins = tempoValues(config);
  const result: TempoChange[] = [];

  for (const change of tempos) {
    const tempo = nearestValue(bins, change.tempo);
    const tick = quantize(change.tick, ticksPerSample);
    const last = result[result.length - 1];
    if (last !== undefined && last.tempo === tempo) continue;
    if (last !== undefined && last.tick === tick) {
      const before = result[result.length - 2];
      if (before !== undefined && before.tempo === tempo) result.pop();
      else result[result.length - 1] = { tempo, tick };
      continue;
    }
    result.push({ tempo, tick });
  }

  return result.length > 0
    ? result
    : [{ tempo: nearestValue(bins, DEFAULT_TEMPO), tick: 0 }];
}

function preprocessTimeSignatures(
  signatures: readonly TimeSignatureChange[],
  config: TokenizerConfig,
  ticksPerSample: number,
): TimeSignatureChange[] {
  const result: TimeSignatureChange[] = [];

  for (const change of signatures) {
    const ts = reduceTimeSignature(config, change.numerator, change.denominator);
    const tick = quantize(change.tick, ticksPerSample);
    const last = result[result.length - 1];
    if (last !== undefined && last.numerator === ts.numerator && last.denominator === ts.denominator) continue;
    if (last !== undefined && last.tick === tick) {
      const before = result[result.length - 2];
      if (before !== undefined && before.numerator === ts.numerator && before.denominator === ts.denominator) {
        result.pop();
      } else {
        result[result.length - 1] = { ...ts, tick };
      }
      continue;
    }
    result.push({ ...ts, tick });
  }

  return result.length > 0 ? result : [{ ...DEFAULT_TIME_SIGNATURE, tick: 0 }];
}

function quantize(tick: number, ticksPerSample: number): number {
  return Math.round(Math.round(tick / ticksPerSample) * ticksPerSample);
}
