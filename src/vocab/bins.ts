// ─── Value Bins ──────────────────────────────────────────────────────────────
//
// Finite value tables derived from a tokenizer config: duration bins,
// velocity bins, tempo bins and supported time signatures. Encoder and
// decoder both resolve through these, so a Duration label always means the
// same tick length on both sides.
// ─────────────────────────────────────────────────────────────────────────────

import type { TokenizerConfig } from "../config/schema.js";

// ─── Types ───────────────────────────────────────────────────────────────────

/**
 * One duration bin: `beats` whole beats plus `subdivision` samples at the
 * resolution of the beat range the bin lives in.
 */
export interface DurationBin {
  beats: number;
  subdivision: number;
  resolution: number;
}

export interface TimeSignature {
  numerator: number;
  denominator: number;
}

// ─── Lookup ──────────────────────────────────────────────────────────────────

/**
 * Index of the value closest to `target`. Ties go to the lowest index.
 */
export function nearestIndex(values: readonly number[], target: number): number {
  let best = 0;
  let bestDistance = Infinity;
  for (let i = 0; i < values.length; i++) {
    const distance = Math.abs(values[i] - target);
    if (distance < bestDistance) {
      best = i;
      bestDistance = distance;
    }
  }
  return best;
}

/** Value closest to `target` (lowest-index tie-break). */
export function nearestValue(values: readonly number[], target: number): number {
  return values[nearestIndex(values, target)];
}

// ─── Durations ───────────────────────────────────────────────────────────────

/**
 * Every (beat, subdivision) pair across the beat ranges, ascending, plus
 * the closing whole-beat bin at the end of the last range. The zero-length
 * bin is left out.
 */
export function durationBins(config: TokenizerConfig): DurationBin[] {
  const bins: DurationBin[] = [];
  for (const range of config.beatResolution) {
    for (let beat = range.start; beat < range.end; beat++) {
      for (let sub = 0; sub < range.resolution; sub++) {
        bins.push({ beats: beat, subdivision: sub, resolution: range.resolution });
      }
    }
  }
  const last = config.beatResolution[config.beatResolution.length - 1];
  bins.push({ beats: last.end, subdivision: 0, resolution: last.resolution });
  return bins.slice(1);
}

export function durationBinToTicks(bin: DurationBin, timeDivision: number): number {
  return Math.floor(((bin.beats * bin.resolution + bin.subdivision) * timeDivision) / bin.resolution);
}

/** Wire form of a duration bin: `beats.subdivision`. */
export function formatDuration(bin: Pick<DurationBin, "beats" | "subdivision">): string {
  return `${bin.beats}.${bin.subdivision}`;
}

/**
 * Resolution of the beat range containing `beats`. Beats past the last range
 * take the last range's resolution.
 */
export function resolutionAt(config: TokenizerConfig, beats: number): number {
  for (const range of config.beatResolution) {
    if (beats >= range.start && beats < range.end) return range.resolution;
  }
  return config.beatResolution[config.beatResolution.length - 1].resolution;
}

/**
 * Tick length of a `beats.subdivision` duration label at a given time division.
 */
export function durationToTicks(
  config: TokenizerConfig,
  beats: number,
  subdivision: number,
  timeDivision: number,
): number {
  return durationBinToTicks(
    { beats, subdivision, resolution: resolutionAt(config, beats) },
    timeDivision,
  );
}

// ─── Velocities & Tempos ─────────────────────────────────────────────────────

/** `velocityBins` evenly spaced velocities in (0, 127]. */
export function velocityValues(config: TokenizerConfig): number[] {
  const n = config.velocityBins;
  return Array.from({ length: n }, (_, i) => Math.floor((127 * (i + 1)) / n));
}

/** `tempoBins` evenly spaced integer tempos across the tempo range. */
export function tempoValues(config: TokenizerConfig): number[] {
  const [low, high] = config.tempoRange;
  const n = config.tempoBins;
  const values = Array.from({ length: n }, (_, i) =>
    Math.floor(n === 1 ? low : low + ((high - low) * i) / (n - 1)),
  );
  return [...new Set(values)];
}

// ─── Time Signatures ─────────────────────────────────────────────────────────

/**
 * Supported time signatures: denominators 1, 2, 4 … maxDenominator, each with
 * numerators 1 … notesPerDenominator × denominator.
 */
export function timeSignatureValues(config: TokenizerConfig): TimeSignature[] {
  const { maxDenominator, notesPerDenominator } = config.timeSignatureRange;
  const signatures: TimeSignature[] = [];
  for (let denominator = 1; denominator <= maxDenominator; denominator *= 2) {
    for (let numerator = 1; numerator <= notesPerDenominator * denominator; numerator++) {
      signatures.push({ numerator, denominator });
    }
  }
  return signatures;
}

function isPowerOfTwo(n: number): boolean {
  return n > 0 && Number.isInteger(Math.log2(n));
}

/**
 * Bring a time signature into the supported set.
 *
 * A denominator that is not a power of two drops to the largest power of two
 * below it, scaling the numerator (rounded, at least 1). A denominator above
 * the maximum is halved together with the numerator while the numerator is
 * even, then forced to the maximum with scaling. The numerator is finally
 * clamped to what the denominator allows.
 */
export function reduceTimeSignature(
  config: TokenizerConfig,
  numerator: number,
  denominator: number,
): TimeSignature {
  if (!Number.isInteger(numerator) || !Number.isInteger(denominator) || numerator < 1 || denominator < 1) {
    throw new Error(`Invalid time signature: ${numerator}/${denominator}`);
  }
  const { maxDenominator, notesPerDenominator } = config.timeSignatureRange;

  let num = numerator;
  let den = denominator;

  if (!isPowerOfTwo(den)) {
    const lower = 2 ** Math.floor(Math.log2(den));
    num = Math.max(1, Math.round((num * lower) / den));
    den = lower;
  }

  while (den > maxDenominator && num % 2 === 0) {
    num /= 2;
    den /= 2;
  }
  if (den > maxDenominator) {
    num = Math.max(1, Math.round((num * maxDenominator) / den));
    den = maxDenominator;
  }

  return { numerator: Math.min(num, notesPerDenominator * den), denominator: den };
}

/** Wire form of a time signature: `numerator/denominator`. */
export function formatTimeSignature(ts: TimeSignature): string {
  return `${ts.numerator}/${ts.denominator}`;
}
