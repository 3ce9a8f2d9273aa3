// ─── Event Encoder ───────────────────────────────────────────────────────────
//
// Turns time-ordered notes plus tempo / time-signature timelines into the
// ordered REMI+ event list:
//
//   Bar… [TimeSig] [Position Tempo] [Position Chord] Position Program Pitch
//   Velocity Duration …
//
// The scan is a fold over the notes with an explicit cursor state. Tempo
// and signature changes are only tokenized next to a new Bar; a change that
// lands strictly inside a bar is absorbed silently.
// ─────────────────────────────────────────────────────────────────────────────

import type { TokenizerConfig } from "../config/schema.js";
import { maxResolution } from "../config/schema.js";
import type {
  ChordEvent,
  Event,
  Note,
  TempoChange,
  TimeSignatureChange,
} from "../types.js";
import { DEFAULT_TEMPO, DEFAULT_TIME_SIGNATURE } from "../types.js";
import {
  durationBinToTicks,
  durationBins,
  formatDuration,
  formatTimeSignature,
  nearestIndex,
} from "../vocab/bins.js";
import { UNBOUNDED_BAR } from "../vocab/vocabulary.js";
import { eventToToken, sortEvents } from "./events.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface EncodeInput {
  /** Notes sorted by (startTick, pitch). */
  notes: readonly Note[];
  timeDivision: number;
  tempos: readonly TempoChange[];
  /** Already reduced to supported signatures. */
  timeSignatures: readonly TimeSignatureChange[];
  /** Used only when Chord tokens are enabled. */
  chords?: readonly ChordEvent[];
}

/** Cursor state carried from one note to the next. */
export interface ScanState {
  currentBar: number;
  ticksPerBar: number;
  tempoIndex: number;
  signatureIndex: number;
  /** Start tick of the last time step; -1 before the first note. */
  previousTick: number;
}

/** Per-encode constants. */
interface ScanContext {
  config: TokenizerConfig;
  timeDivision: number;
  ticksPerSample: number;
  durationTicks: number[];
  durationLabels: string[];
  tempos: readonly TempoChange[];
  timeSignatures: readonly TimeSignatureChange[];
}

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * Encode notes and timelines into the sorted event list.
 */
export function encodeEvents(input: EncodeInput, config: TokenizerConfig): Event[] {
  const ctx = createContext(input, config);

  let state = initialState(ctx);
  const events: Event[] = [];
  for (const note of input.notes) {
    const step = scanNote(state, note, ctx);
    state = step.state;
    events.push(...step.events);
  }

  if (config.tokens.chord && input.chords) {
    for (const chord of input.chords) {
      events.push(...chordEvents(chord, ctx));
    }
  }

  return sortEvents(events);
}

/**
 * Encode notes and timelines straight to `Type_Value` tokens.
 */
export function encodeTokens(input: EncodeInput, config: TokenizerConfig): string[] {
  return encodeEvents(input, config).map(eventToToken);
}

// ─── Scan ────────────────────────────────────────────────────────────────────

function createContext(input: EncodeInput, config: TokenizerConfig): ScanContext {
  const bins = durationBins(config);
  return {
    config,
    timeDivision: input.timeDivision,
    ticksPerSample: input.timeDivision / maxResolution(config),
    durationTicks: bins.map(bin => durationBinToTicks(bin, input.timeDivision)),
    durationLabels: bins.map(formatDuration),
    tempos: input.tempos,
    timeSignatures: input.timeSignatures,
  };
}

function initialState(ctx: ScanContext): ScanState {
  const first = ctx.timeSignatures[0];
  const numerator = ctx.config.tokens.timeSignature && first
    ? first.numerator
    : DEFAULT_TIME_SIGNATURE.numerator;
  return {
    currentBar: -1,
    ticksPerBar: ctx.timeDivision * numerator,
    tempoIndex: 0,
    signatureIndex: 0,
    previousTick: -1,
  };
}

/**
 * One fold step: the time-step events (when the note opens a new time step)
 * followed by the note's own events.
 */
function scanNote(
  state: ScanState,
  note: Note,
  ctx: ScanContext,
): { state: ScanState; events: Event[] } {
  const events: Event[] = [];
  const start = note.startTick;
  let next = state;

  if (start !== state.previousTick) {
    const timeStep = openTimeStep(state, start, ctx);
    next = timeStep.state;
    events.push(...timeStep.events);
  }

  events.push(
    { type: "Position", value: String(positionIndex(start, next.ticksPerBar, ctx)), tick: start, role: "note" },
    { type: "Program", value: String(note.program), tick: start, role: "note" },
    { type: "Pitch", value: String(note.pitch), tick: start, role: "note" },
    { type: "Velocity", value: String(note.velocity), tick: start, role: "note" },
    {
      type: "Duration",
      value: ctx.durationLabels[nearestIndex(ctx.durationTicks, note.endTick - start)],
      tick: start,
      role: "note",
    },
  );

  return { state: next, events };
}

/**
 * Bars elapsed since the last time step, then the time signature and tempo
 * in effect when at least one bar was crossed.
 */
function openTimeStep(
  state: ScanState,
  start: number,
  ctx: ScanContext,
): { state: ScanState; events: Event[] } {
  const { config } = ctx;
  const events: Event[] = [];

  const elapsed = Math.floor(start / state.ticksPerBar) - state.currentBar;
  for (let i = 1; i <= elapsed; i++) {
    const bar = state.currentBar + i;
    events.push({
      type: "Bar",
      value: config.numBars !== undefined ? String(bar) : UNBOUNDED_BAR,
      tick: bar * state.ticksPerBar,
      role: "bar",
    });
  }
  // A longer bar can pull the index back; the cursor always matches `start`.
  const currentBar = state.currentBar + elapsed;

  let { ticksPerBar, signatureIndex, tempoIndex } = state;

  if (config.tokens.timeSignature) {
    while (
      signatureIndex + 1 < ctx.timeSignatures.length &&
      ctx.timeSignatures[signatureIndex + 1].tick <= start
    ) {
      signatureIndex++;
      ticksPerBar = ctx.timeDivision * ctx.timeSignatures[signatureIndex].numerator;
    }
    if (elapsed > 0) {
      const ts = ctx.timeSignatures[signatureIndex] ?? { ...DEFAULT_TIME_SIGNATURE, tick: 0 };
      events.push({ type: "TimeSig", value: formatTimeSignature(ts), tick: start, role: "time-signature" });
    }
  }

  if (config.tokens.tempo) {
    while (tempoIndex + 1 < ctx.tempos.length && ctx.tempos[tempoIndex + 1].tick <= start) {
      tempoIndex++;
    }
    if (elapsed > 0) {
      const tempo = ctx.tempos[tempoIndex]?.tempo ?? DEFAULT_TEMPO;
      events.push(
        { type: "Position", value: String(positionIndex(start, ticksPerBar, ctx)), tick: start, role: "tempo-position" },
        { type: "Tempo", value: String(tempo), tick: start, role: "tempo" },
      );
    }
  }

  return {
    state: { currentBar, ticksPerBar, tempoIndex, signatureIndex, previousTick: start },
    events,
  };
}

function chordEvents(chord: ChordEvent, ctx: ScanContext): Event[] {
  const ticksPerBar = ticksPerBarAt(chord.tick, ctx);
  return [
    { type: "Position", value: String(positionIndex(chord.tick, ticksPerBar, ctx)), tick: chord.tick, role: "chord-position" },
    { type: "Chord", value: chord.label, tick: chord.tick, role: "chord" },
  ];
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function positionIndex(tick: number, ticksPerBar: number, ctx: Pick<ScanContext, "ticksPerSample">): number {
  return Math.floor((tick % ticksPerBar) / ctx.ticksPerSample);
}

/** Bar length of the signature in effect at `tick`. */
function ticksPerBarAt(tick: number, ctx: ScanContext): number {
  const signatures = ctx.timeSignatures;
  let numerator: number = DEFAULT_TIME_SIGNATURE.numerator;
  if (ctx.config.tokens.timeSignature && signatures.length > 0) {
    numerator = signatures[0].numerator;
    for (let i = 1; i < signatures.length && signatures[i].tick <= tick; i++) {
      numerator = signatures[i].numerator;
    }
  }
  return ctx.timeDivision * numerator;
}
