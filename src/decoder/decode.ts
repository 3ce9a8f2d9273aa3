// ─── Token Decoder ───────────────────────────────────────────────────────────
//
// Rebuilds per-program note buckets and tempo / time-signature timelines
// from a flat token sequence. A Pitch without its full Program-Pitch-
// Velocity-Duration run (typically a generated sequence cut off mid-note)
// is dropped instead of failing.
// ─────────────────────────────────────────────────────────────────────────────

import type { TokenizerConfig } from "../config/schema.js";
import { maxResolution } from "../config/schema.js";
import { programName } from "../midi/programs.js";
import type {
  Note,
  Score,
  TempoChange,
  TimeSignatureChange,
  Track,
} from "../types.js";
import {
  DEFAULT_TEMPO,
  DEFAULT_TIME_DIVISION,
  DEFAULT_TIME_SIGNATURE,
  DRUM_PROGRAM,
} from "../types.js";
import { durationToTicks, reduceTimeSignature } from "../vocab/bins.js";
import { parseTokens, type ParsedToken } from "./parse-token.js";

// ─── Types ───────────────────────────────────────────────────────────────────

/** Cursor state threaded through the token fold. */
export interface DecodeState {
  currentTick: number;
  /** -1 until the first Bar (or Position) token. */
  currentBar: number;
  ticksPerBar: number;
  previousNoteEnd: number;
}

/**
 * Everything recorded so far. Timelines start empty: the first entry is
 * absent until a token provides one, and a default is only materialized at
 * tick 0 when finalizing.
 */
interface DecodeOutput {
  tracks: Map<number, Track>;
  tempos: TempoChange[];
  timeSignatures: TimeSignatureChange[];
}

interface DecodeContext {
  config: TokenizerConfig;
  timeDivision: number;
  ticksPerSample: number;
}

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * Decode a token sequence into a score at the given time division.
 * Throws TokenFormatError on a token whose numeric payload does not parse.
 */
export function decodeTokens(
  tokens: readonly string[],
  config: TokenizerConfig,
  timeDivision: number = DEFAULT_TIME_DIVISION,
): Score {
  const resolution = maxResolution(config);
  if (!Number.isInteger(timeDivision) || timeDivision <= 0 || timeDivision % resolution !== 0) {
    throw new Error(
      `Invalid time division ${timeDivision}: must be a positive multiple of ${resolution}`,
    );
  }

  const ctx: DecodeContext = { config, timeDivision, ticksPerSample: timeDivision / resolution };
  const parsed = parseTokens(tokens);
  const output: DecodeOutput = { tracks: new Map(), tempos: [], timeSignatures: [] };

  parsed.reduce<DecodeState>(
    (state, token, i) => step(state, token, i, parsed, output, ctx),
    {
      currentTick: 0,
      currentBar: -1,
      ticksPerBar: timeDivision * DEFAULT_TIME_SIGNATURE.numerator,
      previousNoteEnd: 0,
    },
  );

  return finalize(output, timeDivision);
}

// ─── Transitions ─────────────────────────────────────────────────────────────

function step(
  state: DecodeState,
  token: ParsedToken,
  i: number,
  tokens: readonly ParsedToken[],
  output: DecodeOutput,
  ctx: DecodeContext,
): DecodeState {
  switch (token.type) {
    case "Bar": {
      const currentBar = state.currentBar + 1;
      return { ...state, currentBar, currentTick: currentBar * state.ticksPerBar };
    }

    case "Rest": {
      const from = Math.max(state.currentTick, state.previousNoteEnd);
      const currentTick = from + token.beats * ctx.timeDivision + token.subdivision * ctx.ticksPerSample;
      return { ...state, currentTick, currentBar: Math.floor(currentTick / state.ticksPerBar) };
    }

    case "Position": {
      const currentBar = state.currentBar === -1 ? 0 : state.currentBar;
      return {
        ...state,
        currentBar,
        currentTick: currentBar * state.ticksPerBar + token.index * ctx.ticksPerSample,
      };
    }

    case "Tempo": {
      const last = output.tempos[output.tempos.length - 1];
      if (last === undefined || last.tempo !== token.tempo) {
        output.tempos.push({ tempo: token.tempo, tick: state.currentTick });
      }
      return state;
    }

    case "TimeSig": {
      const ts = reduceTimeSignature(ctx.config, token.numerator, token.denominator);
      const last = output.timeSignatures[output.timeSignatures.length - 1];
      if (last === undefined || last.numerator !== ts.numerator || last.denominator !== ts.denominator) {
        output.timeSignatures.push({ ...ts, tick: state.currentTick });
      }
      return ctx.config.syncBarLengthToTimeSignature
        ? { ...state, ticksPerBar: ctx.timeDivision * ts.numerator }
        : state;
    }

    case "Pitch": {
      const program = tokens[i - 1];
      const velocity = tokens[i + 1];
      const duration = tokens[i + 2];
      if (
        program?.type !== "Program" ||
        velocity?.type !== "Velocity" ||
        duration?.type !== "Duration"
      ) {
        return state;
      }

      const ticks = durationToTicks(ctx.config, duration.beats, duration.subdivision, ctx.timeDivision);
      const note: Note = {
        pitch: token.pitch,
        velocity: velocity.velocity,
        startTick: state.currentTick,
        endTick: state.currentTick + ticks,
        program: program.program,
      };
      bucketFor(output.tracks, program.program).notes.push(note);
      return { ...state, previousNoteEnd: Math.max(state.previousNoteEnd, note.endTick) };
    }

    default:
      return state;
  }
}

function bucketFor(tracks: Map<number, Track>, program: number): Track {
  let track = tracks.get(program);
  if (!track) {
    track = {
      program,
      isDrum: program === DRUM_PROGRAM,
      name: programName(program),
      notes: [],
    };
    tracks.set(program, track);
  }
  return track;
}

// ─── Finalization ────────────────────────────────────────────────────────────

function finalize(output: DecodeOutput, timeDivision: number): Score {
  const tracks = [...output.tracks.values()];
  const maxTick = tracks.reduce(
    (max, track) => track.notes.reduce((m, n) => Math.max(m, n.endTick), max),
    0,
  );

  return {
    timeDivision,
    tracks,
    tempos: anchorAtZero(output.tempos, { tempo: DEFAULT_TEMPO, tick: 0 }),
    timeSignatures: anchorAtZero(output.timeSignatures, { ...DEFAULT_TIME_SIGNATURE, tick: 0 }),
    maxTick,
  };
}

/**
 * The first recorded entry governs the score from its start, so it moves to
 * tick 0; with nothing recorded the default stands in.
 */
function anchorAtZero<T extends { tick: number }>(entries: readonly T[], fallback: T): T[] {
  if (entries.length === 0) return [fallback];
  const [first, ...rest] = entries;
  return [{ ...first, tick: 0 }, ...rest];
}
