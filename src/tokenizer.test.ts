import { describe, it, expect } from "vitest";
import { RemiPlusTokenizer, flattenNotes } from "./tokenizer.js";
import type { Note, Score, Track } from "./types.js";

function track(program: number, notes: Array<[pitch: number, start: number, end: number, velocity: number]>): Track {
  return {
    program,
    isDrum: program === -1,
    name: program === -1 ? "Drums" : `Program ${program}`,
    notes: notes.map(([pitch, startTick, endTick, velocity]): Note => ({
      pitch, velocity, startTick, endTick, program,
    })),
  };
}

function score(...tracks: Track[]): Score {
  return { timeDivision: 480, tracks, tempos: [], timeSignatures: [], maxTick: 0 };
}

const melody = score(track(0, [
  [60, 0, 480, 100],
  [64, 480, 960, 90],
  [67, 1920, 2880, 80],
]));

describe("RemiPlusTokenizer.encode", () => {
  const tokenizer = new RemiPlusTokenizer();

  it("encodes a melody", () => {
    expect(tokenizer.encode(melody).tokens).toEqual([
      "Bar_None",
      "Position_0", "Program_0", "Pitch_60", "Velocity_99", "Duration_1.0",
      "Position_8", "Program_0", "Pitch_64", "Velocity_91", "Duration_1.0",
      "Bar_None",
      "Position_0", "Program_0", "Pitch_67", "Velocity_79", "Duration_2.0",
    ]);
  });

  it("returns ids and events aligned with tokens", () => {
    const seq = tokenizer.encode(melody);
    expect(seq.ids).toEqual(tokenizer.vocabulary.tokensToIds(seq.tokens));
    expect(seq.events).toHaveLength(seq.tokens.length);
    expect(seq.events[0]).toEqual({ type: "Bar", value: "None", tick: 0, role: "bar" });
  });

  it("produces grammatical sequences", () => {
    expect(tokenizer.tokenTypeErrors(tokenizer.encode(melody).tokens).errors).toBe(0);
  });

  it("interleaves tracks by onset", () => {
    const tokens = tokenizer.encode(score(track(40, [[64, 0, 480, 100]]), track(0, [[60, 0, 480, 100]]))).tokens;
    expect(tokens.filter(t => t.startsWith("Program_"))).toEqual(["Program_0", "Program_40"]);
  });

  it("fails when a bar index is outside the vocabulary", () => {
    const bounded = new RemiPlusTokenizer({ numBars: 1 });
    expect(() => bounded.encode(score(track(0, [[60, 1920, 2400, 100]])))).toThrow(
      'Token not in vocabulary: "Bar_1"',
    );
  });

  it("detects chords when chord tokens are on", () => {
    const chordal = new RemiPlusTokenizer({ tokens: { chord: true } });
    const triad = score(track(0, [[60, 0, 480, 100], [64, 0, 480, 100], [67, 0, 480, 100]]));
    expect(chordal.encode(triad).tokens.slice(0, 4)).toEqual([
      "Bar_None", "Position_0", "Chord_maj", "Position_0",
    ]);
    expect(chordal.encode(triad, { chords: [] }).tokens).not.toContain("Chord_maj");
  });

  it("leaves drums out of chord detection", () => {
    const chordal = new RemiPlusTokenizer({ tokens: { chord: true } });
    const kit = score(track(-1, [[36, 0, 480, 100], [38, 0, 480, 100], [42, 0, 480, 100]]));
    expect(chordal.encode(kit).tokens.some(t => t.startsWith("Chord_"))).toBe(false);
  });
});

describe("RemiPlusTokenizer.decode", () => {
  const tokenizer = new RemiPlusTokenizer();

  it("round-trips a quantized melody through ids", () => {
    const decoded = tokenizer.decode(tokenizer.encode(melody).ids, 480);
    expect(decoded.tracks).toHaveLength(1);
    expect(decoded.tracks[0].name).toBe("Acoustic Grand Piano");
    expect(decoded.tracks[0].notes).toEqual([
      { pitch: 60, velocity: 99, startTick: 0, endTick: 480, program: 0 },
      { pitch: 64, velocity: 91, startTick: 480, endTick: 960, program: 0 },
      { pitch: 67, velocity: 79, startTick: 1920, endTick: 2880, program: 0 },
    ]);
    expect(decoded.maxTick).toBe(2880);
  });

  it("keeps drums in their own bucket", () => {
    const tokens = tokenizer.encode(score(track(-1, [[36, 0, 480, 100]]), track(0, [[60, 0, 480, 100]]))).tokens;
    const decoded = tokenizer.decode(tokens, 480);
    expect(decoded.tracks.map(t => [t.program, t.isDrum, t.name])).toEqual([
      [-1, true, "Drums"],
      [0, false, "Acoustic Grand Piano"],
    ]);
  });

  it("ignores special tokens", () => {
    const tokens = ["BOS_None", ...tokenizer.encode(melody).tokens, "EOS_None", "PAD_None"];
    expect(tokenizer.decode(tokens, 480).tracks[0].notes).toHaveLength(3);
    expect(tokenizer.tokenTypeErrors(tokens).errors).toBe(0);
  });

  it("rejects ids outside the vocabulary", () => {
    expect(() => tokenizer.decode([tokenizer.vocabulary.size])).toThrow("Id out of vocabulary range");
  });

  it("replays tempo changes at bar starts", () => {
    const timed = new RemiPlusTokenizer({ tokens: { tempo: true, timeSignature: true } });
    const source: Score = {
      ...melody,
      tempos: [{ tempo: 120, tick: 0 }, { tempo: 90, tick: 1920 }],
      timeSignatures: [{ numerator: 4, denominator: 4, tick: 0 }],
    };
    const decoded = timed.decode(timed.encode(source).tokens, 480);
    // 120 and 90 snap to the 121 and 87 tempo bins
    expect(decoded.tempos).toEqual([{ tempo: 121, tick: 0 }, { tempo: 87, tick: 1920 }]);
    expect(decoded.timeSignatures).toEqual([{ numerator: 4, denominator: 4, tick: 0 }]);
  });
});

describe("RemiPlusTokenizer.params", () => {
  it("rebuilds an identical vocabulary", () => {
    const original = new RemiPlusTokenizer({ tokens: { tempo: true, chord: true }, numBars: 8 });
    const rebuilt = new RemiPlusTokenizer(original.params());
    expect(rebuilt.vocabulary.tokens).toEqual(original.vocabulary.tokens);
  });

  it("returns a copy", () => {
    const tokenizer = new RemiPlusTokenizer();
    const params = tokenizer.params();
    params.velocityBins = 1;
    expect(tokenizer.config.velocityBins).toBe(32);
  });

  it("rejects an invalid config", () => {
    expect(() => new RemiPlusTokenizer({ velocityBins: 0 })).toThrow("Invalid tokenizer config");
  });
});

describe("flattenNotes", () => {
  it("merges tracks by onset then pitch", () => {
    const merged = flattenNotes(score(track(0, [[67, 0, 480, 80]]), track(1, [[60, 0, 480, 80], [55, 480, 960, 80]])));
    expect(merged.map(n => n.pitch)).toEqual([60, 67, 55]);
  });
});
