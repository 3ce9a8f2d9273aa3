import { describe, it, expect } from "vitest";
import { parseConfig, type TokenizerConfigInput } from "../config/schema.js";
import { buildTypeGraph, tokenTypeErrors } from "../grammar/type-graph.js";
import type { Event, Note } from "../types.js";
import { encodeEvents, encodeTokens, type EncodeInput } from "./encode.js";
import { sortEvents } from "./events.js";

function note(pitch: number, startTick: number, endTick: number, program = 0, velocity = 100): Note {
  return { pitch, velocity, startTick, endTick, program };
}

function encode(input: Partial<EncodeInput> & { notes: Note[] }, config: TokenizerConfigInput = {}): string[] {
  return encodeTokens(
    { timeDivision: 480, tempos: [], timeSignatures: [], ...input },
    parseConfig(config),
  );
}

describe("encodeTokens", () => {
  it("encodes a single note", () => {
    expect(encode({ notes: [note(60, 0, 480)] })).toEqual([
      "Bar_None", "Position_0", "Program_0", "Pitch_60", "Velocity_100", "Duration_1.0",
    ]);
  });

  it("returns nothing for no notes", () => {
    expect(encode({ notes: [] })).toEqual([]);
  });

  it("gives every note its own Position, even at the same tick", () => {
    const tokens = encode({ notes: [note(60, 0, 480), note(64, 0, 480, -1)] });
    expect(tokens).toEqual([
      "Bar_None",
      "Position_0", "Program_0", "Pitch_60", "Velocity_100", "Duration_1.0",
      "Position_0", "Program_-1", "Pitch_64", "Velocity_100", "Duration_1.0",
    ]);
  });

  it("positions notes inside the bar", () => {
    const tokens = encode({ notes: [note(60, 0, 480), note(62, 480, 960)] });
    expect(tokens.slice(6, 8)).toEqual(["Position_8", "Program_0"]);
  });

  it("emits one Bar per elapsed bar", () => {
    // Bar = 1920 ticks; second note opens bar 3.
    const tokens = encode({ notes: [note(60, 0, 480), note(62, 3 * 1920, 3 * 1920 + 480)] });
    expect(tokens.slice(6)).toEqual([
      "Bar_None", "Bar_None", "Bar_None",
      "Position_0", "Program_0", "Pitch_62", "Velocity_100", "Duration_1.0",
    ]);
  });

  it("numbers bars when the bar count is bounded", () => {
    const tokens = encode({ notes: [note(60, 1920, 2400)] }, { numBars: 8 });
    expect(tokens.slice(0, 3)).toEqual(["Bar_0", "Bar_1", "Position_0"]);
  });

  it("picks the nearest duration bin", () => {
    // 1.0 = 480 ticks, 1.1 = 540 ticks at 480 tpq
    expect(encode({ notes: [note(60, 0, 500)] })[5]).toBe("Duration_1.0");
    expect(encode({ notes: [note(60, 0, 530)] })[5]).toBe("Duration_1.1");
  });

  it("breaks duration ties toward the shorter bin", () => {
    expect(encode({ notes: [note(60, 0, 510)] })[5]).toBe("Duration_1.0");
  });
});

describe("encodeTokens with tempo and time signature", () => {
  const config = { tokens: { tempo: true, timeSignature: true } };
  const input = {
    notes: [note(60, 0, 480), note(62, 1920, 2400)],
    tempos: [{ tempo: 120, tick: 0 }, { tempo: 90, tick: 960 }],
    timeSignatures: [{ numerator: 4, denominator: 4, tick: 0 }],
  };

  it("anchors tempo and signature after each new bar", () => {
    expect(encode(input, config)).toEqual([
      "Bar_None", "TimeSig_4/4", "Position_0", "Tempo_120",
      "Position_0", "Program_0", "Pitch_60", "Velocity_100", "Duration_1.0",
      "Bar_None", "TimeSig_4/4", "Position_0", "Tempo_90",
      "Position_0", "Program_0", "Pitch_62", "Velocity_100", "Duration_1.0",
    ]);
  });

  it("follows the type graph", () => {
    const tokens = encode(input, config);
    const graph = buildTypeGraph(parseConfig(config).tokens);
    expect(tokenTypeErrors(tokens, graph).errors).toBe(0);
  });

  it("does not tokenize a tempo change inside a bar", () => {
    const tokens = encode(
      { ...input, notes: [note(60, 0, 480), note(62, 1440, 1920)] },
      config,
    );
    expect(tokens.filter(t => t.startsWith("Tempo_"))).toEqual(["Tempo_120"]);
  });

  it("adopts signature changes at the next bar", () => {
    const tokens = encode(
      {
        notes: [note(60, 0, 480), note(62, 1920, 2400), note(64, 3360, 3840)],
        timeSignatures: [
          { numerator: 4, denominator: 4, tick: 0 },
          { numerator: 3, denominator: 4, tick: 1920 },
        ],
      },
      { tokens: { timeSignature: true } },
    );
    expect(tokens.filter(t => t.startsWith("TimeSig_"))).toEqual([
      "TimeSig_4/4", "TimeSig_3/4", "TimeSig_3/4",
    ]);
  });

  it("keeps one Bar per boundary after the bar gets longer", () => {
    // 2/4 bars of 960 ticks until 1920, then 4/4 bars of 1920: bars open at
    // 0, 960, 1920 and 3840.
    const tokens = encode(
      {
        notes: [note(60, 0, 480), note(62, 1920, 2400), note(64, 2400, 2880), note(65, 3840, 4320)],
        timeSignatures: [
          { numerator: 2, denominator: 4, tick: 0 },
          { numerator: 4, denominator: 4, tick: 1920 },
        ],
      },
      { tokens: { timeSignature: true } },
    );
    expect(tokens.filter(t => t === "Bar_None")).toHaveLength(4);
    expect(tokens.slice(7, 11)).toEqual(["Bar_None", "Bar_None", "TimeSig_4/4", "Position_0"]);
    expect(tokens.slice(15, 17)).toEqual(["Position_8", "Program_0"]);
    expect(tokens.slice(20)).toEqual([
      "Bar_None", "TimeSig_4/4", "Position_0", "Program_0", "Pitch_65", "Velocity_100", "Duration_1.0",
    ]);
  });

  it("derives the first bar length from the opening signature", () => {
    // 3/4 at 480 tpq: bar = 1440 ticks, so tick 1440 opens bar 1.
    const tokens = encode(
      {
        notes: [note(60, 0, 480), note(62, 1440, 1920)],
        timeSignatures: [{ numerator: 3, denominator: 4, tick: 0 }],
      },
      { tokens: { timeSignature: true } },
    );
    expect(tokens.slice(7, 10)).toEqual(["Bar_None", "TimeSig_3/4", "Position_0"]);
  });
});

describe("encodeEvents with chords", () => {
  it("puts the chord before the notes it sits on", () => {
    const tokens = encodeTokens(
      {
        notes: [note(60, 0, 384), note(64, 0, 384), note(67, 0, 384)],
        timeDivision: 384,
        tempos: [],
        timeSignatures: [],
        chords: [{ tick: 0, label: "maj" }],
      },
      parseConfig({ tokens: { chord: true } }),
    );
    expect(tokens.slice(0, 5)).toEqual(["Bar_None", "Position_0", "Chord_maj", "Position_0", "Program_0"]);
    expect(tokens).toHaveLength(18);
  });

  it("ignores chords when the family is off", () => {
    const events = encodeEvents(
      {
        notes: [note(60, 0, 384)],
        timeDivision: 384,
        tempos: [],
        timeSignatures: [],
        chords: [{ tick: 0, label: "maj" }],
      },
      parseConfig({}),
    );
    expect(events.some(e => e.type === "Chord")).toBe(false);
  });
});

describe("sortEvents", () => {
  it("puts a Bar before a tempo Position on the same tick", () => {
    const position: Event = { type: "Position", value: "0", tick: 1920, role: "tempo-position" };
    const bar: Event = { type: "Bar", value: "None", tick: 1920, role: "bar" };
    expect(sortEvents([position, bar])).toEqual([bar, position]);
    expect(sortEvents([bar, position])).toEqual([bar, position]);
  });

  it("keeps note events in insertion order", () => {
    const a: Event = { type: "Pitch", value: "64", tick: 0, role: "note" };
    const b: Event = { type: "Position", value: "0", tick: 0, role: "note" };
    expect(sortEvents([a, b])).toEqual([a, b]);
  });

  it("orders by tick first", () => {
    const late: Event = { type: "Bar", value: "None", tick: 10, role: "bar" };
    const early: Event = { type: "Pitch", value: "60", tick: 0, role: "note" };
    expect(sortEvents([late, early])).toEqual([early, late]);
  });
});
