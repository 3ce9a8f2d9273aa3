// ─── General MIDI Programs ───────────────────────────────────────────────────
//
// Program-number → instrument name, read once from data/general-midi.json.
// ─────────────────────────────────────────────────────────────────────────────

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { DRUM_PROGRAM } from "../types.js";

const GeneralMidiSchema = z.object({
  programs: z.array(z.string().min(1)).length(128),
});

const DATA_PATH = fileURLToPath(new URL("../../data/general-midi.json", import.meta.url));

let programNames: readonly string[] | null = null;

function loadProgramNames(): readonly string[] {
  if (programNames === null) {
    const raw: unknown = JSON.parse(readFileSync(DATA_PATH, "utf8"));
    programNames = GeneralMidiSchema.parse(raw).programs;
  }
  return programNames;
}

/**
 * Display name of a program bucket: "Drums" for -1, the General MIDI
 * instrument name for 0-127.
 */
export function programName(program: number): string {
  if (program === DRUM_PROGRAM) return "Drums";
  const name = loadProgramNames()[program];
  if (name === undefined) {
    throw new Error(`Program out of range: ${program} (expected -1..127)`);
  }
  return name;
}
