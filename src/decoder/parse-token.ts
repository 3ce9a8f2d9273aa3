// ─── Token Parser ────────────────────────────────────────────────────────────
//
// Parses each `Type_Value` string once into a tagged value, so the decoder
// never re-splits strings. Numeric payloads that do not parse mean the
// alphabet itself is corrupt and raise TokenFormatError. Unknown types are
// kept as "Other" and ignored downstream.
// ─────────────────────────────────────────────────────────────────────────────

export type ParsedToken =
  | { type: "Bar"; index: number | null }
  | { type: "Position"; index: number }
  | { type: "Program"; program: number }
  | { type: "Pitch"; pitch: number }
  | { type: "Velocity"; velocity: number }
  | { type: "Duration"; beats: number; subdivision: number }
  | { type: "Rest"; beats: number; subdivision: number }
  | { type: "TimeSig"; numerator: number; denominator: number }
  | { type: "Tempo"; tempo: number }
  | { type: "Chord"; label: string }
  | { type: "Other"; name: string; value: string };

export class TokenFormatError extends Error {
  constructor(
    readonly token: string,
    reason: string,
  ) {
    super(`Malformed token "${token}": ${reason}`);
    this.name = "TokenFormatError";
  }
}

/**
 * Parse one token string.
 */
export function parseToken(token: string): ParsedToken {
  const sep = token.indexOf("_");
  if (sep === -1) {
    throw new TokenFormatError(token, "expected Type_Value");
  }
  const name = token.slice(0, sep);
  const value = token.slice(sep + 1);

  switch (name) {
    case "Bar":
      return { type: "Bar", index: value === "None" ? null : parseInteger(token, value) };
    case "Position":
      return { type: "Position", index: parseInteger(token, value) };
    case "Program":
      return { type: "Program", program: parseInteger(token, value) };
    case "Pitch":
      return { type: "Pitch", pitch: parseInteger(token, value) };
    case "Velocity":
      return { type: "Velocity", velocity: parseInteger(token, value) };
    case "Duration":
    case "Rest": {
      const [beats, subdivision] = parsePair(token, value, ".");
      return name === "Duration"
        ? { type: "Duration", beats, subdivision }
        : { type: "Rest", beats, subdivision };
    }
    case "TimeSig": {
      const [numerator, denominator] = parsePair(token, value, "/");
      if (numerator < 1 || denominator < 1) {
        throw new TokenFormatError(token, "time signature parts must be positive");
      }
      return { type: "TimeSig", numerator, denominator };
    }
    case "Tempo": {
      const tempo = Number(value);
      if (value.trim() === "" || !Number.isFinite(tempo)) {
        throw new TokenFormatError(token, `"${value}" is not a number`);
      }
      return { type: "Tempo", tempo };
    }
    case "Chord":
      return { type: "Chord", label: value };
    default:
      return { type: "Other", name, value };
  }
}

/** Parse a whole sequence up front. */
export function parseTokens(tokens: readonly string[]): ParsedToken[] {
  return tokens.map(parseToken);
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function parseInteger(token: string, value: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new TokenFormatError(token, `"${value}" is not an integer`);
  }
  return parseInt(value, 10);
}

function parsePair(token: string, value: string, separator: string): [number, number] {
  const parts = value.split(separator);
  if (parts.length !== 2) {
    throw new TokenFormatError(token, `expected two values separated by "${separator}"`);
  }
  return [parseInteger(token, parts[0]), parseInteger(token, parts[1])];
}
