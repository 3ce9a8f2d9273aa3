// ─── Tokenizer Config Schema ─────────────────────────────────────────────────
//
// Everything that shapes the token alphabet: pitch range, beat resolution
// table, velocity / tempo bins, optional token families and bar bound.
// Two tokenizers built from equal configs produce identical vocabularies.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";

// ─── Zod Schemas ─────────────────────────────────────────────────────────────

/** Resolution (samples per beat) applied to durations in [start, end) beats. */
export const BeatRangeSchema = z.object({
  start: z.number().int().min(0),
  end: z.number().int().min(1),
  resolution: z.number().int().min(1),
});

export const PitchRangeSchema = z
  .object({
    min: z.number().int().min(0).max(127),
    max: z.number().int().min(0).max(127),
  })
  .refine((r) => r.min <= r.max, { message: "min must not exceed max" });

export const TokenFamiliesSchema = z.object({
  chord: z.boolean().default(false),
  rest: z.boolean().default(false),
  tempo: z.boolean().default(false),
  timeSignature: z.boolean().default(false),
});

export const TimeSignatureRangeSchema = z.object({
  maxDenominator: z
    .number()
    .int()
    .min(1)
    .refine((d) => Number.isInteger(Math.log2(d)), {
      message: "maxDenominator must be a power of two",
    }),
  notesPerDenominator: z.number().int().min(1),
});

export const TokenizerConfigSchema = z
  .object({
    pitchRange: PitchRangeSchema.default({ min: 21, max: 108 }),
    beatResolution: z.array(BeatRangeSchema).min(1).default([
      { start: 0, end: 4, resolution: 8 },
      { start: 4, end: 12, resolution: 4 },
    ]),
    velocityBins: z.number().int().min(1).max(127).default(32),
    tokens: TokenFamiliesSchema.default({}),
    tempoBins: z.number().int().min(1).default(32),
    tempoRange: z
      .tuple([z.number().positive(), z.number().positive()])
      .default([40, 250]),
    timeSignatureRange: TimeSignatureRangeSchema.default({
      maxDenominator: 8,
      notesPerDenominator: 2,
    }),
    specialTokens: z.array(z.string().regex(/^[A-Za-z]+$/)).default(["PAD", "BOS", "EOS", "MASK"]),
    numBars: z.number().int().min(1).optional(),
    syncBarLengthToTimeSignature: z.boolean().default(false),
  })
  .superRefine((config, ctx) => {
    let expectedStart = 0;
    config.beatResolution.forEach((range, i) => {
      if (range.start !== expectedStart) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["beatResolution", i, "start"],
          message: `beat ranges must be contiguous from 0 (expected start ${expectedStart})`,
        });
      }
      if (range.end <= range.start) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["beatResolution", i, "end"],
          message: "end must be greater than start",
        });
      }
      expectedStart = range.end;
    });
    if (config.tempoRange[0] > config.tempoRange[1]) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["tempoRange"],
        message: "tempo range must be ascending",
      });
    }
  });

// ─── Derived Types ───────────────────────────────────────────────────────────

/** A fully resolved config (every default filled in). */
export type TokenizerConfig = z.infer<typeof TokenizerConfigSchema>;
/** What callers may pass: any subset of the fields. */
export type TokenizerConfigInput = z.input<typeof TokenizerConfigSchema>;
export type BeatRange = z.infer<typeof BeatRangeSchema>;
export type TokenFamilies = z.infer<typeof TokenFamiliesSchema>;

// ─── Validation ──────────────────────────────────────────────────────────────

export interface ConfigError {
  field: string;
  message: string;
}

/**
 * Validate a raw config object. Returns an empty array if valid.
 */
export function validateConfig(config: unknown): ConfigError[] {
  const result = TokenizerConfigSchema.safeParse(config);
  if (result.success) return [];

  return result.error.issues.map((issue) => ({
    field: issue.path.join(".") || "root",
    message: issue.message,
  }));
}

/**
 * Parse a raw config, filling defaults. Throws listing every issue.
 */
export function parseConfig(config: unknown = {}): TokenizerConfig {
  const result = TokenizerConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues
      .map(i => `  ${i.path.join(".") || "root"}: ${i.message}`)
      .join("\n");
    throw new Error(`Invalid tokenizer config:\n${issues}`);
  }
  return result.data;
}

/** Highest resolution across the beat ranges (samples per beat). */
export function maxResolution(config: TokenizerConfig): number {
  return Math.max(...config.beatResolution.map(r => r.resolution));
}
