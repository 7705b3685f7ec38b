import { z } from "zod";
import { InvalidParameterError, type ParameterIssue } from "./errors";
import { MIN_FRAME_SIZE } from "./footprint";
import { DEFAULT_HAWKES, DEFAULT_MAX_SPIKE_RETRIES, DEFAULT_TRANSITION_MATRIX, rowSumsToOne } from "./spikes";

const positiveFinite = z.number().finite().positive();
const nonNegativeFinite = z.number().finite().min(0);
const probability = z.number().min(0).max(1);

const TransitionRow = z
  .tuple([probability, probability])
  .refine(rowSumsToOne, { message: "transition matrix rows must sum to 1" });

export const MarkovSpikeSchema = z.object({
  strategy: z.literal("markov"),
  transitionMatrix: z
    .tuple([TransitionRow, TransitionRow])
    .default((): [[number, number], [number, number]] => [[...DEFAULT_TRANSITION_MATRIX[0]], [...DEFAULT_TRANSITION_MATRIX[1]]]),
});

export const HawkesSpikeSchema = z.object({
  strategy: z.literal("hawkes"),
  mu: z.number().gt(0).lt(1).default(DEFAULT_HAWKES.mu),
  alpha: positiveFinite.default(DEFAULT_HAWKES.alpha),
  tau: positiveFinite.default(DEFAULT_HAWKES.tau),
});

export const SpikeConfigSchema = z.discriminatedUnion("strategy", [MarkovSpikeSchema, HawkesSpikeSchema]);

export const CalciumConfigSchema = z.object({
  strategy: z.enum(["ar2", "biexp"]).default("ar2"),
  tauDecay: positiveFinite.default(10),
  tauRise: positiveFinite.default(4),
});

const frameSize = z.number().int().min(MIN_FRAME_SIZE, {
  message: `frames must be at least ${MIN_FRAME_SIZE} pixels to fit the footprint padding`,
});

export const MovieConfigSchema = z.object({
  numCells: z.number().int().positive().default(45),
  numFrames: z.number().int().positive().default(200),
  height: frameSize.default(512),
  width: frameSize.default(512),
  spikes: SpikeConfigSchema.default({ strategy: "markov" }),
  calcium: CalciumConfigSchema.default({}),
  cellSnr: positiveFinite.default(1),
  backgroundStrength: nonNegativeFinite.default(0.1),
  motionSmoothingSigma: nonNegativeFinite.default(5),
  maxShift: nonNegativeFinite.default(0),
  noiseSigma: nonNegativeFinite.default(5),
  footprintSigmaRange: z
    .tuple([positiveFinite, positiveFinite])
    .refine(([lo, hi]) => lo <= hi, { message: "sigma range must be ordered low <= high" })
    .default([3, 4]),
  rngSeed: z.number().int().min(0).max(0xffffffff).optional(),
  maxSpikeRetries: z.number().int().positive().default(DEFAULT_MAX_SPIKE_RETRIES),
});

export type MovieConfigInput = z.input<typeof MovieConfigSchema>;
export type MovieConfig = z.output<typeof MovieConfigSchema>;

export function parseMovieConfig(input: unknown): MovieConfig {
  const parsed = MovieConfigSchema.safeParse(input ?? {});
  if (parsed.success) return parsed.data;
  const issues: ParameterIssue[] = parsed.error.issues.map((issue) => ({
    parameter: issue.path.length > 0 ? issue.path.join(".") : "config",
    message: issue.message,
  }));
  const [first] = issues;
  throw new InvalidParameterError(first.parameter, first.message, issues);
}
