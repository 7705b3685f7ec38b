export { buildMovie } from "./core/movie";
export type { BuildOptions } from "./core/movie";
export {
  CalciumConfigSchema,
  HawkesSpikeSchema,
  MarkovSpikeSchema,
  MovieConfigSchema,
  SpikeConfigSchema,
  parseMovieConfig,
} from "./core/config";
export type { MovieConfig, MovieConfigInput } from "./core/config";
export {
  DEFAULT_HAWKES,
  DEFAULT_MAX_SPIKE_RETRIES,
  DEFAULT_TRANSITION_MATRIX,
  burstiness,
  countSpikes,
  createHawkesSpikeGenerator,
  createMarkovSpikeGenerator,
  createSpikeGenerator,
} from "./core/spikes";
export type { SpikeGenerator, SpikeParams } from "./core/spikes";
export {
  ar2Coefficients,
  applyAr2Filter,
  applyBiExponentialFilter,
  biExponentialKernel,
  createCalciumFilter,
} from "./core/calcium";
export type { CalciumFilter, CalciumParams } from "./core/calcium";
export {
  FOOTPRINT_PADDING,
  MIN_FRAME_SIZE,
  gaussianEnvelope,
  gaussianFootprint,
  generateFootprint,
  normalizeFootprint,
} from "./core/footprint";
export type { SigmaRange } from "./core/footprint";
export { gaussianKernel1d, gaussianSmooth1d, randomMotion } from "./core/motion";
export { compositeMovie, quantizePixel, rawFrame, shiftFrame } from "./core/compositor";
export type { CompositeInput } from "./core/compositor";
export { deriveSeed, makeRng, randInt, randNormal, randUniform, randomSeed, subStream } from "./core/rng";
export type { StreamName } from "./core/rng";
export { GenerationExhaustedError, InvalidParameterError } from "./core/errors";
export type { ParameterIssue } from "./core/errors";
export { BUILTIN_PRESETS, createGeneratorStore, generatorStore } from "./core/store";
export type { GenerationStatus, GeneratorStore, Preset } from "./core/store";
export type * from "./core/types";
