/**
 * Movie builder: validates a configuration, runs every generator on its own
 * random sub-stream and returns the movie with all of its ground truth.
 */
import { createCalciumFilter } from "./calcium";
import { compositeMovie } from "./compositor";
import { type MovieConfigInput, parseMovieConfig } from "./config";
import { GenerationExhaustedError } from "./errors";
import { generateFootprint } from "./footprint";
import { randomMotion } from "./motion";
import { randomSeed, subStream } from "./rng";
import { createSpikeGenerator } from "./spikes";
import type {
  CalciumTrace,
  CellFootprint,
  Diagnostic,
  Logger,
  MovieResult,
  SpikeTrain,
} from "./types";

export type BuildOptions = {
  /** Receives diagnostic warnings; defaults to the console. */
  logger?: Logger;
};

/**
 * Runs the whole pipeline. Throws `InvalidParameterError` for a bad
 * configuration and `GenerationExhaustedError` when a cell never spikes
 * within the retry cap; nothing is returned in either case.
 */
export function buildMovie(input: MovieConfigInput = {}, options: BuildOptions = {}): MovieResult {
  const config = parseMovieConfig(input);
  const logger = options.logger ?? console;
  const seed = config.rngSeed ?? randomSeed();
  const diagnostics: Diagnostic[] = [];
  const report = (d: Diagnostic) => {
    diagnostics.push(d);
    logger.warn(d.message);
  };

  const { numCells, numFrames, height, width, calcium } = config;
  const spikeGenerator = createSpikeGenerator(config.spikes, config.maxSpikeRetries);
  const calciumFilter = createCalciumFilter(calcium);
  if (calcium.tauDecay <= calcium.tauRise) {
    report({
      kind: "tau-order",
      message: `tauDecay (${calcium.tauDecay}) should exceed tauRise (${calcium.tauRise})`,
    });
  }

  const motion = randomMotion(numFrames, config.maxShift, config.motionSmoothingSigma, subStream(seed, "motion"));

  const footprints: CellFootprint[] = [];
  for (let c = 0; c < numCells; c += 1) {
    const footprint = generateFootprint(height, width, subStream(seed, "footprint", c), config.footprintSigmaRange);
    if (footprint.degenerate) {
      report({
        kind: "degenerate-footprint",
        cellIndex: c,
        message: `footprint of cell ${c} is flat; left unscaled after min subtraction`,
      });
    }
    footprints.push(footprint);
  }

  const spikes: SpikeTrain[] = [];
  const traces: CalciumTrace[] = [];
  for (let c = 0; c < numCells; c += 1) {
    let train: SpikeTrain;
    try {
      train = spikeGenerator.generate(numFrames, subStream(seed, "spikes", c));
    } catch (err) {
      if (err instanceof GenerationExhaustedError) {
        throw new GenerationExhaustedError(err.strategy, err.attempts, c);
      }
      throw err;
    }
    spikes.push(train);
    traces.push(calciumFilter.apply(train));
  }

  const movie = compositeMovie(
    {
      height,
      width,
      footprints,
      traces,
      motion,
      backgroundStrength: config.backgroundStrength,
      noiseSigma: config.noiseSigma,
      cellSnr: config.cellSnr,
    },
    (t) => subStream(seed, "noise", t),
  );

  return { movie, footprints, traces, spikes, motion, seed, diagnostics };
}
