import { GenerationExhaustedError, InvalidParameterError } from "./errors";
import type { HawkesParameters, Rng, SpikeStrategy, SpikeTrain, TransitionMatrix } from "./types";

export const DEFAULT_TRANSITION_MATRIX: TransitionMatrix = [
  [0.98, 0.02],
  [0.02, 0.98],
];

export const DEFAULT_HAWKES: HawkesParameters = { mu: 0.01, alpha: 0.05, tau: 10 };

export const DEFAULT_MAX_SPIKE_RETRIES = 1000;

export type MarkovSpikeParams = {
  strategy: "markov";
  transitionMatrix: TransitionMatrix;
};

export type HawkesSpikeParams = { strategy: "hawkes" } & HawkesParameters;

export type SpikeParams = MarkovSpikeParams | HawkesSpikeParams;

export interface SpikeGenerator {
  readonly strategy: SpikeStrategy;
  /** Binary train of `frameCount` frames with at least one spike. */
  generate(frameCount: number, rng: Rng): SpikeTrain;
}

/** Same tolerance as an all-close comparison against 1: 1e-8 absolute plus 1e-5 relative. */
export function rowSumsToOne(row: readonly number[]): boolean {
  const sum = row.reduce((acc, v) => acc + v, 0);
  return Math.abs(sum - 1) <= 1e-8 + 1e-5;
}

export function assertTransitionMatrix(m: readonly (readonly number[])[]): asserts m is TransitionMatrix {
  if (m.length !== 2 || m.some((row) => row.length !== 2)) {
    throw new InvalidParameterError("spikes.transitionMatrix", "transition matrix must be 2x2");
  }
  m.forEach((row, i) => {
    if (row.some((p) => !Number.isFinite(p) || p < 0 || p > 1)) {
      throw new InvalidParameterError(
        `spikes.transitionMatrix.${i}`,
        "transition probabilities must lie in [0, 1]",
      );
    }
    if (!rowSumsToOne(row)) {
      throw new InvalidParameterError(`spikes.transitionMatrix.${i}`, `row ${i} must sum to 1`);
    }
  });
}

export function assertHawkesParameters(p: HawkesParameters): void {
  if (!(p.mu > 0 && p.mu < 1)) {
    throw new InvalidParameterError("spikes.mu", "baseline rate must lie in (0, 1)");
  }
  if (!(p.alpha > 0) || !Number.isFinite(p.alpha)) {
    throw new InvalidParameterError("spikes.alpha", "excitation strength must be positive");
  }
  if (!(p.tau > 0) || !Number.isFinite(p.tau)) {
    throw new InvalidParameterError("spikes.tau", "decay time constant must be positive");
  }
}

function assertRetries(maxRetries: number): void {
  if (!Number.isInteger(maxRetries) || maxRetries < 1) {
    throw new InvalidParameterError("maxSpikeRetries", "retry cap must be a positive integer");
  }
}

export function countSpikes(train: SpikeTrain): number {
  let n = 0;
  for (let i = 0; i < train.length; i += 1) n += train[i];
  return n;
}

/** Fraction of spikes whose preceding frame also spiked. */
export function burstiness(train: SpikeTrain): number {
  let spikes = 0;
  let runs = 0;
  for (let i = 0; i < train.length; i += 1) {
    if (train[i] !== 1) continue;
    spikes += 1;
    if (i > 0 && train[i - 1] === 1) runs += 1;
  }
  return spikes > 0 ? runs / spikes : 0;
}

function markovDraw(frameCount: number, matrix: TransitionMatrix, rng: Rng): SpikeTrain {
  const states = new Uint8Array(frameCount);
  for (let i = 1; i < frameCount; i += 1) {
    const row = matrix[states[i - 1]];
    states[i] = rng() < row[0] ? 0 : 1;
  }
  return states;
}

function hawkesDraw(frameCount: number, p: HawkesParameters, rng: Rng): SpikeTrain {
  const spikes = new Uint8Array(frameCount);
  const decay = Math.exp(-1.0 / p.tau);
  // excite holds sum_{k<i, s_k=1} alpha * exp(-(i-k)/tau)
  let excite = 0;
  for (let i = 0; i < frameCount; i += 1) {
    const lambda = Math.min(p.mu + excite, 1.0);
    if (rng() < lambda) {
      spikes[i] = 1;
      excite += p.alpha;
    }
    excite *= decay;
  }
  return spikes;
}

function withRejection(
  strategy: SpikeStrategy,
  maxRetries: number,
  draw: () => SpikeTrain,
): SpikeTrain {
  for (let attempt = 0; attempt < maxRetries; attempt += 1) {
    const train = draw();
    if (countSpikes(train) > 0) return train;
  }
  throw new GenerationExhaustedError(strategy, maxRetries);
}

export function createMarkovSpikeGenerator(
  matrix: TransitionMatrix,
  maxRetries = DEFAULT_MAX_SPIKE_RETRIES,
): SpikeGenerator {
  assertTransitionMatrix(matrix);
  assertRetries(maxRetries);
  return {
    strategy: "markov",
    generate: (frameCount, rng) => withRejection("markov", maxRetries, () => markovDraw(frameCount, matrix, rng)),
  };
}

export function createHawkesSpikeGenerator(
  params: HawkesParameters,
  maxRetries = DEFAULT_MAX_SPIKE_RETRIES,
): SpikeGenerator {
  assertHawkesParameters(params);
  assertRetries(maxRetries);
  const p: HawkesParameters = { mu: params.mu, alpha: params.alpha, tau: params.tau };
  return {
    strategy: "hawkes",
    generate: (frameCount, rng) => withRejection("hawkes", maxRetries, () => hawkesDraw(frameCount, p, rng)),
  };
}

export function createSpikeGenerator(params: SpikeParams, maxRetries = DEFAULT_MAX_SPIKE_RETRIES): SpikeGenerator {
  if (params.strategy === "markov") {
    return createMarkovSpikeGenerator(params.transitionMatrix, maxRetries);
  }
  return createHawkesSpikeGenerator(params, maxRetries);
}
