import { InvalidParameterError } from "./errors";
import type { CalciumStrategy, CalciumTrace, SpikeTrain } from "./types";

export type CalciumParams = {
  strategy: CalciumStrategy;
  tauDecay: number;
  tauRise: number;
};

export interface CalciumFilter {
  readonly strategy: CalciumStrategy;
  apply(spikes: SpikeTrain): CalciumTrace;
}

function assertTau(name: string, tau: number): void {
  if (!(tau > 0) || !Number.isFinite(tau)) {
    throw new InvalidParameterError(`calcium.${name}`, "time constant must be positive");
  }
}

/**
 * AR(2) feedback coefficients for the given decay and rise time constants
 * (in frames): theta1 = z1 + z2, theta2 = -z1 * z2 with z = exp(-1 / tau).
 */
export function ar2Coefficients(tauDecay: number, tauRise: number): [number, number] {
  const z1 = Math.exp(-1.0 / tauDecay);
  const z2 = Math.exp(-1.0 / tauRise);
  return [z1 + z2, -z1 * z2];
}

export function applyAr2Filter(spikes: SpikeTrain, theta: readonly [number, number]): CalciumTrace {
  const [theta1, theta2] = theta;
  const c = new Float64Array(spikes.length);
  for (let n = 0; n < spikes.length; n += 1) {
    if (n === 0) {
      c[n] = spikes[n];
    } else if (n === 1) {
      c[n] = spikes[n] + theta1 * c[n - 1];
    } else {
      c[n] = spikes[n] + theta1 * c[n - 1] + theta2 * c[n - 2];
    }
  }
  return Float32Array.from(c);
}

export function biExponentialKernel(length: number, tauDecay: number, tauRise: number): Float64Array {
  const k = new Float64Array(length);
  for (let t = 0; t < length; t += 1) {
    k[t] = Math.exp(-t / tauDecay) - Math.exp(-t / tauRise);
  }
  return k;
}

/** First N samples of the full linear convolution of the spikes with the bi-exponential kernel. */
export function applyBiExponentialFilter(spikes: SpikeTrain, tauDecay: number, tauRise: number): CalciumTrace {
  const n = spikes.length;
  const kernel = biExponentialKernel(n, tauDecay, tauRise);
  const out = new Float64Array(n);
  for (let k = 0; k < n; k += 1) {
    if (spikes[k] === 0) continue;
    const s = spikes[k];
    for (let t = k; t < n; t += 1) {
      out[t] += s * kernel[t - k];
    }
  }
  return Float32Array.from(out);
}

export function createCalciumFilter(params: CalciumParams): CalciumFilter {
  const { strategy, tauDecay, tauRise } = params;
  assertTau("tauDecay", tauDecay);
  assertTau("tauRise", tauRise);
  if (strategy === "ar2") {
    const theta = ar2Coefficients(tauDecay, tauRise);
    return { strategy, apply: (spikes) => applyAr2Filter(spikes, theta) };
  }
  return { strategy, apply: (spikes) => applyBiExponentialFilter(spikes, tauDecay, tauRise) };
}
