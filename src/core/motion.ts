import { InvalidParameterError } from "./errors";
import { randNormal } from "./rng";
import type { MotionTrajectory, Rng } from "./types";

/** Kernel truncated at four standard deviations, weights summing to 1. */
export function gaussianKernel1d(sigma: number): Float64Array {
  const radius = Math.floor(4.0 * sigma + 0.5);
  const out = new Float64Array(2 * radius + 1);
  const inv2sigma2 = 1.0 / (2.0 * sigma * sigma);
  let sum = 0;
  for (let i = -radius; i <= radius; i += 1) {
    const w = Math.exp(-i * i * inv2sigma2);
    out[i + radius] = w;
    sum += w;
  }
  for (let i = 0; i < out.length; i += 1) out[i] /= sum;
  return out;
}

// half-sample symmetric: d c b a | a b c d | d c b a
function reflectIndex(i: number, n: number): number {
  const period = 2 * n;
  const m = ((i % period) + period) % period;
  return m < n ? m : period - m - 1;
}

export function gaussianSmooth1d(signal: Float64Array, sigma: number): Float64Array {
  if (!(sigma > 0) || signal.length === 0) return signal.slice();
  const kernel = gaussianKernel1d(sigma);
  const radius = (kernel.length - 1) / 2;
  const n = signal.length;
  const out = new Float64Array(n);
  for (let i = 0; i < n; i += 1) {
    let acc = 0;
    for (let k = -radius; k <= radius; k += 1) {
      acc += kernel[k + radius] * signal[reflectIndex(i + k, n)];
    }
    out[i] = acc;
  }
  return out;
}

function smoothedAxis(frameCount: number, std: number, sigma: number, rng: Rng): Int32Array {
  const raw = new Float64Array(frameCount);
  for (let i = 0; i < frameCount; i += 1) {
    raw[i] = std * randNormal(rng);
  }
  const smooth = gaussianSmooth1d(raw, sigma);
  // Int32Array storage also folds -0 into 0
  return Int32Array.from(smooth, (v) => Math.round(v));
}

/**
 * Per-frame integer drift. Gaussian noise with std `maxShift / 3` on each
 * axis, smoothed along time so consecutive frames move together.
 */
export function randomMotion(
  frameCount: number,
  maxShift: number,
  smoothingSigma: number,
  rng: Rng,
): MotionTrajectory {
  if (!(maxShift >= 0) || !Number.isFinite(maxShift)) {
    throw new InvalidParameterError("maxShift", "must be a finite value >= 0");
  }
  if (!(smoothingSigma >= 0) || !Number.isFinite(smoothingSigma)) {
    throw new InvalidParameterError("motionSmoothingSigma", "must be a finite value >= 0");
  }
  const std = maxShift / 3.0;
  const dy = smoothedAxis(frameCount, std, smoothingSigma, rng);
  const dx = smoothedAxis(frameCount, std, smoothingSigma, rng);
  return { dy, dx };
}
