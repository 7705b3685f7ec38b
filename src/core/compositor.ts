import { InvalidParameterError } from "./errors";
import { randNormal } from "./rng";
import type { CalciumTrace, CellFootprint, Movie, MotionTrajectory, Rng } from "./types";

export type CompositeInput = {
  height: number;
  width: number;
  footprints: readonly CellFootprint[];
  traces: readonly CalciumTrace[];
  motion: MotionTrajectory;
  backgroundStrength: number;
  noiseSigma: number;
  /** Multiplier on every cell's contribution; 1 leaves traces unscaled. */
  cellSnr?: number;
};

function clamp(v: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, v));
}

/** Clip to [0, 255] then truncate, as an unsigned 8-bit cast does. */
export function quantizePixel(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.floor(clamp(value, 0, 255));
}

/**
 * Integer translation by (dy, dx): destination (y, x) reads source
 * (y - dy, x - dx), and pixels with no source take `fill`. Never wraps.
 */
export function shiftFrame(
  frame: Float32Array,
  height: number,
  width: number,
  dy: number,
  dx: number,
  fill = 0,
): Float32Array {
  const out = new Float32Array(height * width).fill(fill);
  const yStart = Math.max(0, dy);
  const yEnd = Math.min(height, height + dy);
  const xStart = Math.max(0, dx);
  const xEnd = Math.min(width, width + dx);
  for (let y = yStart; y < yEnd; y += 1) {
    const srcRow = (y - dy) * width;
    const dstRow = y * width;
    for (let x = xStart; x < xEnd; x += 1) {
      out[dstRow + x] = frame[srcRow + x - dx];
    }
  }
  return out;
}

function assertCompositeInput(input: CompositeInput, frames: number): void {
  const { footprints, traces, height, width, motion } = input;
  if (motion.dx.length !== frames) {
    throw new InvalidParameterError("motion", "dy and dx must have one entry per frame");
  }
  if (footprints.length !== traces.length) {
    throw new InvalidParameterError("traces", `expected ${footprints.length} traces, got ${traces.length}`);
  }
  footprints.forEach((fp, i) => {
    if (fp.height !== height || fp.width !== width || fp.data.length !== height * width) {
      throw new InvalidParameterError(`footprints.${i}`, `footprint must be ${height}x${width}`);
    }
  });
  traces.forEach((trace, i) => {
    if (trace.length !== frames) {
      throw new InvalidParameterError(`traces.${i}`, `trace must have ${frames} frames`);
    }
  });
  if (!(input.noiseSigma >= 0)) {
    throw new InvalidParameterError("noiseSigma", "must be >= 0");
  }
}

/** Noise-free, unshifted frame t: background plus every cell's trace-weighted footprint. */
export function rawFrame(input: CompositeInput, t: number): Float32Array {
  const snr = input.cellSnr ?? 1;
  const frame = new Float32Array(input.height * input.width).fill(input.backgroundStrength);
  for (let c = 0; c < input.footprints.length; c += 1) {
    const gain = input.traces[c][t] * snr;
    if (gain === 0) continue;
    const fp = input.footprints[c].data;
    for (let i = 0; i < frame.length; i += 1) {
      frame[i] += gain * fp[i];
    }
  }
  return frame;
}

/**
 * Renders the 8-bit movie. `noiseRng(t)` supplies the random source for
 * frame t; it is not called when `noiseSigma` is 0.
 */
export function compositeMovie(input: CompositeInput, noiseRng: (frame: number) => Rng): Movie {
  const frames = input.motion.dy.length;
  assertCompositeInput(input, frames);
  const { height, width, backgroundStrength, noiseSigma } = input;
  const plane = height * width;
  const data = new Uint8Array(frames * plane);

  for (let t = 0; t < frames; t += 1) {
    const moved = shiftFrame(
      rawFrame(input, t),
      height,
      width,
      input.motion.dy[t],
      input.motion.dx[t],
      backgroundStrength,
    );
    const rng = noiseSigma > 0 ? noiseRng(t) : null;
    const offset = t * plane;
    for (let i = 0; i < plane; i += 1) {
      const v = rng ? moved[i] + noiseSigma * randNormal(rng) : moved[i];
      data[offset + i] = quantizePixel(v);
    }
  }
  return { frames, height, width, data };
}
