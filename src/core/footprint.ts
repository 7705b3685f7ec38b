import { InvalidParameterError } from "./errors";
import { randInt, randUniform } from "./rng";
import type { CellFootprint, Point2, Rng } from "./types";

/** Minimum distance in pixels between a footprint center and the frame border. */
export const FOOTPRINT_PADDING = 5;

export const MIN_FRAME_SIZE = 2 * FOOTPRINT_PADDING + 1;

export type SigmaRange = readonly [number, number];

/**
 * Unit-peak Gaussian envelope, row-major, in double precision. Offsets are
 * divided by sigma before squaring so an extreme sigma cannot produce
 * `0 * Infinity` at the center.
 */
export function gaussianEnvelope(
  height: number,
  width: number,
  center: Point2,
  sigmaY: number,
  sigmaX: number,
): Float64Array {
  const out = new Float64Array(height * width);
  let i = 0;
  for (let y = 0; y < height; y += 1) {
    const ry = (y - center.y) / sigmaY;
    for (let x = 0; x < width; x += 1) {
      const rx = (x - center.x) / sigmaX;
      out[i] = Math.exp(-0.5 * (ry * ry + rx * rx));
      i += 1;
    }
  }
  return out;
}

/** Axis-aligned bivariate normal density evaluated on every pixel, row-major. */
export function gaussianFootprint(
  height: number,
  width: number,
  center: Point2,
  sigmaY: number,
  sigmaX: number,
): Float64Array {
  const out = gaussianEnvelope(height, width, center, sigmaY, sigmaX);
  const norm = 1.0 / (2.0 * Math.PI * sigmaY * sigmaX);
  for (let i = 0; i < out.length; i += 1) out[i] *= norm;
  return out;
}

/**
 * Min-max scaling to [0, 1], computed in double precision and stored as
 * float32. When max equals min the values are only shifted by the minimum
 * and the footprint is reported as degenerate.
 */
export function normalizeFootprint(data: ArrayLike<number>): { data: Float32Array; degenerate: boolean } {
  let minV = Number.POSITIVE_INFINITY;
  let maxV = Number.NEGATIVE_INFINITY;
  for (let i = 0; i < data.length; i += 1) {
    if (data[i] < minV) minV = data[i];
    if (data[i] > maxV) maxV = data[i];
  }
  const out = new Float32Array(data.length);
  const degenerate = !(maxV > minV);
  const den = maxV - minV;
  for (let i = 0; i < data.length; i += 1) {
    out[i] = degenerate ? data[i] - minV : (data[i] - minV) / den;
  }
  return { data: out, degenerate };
}

export function assertFrameSize(height: number, width: number): void {
  if (!Number.isInteger(height) || height < MIN_FRAME_SIZE) {
    throw new InvalidParameterError("height", `must be an integer of at least ${MIN_FRAME_SIZE} pixels`);
  }
  if (!Number.isInteger(width) || width < MIN_FRAME_SIZE) {
    throw new InvalidParameterError("width", `must be an integer of at least ${MIN_FRAME_SIZE} pixels`);
  }
}

export function assertSigmaRange(range: SigmaRange): void {
  const [lo, hi] = range;
  if (!(lo > 0) || !(hi >= lo) || !Number.isFinite(hi)) {
    throw new InvalidParameterError("footprintSigmaRange", "expected 0 < low <= high");
  }
}

export function generateFootprint(
  height: number,
  width: number,
  rng: Rng,
  sigmaRange: SigmaRange,
): CellFootprint {
  assertFrameSize(height, width);
  assertSigmaRange(sigmaRange);
  const center: Point2 = {
    y: randInt(rng, FOOTPRINT_PADDING, height - FOOTPRINT_PADDING),
    x: randInt(rng, FOOTPRINT_PADDING, width - FOOTPRINT_PADDING),
  };
  const sigmaY = randUniform(rng, sigmaRange[0], sigmaRange[1]);
  const sigmaX = randUniform(rng, sigmaRange[0], sigmaRange[1]);
  // min-max scaling cancels the density's normalizing constant, which overflows for tiny sigmas
  const { data, degenerate } = normalizeFootprint(gaussianEnvelope(height, width, center, sigmaY, sigmaX));
  return { height, width, center, sigmaY, sigmaX, data, degenerate };
}
