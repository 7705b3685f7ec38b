import { describe, expect, it } from "vitest";
import { InvalidParameterError } from "./errors";
import { gaussianKernel1d, gaussianSmooth1d, randomMotion } from "./motion";
import { makeRng } from "./rng";

function meanAbsStep(v: Int32Array): number {
  let s = 0;
  for (let i = 1; i < v.length; i += 1) s += Math.abs(v[i] - v[i - 1]);
  return s / (v.length - 1);
}

describe("gaussianKernel1d", () => {
  it("is truncated at four sigma and sums to one", () => {
    const k = gaussianKernel1d(2);
    expect(k).toHaveLength(17);
    expect(k.reduce((a, b) => a + b, 0)).toBeCloseTo(1, 12);
    expect(k[0]).toBeCloseTo(k[16], 15);
    expect(k[8]).toBeGreaterThan(k[7]);
  });
});

describe("gaussianSmooth1d", () => {
  it("reproduces the kernel from an interior impulse", () => {
    const signal = new Float64Array(21);
    signal[10] = 1;
    const out = gaussianSmooth1d(signal, 1);
    const k = gaussianKernel1d(1);
    for (let j = -4; j <= 4; j += 1) {
      expect(out[10 + j]).toBeCloseTo(k[4 + j], 12);
    }
    expect(out[0]).toBe(0);
  });

  it("leaves a constant signal unchanged at the edges", () => {
    const out = gaussianSmooth1d(new Float64Array(6).fill(3), 5);
    for (const v of out) expect(v).toBeCloseTo(3, 12);
  });

  it("reflects at the boundary", () => {
    const signal = Float64Array.from([1, 0, 0, 0, 0, 0, 0, 0, 0, 0]);
    const out = gaussianSmooth1d(signal, 1);
    const k = gaussianKernel1d(1);
    // index -1 mirrors onto index 0
    expect(out[0]).toBeCloseTo(k[4] + k[3], 12);
  });

  it("returns a copy when sigma is zero", () => {
    const signal = Float64Array.from([1, -2, 3]);
    const out = gaussianSmooth1d(signal, 0);
    expect(Array.from(out)).toEqual([1, -2, 3]);
    expect(out).not.toBe(signal);
  });
});

describe("randomMotion", () => {
  it("never moves when maxShift is zero", () => {
    const m = randomMotion(40, 0, 5, makeRng(3));
    expect(m.dy).toEqual(new Int32Array(40));
    expect(m.dx).toEqual(new Int32Array(40));
  });

  it("produces integer shifts, one pair per frame", () => {
    const m = randomMotion(25, 6, 2, makeRng(4));
    expect(m.dy).toHaveLength(25);
    expect(m.dx).toHaveLength(25);
  });

  it("correlates consecutive frames when smoothed", () => {
    const jitter = randomMotion(500, 30, 0, makeRng(1));
    const drift = randomMotion(500, 30, 5, makeRng(1));
    expect(meanAbsStep(drift.dy)).toBeLessThan(meanAbsStep(jitter.dy) / 3);
    expect(meanAbsStep(drift.dx)).toBeLessThan(meanAbsStep(jitter.dx) / 3);
  });

  it("is reproducible for a seed", () => {
    const a = randomMotion(50, 5, 2, makeRng(8));
    const b = randomMotion(50, 5, 2, makeRng(8));
    expect(a.dy).toEqual(b.dy);
    expect(a.dx).toEqual(b.dx);
  });

  it("rejects a negative shift scale", () => {
    expect(() => randomMotion(10, -1, 2, makeRng(0))).toThrow(InvalidParameterError);
  });
});
