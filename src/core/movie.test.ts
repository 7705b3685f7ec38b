import { describe, expect, it, vi } from "vitest";
import type { MovieConfigInput } from "./config";
import { GenerationExhaustedError, InvalidParameterError } from "./errors";
import { buildMovie } from "./movie";
import { countSpikes } from "./spikes";

const quiet = { logger: { warn: vi.fn() } };

function expectInvalid(config: MovieConfigInput, parameter: string): void {
  try {
    buildMovie(config, quiet);
    expect.unreachable();
  } catch (err) {
    expect(err).toBeInstanceOf(InvalidParameterError);
    if (err instanceof InvalidParameterError) {
      expect(err.parameter).toBe(parameter);
    }
  }
}

const small: MovieConfigInput = {
  numCells: 3,
  numFrames: 20,
  height: 24,
  width: 24,
  maxShift: 3,
  motionSmoothingSigma: 2,
  noiseSigma: 2,
  rngSeed: 1234,
};

describe("buildMovie", () => {
  it("reproduces the trace at the footprint peak of a single noiseless cell", () => {
    const result = buildMovie(
      {
        numCells: 1,
        numFrames: 50,
        height: 32,
        width: 32,
        noiseSigma: 0,
        backgroundStrength: 0,
        maxShift: 0,
        rngSeed: 7,
      },
      quiet,
    );
    const [fp] = result.footprints;
    const [trace] = result.traces;
    const peak = fp.center.y * 32 + fp.center.x;
    expect(fp.data[peak]).toBe(1);
    for (let t = 0; t < 50; t += 1) {
      const expected = Math.floor(Math.min(255, Math.max(0, trace[t])));
      expect(result.movie.data[t * 32 * 32 + peak]).toBe(expected);
    }
  });

  it("returns every output with matching shapes", () => {
    const result = buildMovie(small, quiet);
    expect(result.seed).toBe(1234);
    expect(result.movie).toMatchObject({ frames: 20, height: 24, width: 24 });
    expect(result.movie.data).toHaveLength(20 * 24 * 24);
    expect(result.footprints).toHaveLength(3);
    expect(result.traces).toHaveLength(3);
    expect(result.spikes).toHaveLength(3);
    for (let c = 0; c < 3; c += 1) {
      expect(result.footprints[c].data).toHaveLength(24 * 24);
      expect(result.traces[c]).toHaveLength(20);
      expect(countSpikes(result.spikes[c])).toBeGreaterThan(0);
    }
    expect(result.motion.dy).toHaveLength(20);
    expect(result.motion.dx).toHaveLength(20);
    expect(result.diagnostics).toEqual([]);
  });

  it("is byte-identical for the same configuration and seed", () => {
    const a = buildMovie(small, quiet);
    const b = buildMovie(small, quiet);
    expect(b.movie.data).toEqual(a.movie.data);
    expect(b.spikes).toEqual(a.spikes);
    expect(b.traces).toEqual(a.traces);
    expect(b.footprints).toEqual(a.footprints);
    expect(b.motion).toEqual(a.motion);
  });

  it("changes with the seed", () => {
    const a = buildMovie(small, quiet);
    const b = buildMovie({ ...small, rngSeed: 4321 }, quiet);
    expect(b.movie.data).not.toEqual(a.movie.data);
  });

  it("keeps each cell's draws when cells are added", () => {
    const two = buildMovie({ ...small, numCells: 2 }, quiet);
    const three = buildMovie({ ...small, numCells: 3 }, quiet);
    expect(three.spikes.slice(0, 2)).toEqual(two.spikes);
    expect(three.footprints.slice(0, 2)).toEqual(two.footprints);
    expect(three.motion).toEqual(two.motion);
  });

  it("reports a drawn seed that reproduces the run", () => {
    const first = buildMovie({ ...small, rngSeed: undefined }, quiet);
    expect(Number.isInteger(first.seed)).toBe(true);
    const again = buildMovie({ ...small, rngSeed: first.seed }, quiet);
    expect(again.movie.data).toEqual(first.movie.data);
  });

  it("keeps pixels in range under heavy signal and noise", () => {
    const result = buildMovie(
      {
        ...small,
        spikes: { strategy: "hawkes", mu: 0.3, alpha: 0.5, tau: 5 },
        calcium: { strategy: "biexp", tauDecay: 12, tauRise: 2 },
        cellSnr: 50,
        noiseSigma: 60,
      },
      quiet,
    );
    let zeros = 0;
    for (const v of result.movie.data) {
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThanOrEqual(255);
      if (v === 0) zeros += 1;
    }
    expect(zeros).toBeGreaterThan(0);
  });

  it("runs the bi-exponential and Hawkes variants", () => {
    const result = buildMovie(
      {
        ...small,
        spikes: { strategy: "hawkes" },
        calcium: { strategy: "biexp", tauDecay: 10, tauRise: 5 },
      },
      quiet,
    );
    for (const train of result.spikes) {
      expect(countSpikes(train)).toBeGreaterThan(0);
    }
    expect(result.traces[0][0]).toBe(0);
  });

  it("warns when decay is not slower than rise", () => {
    const logger = { warn: vi.fn() };
    const result = buildMovie({ ...small, calcium: { strategy: "ar2", tauDecay: 2, tauRise: 5 } }, { logger });
    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0].kind).toBe("tau-order");
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith("tauDecay (2) should exceed tauRise (5)");
  });

  it("reports a flat footprint per cell and keeps building", () => {
    const logger = { warn: vi.fn() };
    const result = buildMovie({ ...small, numCells: 2, footprintSigmaRange: [1e25, 1e25] }, { logger });
    expect(result.diagnostics.map((d) => [d.kind, d.cellIndex])).toEqual([
      ["degenerate-footprint", 0],
      ["degenerate-footprint", 1],
    ]);
    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledWith("footprint of cell 0 is flat; left unscaled after min subtraction");
    expect(result.footprints[0].degenerate).toBe(true);
    expect(result.movie.data).toHaveLength(20 * 24 * 24);
  });

  it("keeps a cell with a vanishing sigma visible at its center", () => {
    const result = buildMovie(
      {
        numCells: 1,
        numFrames: 30,
        height: 16,
        width: 16,
        noiseSigma: 0,
        backgroundStrength: 0,
        footprintSigmaRange: [1e-20, 1e-20],
        rngSeed: 3,
      },
      quiet,
    );
    const [fp] = result.footprints;
    const peak = fp.center.y * 16 + fp.center.x;
    expect(fp.data[peak]).toBe(1);
    for (let t = 0; t < 30; t += 1) {
      expect(result.movie.data[t * 256 + peak]).toBe(Math.floor(Math.min(255, result.traces[0][t])));
    }
  });

  it("names the cell whose spike generation ran out of retries", () => {
    try {
      buildMovie(
        {
          ...small,
          spikes: {
            strategy: "markov",
            transitionMatrix: [
              [1, 0],
              [0, 1],
            ],
          },
          maxSpikeRetries: 2,
        },
        quiet,
      );
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(GenerationExhaustedError);
      if (err instanceof GenerationExhaustedError) {
        expect(err.cellIndex).toBe(0);
        expect(err.attempts).toBe(2);
      }
    }
  });

  it("rejects invalid configurations by field", () => {
    expectInvalid({ numCells: 0 }, "numCells");
    expectInvalid({ numFrames: -5 }, "numFrames");
    expectInvalid({ height: 8 }, "height");
    expectInvalid({ spikes: { strategy: "hawkes", mu: 1.5 } }, "spikes.mu");
    expectInvalid({ spikes: { strategy: "hawkes", tau: 0 } }, "spikes.tau");
    expectInvalid(
      {
        spikes: {
          strategy: "markov",
          transitionMatrix: [
            [0.5, 0.4],
            [0.5, 0.5],
          ],
        },
      },
      "spikes.transitionMatrix.0",
    );
    expectInvalid({ calcium: { tauDecay: -1 } }, "calcium.tauDecay");
    expectInvalid({ footprintSigmaRange: [5, 3] }, "footprintSigmaRange");
    expectInvalid({ noiseSigma: -1 }, "noiseSigma");
  });
});
