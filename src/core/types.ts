export type Rng = () => number;

export type Point2 = { y: number; x: number };

/** Row i holds the probabilities of moving from state i (0 silent, 1 spiking) to states 0 and 1. */
export type TransitionMatrix = readonly [readonly [number, number], readonly [number, number]];

export type HawkesParameters = {
  mu: number;
  alpha: number;
  tau: number;
};

export type SpikeStrategy = "markov" | "hawkes";

export type CalciumStrategy = "ar2" | "biexp";

export type SpikeTrain = Uint8Array;

export type CalciumTrace = Float32Array;

export type CellFootprint = {
  height: number;
  width: number;
  center: Point2;
  sigmaY: number;
  sigmaX: number;
  data: Float32Array;
  /** Set when max equals min and the data was only shifted, not scaled. */
  degenerate: boolean;
};

export type MotionTrajectory = {
  dy: Int32Array;
  dx: Int32Array;
};

export type Movie = {
  frames: number;
  height: number;
  width: number;
  data: Uint8Array;
};

export type DiagnosticKind = "degenerate-footprint" | "tau-order";

export type Diagnostic = {
  kind: DiagnosticKind;
  cellIndex?: number;
  message: string;
};

export type MovieResult = {
  movie: Movie;
  footprints: CellFootprint[];
  traces: CalciumTrace[];
  spikes: SpikeTrain[];
  motion: MotionTrajectory;
  seed: number;
  diagnostics: Diagnostic[];
};

export type Logger = {
  warn: (message: string) => void;
};
