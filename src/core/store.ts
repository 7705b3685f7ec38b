/**
 * Generator session store: the configuration being edited, the preset
 * library and the outcome of the latest run.
 *
 * Built on the zustand vanilla store so it runs without a UI; subscribers
 * can watch slices such as `status` through `subscribeWithSelector`.
 */

import { subscribeWithSelector } from "zustand/middleware";
import { createStore } from "zustand/vanilla";
import type { MovieConfigInput } from "./config";
import { type BuildOptions, buildMovie } from "./movie";
import type { MovieResult } from "./types";

// ---------------------------------------------------------------------------
// Presets
// ---------------------------------------------------------------------------

export type Preset = {
  name: string;
  config: MovieConfigInput;
};

export const BUILTIN_PRESETS: Preset[] = [
  {
    name: "Markov default",
    config: {},
  },
  {
    name: "Hawkes bursty",
    config: {
      numCells: 5,
      numFrames: 200,
      height: 64,
      width: 64,
      spikes: { strategy: "hawkes", mu: 0.01, alpha: 0.05, tau: 10 },
      calcium: { strategy: "ar2", tauDecay: 20, tauRise: 5 },
      cellSnr: 5,
      backgroundStrength: 0.3,
      motionSmoothingSigma: 2,
      maxShift: 5,
      noiseSigma: 3,
      footprintSigmaRange: [3, 5],
    },
  },
  {
    name: "Markov long run",
    config: {
      numCells: 60,
      numFrames: 500,
      height: 512,
      width: 512,
      spikes: { strategy: "markov" },
      calcium: { strategy: "ar2", tauDecay: 15, tauRise: 5 },
      backgroundStrength: 0.3,
      motionSmoothingSigma: 5,
      maxShift: 0,
      noiseSigma: 1,
    },
  },
  {
    name: "Bi-exponential small",
    config: {
      numCells: 10,
      numFrames: 300,
      height: 64,
      width: 64,
      spikes: { strategy: "hawkes", mu: 0.02, alpha: 0.05, tau: 10 },
      calcium: { strategy: "biexp", tauDecay: 10, tauRise: 5 },
      cellSnr: 5,
      backgroundStrength: 0.3,
      motionSmoothingSigma: 2,
      maxShift: 5,
      noiseSigma: 3,
      footprintSigmaRange: [3, 5],
    },
  },
];

// ---------------------------------------------------------------------------
// Store shape
// ---------------------------------------------------------------------------

export type GenerationStatus = "idle" | "ready" | "failed";

export interface GeneratorStore {
  config: MovieConfigInput;
  presets: Preset[];
  customPresets: Preset[];
  status: GenerationStatus;
  result: MovieResult | null;
  error: Error | null;

  // ---- Actions ----
  setConfig: (partial: Partial<MovieConfigInput>) => void;
  applyPreset: (preset: Preset) => void;
  saveCustomPreset: (name: string) => void;
  deleteCustomPreset: (index: number) => void;
  /** Runs the pipeline on the current config; the outcome is all-or-nothing. */
  generate: () => MovieResult | null;
  reset: () => void;
}

export function createGeneratorStore(options: BuildOptions = {}) {
  return createStore<GeneratorStore>()(subscribeWithSelector((set, get) => ({
    config: {},
    presets: BUILTIN_PRESETS,
    customPresets: [],
    status: "idle",
    result: null,
    error: null,

    setConfig: (partial) =>
      set((s) => ({ config: { ...s.config, ...partial } })),

    applyPreset: (preset) =>
      set({ config: { ...preset.config } }),

    saveCustomPreset: (name) => {
      const s = get();
      const preset: Preset = { name, config: { ...s.config } };
      set({ customPresets: [...s.customPresets, preset] });
    },

    deleteCustomPreset: (index) =>
      set((s) => ({ customPresets: s.customPresets.filter((_, i) => i !== index) })),

    generate: () => {
      try {
        const result = buildMovie(get().config, options);
        set({ status: "ready", result, error: null });
        return result;
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err));
        set({ status: "failed", result: null, error });
        return null;
      }
    },

    reset: () => set({ status: "idle", result: null, error: null }),
  })));
}

export const generatorStore = createGeneratorStore();
