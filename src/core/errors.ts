import type { SpikeStrategy } from "./types";

export type ParameterIssue = {
  parameter: string;
  message: string;
};

export class InvalidParameterError extends Error {
  parameter: string;
  issues: ParameterIssue[];

  constructor(parameter: string, message: string, issues?: ParameterIssue[]) {
    super(`invalid parameter ${parameter}: ${message}`);
    this.name = "InvalidParameterError";
    this.parameter = parameter;
    this.issues = issues ?? [{ parameter, message }];
  }
}

export class GenerationExhaustedError extends Error {
  strategy: SpikeStrategy;
  attempts: number;
  cellIndex?: number;

  constructor(strategy: SpikeStrategy, attempts: number, cellIndex?: number) {
    const where = cellIndex === undefined ? "" : ` for cell ${cellIndex}`;
    super(`${strategy} spike generation produced no spikes after ${attempts} attempts${where}`);
    this.name = "GenerationExhaustedError";
    this.strategy = strategy;
    this.attempts = attempts;
    this.cellIndex = cellIndex;
  }
}
