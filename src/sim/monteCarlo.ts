import { summarize } from "./analysis";
import { DEFAULT_THRESHOLDS_KM } from "./defaults";
import { ConfigError } from "./errors";
import {
  DEFAULT_CRUISE_HOURS,
  boundRange,
  createAnalyticEvaluator,
  type Evaluator,
} from "./model";
import { MAX_SEED, RNG } from "./rng";
import { buildSamples } from "./sampling";
import {
  type DriverConfig,
  type EnsembleRow,
  type MonteCarloResult,
  type ParameterVector,
  PARAMETER_FIELDS,
} from "./types";

export interface RunOptions {
  evaluator?: Evaluator;
  onProgress?: (completed: number, total: number) => void;
}

export function validateDriverConfig(config: DriverConfig): void {
  const { runs, seed, nominal, distributions } = config;

  if (!Number.isInteger(runs) || runs <= 0) {
    throw new ConfigError("runs", `must be a positive integer (got ${runs})`);
  }
  // the generator keeps 32 bits of state; anything else would alias another seed
  if (!Number.isInteger(seed) || seed < 0 || seed > MAX_SEED) {
    throw new ConfigError("seed", `must be an integer in [0, ${MAX_SEED}] (got ${seed})`);
  }

  distributions.forEach((spec, i) => {
    const at = `distributions[${i}]`;
    // field may come from an untyped config document
    if (!Object.prototype.hasOwnProperty.call(nominal, spec.field)) {
      throw new ConfigError(
        `${at}.field`,
        `"${String(spec.field)}" is not a field of the nominal parameter vector`,
      );
    }
    if (!Number.isFinite(spec.spread) || spec.spread < 0) {
      throw new ConfigError(`spread.${spec.field}`, "must be finite and >= 0");
    }
    if (
      spec.floor !== undefined &&
      spec.ceiling !== undefined &&
      spec.floor > spec.ceiling
    ) {
      throw new ConfigError(
        `floor.${spec.field}`,
        `floor ${spec.floor} is above ceiling ${spec.ceiling}`,
      );
    }
  });

  for (const field of PARAMETER_FIELDS) {
    if (!Number.isFinite(nominal[field])) {
      throw new ConfigError(`nominal.${field}`, "must be a finite number");
    }
  }

  if (config.cruiseHours !== undefined && !(config.cruiseHours >= 0)) {
    throw new ConfigError("cruiseHours", "must be >= 0");
  }
  if (config.thresholdsKm?.some((t) => !Number.isFinite(t))) {
    throw new ConfigError("thresholdsKm", "thresholds must be finite");
  }
}

/**
 * Samples the parameter vectors of a run. Every random draw happens here,
 * before any evaluation, so evaluation order cannot change the ensemble.
 */
export function materializeSamples(config: DriverConfig): ParameterVector[] {
  validateDriverConfig(config);
  const rng = new RNG(config.seed);
  return buildSamples(config.nominal, config.distributions, config.runs, rng);
}

export function assembleResult(
  config: DriverConfig,
  evaluator: string,
  samples: ParameterVector[],
  ranges: number[],
  startedAt: number,
): MonteCarloResult {
  const ensemble: EnsembleRow[] = samples.map((params, i) => ({
    run: i + 1,
    params,
    rangeKm: ranges[i],
  }));

  const summary = summarize(
    ensemble,
    config.distributions,
    config.thresholdsKm ?? DEFAULT_THRESHOLDS_KM,
  );

  return {
    config,
    evaluator,
    ensemble,
    summary,
    elapsedMs: Date.now() - startedAt,
  };
}

export function runMonteCarlo(
  config: DriverConfig,
  options: RunOptions = {},
): MonteCarloResult {
  const startedAt = Date.now();
  const evaluator =
    options.evaluator ??
    createAnalyticEvaluator({
      cruiseHours: config.cruiseHours ?? DEFAULT_CRUISE_HOURS,
    });

  const samples = materializeSamples(config);
  const total = samples.length;

  const ranges: number[] = [];
  for (let i = 0; i < total; i++) {
    // injected backends get the same [0, 50000] bound as the closed form
    ranges.push(boundRange(evaluator.evaluate(samples[i])));
    options.onProgress?.(i + 1, total);
  }

  return assembleResult(config, evaluator.name, samples, ranges, startedAt);
}
