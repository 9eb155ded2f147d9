// src/sim/model.ts

import { type ModelOptions, type ParameterVector, type RangeBreakdown } from "./types";

export const MAX_RANGE_KM = 50000;
export const DEFAULT_CRUISE_HOURS = 6;

const DEFAULT_MODEL_OPTIONS: ModelOptions = { cruiseHours: DEFAULT_CRUISE_HOURS };

/**
 * Anything that maps one parameter vector to one range in km.
 * The closed-form model is one implementation; an external simulation
 * backend can be injected into the driver in its place.
 */
export interface Evaluator {
  readonly name: string;
  evaluate(params: ParameterVector): number;
}

export function rangeBreakdown(
  params: ParameterVector,
  options: ModelOptions = DEFAULT_MODEL_OPTIONS,
): RangeBreakdown {
  const packEnergyWh = params.packEnergyDensity * params.batteryMass;
  const harvestEnergyWh = params.harvestPower * 1000 * options.cruiseHours;

  // Not capped at 1: a large SiC gain can push usable energy above stored energy.
  const etaEffective = params.etaSystem * params.sicGain;
  const usableWh = etaEffective * (packEnergyWh + harvestEnergyWh);

  // Electric Breguet: R = E_usable / (g * L/D * SFC_eq * m)
  const rangeM =
    usableWh /
    (params.gravity * params.liftToDrag * params.sfcEq * params.totalMass);
  const rawRangeKm = rangeM / 1000;

  return {
    packEnergyWh,
    harvestEnergyWh,
    etaEffective,
    usableWh,
    rawRangeKm,
    rangeKm: boundRange(rawRangeKm),
    overUnityEfficiency: etaEffective > 1,
  };
}

export function rangeKm(
  params: ParameterVector,
  options: ModelOptions = DEFAULT_MODEL_OPTIONS,
): number {
  return rangeBreakdown(params, options).rangeKm;
}

// NaN, ±Infinity and negatives collapse to 0
export function boundRange(km: number): number {
  if (!Number.isFinite(km) || km < 0) return 0;
  return Math.min(MAX_RANGE_KM, km);
}

export function createAnalyticEvaluator(
  options: Partial<ModelOptions> = {},
): Evaluator {
  const resolved: ModelOptions = {
    cruiseHours: options.cruiseHours ?? DEFAULT_CRUISE_HOURS,
  };
  return {
    name: "analytic",
    evaluate: (params) => rangeKm(params, resolved),
  };
}
