import { type DriverConfig, type DistributionSpec, type ParameterVector } from "./types";

// Al-ion pack + SiC power electronics reference design
export const NOMINAL_PARAMS: ParameterVector = {
  etaSystem: 0.92,
  packEnergyDensity: 450,
  batteryMass: 25000,
  totalMass: 80000,
  gravity: 9.80665,
  liftToDrag: 22,
  sfcEq: 0.00015,
  harvestPower: 15,
  sicGain: 1.08,
};

export const DEFAULT_DISTRIBUTIONS: DistributionSpec[] = [
  { field: "packEnergyDensity", spread: 0.25, floor: 200 }, // pack scaling is the big unknown
  { field: "liftToDrag", spread: 0.15, floor: 15 },
  { field: "harvestPower", spread: 0.4, floor: 0 }, // weather dependent
  { field: "sicGain", spread: 0.2, floor: 1.0 },
  { field: "etaSystem", spread: 0.1, floor: 0.7, ceiling: 0.98 },
];

export const DEFAULT_THRESHOLDS_KM = [5000, 10000];

export function defaultDriverConfig(): DriverConfig {
  return {
    nominal: { ...NOMINAL_PARAMS },
    distributions: DEFAULT_DISTRIBUTIONS.map((d) => ({ ...d })),
    runs: 2000,
    seed: 42,
    cruiseHours: 6,
    thresholdsKm: [...DEFAULT_THRESHOLDS_KM],
  };
}
