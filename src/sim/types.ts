export interface ParameterVector {
  etaSystem: number; // base system efficiency, (0, 1]
  packEnergyDensity: number; // Wh/kg
  batteryMass: number; // kg
  totalMass: number; // kg
  gravity: number; // m/s^2
  liftToDrag: number; // L/D
  sfcEq: number; // equivalent specific consumption
  harvestPower: number; // kW, steady over the cruise
  sicGain: number; // SiC efficiency multiplier, >= 1
}

export type ParameterField = keyof ParameterVector;

export const PARAMETER_FIELDS: readonly ParameterField[] = [
  "etaSystem",
  "packEnergyDensity",
  "batteryMass",
  "totalMass",
  "gravity",
  "liftToDrag",
  "sfcEq",
  "harvestPower",
  "sicGain",
];

export function isParameterField(key: string): key is ParameterField {
  return (PARAMETER_FIELDS as readonly string[]).includes(key);
}

export type SpreadMode = "relative" | "absolute";

export interface DistributionSpec {
  field: ParameterField;
  spread: number; // std of the noise: fraction of nominal (relative) or same unit (absolute)
  mode?: SpreadMode; // default "relative"
  floor?: number;
  ceiling?: number;
}

export interface ModelOptions {
  cruiseHours: number;
}

export interface DriverConfig {
  nominal: ParameterVector;
  distributions: DistributionSpec[];
  runs: number;
  seed: number;
  cruiseHours?: number; // default 6
  thresholdsKm?: number[]; // default [5000, 10000]
}

export interface RangeBreakdown {
  packEnergyWh: number;
  harvestEnergyWh: number;
  etaEffective: number;
  usableWh: number;
  rawRangeKm: number; // before clamping, may be non-finite
  rangeKm: number;
  overUnityEfficiency: boolean;
}

export interface EnsembleRow {
  run: number; // 1-based
  params: ParameterVector;
  rangeKm: number;
}

export interface ThresholdRate {
  thresholdKm: number;
  percent: number; // share of runs with range >= threshold, 0..100
}

export interface FieldCorrelation {
  field: ParameterField;
  r: number;
}

export interface AnalysisSummary {
  runs: number;
  meanKm: number;
  stdKm: number;
  medianKm: number;
  p5Km: number;
  p95Km: number;
  minKm: number;
  maxKm: number;
  thresholdRates: ThresholdRate[];
  correlations: FieldCorrelation[];
}

export interface MonteCarloResult {
  config: DriverConfig;
  evaluator: string;
  ensemble: EnsembleRow[];
  summary: AnalysisSummary;
  elapsedMs: number;
}

export interface WorkerRequest {
  type: "evaluate";
  chunkIndex: number;
  samples: ParameterVector[];
  options: ModelOptions;
}

export interface WorkerResponse {
  type: "result" | "error";
  chunkIndex: number;
  ranges?: number[];
  error?: string;
}
