import { describe, expect, it } from "vitest";
import { NOMINAL_PARAMS, defaultDriverConfig } from "../defaults";
import { rangeKm } from "../model";
import { fieldLabel, summaryLines, toCsv } from "../report";
import { type MonteCarloResult } from "../types";

const result: MonteCarloResult = {
  config: defaultDriverConfig(),
  evaluator: "analytic",
  ensemble: [
    { run: 1, params: { ...NOMINAL_PARAMS }, rangeKm: rangeKm(NOMINAL_PARAMS) },
    {
      run: 2,
      params: {
        ...NOMINAL_PARAMS,
        etaSystem: 0.85,
        packEnergyDensity: 512.25,
        liftToDrag: 19.5,
        harvestPower: 0,
        sicGain: 1,
      },
      rangeKm: 0,
    },
  ],
  summary: {
    runs: 2000,
    meanKm: 4.4123,
    stdKm: 0.987,
    medianKm: 4.31,
    p5Km: 2.94,
    p95Km: 6.08,
    minKm: 1.2,
    maxKm: 9.6,
    thresholdRates: [
      { thresholdKm: 5000, percent: 0 },
      { thresholdKm: 10000, percent: 0 },
    ],
    correlations: [
      { field: "etaSystem", r: 0.1234 },
      { field: "packEnergyDensity", r: 0.7412 },
      { field: "liftToDrag", r: -0.5 },
    ],
  },
  elapsedMs: 12,
};

describe("toCsv", () => {
  it("writes one row per run in the documented column order", () => {
    expect(toCsv(result).split("\n")).toEqual([
      "run,eta_system,pack_energy_density_wh_kg,lift_to_drag,harvest_power_kw,sic_gain,range_km",
      "1,0.920000,450.000,22.0000,15.0000,1.080000,4.352",
      "2,0.850000,512.250,19.5000,0.0000,1.000000,0.000",
      "",
    ]);
  });
});

describe("summaryLines", () => {
  it("prints the statistics, targets and ranked correlations", () => {
    expect(summaryLines(result)).toEqual([
      "=== Range Monte-Carlo Summary ===",
      "Runs: 2000 (seed 42, evaluator analytic)",
      "  Mean: 4.4 km (±1.0 km std)",
      "  Median: 4.3 km",
      "  90% band: 2.9 - 6.1 km",
      "Target achievement:",
      "  ≥5,000 km: 0.0% of runs",
      "  ≥10,000 km: 0.0% of runs",
      "Correlation with range:",
      "  packEnergyDensity: 0.741",
      "  liftToDrag: -0.500",
      "  etaSystem: 0.123",
    ]);
  });

  it("omits the correlation block when nothing was uncertain", () => {
    const fixed = { ...result, summary: { ...result.summary, correlations: [] } };
    expect(summaryLines(fixed)).toHaveLength(8);
  });
});

describe("fieldLabel", () => {
  it("names parameters for axes and tables", () => {
    expect(fieldLabel("packEnergyDensity")).toBe("Pack energy density (Wh/kg)");
    expect(fieldLabel("sicGain")).toBe("SiC efficiency gain");
  });
});
