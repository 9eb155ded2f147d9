import { type MonteCarloResult, type ParameterField } from "./types";

const FIELD_LABELS: Record<ParameterField, string> = {
  etaSystem: "System efficiency",
  packEnergyDensity: "Pack energy density (Wh/kg)",
  batteryMass: "Battery mass (kg)",
  totalMass: "Total mass (kg)",
  gravity: "Gravity (m/s²)",
  liftToDrag: "Lift-to-drag ratio",
  sfcEq: "Equivalent SFC",
  harvestPower: "Harvesting power (kW)",
  sicGain: "SiC efficiency gain",
};

export function fieldLabel(field: ParameterField): string {
  return FIELD_LABELS[field];
}

export function toCsv(result: MonteCarloResult): string {
  const header = [
    "run",
    "eta_system",
    "pack_energy_density_wh_kg",
    "lift_to_drag",
    "harvest_power_kw",
    "sic_gain",
    "range_km",
  ].join(",");

  const rows = result.ensemble.map((r) =>
    [
      r.run,
      r.params.etaSystem.toFixed(6),
      r.params.packEnergyDensity.toFixed(3),
      r.params.liftToDrag.toFixed(4),
      r.params.harvestPower.toFixed(4),
      r.params.sicGain.toFixed(6),
      r.rangeKm.toFixed(3),
    ].join(","),
  );

  return [header, ...rows].join("\n") + "\n";
}

function fmtKm(x: number): string {
  return x.toFixed(1);
}

export function summaryLines(result: MonteCarloResult): string[] {
  const { summary, config } = result;

  const lines = [
    `=== Range Monte-Carlo Summary ===`,
    `Runs: ${summary.runs} (seed ${config.seed}, evaluator ${result.evaluator})`,
    `  Mean: ${fmtKm(summary.meanKm)} km (±${fmtKm(summary.stdKm)} km std)`,
    `  Median: ${fmtKm(summary.medianKm)} km`,
    `  90% band: ${fmtKm(summary.p5Km)} - ${fmtKm(summary.p95Km)} km`,
    `Target achievement:`,
    ...summary.thresholdRates.map(
      (t) =>
        `  ≥${t.thresholdKm.toLocaleString("en-US")} km: ${t.percent.toFixed(1)}% of runs`,
    ),
  ];

  if (summary.correlations.length > 0) {
    const ranked = [...summary.correlations].sort(
      (a, b) => Math.abs(b.r) - Math.abs(a.r),
    );
    lines.push(
      `Correlation with range:`,
      ...ranked.map((c) => `  ${c.field}: ${c.r.toFixed(3)}`),
    );
  }

  return lines;
}
