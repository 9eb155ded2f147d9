import type { AnalysisSummary } from "../sim/types";

export function KpiCards({ summary }: { summary: AnalysisSummary }) {
  return (
    <div className="rounded-xl border bg-white p-4 shadow-sm text-gray-900">
      <div className="flex items-start justify-between gap-4">
        <div>
          <div className="text-lg font-semibold">Range statistics</div>
          <div className="text-sm opacity-70">
            {summary.runs.toLocaleString("en-US")} Monte-Carlo runs
          </div>
        </div>
        <div className="text-right">
          <div className="text-sm opacity-70">Median</div>
          <div className="text-lg font-semibold">{fmtKm(summary.medianKm)}</div>
        </div>
      </div>

      <div className="mt-4 grid grid-cols-4 gap-3">
        <Card label="Mean" value={fmtKm(summary.meanKm)} />
        <Card label="Std deviation" value={fmtKm(summary.stdKm)} />
        <Card
          label="5–95% band"
          value={`${fmtKm(summary.p5Km)} – ${fmtKm(summary.p95Km)}`}
        />
        <Card
          label="Min / max"
          value={`${fmtKm(summary.minKm)} / ${fmtKm(summary.maxKm)}`}
        />
      </div>

      <div className="mt-4 grid grid-cols-4 gap-3">
        {summary.thresholdRates.map((t) => (
          <Card
            key={t.thresholdKm}
            label={`≥ ${t.thresholdKm.toLocaleString("en-US")} km`}
            value={`${t.percent.toFixed(1)}% of runs`}
          />
        ))}
      </div>
    </div>
  );
}

function Card({ label, value }: { label: string; value: string }) {
  return (
    <div className="rounded-lg border p-3">
      <div className="text-xs opacity-70">{label}</div>
      <div className="mt-1 text-base font-semibold">{value}</div>
    </div>
  );
}

function fmtKm(x: number): string {
  return `${x.toFixed(1)} km`;
}
