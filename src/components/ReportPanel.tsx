import { fieldLabel, summaryLines } from "../sim/report";
import { PARAMETER_FIELDS, type MonteCarloResult } from "../sim/types";

function describeSpread(result: MonteCarloResult, index: number): string {
  const d = result.config.distributions[index];
  const spread =
    d.mode === "absolute" ? `±${d.spread} (absolute)` : `±${(d.spread * 100).toFixed(0)}%`;
  const bounds = [
    d.floor !== undefined ? `floor ${d.floor}` : null,
    d.ceiling !== undefined ? `ceiling ${d.ceiling}` : null,
  ].filter((x): x is string => x !== null);
  return bounds.length > 0 ? `${spread}, ${bounds.join(", ")}` : spread;
}

export function ReportPanel({ result }: { result: MonteCarloResult }) {
  const { config } = result;

  return (
    <div className="rounded-xl border bg-white p-4 shadow-sm">
      <div className="text-lg font-semibold">Model assumptions</div>
      <table className="mt-3 text-sm">
        <thead>
          <tr>
            <th className="text-left pr-4">Parameter</th>
            <th className="text-left pr-4">Nominal</th>
            <th className="text-left">Uncertainty</th>
          </tr>
        </thead>
        <tbody>
          {PARAMETER_FIELDS.map((field) => {
            const idx = config.distributions.findIndex((d) => d.field === field);
            return (
              <tr key={field}>
                <td className="pr-4">{fieldLabel(field)}</td>
                <td className="pr-4">{config.nominal[field]}</td>
                <td>{idx === -1 ? "fixed" : describeSpread(result, idx)}</td>
              </tr>
            );
          })}
        </tbody>
      </table>

      <div className="mt-4 text-lg font-semibold">Summary</div>
      <pre className="mt-2 text-sm">{summaryLines(result).join("\n")}</pre>
    </div>
  );
}
