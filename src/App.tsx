import { Charts, type RenderedFigures } from "./components/Charts";
import { KpiCards } from "./components/KpiCards";
import { ReportPanel } from "./components/ReportPanel";
import type { MonteCarloResult } from "./sim/types";

export default function App({
  result,
  figures,
}: {
  result: MonteCarloResult;
  figures: RenderedFigures;
}) {
  return (
    <div className="min-h-screen p-6">
      <div className="max-w-7xl mx-auto space-y-4">
        <h1 className="text-2xl font-bold">Electric aircraft range Monte Carlo</h1>

        <div className="text-sm opacity-80">
          {result.summary.runs} runs, seed {result.config.seed}, evaluator{" "}
          {result.evaluator}, {result.elapsedMs} ms
        </div>

        <KpiCards summary={result.summary} />

        <Charts figures={figures} />

        <ReportPanel result={result} />
      </div>
    </div>
  );
}
