export * from "./sim/types";
export { MAX_SEED, RNG, clamp, extent, mean, median, percentile, stdDev } from "./sim/rng";
export {
  MAX_RANGE_KM,
  DEFAULT_CRUISE_HOURS,
  boundRange,
  createAnalyticEvaluator,
  rangeBreakdown,
  rangeKm,
  type Evaluator,
} from "./sim/model";
export { buildSamples, drawNormals, sampleValue } from "./sim/sampling";
export {
  materializeSamples,
  runMonteCarlo,
  validateDriverConfig,
  type RunOptions,
} from "./sim/monteCarlo";
export { runMonteCarloParallel, type ParallelOptions } from "./sim/parallel";
export {
  boxStats,
  empiricalCdf,
  histogram,
  linearFit,
  pearson,
  quartileGroups,
  summarize,
  thresholdRates,
} from "./sim/analysis";
export { DEFAULT_DISTRIBUTIONS, NOMINAL_PARAMS, defaultDriverConfig } from "./sim/defaults";
export { applyConfigFile, applyOverride, loadConfig, parseKeyValueText } from "./sim/config";
export { ConfigError } from "./sim/errors";
export { summaryLines, toCsv } from "./sim/report";
export {
  makeRangeFigureOption,
  makeSensitivityFigureOption,
  renderFigures,
  renderSvg,
} from "./components/Charts";
export { renderReportHtml } from "./render";
