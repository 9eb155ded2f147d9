import * as echarts from "echarts";
import type { EChartsOption } from "echarts";
import {
  boxStats,
  empiricalCdf,
  histogram,
  linearFit,
  quartileGroups,
} from "../sim/analysis";
import { fieldLabel } from "../sim/report";
import { extent } from "../sim/rng";
import type { MonteCarloResult, ParameterField } from "../sim/types";

export const FIGURE_WIDTH = 1500;
export const FIGURE_HEIGHT = 800;

const THRESHOLD_COLORS = ["#d62728", "#2ca02c", "#9467bd", "#8c564b"];
const SCATTER_FIELDS: ParameterField[] = [
  "packEnergyDensity",
  "harvestPower",
  "sicGain",
  "liftToDrag",
  "etaSystem",
];

// 3x2 panel layout, in reading order
const COLUMNS = ["5%", "38%", "71%"];
const PANELS = [0, 1, 2, 3, 4, 5].map((i) => ({
  left: COLUMNS[i % 3],
  top: i < 3 ? "9%" : "57%",
}));

function formatKm(x: number): string {
  return `${Math.round(x).toLocaleString("en-US")} km`;
}

function thresholdLines(thresholds: number[]) {
  return thresholds.map((t, i) => ({
    xAxis: t,
    name: `${t.toLocaleString("en-US")} km target`,
    lineStyle: {
      color: THRESHOLD_COLORS[i % THRESHOLD_COLORS.length],
      type: "dashed" as const,
      width: 2,
    },
    label: { formatter: formatKm(t) },
  }));
}

function trendLine(xs: number[], ys: number[]): [number, number][] {
  if (xs.length === 0) return [];
  const { slope, intercept } = linearFit(xs, ys);
  const [lo, hi] = extent(xs);
  return [
    [lo, intercept + slope * lo],
    [hi, intercept + slope * hi],
  ];
}

/** Histogram of range plus range against each sampled driver. */
export function makeRangeFigureOption(result: MonteCarloResult): EChartsOption {
  const { ensemble, summary } = result;
  const ranges = ensemble.map((r) => r.rangeKm);
  const thresholds = summary.thresholdRates.map((t) => t.thresholdKm);
  const bins = histogram(ranges, 50);
  // keep the reference lines on screen even when every run falls short
  const histMax = Math.max(summary.maxKm, ...thresholds) * 1.05;

  const scatterPanels = SCATTER_FIELDS.map((field, i) => {
    const xs = ensemble.map((r) => r.params[field]);
    return { field, panel: i + 1, xs, points: xs.map((x, k): [number, number] => [x, ranges[k]]) };
  });

  return {
    animation: false,
    backgroundColor: "#ffffff",
    title: [
      {
        text: `Range (mean ${formatKm(summary.meanKm)}, σ ${formatKm(summary.stdKm)})`,
        ...PANELS[0],
        top: "2%",
        textStyle: { fontSize: 13 },
      },
      ...scatterPanels.map(({ field, panel }) => ({
        text: `Range vs ${fieldLabel(field)}`,
        left: PANELS[panel].left,
        top: panel < 3 ? "2%" : "50%",
        textStyle: { fontSize: 13 },
      })),
    ],
    grid: PANELS.map((p) => ({ ...p, width: "25%", height: "33%" })),
    xAxis: [
      {
        gridIndex: 0,
        type: "value",
        name: "Range (km)",
        nameLocation: "middle",
        nameGap: 28,
        min: 0,
        max: histMax,
      },
      ...scatterPanels.map(({ field, panel }) => ({
        gridIndex: panel,
        type: "value" as const,
        name: fieldLabel(field),
        nameLocation: "middle" as const,
        nameGap: 28,
        scale: true,
      })),
    ],
    yAxis: [
      { gridIndex: 0, type: "value", name: "Frequency" },
      ...scatterPanels.map(({ panel }) => ({
        gridIndex: panel,
        type: "value" as const,
        name: "Range (km)",
        scale: true,
      })),
    ],
    series: [
      {
        name: "Runs",
        type: "bar",
        xAxisIndex: 0,
        yAxisIndex: 0,
        data: bins.map((b): [number, number] => [(b.x0 + b.x1) / 2, b.count]),
        barWidth: "90%",
        itemStyle: { color: "#4d99e6", borderColor: "#000000", borderWidth: 0.5 },
        markLine: {
          symbol: "none",
          data: [
            ...thresholdLines(thresholds),
            {
              xAxis: summary.meanKm,
              name: "Mean",
              lineStyle: { color: "#ff7f0e", type: "solid", width: 2 },
              label: { formatter: `Mean ${formatKm(summary.meanKm)}` },
            },
          ],
        },
      },
      ...scatterPanels.flatMap(({ field, panel, xs, points }) => [
        {
          name: fieldLabel(field),
          type: "scatter" as const,
          xAxisIndex: panel,
          yAxisIndex: panel,
          data: points,
          symbolSize: 4,
          itemStyle: { opacity: 0.6 },
        },
        {
          name: `${fieldLabel(field)} trend`,
          type: "line" as const,
          xAxisIndex: panel,
          yAxisIndex: panel,
          data: trendLine(xs, ranges),
          showSymbol: false,
          lineStyle: { color: "#d62728", type: "dashed" as const, width: 1.5 },
        },
      ]),
    ],
  };
}

/**
 * Range by battery-density quartile, cumulative distribution of range and
 * |r| of each uncertain field.
 */
export function makeSensitivityFigureOption(
  result: MonteCarloResult,
): EChartsOption {
  const { ensemble, summary } = result;
  const thresholds = summary.thresholdRates.map((t) => t.thresholdKm);
  const cdf = empiricalCdf(ensemble.map((r) => r.rangeKm));
  const quartiles = quartileGroups(ensemble, "packEnergyDensity");
  const ranked = [...summary.correlations].sort(
    (a, b) => Math.abs(b.r) - Math.abs(a.r),
  );

  return {
    animation: false,
    backgroundColor: "#ffffff",
    title: [
      { text: "Range by energy density quartile", left: COLUMNS[0], top: "3%", textStyle: { fontSize: 13 } },
      { text: "Range cumulative distribution", left: COLUMNS[1], top: "3%", textStyle: { fontSize: 13 } },
      { text: "Parameter sensitivity (|r| with range)", left: COLUMNS[2], top: "3%", textStyle: { fontSize: 13 } },
    ],
    grid: [
      { left: COLUMNS[0], top: "12%", width: "25%", height: "70%" },
      { left: COLUMNS[1], top: "12%", width: "25%", height: "70%" },
      { left: COLUMNS[2], top: "12%", width: "25%", height: "62%" },
    ],
    xAxis: [
      {
        gridIndex: 0,
        type: "category",
        name: "Battery density quartile",
        nameLocation: "middle",
        nameGap: 28,
        data: quartiles.map((q) => q.label),
      },
      {
        gridIndex: 1,
        type: "value",
        name: "Range (km)",
        nameLocation: "middle",
        nameGap: 28,
        min: 0,
        max: Math.max(summary.maxKm, ...thresholds) * 1.05,
      },
      {
        gridIndex: 2,
        type: "category",
        data: ranked.map((c) => fieldLabel(c.field)),
        axisLabel: { rotate: 30, fontSize: 11, interval: 0 },
      },
    ],
    yAxis: [
      { gridIndex: 0, type: "value", name: "Range (km)", scale: true },
      { gridIndex: 1, type: "value", name: "Cumulative probability (%)", min: 0, max: 100 },
      { gridIndex: 2, type: "value", name: "|r|", min: 0, max: 1 },
    ],
    series: [
      {
        name: "Range by quartile",
        type: "boxplot",
        xAxisIndex: 0,
        yAxisIndex: 0,
        data: quartiles.map((q) => boxStats(q.ranges)),
        itemStyle: { color: "#a6cee3", borderColor: "#1f4e79" },
      },
      {
        name: "CDF",
        type: "line",
        xAxisIndex: 1,
        yAxisIndex: 1,
        data: cdf,
        showSymbol: false,
        lineStyle: { width: 2 },
        markLine: { symbol: "none", data: thresholdLines(thresholds) },
      },
      {
        name: "|r|",
        type: "bar",
        xAxisIndex: 2,
        yAxisIndex: 2,
        data: ranked.map((c) => Number(Math.abs(c.r).toFixed(3))),
        label: { show: true, position: "top" },
      },
    ],
  };
}

export function renderSvg(
  option: EChartsOption,
  width = FIGURE_WIDTH,
  height = FIGURE_HEIGHT,
): string {
  const chart = echarts.init(null, null, {
    renderer: "svg",
    ssr: true,
    width,
    height,
  });
  try {
    chart.setOption(option);
    return chart.renderToSVGString();
  } finally {
    chart.dispose();
  }
}

export interface RenderedFigures {
  rangeSvg: string;
  sensitivitySvg: string;
}

export function renderFigures(result: MonteCarloResult): RenderedFigures {
  return {
    rangeSvg: renderSvg(makeRangeFigureOption(result)),
    sensitivitySvg: renderSvg(makeSensitivityFigureOption(result), FIGURE_WIDTH, 520),
  };
}

function Figure({ title, svg }: { title: string; svg: string }) {
  return (
    <div className="rounded-xl border bg-white p-4 shadow-sm">
      <div className="text-lg font-semibold">{title}</div>
      <div className="mt-2" dangerouslySetInnerHTML={{ __html: svg }} />
    </div>
  );
}

export function Charts({ figures }: { figures: RenderedFigures }) {
  return (
    <div className="space-y-8">
      <Figure title="Range distribution and drivers" svg={figures.rangeSvg} />
      <Figure title="Sensitivity" svg={figures.sensitivitySvg} />
    </div>
  );
}
