#!/usr/bin/env node
import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { parseArgs } from "node:util";
import { z } from "zod";
import { renderFigures } from "./components/Charts";
import { renderReportHtml } from "./render";
import { loadConfig } from "./sim/config";
import { ConfigError, errorMessage } from "./sim/errors";
import { runMonteCarlo } from "./sim/monteCarlo";
import { runMonteCarloParallel } from "./sim/parallel";
import { summaryLines, toCsv } from "./sim/report";
import type { MonteCarloResult } from "./sim/types";

const USAGE = `Usage: aircraft-range-mc [options]

  -c, --config <file>   JSON or key=value configuration file
  -s, --set <key=value> override one setting (repeatable)
      --runs <n>        number of Monte-Carlo runs
      --seed <n>        random seed
  -w, --workers <n>     evaluate in n worker threads
  -o, --out <dir>       output directory (default: .)
      --no-report       skip the figures and the HTML report
  -h, --help            show this help
`;

export const OUTPUT_FILES = {
  csv: "range_results.csv",
  rangeFigure: "range_figure.svg",
  sensitivityFigure: "sensitivity_figure.svg",
  report: "report.html",
} as const;

function progressPrinter(): (completed: number, total: number) => void {
  let lastDecile = -1;
  return (completed, total) => {
    const decile = Math.floor((completed / total) * 10);
    // throttle to one line per 10%
    if (decile !== lastDecile) {
      lastDecile = decile;
      console.error(`Simulating ${completed}/${total}`);
    }
  };
}

async function writeOutputs(
  result: MonteCarloResult,
  outDir: string,
  withReport: boolean,
): Promise<string[]> {
  await mkdir(outDir, { recursive: true });
  const written: string[] = [];

  const csvPath = join(outDir, OUTPUT_FILES.csv);
  await writeFile(csvPath, toCsv(result), "utf8");
  written.push(csvPath);

  if (withReport) {
    const figures = renderFigures(result);
    const files: [string, string][] = [
      [OUTPUT_FILES.rangeFigure, figures.rangeSvg],
      [OUTPUT_FILES.sensitivityFigure, figures.sensitivitySvg],
      [OUTPUT_FILES.report, renderReportHtml(result, figures)],
    ];
    for (const [name, content] of files) {
      const path = join(outDir, name);
      await writeFile(path, content, "utf8");
      written.push(path);
    }
  }

  return written;
}

export async function main(argv: string[]): Promise<number> {
  try {
    const { values } = parseArgs({
      args: argv,
      options: {
        config: { type: "string", short: "c" },
        set: { type: "string", short: "s", multiple: true },
        runs: { type: "string" },
        seed: { type: "string" },
        workers: { type: "string", short: "w" },
        out: { type: "string", short: "o", default: "." },
        "no-report": { type: "boolean", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
      strict: true,
    });

    if (values.help) {
      console.log(USAGE);
      return 0;
    }

    const overrides = [...(values.set ?? [])];
    if (values.runs !== undefined) overrides.push(`runs=${values.runs}`);
    if (values.seed !== undefined) overrides.push(`seed=${values.seed}`);

    const config = loadConfig({ file: values.config, overrides });

    let workers = 1;
    if (values.workers !== undefined) {
      const parsed = z.coerce.number().int().positive().safeParse(values.workers);
      if (!parsed.success) {
        throw new ConfigError("workers", "must be a positive integer");
      }
      workers = parsed.data;
    }

    const onProgress = progressPrinter();
    const result =
      workers > 1
        ? await runMonteCarloParallel(config, { workers, onProgress })
        : runMonteCarlo(config, { onProgress });

    console.log(summaryLines(result).join("\n"));
    console.log(`Analysis completed in ${(result.elapsedMs / 1000).toFixed(2)} s`);

    const written = await writeOutputs(result, values.out ?? ".", !values["no-report"]);
    for (const path of written) console.log(`Saved ${path}`);
    return 0;
  } catch (e: unknown) {
    if (e instanceof ConfigError) {
      console.error(`Configuration error (${e.field}): ${e.detail}`);
    } else {
      console.error(errorMessage(e));
      console.error(USAGE);
    }
    return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((e: unknown) => {
      console.error(errorMessage(e));
      process.exitCode = 1;
    });
}
