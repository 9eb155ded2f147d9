import { cpus } from "node:os";
import { join } from "node:path";
import { Worker } from "node:worker_threads";
import { DEFAULT_CRUISE_HOURS, createAnalyticEvaluator } from "./model";
import { assembleResult, materializeSamples } from "./monteCarlo";
import {
  type DriverConfig,
  type ModelOptions,
  type MonteCarloResult,
  type ParameterVector,
  type WorkerRequest,
  type WorkerResponse,
} from "./types";

export interface ParallelOptions {
  workers?: number; // default: available cores
  workerFile?: string; // compiled worker entry, default ./worker.js beside this module
  onProgress?: (completed: number, total: number) => void;
}

export function splitIntoChunks<T>(items: T[], parts: number): T[][] {
  const n = Math.max(1, Math.min(Math.floor(parts), items.length));
  const size = Math.ceil(items.length / n);
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export function evaluateChunk(
  samples: ParameterVector[],
  options: ModelOptions,
): number[] {
  const evaluator = createAnalyticEvaluator(options);
  return samples.map((p) => evaluator.evaluate(p));
}

function evaluateInWorker(workerFile: string, request: WorkerRequest): Promise<number[]> {
  return new Promise((resolve, reject) => {
    const worker = new Worker(workerFile);
    let settled = false;

    const finish = (err: Error | null, ranges?: number[]) => {
      if (settled) return;
      settled = true;
      worker.removeAllListeners();
      worker
        .terminate()
        .then(() => (err ? reject(err) : resolve(ranges ?? [])))
        .catch(reject);
    };

    worker.once("message", (msg: WorkerResponse) => {
      if (msg.type === "result" && msg.ranges) {
        finish(null, msg.ranges);
      } else {
        finish(new Error(msg.error ?? `chunk ${request.chunkIndex} failed`));
      }
    });
    worker.once("error", (err: Error) => finish(err));
    // only reached when the worker quits before posting a response
    worker.once("exit", (code: number) =>
      finish(
        new Error(
          `worker exited with code ${code} before returning chunk ${request.chunkIndex}`,
        ),
      ),
    );

    worker.postMessage(request);
  });
}

/**
 * Same ensemble as `runMonteCarlo` with the analytic model: samples are drawn
 * up front in this thread, chunks are evaluated in worker threads and put
 * back in run order.
 */
export async function runMonteCarloParallel(
  config: DriverConfig,
  options: ParallelOptions = {},
): Promise<MonteCarloResult> {
  const startedAt = Date.now();
  const samples = materializeSamples(config);
  const modelOptions: ModelOptions = {
    cruiseHours: config.cruiseHours ?? DEFAULT_CRUISE_HOURS,
  };

  const chunks = splitIntoChunks(samples, options.workers ?? cpus().length);
  const workerFile = options.workerFile ?? join(__dirname, "worker.js");
  const total = samples.length;

  let completed = 0;
  const results = await Promise.all(
    chunks.map(async (chunk, chunkIndex) => {
      const ranges = await evaluateInWorker(workerFile, {
        type: "evaluate",
        chunkIndex,
        samples: chunk,
        options: modelOptions,
      });
      completed += chunk.length;
      options.onProgress?.(completed, total);
      return ranges;
    }),
  );

  // Promise.all keeps chunk order, so flattening restores run order
  const ranges = results.flat();
  if (ranges.length !== total) {
    throw new Error(`worker pool returned ${ranges.length} ranges for ${total} runs`);
  }

  return assembleResult(config, "analytic (worker pool)", samples, ranges, startedAt);
}
