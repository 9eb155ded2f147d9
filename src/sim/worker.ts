// src/sim/worker.ts

import { parentPort } from "node:worker_threads";
import { errorMessage } from "./errors";
import { evaluateChunk } from "./parallel";
import { type WorkerRequest, type WorkerResponse } from "./types";

// worker_threads entry used by runMonteCarloParallel
const port = parentPort;

if (port) {
  port.on("message", (msg: WorkerRequest) => {
    if (msg.type !== "evaluate") return;

    try {
      const done: WorkerResponse = {
        type: "result",
        chunkIndex: msg.chunkIndex,
        ranges: evaluateChunk(msg.samples, msg.options),
      };
      port.postMessage(done);
    } catch (e: unknown) {
      const err: WorkerResponse = {
        type: "error",
        chunkIndex: msg.chunkIndex,
        error: errorMessage(e),
      };
      port.postMessage(err);
    }
  });
}
