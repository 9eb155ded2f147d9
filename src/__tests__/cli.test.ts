import { existsSync, mkdtempSync, readFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { OUTPUT_FILES, main } from "../cli";

function captureConsole() {
  return {
    log: vi.spyOn(console, "log").mockImplementation(() => undefined),
    error: vi.spyOn(console, "error").mockImplementation(() => undefined),
  };
}

describe("main", () => {
  let out = "";

  beforeEach(() => {
    out = mkdtempSync(join(tmpdir(), "range-cli-"));
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes the results table and prints the summary", async () => {
    const { log } = captureConsole();
    const code = await main(["--runs", "50", "--seed", "7", "--no-report", "-o", out]);

    expect(code).toBe(0);
    const lines = readFileSync(join(out, OUTPUT_FILES.csv), "utf8").split("\n");
    expect(lines).toHaveLength(52);
    expect(lines[1].startsWith("1,")).toBe(true);
    expect(lines[51]).toBe("");
    expect(log).toHaveBeenCalledWith(
      expect.stringContaining("Runs: 50 (seed 7, evaluator analytic)"),
    );
    expect(existsSync(join(out, OUTPUT_FILES.report))).toBe(false);
  });

  it("writes the figures and the HTML report", async () => {
    captureConsole();
    const code = await main(["--runs", "40", "-o", out]);

    expect(code).toBe(0);
    expect(readFileSync(join(out, OUTPUT_FILES.rangeFigure), "utf8")).toContain("<svg");
    expect(readFileSync(join(out, OUTPUT_FILES.sensitivityFigure), "utf8")).toContain("<svg");
    expect(readFileSync(join(out, OUTPUT_FILES.report), "utf8")).toContain("<!DOCTYPE html>");
  });

  it("applies --set overrides", async () => {
    captureConsole();
    const code = await main(["--set", "runs=12", "--set", "nominal.totalMass=40000", "--no-report", "-o", out]);

    expect(code).toBe(0);
    const lines = readFileSync(join(out, OUTPUT_FILES.csv), "utf8").trimEnd().split("\n");
    expect(lines).toHaveLength(13);
  });

  it("fails on zero runs without writing anything", async () => {
    const { log, error } = captureConsole();
    const code = await main(["--runs", "0", "-o", out]);

    expect(code).toBe(1);
    expect(error).toHaveBeenCalledWith(expect.stringMatching(/^Configuration error \(runs\): \S/));
    expect(existsSync(join(out, OUTPUT_FILES.csv))).toBe(false);
    expect(log).not.toHaveBeenCalled();
  });

  it("rejects a bad worker count", async () => {
    const { error } = captureConsole();
    const code = await main(["--workers", "none", "-o", out]);

    expect(code).toBe(1);
    expect(error).toHaveBeenCalledWith(
      "Configuration error (workers): must be a positive integer",
    );
  });

  it("rejects unknown options", async () => {
    captureConsole();
    expect(await main(["--bogus"])).toBe(1);
  });

  it("prints usage", async () => {
    const { log } = captureConsole();
    expect(await main(["--help"])).toBe(0);
    expect(log).toHaveBeenCalledWith(expect.stringContaining("Usage: aircraft-range-mc"));
  });
});
