import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import {
  applyConfigFile,
  applyOverride,
  applyOverrides,
  loadConfig,
  parseKeyValueText,
  parseOverride,
} from "../config";
import { defaultDriverConfig } from "../defaults";
import { ConfigError } from "../errors";

function configErrorField(fn: () => unknown): string {
  try {
    fn();
  } catch (e: unknown) {
    if (e instanceof ConfigError) return e.field;
    throw e;
  }
  throw new Error("expected a ConfigError");
}

describe("parseKeyValueText", () => {
  it("reads key=value lines and skips comments", () => {
    const text = ["# study A", "", "runs = 500", "  seed=7  ", "nominal.totalMass=90000"].join("\n");
    expect(parseKeyValueText(text)).toEqual([
      ["runs", "500"],
      ["seed", "7"],
      ["nominal.totalMass", "90000"],
    ]);
  });

  it("reports the line of a malformed entry", () => {
    expect(configErrorField(() => parseKeyValueText("runs=5\nseed 7"))).toBe("line 2");
    expect(configErrorField(() => parseKeyValueText("=5"))).toBe("line 1");
  });
});

describe("parseOverride", () => {
  it("splits on the first equals sign", () => {
    expect(parseOverride("thresholdsKm=1=2")).toEqual(["thresholdsKm", "1=2"]);
    expect(configErrorField(() => parseOverride("runs"))).toBe("runs");
  });
});

describe("applyOverride", () => {
  const base = defaultDriverConfig();

  it("sets scalar settings", () => {
    expect(applyOverride(base, "runs", "500").runs).toBe(500);
    expect(applyOverride(base, "seed", "3").seed).toBe(3);
    expect(applyOverride(base, "cruiseHours", "8").cruiseHours).toBe(8);
    expect(applyOverride(base, "thresholdsKm", "3000, 6000").thresholdsKm).toEqual([3000, 6000]);
  });

  it("rejects seeds outside the generator's 32-bit range", () => {
    expect(configErrorField(() => applyOverride(base, "seed", "-3"))).toBe("seed");
    expect(configErrorField(() => applyOverride(base, "seed", "1.5"))).toBe("seed");
    expect(configErrorField(() => applyOverride(base, "seed", "4294967296"))).toBe("seed");
    expect(applyOverride(base, "seed", "4294967295").seed).toBe(4294967295);
  });

  it("rejects invalid run counts", () => {
    expect(configErrorField(() => applyOverride(base, "runs", "0"))).toBe("runs");
    expect(configErrorField(() => applyOverride(base, "runs", "-1"))).toBe("runs");
    expect(configErrorField(() => applyOverride(base, "runs", "1.5"))).toBe("runs");
    expect(configErrorField(() => applyOverride(base, "runs", "lots"))).toBe("runs");
    expect(configErrorField(() => applyOverride(base, "runs", ""))).toBe("runs");
  });

  it("sets nominal values", () => {
    const cfg = applyOverride(base, "nominal.totalMass", "90000");
    expect(cfg.nominal.totalMass).toBe(90000);
    expect(base.nominal.totalMass).toBe(80000);
  });

  it("updates an existing distribution in place", () => {
    const cfg = applyOverride(base, "spread.packEnergyDensity", "0.3");
    expect(cfg.distributions[0]).toEqual({ field: "packEnergyDensity", spread: 0.3, floor: 200 });
    expect(cfg.distributions).toHaveLength(5);
  });

  it("appends a distribution for a fixed field", () => {
    const cfg = applyOverrides(base, [
      ["spread.batteryMass", "0.05"],
      ["floor.batteryMass", "20000"],
    ]);
    expect(cfg.distributions).toHaveLength(6);
    expect(cfg.distributions[5]).toEqual({ field: "batteryMass", spread: 0.05, floor: 20000 });
  });

  it("sets the spread mode", () => {
    const cfg = applyOverride(base, "mode.harvestPower", "absolute");
    expect(cfg.distributions[2].mode).toBe("absolute");
    expect(configErrorField(() => applyOverride(base, "mode.harvestPower", "wide"))).toBe(
      "mode.harvestPower",
    );
  });

  it("rejects unknown keys and parameters", () => {
    expect(configErrorField(() => applyOverride(base, "foo", "1"))).toBe("foo");
    expect(configErrorField(() => applyOverride(base, "nominal.wingspan", "40"))).toBe(
      "nominal.wingspan",
    );
    expect(configErrorField(() => applyOverride(base, "bounds.etaSystem", "1"))).toBe(
      "bounds.etaSystem",
    );
  });

  it("rejects a negative spread", () => {
    expect(configErrorField(() => applyOverride(base, "spread.sicGain", "-0.2"))).toBe(
      "spread.sicGain",
    );
  });
});

describe("applyConfigFile", () => {
  const base = defaultDriverConfig();

  it("merges nominal values onto the base", () => {
    const cfg = applyConfigFile(base, { runs: 100, nominal: { totalMass: 70000 } });
    expect(cfg.runs).toBe(100);
    expect(cfg.nominal.totalMass).toBe(70000);
    expect(cfg.nominal.batteryMass).toBe(25000);
    expect(cfg.distributions).toEqual(base.distributions);
  });

  it("replaces the distribution list", () => {
    const cfg = applyConfigFile(base, {
      distributions: [{ field: "harvestPower", spread: 5, mode: "absolute", floor: 0 }],
    });
    expect(cfg.distributions).toEqual([
      { field: "harvestPower", spread: 5, mode: "absolute", floor: 0 },
    ]);
  });

  it("rejects a distribution on an unknown field", () => {
    expect(
      configErrorField(() =>
        applyConfigFile(base, { distributions: [{ field: "wingspan", spread: 0.1 }] }),
      ),
    ).toBe("distributions.0.field");
  });

  it("reports the path of a schema violation", () => {
    expect(configErrorField(() => applyConfigFile(base, { runs: -1 }))).toBe("runs");
    expect(configErrorField(() => applyConfigFile(base, { nominal: { gravity: "g" } }))).toBe(
      "nominal.gravity",
    );
    expect(configErrorField(() => applyConfigFile(base, { colour: "blue" }))).toBe("config");
  });
});

describe("loadConfig", () => {
  const dir = mkdtempSync(join(tmpdir(), "range-config-"));

  it("returns the defaults without a file", () => {
    expect(loadConfig()).toEqual(defaultDriverConfig());
  });

  it("reads a key-value file and applies overrides last", () => {
    const file = join(dir, "study.conf");
    writeFileSync(file, "runs=300\nseed=9\nceiling.sicGain=1.5\n");
    const cfg = loadConfig({ file, overrides: ["seed=11"] });
    expect(cfg.runs).toBe(300);
    expect(cfg.seed).toBe(11);
    expect(cfg.distributions[3]).toEqual({ field: "sicGain", spread: 0.2, floor: 1, ceiling: 1.5 });
  });

  it("reads a JSON file", () => {
    const file = join(dir, "study.json");
    writeFileSync(file, JSON.stringify({ runs: 42, thresholdsKm: [100] }));
    const cfg = loadConfig({ file });
    expect(cfg.runs).toBe(42);
    expect(cfg.thresholdsKm).toEqual([100]);
  });

  it("reports invalid JSON as a configuration error", () => {
    const file = join(dir, "broken.json");
    writeFileSync(file, "{ runs: ");
    expect(configErrorField(() => loadConfig({ file }))).toBe(file);
  });

  it("validates the merged result", () => {
    expect(
      configErrorField(() =>
        loadConfig({ overrides: ["floor.etaSystem=0.99", "ceiling.etaSystem=0.9"] }),
      ),
    ).toBe("floor.etaSystem");
  });
});
