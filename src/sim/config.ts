import { readFileSync } from "node:fs";
import { extname } from "node:path";
import { z } from "zod";
import { defaultDriverConfig } from "./defaults";
import { ConfigError } from "./errors";
import { validateDriverConfig } from "./monteCarlo";
import { MAX_SEED } from "./rng";
import {
  type DistributionSpec,
  type DriverConfig,
  type ParameterField,
  isParameterField,
} from "./types";

const finite = z.number().finite();
const seedSchema = z.number().int().min(0).max(MAX_SEED);

const nominalSchema = z
  .object({
    etaSystem: finite,
    packEnergyDensity: finite,
    batteryMass: finite,
    totalMass: finite,
    gravity: finite,
    liftToDrag: finite,
    sfcEq: finite,
    harvestPower: finite,
    sicGain: finite,
  })
  .partial()
  .strict();

const distributionSchema = z
  .object({
    field: z.string(),
    spread: finite.nonnegative(),
    mode: z.enum(["relative", "absolute"]).optional(),
    floor: finite.optional(),
    ceiling: finite.optional(),
  })
  .strict();

const configFileSchema = z
  .object({
    runs: z.number().int().positive().optional(),
    seed: seedSchema.optional(),
    cruiseHours: finite.nonnegative().optional(),
    thresholdsKm: z.array(finite.positive()).min(1).optional(),
    nominal: nominalSchema.optional(),
    distributions: z.array(distributionSchema).optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

function fromZodError(error: z.ZodError): ConfigError {
  const issue = error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join(".") : "config";
  return new ConfigError(field, issue ? issue.message : "invalid configuration");
}

/** Merges a JSON document onto `base`. Distributions, when given, replace the list. */
export function applyConfigFile(base: DriverConfig, raw: unknown): DriverConfig {
  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) throw fromZodError(parsed.error);
  const file = parsed.data;

  const distributions = file.distributions
    ? file.distributions.map((d, i): DistributionSpec => {
        if (!isParameterField(d.field)) {
          throw new ConfigError(
            `distributions.${i}.field`,
            `"${d.field}" is not a field of the nominal parameter vector`,
          );
        }
        return { ...d, field: d.field };
      })
    : base.distributions;

  return {
    ...base,
    runs: file.runs ?? base.runs,
    seed: file.seed ?? base.seed,
    cruiseHours: file.cruiseHours ?? base.cruiseHours,
    thresholdsKm: file.thresholdsKm ?? base.thresholdsKm,
    nominal: { ...base.nominal, ...file.nominal },
    distributions,
  };
}

/** `key=value` lines; blank lines and `#` comments are skipped. */
export function parseKeyValueText(text: string): [string, string][] {
  const entries: [string, string][] = [];
  text.split(/\r?\n/).forEach((line, i) => {
    const trimmed = line.trim();
    if (trimmed === "" || trimmed.startsWith("#")) return;
    const eq = trimmed.indexOf("=");
    if (eq <= 0) {
      throw new ConfigError(`line ${i + 1}`, `expected key=value, got "${trimmed}"`);
    }
    entries.push([trimmed.slice(0, eq).trim(), trimmed.slice(eq + 1).trim()]);
  });
  return entries;
}

export function parseOverride(arg: string): [string, string] {
  const eq = arg.indexOf("=");
  if (eq <= 0) throw new ConfigError(arg, "expected key=value");
  return [arg.slice(0, eq).trim(), arg.slice(eq + 1).trim()];
}

function parseNumber(key: string, raw: string, schema: z.ZodNumber = finite): number {
  const text = raw.trim();
  const result = schema.safeParse(text === "" ? Number.NaN : Number(text));
  if (!result.success) {
    throw new ConfigError(key, result.error.issues[0]?.message ?? "invalid number");
  }
  return result.data;
}

function parameterField(key: string, name: string): ParameterField {
  if (!isParameterField(name)) {
    throw new ConfigError(key, `unknown parameter "${name}"`);
  }
  return name;
}

function withDistribution(
  config: DriverConfig,
  field: ParameterField,
  patch: Partial<DistributionSpec>,
): DriverConfig {
  const exists = config.distributions.some((d) => d.field === field);
  const distributions = exists
    ? config.distributions.map((d) => (d.field === field ? { ...d, ...patch } : d))
    : [...config.distributions, { field, spread: 0, ...patch }];
  return { ...config, distributions };
}

export function applyOverride(
  config: DriverConfig,
  key: string,
  value: string,
): DriverConfig {
  switch (key) {
    case "runs":
      return { ...config, runs: parseNumber(key, value, z.number().int().positive()) };
    case "seed":
      return { ...config, seed: parseNumber(key, value, seedSchema) };
    case "cruiseHours":
      return { ...config, cruiseHours: parseNumber(key, value, finite.nonnegative()) };
    case "thresholdsKm":
      return {
        ...config,
        thresholdsKm: value
          .split(",")
          .map((part) => parseNumber(key, part, finite.positive())),
      };
  }

  const dot = key.indexOf(".");
  if (dot <= 0) throw new ConfigError(key, "unknown configuration key");
  const group = key.slice(0, dot);
  const field = parameterField(key, key.slice(dot + 1));

  switch (group) {
    case "nominal":
      return {
        ...config,
        nominal: { ...config.nominal, [field]: parseNumber(key, value) },
      };
    case "spread":
      return withDistribution(config, field, {
        spread: parseNumber(key, value, finite.nonnegative()),
      });
    case "mode": {
      const mode = z.enum(["relative", "absolute"]).safeParse(value);
      if (!mode.success) {
        throw new ConfigError(key, 'must be "relative" or "absolute"');
      }
      return withDistribution(config, field, { mode: mode.data });
    }
    case "floor":
      return withDistribution(config, field, { floor: parseNumber(key, value) });
    case "ceiling":
      return withDistribution(config, field, { ceiling: parseNumber(key, value) });
    default:
      throw new ConfigError(key, "unknown configuration key");
  }
}

export function applyOverrides(
  config: DriverConfig,
  entries: [string, string][],
): DriverConfig {
  return entries.reduce((acc, [key, value]) => applyOverride(acc, key, value), config);
}

export function readConfigFile(base: DriverConfig, path: string): DriverConfig {
  const text = readFileSync(path, "utf8");
  if (extname(path).toLowerCase() === ".json") {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (e: unknown) {
      throw new ConfigError(path, `invalid JSON (${e instanceof Error ? e.message : String(e)})`);
    }
    return applyConfigFile(base, raw);
  }
  return applyOverrides(base, parseKeyValueText(text));
}

export interface LoadConfigOptions {
  file?: string;
  overrides?: string[];
}

/** Defaults, then the config file, then `key=value` overrides. */
export function loadConfig(options: LoadConfigOptions = {}): DriverConfig {
  let config = defaultDriverConfig();
  if (options.file) config = readConfigFile(config, options.file);
  config = applyOverrides(config, (options.overrides ?? []).map(parseOverride));
  validateDriverConfig(config);
  return config;
}
