import { RNG, clamp } from "./rng";
import { type DistributionSpec, type ParameterVector } from "./types";

export function sampleValue(
  nominal: number,
  spec: DistributionSpec,
  z: number,
): number {
  const raw =
    spec.mode === "absolute"
      ? nominal + spec.spread * z
      : nominal * (1 + spec.spread * z);
  // Clamp the value itself, no renormalization of the tail
  return clamp(raw, spec.floor ?? -Infinity, spec.ceiling ?? Infinity);
}

/**
 * Draws every standard normal the ensemble needs, one column of `runs`
 * draws per distribution, in list order. Evaluation never touches the
 * stream, so the ensemble only depends on seed, distributions and runs.
 */
export function drawNormals(
  rng: RNG,
  distributions: DistributionSpec[],
  runs: number,
): number[][] {
  return distributions.map(() =>
    Array.from({ length: runs }, () => rng.normal01()),
  );
}

export function buildSamples(
  nominal: ParameterVector,
  distributions: DistributionSpec[],
  runs: number,
  rng: RNG,
): ParameterVector[] {
  const z = drawNormals(rng, distributions, runs);

  const samples: ParameterVector[] = [];
  for (let i = 0; i < runs; i++) {
    const params: ParameterVector = { ...nominal };
    distributions.forEach((spec, k) => {
      params[spec.field] = sampleValue(nominal[spec.field], spec, z[k][i]);
    });
    samples.push(params);
  }
  return samples;
}
