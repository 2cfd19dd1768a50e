import seedrandom from "seedrandom";
import type { EvaluateOptions, Rng } from "./types";

let defaultRng: Rng = seedrandom();

/** Deterministic generator for a given seed. */
export function createRng(seed: string): Rng {
  return seedrandom(seed);
}

/** Replace the process-wide random source. */
export function setDefaultRng(rng: Rng): void {
  defaultRng = rng;
}

export function getDefaultRng(): Rng {
  return defaultRng;
}

/** Go back to a freshly auto-seeded generator. */
export function resetDefaultRng(): void {
  defaultRng = seedrandom();
}

export function resolveRng(options: EvaluateOptions = {}): Rng {
  if (options.rng) return options.rng;
  if (options.seed !== undefined) return createRng(options.seed);
  return defaultRng;
}

/** Uniform integer in [1, faces]. */
export function rollDie(faces: number, rng: Rng): number {
  const r = rng();
  if (!(r >= 0 && r < 1)) {
    throw new RangeError(`Random source returned ${r}, expected a number in [0, 1)`);
  }
  return 1 + Math.floor(r * faces);
}
