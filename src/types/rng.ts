// src/types/rng.ts
import type { Faker } from "@faker-js/faker";

/** Uniform source in [0, 1), e.g. a seedrandom PRNG */
export type RNG = () => number;

/**
 * Both random streams used during one generation run, seeded from the same
 * value. Passed explicitly to every generation call.
 */
export type RandomSource = {
  seed: number;
  rng: RNG;
  faker: Faker;
};
