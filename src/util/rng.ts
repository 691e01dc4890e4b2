// src/util/rng.ts
import seedrandom from "seedrandom";
import { Faker, en } from "@faker-js/faker";
import type { RNG, RandomSource } from "../types/rng.js";

/**
 * Create a seeded random number generator.
 */
export function createRng(seed: number | string): RNG {
  return seedrandom(String(seed));
}

/**
 * Create the PRNG + faker pair for one generation run. Faker gets its own
 * instance so nothing leaks between runs through the shared default.
 */
export function createRandomSource(seed: number): RandomSource {
  const faker = new Faker({ locale: [en] });
  faker.seed(seed);
  return { seed, rng: createRng(seed), faker };
}

/**
 * Pick a random integer in [min, max] inclusive.
 */
export function randomInt(rng: RNG, min: number, max: number): number {
  return Math.floor(rng() * (max - min + 1)) + min;
}

/**
 * Pick a random float in [min, max].
 */
export function randomFloat(rng: RNG, min: number, max: number): number {
  return rng() * (max - min) + min;
}

/**
 * Draw from a normal distribution (Box-Muller).
 */
export function randomNormal(rng: RNG, mean = 0, stdDev = 1): number {
  let u = 0;
  while (u === 0) u = rng();
  const v = rng();
  return mean + stdDev * Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
}

/**
 * Pick a random element from an array.
 */
export function randomPick<T>(rng: RNG, arr: readonly T[]): T {
  const value = arr[Math.floor(rng() * arr.length)];
  if (value === undefined) {
    throw new Error("Cannot pick from empty array");
  }
  return value;
}

/**
 * Weighted random pick of an index.
 * @param weights One non-negative weight per candidate
 * @returns Index of the selected candidate
 */
export function weightedIndex(rng: RNG, weights: readonly number[]): number {
  const total = weights.reduce((sum, w) => sum + w, 0);

  if (total <= 0) {
    throw new Error("Total weight must be positive");
  }

  let r = rng() * total;
  for (let i = 0; i < weights.length; i++) {
    const weight = weights[i] ?? 0;
    if (weight <= 0) continue;
    r -= weight;
    if (r <= 0) {
      return i;
    }
  }

  // Fallback for floating point drift: last candidate with weight
  let last = weights.length - 1;
  while (last > 0 && (weights[last] ?? 0) <= 0) last--;
  return last;
}

/**
 * Generate a random boolean with given probability of true.
 */
export function randomBool(rng: RNG, probability = 0.5): boolean {
  return rng() < probability;
}
