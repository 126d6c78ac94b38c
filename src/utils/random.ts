import { randomInt } from 'node:crypto';

export interface Sample<T> {
  items: T[];
  // Population size observed while sampling
  seen: number;
}

export interface RandomSource {
  sampleWithoutReplacement<T>(population: Iterable<T> | AsyncIterable<T>, k: number): Promise<Sample<T>>;
}

/**
 * Uniform sampling without replacement in a single pass (Algorithm R).
 *
 * Memory is bounded by k regardless of the population size, so the
 * population can be a cursor over an arbitrarily large table.
 */
export class ReservoirSampler implements RandomSource {
  constructor(private nextInt: (maxExclusive: number) => number = (max) => randomInt(max)) {}

  async sampleWithoutReplacement<T>(
    population: Iterable<T> | AsyncIterable<T>,
    k: number
  ): Promise<Sample<T>> {
    const reservoir: T[] = [];
    let seen = 0;

    for await (const item of population) {
      if (reservoir.length < k) {
        reservoir.push(item);
      } else {
        const j = this.nextInt(seen + 1);
        if (j < k) {
          reservoir[j] = item;
        }
      }
      seen++;
    }

    return { items: reservoir, seen };
  }
}
