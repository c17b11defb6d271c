import seedrandom from 'seedrandom';

/** Returns a float in [0, 1). */
export type RandomSource = () => number;

export const RANDOM_SOURCE = Symbol('RANDOM_SOURCE');

export const defaultRandom: RandomSource = Math.random;

export function seededRandom(seed: string): RandomSource {
  const rng = seedrandom(seed);
  return () => rng();
}

export function randomInt(maxExclusive: number, random: RandomSource): number {
  return Math.floor(random() * maxExclusive);
}

// Fisher-Yates on a copy
export function shuffle<T>(items: readonly T[], random: RandomSource): T[] {
  const a = items.slice();
  for (let i = a.length - 1; i > 0; i--) {
    const j = randomInt(i + 1, random);
    [a[i], a[j]] = [a[j], a[i]];
  }
  return a;
}

export function pickOne<T>(items: readonly T[], random: RandomSource): T | undefined {
  if (items.length === 0) return undefined;
  return items[randomInt(items.length, random)];
}
