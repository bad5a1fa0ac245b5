export function mean(xs: ReadonlyArray<number>): number {
  let sum = 0;
  for (const x of xs) sum += x;
  return sum / xs.length;
}

/**
 * Sample standard deviation (n - 1 denominator).
 * Returns null below two samples, where it is undefined.
 */
export function sampleStd(xs: ReadonlyArray<number>): number | null {
  const n = xs.length;
  if (n < 2) return null;
  const m = mean(xs);
  let ss = 0;
  for (const x of xs) ss += (x - m) * (x - m);
  return Math.sqrt(ss / (n - 1));
}

export function anyOutside(xs: ReadonlyArray<number>, min: number, max: number): boolean {
  return xs.some((x) => x < min || x > max);
}

/**
 * Index of the first step that rises by more than `tolerance`, or -1.
 */
export function firstRiseAbove(xs: ReadonlyArray<number>, tolerance: number): number {
  for (let i = 1; i < xs.length; i++) {
    if (xs[i] - xs[i - 1] > tolerance) return i;
  }
  return -1;
}
