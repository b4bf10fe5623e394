/** Percent change from `a` to `b`; 0 when `a` is (near) zero. */
export function pctChange(a: number, b: number): number {
  if (Math.abs(a) < 1e-12) return 0;
  return ((b - a) / Math.abs(a)) * 100;
}

export function mean(arr: readonly number[]): number {
  if (!arr.length) return 0;
  return arr.reduce((s, n) => s + n, 0) / arr.length;
}

/** Sample standard deviation (n - 1); 0 below two values. */
export function sampleStddev(arr: readonly number[]): number {
  if (arr.length < 2) return 0;
  const m = mean(arr);
  return Math.sqrt(arr.reduce((s, n) => s + (n - m) * (n - m), 0) / (arr.length - 1));
}

// Abramowitz & Stegun 7.1.26, max error 1.5e-7
function erf(x: number): number {
  const sign = x < 0 ? -1 : 1;
  const ax = Math.abs(x);
  const t = 1 / (1 + 0.3275911 * ax);
  const y =
    1 -
    ((((1.061405429 * t - 1.453152027) * t + 1.421413741) * t - 0.284496736) * t + 0.254829592) *
      t *
      Math.exp(-ax * ax);
  return sign * y;
}

/** Standard normal cumulative distribution P(Z <= z). */
export function normalCdf(z: number): number {
  return 0.5 * (1 + erf(z / Math.SQRT2));
}
