export function mean(values: ReadonlyArray<number>): number {
  if (!values.length) {
    return 0;
  }
  return values.reduce((acc, value) => acc + value, 0) / values.length;
}

/** Share of `true` entries, as a fraction. Empty input yields 0. */
export function rate(flags: ReadonlyArray<boolean>): number {
  if (!flags.length) {
    return 0;
  }
  return flags.filter(Boolean).length / flags.length;
}

export function safeDivide(numerator: number, denominator: number, fallback = 0): number {
  if (denominator === 0 || !Number.isFinite(denominator)) {
    return fallback;
  }
  return numerator / denominator;
}

export function round(value: number, digits: number): number {
  return Number(value.toFixed(digits));
}
