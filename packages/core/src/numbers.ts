export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

/** Ratio with the denominator floored at 1. */
export function safeRatio(numerator: number, denominator: number): number {
  return numerator / Math.max(1, denominator);
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
