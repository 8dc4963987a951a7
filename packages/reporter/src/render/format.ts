/** Fixed-point with an explicit `+` on non-negative values. */
export function formatSigned(value: number, digits = 1): string {
  const fixed = value.toFixed(digits);
  return fixed.startsWith('-') ? fixed : `+${fixed}`;
}

/** `+50.0%` style label; `n/a` when no percentage could be computed. */
export function formatImprovement(pct: number | undefined): string {
  return pct === undefined ? 'n/a' : `${formatSigned(pct)}%`;
}

export function formatFixed(value: number, digits = 1): string {
  return value.toFixed(digits);
}

export function rule(char: string, width = 80): string {
  return char.repeat(width);
}
