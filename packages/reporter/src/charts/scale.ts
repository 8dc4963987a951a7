export type Scale = (value: number) => number;

export function linearScale(
  domain: readonly [number, number],
  range: readonly [number, number]
): Scale {
  const [d0, d1] = domain;
  const [r0, r1] = range;
  const span = d1 - d0;
  if (span === 0) {
    return () => r0;
  }
  return (value) => r0 + ((value - d0) / span) * (r1 - r0);
}

function niceStep(raw: number): number {
  const magnitude = 10 ** Math.floor(Math.log10(raw));
  const fraction = raw / magnitude;
  if (fraction <= 1) return magnitude;
  if (fraction <= 2) return 2 * magnitude;
  if (fraction <= 5) return 5 * magnitude;
  return 10 * magnitude;
}

/**
 * Evenly spaced ticks from 0 covering `max` with round step sizes. The last
 * tick is the axis maximum.
 */
export function niceTicks(max: number, count = 5): number[] {
  const upper = Number.isFinite(max) && max > 0 ? max : 1;
  const step = niceStep(upper / count);
  const top = Math.ceil(upper / step) * step;
  const ticks: number[] = [];
  for (let i = 0; i * step <= top + step / 2; i += 1) {
    ticks.push(Number((i * step).toPrecision(12)));
  }
  return ticks;
}

export function formatTick(value: number): string {
  return Number.isInteger(value) ? String(value) : String(Number(value.toFixed(3)));
}
