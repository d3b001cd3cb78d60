// Interpolation helpers shared by the performance table and the wind grid.
// Everything here is pure and clamps rather than extrapolates.

export interface Bracket {
  lower: number; // index into the axis
  upper: number;
  t: number; // 0 at lower, 1 at upper
  clamped: boolean;
  clampedTo?: number;
}

// a*(1-t) + b*t returns a at t=0 and b at t=1 exactly
export function lerp(a: number, b: number, t: number): number {
  return a * (1 - t) + b * t;
}

export function clamp(n: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, n));
}

/**
 * Locate `x` on a strictly increasing axis. An exact hit returns a zero-width
 * bracket so the sample is used untouched.
 */
export function bracket(x: number, axis: readonly number[]): Bracket {
  const last = axis.length - 1;

  if (x <= axis[0]) {
    return { lower: 0, upper: 0, t: 0, clamped: x < axis[0], clampedTo: x < axis[0] ? axis[0] : undefined };
  }
  if (x >= axis[last]) {
    return { lower: last, upper: last, t: 0, clamped: x > axis[last], clampedTo: x > axis[last] ? axis[last] : undefined };
  }

  let i = 0;
  while (i + 1 < last && x >= axis[i + 1]) i++;

  if (x === axis[i]) {
    return { lower: i, upper: i, t: 0, clamped: false };
  }

  return {
    lower: i,
    upper: i + 1,
    t: (x - axis[i]) / (axis[i + 1] - axis[i]),
    clamped: false
  };
}

export function interpolateVector(a: readonly number[], b: readonly number[], t: number): number[] {
  if (t === 0) return [...a];
  return a.map((value, i) => lerp(value, b[i], t));
}

// ── Angles ──────────────────────────────────────────────────

export function normalizeDegrees(deg: number): number {
  const n = deg % 360;
  return n < 0 ? n + 360 : n + 0;
}

/** Signed difference `to - from` folded into [-180, 180). */
export function angleDifference(from: number, to: number): number {
  return normalizeDegrees(to - from + 180) - 180;
}

/** Interpolate a direction along the shorter arc; result in [0, 360). */
export function interpolateDirection(from: number, to: number, t: number): number {
  if (t === 0) return normalizeDegrees(from);
  return normalizeDegrees(from + angleDifference(from, to) * t);
}

export function toRadians(deg: number): number {
  return (deg * Math.PI) / 180;
}

export function toDegrees(rad: number): number {
  return (rad * 180) / Math.PI;
}

// Exact zeros on the axes so a pure head- or tailwind leaves no crosswind residue
export function sinDeg(deg: number): number {
  const n = normalizeDegrees(deg);
  if (n === 0 || n === 180) return 0;
  if (n === 90) return 1;
  if (n === 270) return -1;
  return Math.sin(toRadians(n));
}

export function cosDeg(deg: number): number {
  const n = normalizeDegrees(deg);
  if (n === 90 || n === 270) return 0;
  if (n === 0) return 1;
  if (n === 180) return -1;
  return Math.cos(toRadians(n));
}
