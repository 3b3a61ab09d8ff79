import type { Vector } from '@/lib/types';

export function dot(a: Vector, b: Vector): number {
  const n = Math.min(a.length, b.length);
  let sum = 0;
  for (let i = 0; i < n; i++) sum += a[i] * b[i];
  return sum;
}

/** Unit-length copy of `v`; a zero vector stays zero. */
export function l2Normalize(v: Vector): number[] {
  const norm = Math.sqrt(dot(v, v));
  if (norm === 0) return v.map(() => 0);
  return v.map(x => x / norm);
}

/** Cosine similarity of two unit vectors. */
export const cosine = (a: Vector, b: Vector) => dot(a, b);

export const clamp = (x: number, lo = 0, hi = 1) => Math.max(lo, Math.min(hi, x));
