export function dot(a: readonly number[], b: readonly number[]): number {
  const n = Math.min(a.length, b.length);
  let sum = 0;
  for (let i = 0; i < n; i++) sum += a[i] * b[i];
  return sum;
}

export function magnitude(v: readonly number[]): number {
  return Math.sqrt(dot(v, v));
}

/**
 * Cosine of the angle between two vectors. Returns 0 when either vector has
 * zero magnitude.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  const magA = magnitude(a);
  const magB = magnitude(b);
  if (magA === 0 || magB === 0) return 0;
  // Clamp float drift so identical vectors compare as exactly 1
  return Math.min(1, Math.max(-1, dot(a, b) / (magA * magB)));
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
