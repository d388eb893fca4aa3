// Fixed-length hash projection of text. Lossy and collision-prone: short or
// near-duplicate strings may share slots.

const SLOT_INCREMENT = 0.3;
const CHARS_PER_SLOT = 4;

export type FeatureVector = number[];

export function encode(text: string, size: number): FeatureVector {
  if (!Number.isInteger(size) || size <= 0) {
    throw new RangeError(`Encoding size must be a positive integer, got ${size}`);
  }

  const vec: FeatureVector = new Array<number>(size).fill(0);
  const chars = Array.from(text).slice(0, size * CHARS_PER_SLOT);

  for (let i = 0; i < chars.length; i++) {
    const code = chars[i].codePointAt(0) ?? 0;
    const idx = (code * 31 + i) % size;
    vec[idx] = (vec[idx] + SLOT_INCREMENT) % 1.0;
  }

  return vec;
}

export function euclideanDistance(a: FeatureVector, b: FeatureVector): number {
  const n = Math.min(a.length, b.length);
  let sum = 0;
  for (let i = 0; i < n; i++) {
    const d = a[i] - b[i];
    sum += d * d;
  }
  return Math.sqrt(sum);
}
