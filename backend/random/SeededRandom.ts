/**
 * Source of pseudo-randomness for the trace synthesizer.
 * Every draw goes through one instance so a run is reproducible from its seed.
 */
export interface RandomSource {
  /** [0, 1) */
  nextFloat(): number;
  /** Uniform float in [min, max]. */
  uniform(min: number, max: number): number;
  /** Uniform integer in [min, max], both inclusive. */
  intBetween(min: number, max: number): number;
  pick<T>(items: readonly T[]): T;
  /** `length` lowercase hex characters. */
  hex(length: number): string;
}

export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed: number) {
    // Force into uint32.
    this.state = seed >>> 0 || 0x12345678;
  }

  /** xorshift32 */
  private nextU32(): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    return this.state;
  }

  nextFloat(): number {
    // [0, 1)
    return this.nextU32() / 0x1_0000_0000;
  }

  nextInt(maxExclusive: number): number {
    const m = Math.trunc(maxExclusive);
    if (!Number.isFinite(m) || m <= 0)
      throw new Error('nextInt(maxExclusive) requires maxExclusive > 0');
    return Math.floor(this.nextFloat() * m);
  }

  uniform(min: number, max: number): number {
    return min + (max - min) * this.nextFloat();
  }

  intBetween(min: number, max: number): number {
    const lo = Math.trunc(min);
    const hi = Math.trunc(max);
    if (hi < lo) throw new Error('intBetween(min, max) requires max >= min');
    return lo + this.nextInt(hi - lo + 1);
  }

  pick<T>(items: readonly T[]): T {
    if (!items.length) throw new Error('pick(items) requires non-empty array');
    return items[this.nextInt(items.length)];
  }

  hex(length: number): string {
    let out = '';
    while (out.length < length) {
      out += this.nextU32().toString(16).padStart(8, '0');
    }
    return out.slice(0, length);
  }
}

/** Seed for callers that did not pick one: low 32 bits of the clock. */
export const seedFromClock = (nowMs: number = Date.now()): number =>
  Math.trunc(nowMs) >>> 0;
