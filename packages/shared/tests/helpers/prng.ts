/**
 * Seeded Mulberry32 generator, so that property tests draw the same
 * "random" orbits on every run.
 */
export class PRNG {
  private seed: number;

  constructor(seed: number) {
    this.seed = seed;
  }

  /** Float in [0, 1). */
  public nextFloat(): number {
    let t = (this.seed += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** Float in [min, max). */
  public nextInRange(min: number, max: number): number {
    return this.nextFloat() * (max - min) + min;
  }

  /** Integer in [min, max]. */
  public nextInt(min: number, max: number): number {
    return Math.floor(this.nextInRange(min, max + 1));
  }
}
