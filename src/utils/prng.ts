/** Source of uniform draws in [0, 1). */
export interface RandomSource {
  nextFloat(): number;
}

export const mathRandomSource: RandomSource = {
  nextFloat: () => Math.random(),
};

export class XorShift32 implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
    if (this.state === 0) {
      this.state = 0x6d2b79f5;
    }
  }

  nextUint32(): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    return this.state;
  }

  // 2^32 keeps the result strictly below 1.
  nextFloat(): number {
    return this.nextUint32() / 0x1_0000_0000;
  }

  nextInt(minInclusive: number, maxInclusive: number): number {
    if (maxInclusive < minInclusive) {
      throw new Error('invalid range');
    }

    const span = maxInclusive - minInclusive + 1;
    return minInclusive + (this.nextUint32() % span);
  }
}

/** Fixed sequence of draws, cycled; handy for pinning node heights. */
export class SequenceRandom implements RandomSource {
  private cursor = 0;

  constructor(private readonly draws: readonly number[]) {
    if (draws.length === 0) {
      throw new Error('sequence must contain at least one draw');
    }
  }

  nextFloat(): number {
    const value = this.draws[this.cursor % this.draws.length];
    this.cursor += 1;
    return value;
  }
}

export function createRandomSource(seed?: number): RandomSource {
  return seed === undefined ? mathRandomSource : new XorShift32(seed);
}
