/**
 * Seeded pseudo-random generator (xoshiro128**, seeded through splitmix32).
 * Same seed, same stream, on every platform.
 */

const UINT32_RANGE = 0x100000000;

const HIGH_WORD_SALT = 0x6a09e667;

function rotl(x: number, k: number): number {
  return (x << k) | (x >>> (32 - k));
}

/**
 * splitmix32 stream; the output mix is a bijection of the state
 */
function splitmix32(seed: number): () => number {
  let state = seed | 0;
  return () => {
    state = (state + 0x9e3779b9) | 0;
    let z = state;
    z = Math.imul(z ^ (z >>> 16), 0x85ebca6b);
    z = Math.imul(z ^ (z >>> 13), 0xc2b2ae35);
    return (z ^ (z >>> 16)) | 0;
  };
}

export class SeededRandom {
  private s0: number;
  private s1: number;
  private s2: number;
  private s3: number;
  private spareNormal: number | null = null;

  constructor(seed: number = 0) {
    // Each 32-bit half seeds its own pair of state words, so distinct
    // integer seeds reach distinct states
    const low = seed >>> 0;
    const high = Math.floor(seed / UINT32_RANGE) >>> 0;

    const lowStream = splitmix32(low);
    this.s0 = lowStream();
    this.s1 = lowStream();

    const highStream = splitmix32(high ^ HIGH_WORD_SALT);
    this.s2 = highStream();
    this.s3 = highStream();
  }

  /** Next unsigned 32-bit integer */
  nextUint32(): number {
    const result = Math.imul(rotl(Math.imul(this.s1, 5), 7), 9) >>> 0;
    const t = this.s1 << 9;

    this.s2 ^= this.s0;
    this.s3 ^= this.s1;
    this.s1 ^= this.s2;
    this.s0 ^= this.s3;
    this.s2 ^= t;
    this.s3 = rotl(this.s3, 11);

    return result;
  }

  /** Uniform float in [0, 1) */
  next(): number {
    return this.nextUint32() / UINT32_RANGE;
  }

  /** Standard normal variate (Box-Muller, second value cached) */
  standardNormal(): number {
    if (this.spareNormal !== null) {
      const spare = this.spareNormal;
      this.spareNormal = null;
      return spare;
    }

    const u1 = 1 - this.next(); // (0, 1], keeps log finite
    const u2 = this.next();
    const radius = Math.sqrt(-2 * Math.log(u1));
    const theta = 2 * Math.PI * u2;

    this.spareNormal = radius * Math.sin(theta);
    return radius * Math.cos(theta);
  }
}
