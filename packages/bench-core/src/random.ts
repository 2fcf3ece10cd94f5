/**
 * Deterministic PRNG for dataset generation.
 *
 * Implementation: Mulberry32 over a 32-bit state. Every consumer receives its
 * own instance, so the seed each function depends on is visible in its
 * signature.
 */
export class SeededRandom {
  private state: number;

  constructor(seed: number) {
    // Fold seeds wider than 32 bits so large seeds still differ
    const high = Math.floor(seed / 0x100000000);
    this.state = (seed ^ Math.imul(high, 0x9e3779b1)) >>> 0;
  }

  /**
   * Next unsigned 32-bit integer
   */
  nextUint32(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let x = this.state;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return (x ^ (x >>> 14)) >>> 0;
  }

  /**
   * Next float in [0, 1)
   */
  next(): number {
    return this.nextUint32() / 4294967296;
  }

  /**
   * Uniform integer in [min, max], both inclusive.
   *
   * Ranges wider than 2^32 combine two draws to keep every value reachable.
   */
  int(min: number, max: number): number {
    if (max <= min) return min;
    const span = max - min + 1;
    const fraction = span > 0x100000000
      ? (this.nextUint32() * 0x100000000 + this.nextUint32()) / 2 ** 64
      : this.next();
    return min + Math.min(span - 1, Math.floor(fraction * span));
  }

  /**
   * Fisher-Yates shuffle in place
   */
  shuffle<T>(items: T[]): T[] {
    for (let i = items.length - 1; i > 0; i--) {
      const j = this.int(0, i);
      const a = items[i];
      const b = items[j];
      if (a !== undefined && b !== undefined) {
        items[i] = b;
        items[j] = a;
      }
    }
    return items;
  }

  /**
   * Fill a buffer with pseudo-random bytes, four per draw
   */
  fill(buffer: Uint8Array): Uint8Array {
    const whole = buffer.length - (buffer.length % 4);
    const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
    for (let i = 0; i < whole; i += 4) {
      view.setUint32(i, this.nextUint32(), true);
    }
    if (whole < buffer.length) {
      let last = this.nextUint32();
      for (let i = whole; i < buffer.length; i++) {
        buffer[i] = last & 0xff;
        last >>>= 8;
      }
    }
    return buffer;
  }
}
