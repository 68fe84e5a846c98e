// Diffusion and timing helpers shared by comparison.ts and the tests.

import { encryptBlock } from "./algorithms/feistel.ts";
import type { Bytes } from "./algorithms/utils/util.ts";

// deterministic PRNG (no Node 'crypto'), xorshift32
export function makePRNG(seed = 0x12345678) {
  let x = seed | 0;
  return (len: number): Uint8Array => {
    const out = new Uint8Array(len);
    for (let i = 0; i < len; i++) {
      x ^= x << 13;
      x ^= x >>> 17;
      x ^= x << 5;
      out[i] = x & 0xff;
    }
    return out;
  };
}

/** Number of differing bits over the common length. */
export function hammingDistance(a: Bytes, b: Bytes): number {
  const n = Math.min(a.length, b.length);
  let bits = 0;
  for (let i = 0; i < n; i++) {
    let v = a[i] ^ b[i];
    while (v) {
      bits += v & 1;
      v >>>= 1;
    }
  }
  return bits;
}

/** Copy of `bytes` with one bit flipped; bit 0 is the MSB of byte 0. */
export function flipBit(bytes: Bytes, bit: number): Uint8Array {
  if (!Number.isInteger(bit) || bit < 0 || bit >= bytes.length * 8)
    throw new Error(`bit ${bit} out of range`);
  const out = bytes.slice();
  out[bit >>> 3] ^= 0x80 >>> (bit & 7);
  return out;
}

export type AvalancheSummary = {
  rounds: number;
  trials: number; // one per plaintext bit
  meanBits: number;
  minBits: number;
  maxBits: number;
  ratio: number; // meanBits / block bits; 0.5 would be ideal
};

/**
 * Flip every plaintext bit in turn and count how many ciphertext bits change.
 */
export function avalanche(
  block: Bytes,
  key: Bytes,
  rounds: number
): AvalancheSummary {
  const base = encryptBlock(block, key, rounds);
  const totalBits = block.length * 8;
  const diffs: number[] = [];
  for (let bit = 0; bit < totalBits; bit++) {
    const ct = encryptBlock(flipBit(block, bit), key, rounds);
    diffs.push(hammingDistance(base, ct));
  }
  const meanBits = diffs.reduce((s, d) => s + d, 0) / diffs.length;
  return {
    rounds,
    trials: diffs.length,
    meanBits,
    minBits: Math.min(...diffs),
    maxBits: Math.max(...diffs),
    ratio: meanBits / totalBits,
  };
}

// quantiles
export function quantile(xs: number[], q: number): number {
  if (xs.length === 0) return NaN;
  const a = xs.slice().sort((u, v) => u - v);
  const idx = (a.length - 1) * q;
  const lo = Math.floor(idx);
  const hi = Math.ceil(idx);
  if (lo === hi) return a[lo];
  const w = idx - lo;
  return a[lo] * (1 - w) + a[hi] * w;
}
export const median = (xs: number[]) => quantile(xs, 0.5);
