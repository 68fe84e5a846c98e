import type { Bytes } from "./util.ts";

/** Elementwise XOR over the common length; the longer operand's tail is dropped. */
export function xorBytes(a: Bytes, b: Bytes): Uint8Array {
  const n = Math.min(a.length, b.length);
  const out = new Uint8Array(n);
  for (let i = 0; i < n; i++) out[i] = a[i] ^ b[i];
  return out;
}

/** Bitwise NOT of every byte. */
export function complementBytes(a: Bytes): Uint8Array {
  const out = new Uint8Array(a.length);
  for (let i = 0; i < a.length; i++) out[i] = ~a[i] & 0xff;
  return out;
}

/**
 * Logical shift left by one bit, per byte.
 * The high bit falls off and the low bit becomes 0 (not a rotate).
 */
export function shiftLeftBytes(a: Bytes): Uint8Array {
  const out = new Uint8Array(a.length);
  for (let i = 0; i < a.length; i++) out[i] = (a[i] << 1) & 0xff;
  return out;
}

export function concatBytes(...parts: Bytes[]): Uint8Array {
  let len = 0;
  for (const p of parts) len += p.length;
  const out = new Uint8Array(len);
  let off = 0;
  for (const p of parts) {
    out.set(p, off);
    off += p.length;
  }
  return out;
}

/** Split at floor(n/2); both halves are copies. */
export function splitHalves(block: Bytes): [Uint8Array, Uint8Array] {
  const mid = Math.floor(block.length / 2);
  return [block.slice(0, mid), block.slice(mid)];
}
