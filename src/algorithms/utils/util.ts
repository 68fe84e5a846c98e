export type Bytes = Uint8Array;
export type Input = string | Uint8Array;

export const toBytes = (v: Input): Uint8Array =>
  typeof v === "string" ? new TextEncoder().encode(v) : v;

export const toString = (u8: Uint8Array): string =>
  new TextDecoder().decode(u8);

// Hex helpers, used by the wrapper and the demo output
export const hex = {
  toBytes(hex: string): Uint8Array {
    if (hex.length % 2 !== 0) throw new Error("hex must have even length");
    if (!/^[0-9a-fA-F]*$/.test(hex)) throw new Error("invalid hex");
    const out = new Uint8Array(hex.length / 2);
    for (let i = 0; i < out.length; i++) {
      out[i] = parseInt(hex.slice(2 * i, 2 * i + 2), 16);
    }
    return out;
  },
  fromBytes(bytes: Bytes): string {
    let s = "";
    for (let i = 0; i < bytes.length; i++)
      s += bytes[i].toString(16).padStart(2, "0");
    return s;
  },
};

/**
 * Accepts whatever a caller is likely to hand over as a key.
 * Strings are UTF-8 unless prefixed with `hex:`.
 */
export function normalizeKey(key: unknown): Uint8Array {
  if (key instanceof Uint8Array) return key;
  if (ArrayBuffer.isView(key))
    return new Uint8Array(key.buffer, key.byteOffset, key.byteLength);
  if (key instanceof ArrayBuffer) return new Uint8Array(key);

  if (typeof key === "string") {
    if (key.startsWith("hex:")) return hex.toBytes(key.slice(4));
    return new TextEncoder().encode(key);
  }
  throw new Error("Unsupported key type");
}
