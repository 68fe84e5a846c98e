import type { Bytes } from "./util.ts";

export interface BlockCipher {
  readonly blockSize: number;
  /** Encrypt one block of `blockSize` bytes from `inp[inOff..]` into `out[outOff..]`. */
  encryptBlock(inp: Bytes, inOff: number, out: Bytes, outOff: number): void;
  /** Inverse of `encryptBlock`. */
  decryptBlock(inp: Bytes, inOff: number, out: Bytes, outOff: number): void;
}
