import { FeistelRaw } from "./algorithms/feistel.ts";
import {
  toBytes,
  toString,
  normalizeKey,
  hex,
  type Bytes,
  type Input,
} from "./algorithms/utils/util.ts";
import type { BlockCipher } from "./algorithms/utils/cipher.ts";
import { InvalidParametersError } from "./algorithms/utils/errors.ts";

/** Round count used by the demo when nothing else is configured. */
export const DEFAULT_ROUNDS = 10;

export interface FeistelOpts {
  rounds?: number; // default DEFAULT_ROUNDS
}

/**
 * Friendly Feistel cipher: string keys and blocks, hex in/out.
 * Works on exactly one block of `blockSize` (twice the key) bytes.
 */
export class FeistelCipher {
  protected readonly raw: BlockCipher;
  readonly rounds: number;

  constructor(key: Input | ArrayBuffer, { rounds = DEFAULT_ROUNDS }: FeistelOpts = {}) {
    this.raw = new FeistelRaw(normalizeKey(key), rounds);
    this.rounds = rounds;
  }

  get blockSize(): number {
    return this.raw.blockSize;
  }

  encrypt(plain: Input): Uint8Array {
    const block = this.checked(toBytes(plain), "Plaintext");
    const out = new Uint8Array(block.length);
    this.raw.encryptBlock(block, 0, out, 0);
    return out;
  }

  decrypt(cipher: Bytes): Uint8Array {
    const block = this.checked(cipher, "Ciphertext");
    const out = new Uint8Array(block.length);
    this.raw.decryptBlock(block, 0, out, 0);
    return out;
  }

  decryptToString(cipher: Bytes): string {
    return toString(this.decrypt(cipher));
  }

  encryptHex(plain: Input): string {
    return hex.fromBytes(this.encrypt(plain));
  }

  decryptHex(cipherHex: string): Uint8Array {
    return this.decrypt(hex.toBytes(cipherHex));
  }

  private checked(block: Bytes, label: string): Bytes {
    if (block.length !== this.raw.blockSize)
      throw new InvalidParametersError(
        `${label} must be exactly ${this.raw.blockSize} bytes, got ${block.length}`
      );
    return block;
  }
}

/** Also export the raw API */
export {
  FeistelRaw,
  cryptBlock,
  encryptBlock,
  decryptBlock,
  cryptRound,
  generateRoundKeys,
  permuteWord,
  roundFunction,
} from "./algorithms/feistel.ts";
export * as ByteOps from "./algorithms/utils/bytes.ts";
export { InvalidParametersError } from "./algorithms/utils/errors.ts";
export type { BlockCipher } from "./algorithms/utils/cipher.ts";
export { hex, toBytes, toString, type Input } from "./algorithms/utils/util.ts";
