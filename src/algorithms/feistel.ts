import type { Bytes } from "./utils/util.ts";
import type { BlockCipher } from "./utils/cipher.ts";
import {
  xorBytes,
  complementBytes,
  shiftLeftBytes,
  concatBytes,
  splitHalves,
} from "./utils/bytes.ts";
import { InvalidParametersError } from "./utils/errors.ts";

/**
 * Shuffle a key for one round.
 * Walks i = 0..n-1 and swaps word[i] with word[(i + round) % n] on a working
 * copy, so each swap sees the result of the previous ones. This is NOT a
 * rotation: for n = 5, round = 2 it yields [1, 0, 4, 2, 3].
 */
export function permuteWord(word: Bytes, round: number): Uint8Array {
  const w = word.slice();
  const n = w.length;
  for (let i = 0; i < n; i++) {
    const j = (i + round) % n;
    const t = w[i];
    w[i] = w[j];
    w[j] = t;
  }
  return w;
}

/**
 * F(half, k) = shl1(~(half XOR k)).
 * Lossy on purpose: the shift drops each byte's top bit. The Feistel
 * structure never needs to invert F.
 */
export function roundFunction(half: Bytes, roundKey: Bytes): Uint8Array {
  return shiftLeftBytes(complementBytes(xorBytes(half, roundKey)));
}

/**
 * One round key per round, each permuted from the base key (not chained).
 * For decryption the same list is applied back to front.
 */
export function generateRoundKeys(
  key: Bytes,
  decrypt: boolean,
  rounds: number
): Uint8Array[] {
  const keys: Uint8Array[] = [];
  for (let r = 0; r < rounds; r++) keys.push(permuteWord(key, r));
  if (decrypt) keys.reverse();
  return keys;
}

/** (L, R) -> (R, L XOR F(R, k)) */
export function cryptRound(block: Bytes, roundKey: Bytes): Uint8Array {
  const [left, right] = splitHalves(block);
  const newRight = xorBytes(left, roundFunction(right, roundKey));
  return concatBytes(right, newRight);
}

function validate(block: Bytes, key: Bytes, rounds: number): void {
  if (block.length === 0 || block.length % 2 !== 0)
    throw new InvalidParametersError(
      `block length must be even and non-zero, got ${block.length} bytes`
    );
  if (key.length === 0)
    throw new InvalidParametersError("key must not be empty");
  if (!Number.isInteger(rounds) || rounds < 0)
    throw new InvalidParametersError(
      `rounds must be a non-negative integer, got ${rounds}`
    );
}

/**
 * Run the whole network over one block.
 *
 * Encryption and decryption are the same procedure: `rounds` applications of
 * `cryptRound`, then one final half swap that cancels the swap left over from
 * the last round. Only the order of the round keys differs.
 *
 * The key is expected to be half the block length. That is not checked here:
 * a shorter or longer key is accepted and the XOR truncates to the shorter
 * operand, which changes the output length. `FeistelRaw` rejects it instead.
 *
 * @throws InvalidParametersError if the block is empty or odd-length, the key
 *   is empty, or `rounds` is not a non-negative integer.
 */
export function cryptBlock(
  block: Bytes,
  key: Bytes,
  decrypt: boolean,
  rounds: number
): Uint8Array {
  validate(block, key, rounds);

  const keys = generateRoundKeys(key, decrypt, rounds);
  let state: Uint8Array = block.slice();
  for (const roundKey of keys) {
    state = cryptRound(state, roundKey);
  }

  const [left, right] = splitHalves(state);
  return concatBytes(right, left); // undo last swap
}

export const encryptBlock = (block: Bytes, key: Bytes, rounds: number) =>
  cryptBlock(block, key, false, rounds);

export const decryptBlock = (block: Bytes, key: Bytes, rounds: number) =>
  cryptBlock(block, key, true, rounds);

/**
 * Feistel teaching cipher as a `BlockCipher`.
 *
 *  - Block size is twice the key length; the key is checked up front.
 *  - Round keys are derived once per call, never cached between calls.
 *  - Not secure. The round function and key schedule are deliberately weak.
 */
export class FeistelRaw implements BlockCipher {
  readonly blockSize: number;
  readonly rounds: number;

  private readonly key: Uint8Array;

  constructor(key: Uint8Array, rounds: number) {
    if (key.length === 0)
      throw new InvalidParametersError("key must not be empty");
    if (!Number.isInteger(rounds) || rounds < 0)
      throw new InvalidParametersError(
        `rounds must be a non-negative integer, got ${rounds}`
      );
    this.key = key.slice();
    this.rounds = rounds;
    this.blockSize = key.length * 2;
  }

  /**
   * Encrypt one block.
   *
   * Parameters:
   *  - `inp`:  source bytes
   *  - `inOff`: byte offset into `inp` where the block starts
   *  - `out`: destination buffer
   *  - `outOff`: byte offset into `out` where to write the ciphertext
   *
   * `inp` and `out` may be the same buffer; the block is copied out before
   * anything is written.
   */
  encryptBlock(inp: Bytes, inOff: number, out: Bytes, outOff: number): void {
    this.run(inp, inOff, out, outOff, false);
  }

  /** Decrypt one block. Same parameters as `encryptBlock`. */
  decryptBlock(inp: Bytes, inOff: number, out: Bytes, outOff: number): void {
    this.run(inp, inOff, out, outOff, true);
  }

  private run(
    inp: Bytes,
    inOff: number,
    out: Bytes,
    outOff: number,
    decrypt: boolean
  ): void {
    const bs = this.blockSize;
    if (inOff < 0 || inOff + bs > inp.length)
      throw new Error(`Input must hold ${bs} bytes at offset ${inOff}`);
    if (outOff < 0 || outOff + bs > out.length)
      throw new Error(`Output must hold ${bs} bytes at offset ${outOff}`);

    const block = inp.slice(inOff, inOff + bs);
    out.set(cryptBlock(block, this.key, decrypt, this.rounds), outOff);
  }
}
