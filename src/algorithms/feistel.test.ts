import { describe, expect, it } from "vitest";
import {
  FeistelRaw,
  cryptBlock,
  cryptRound,
  decryptBlock,
  encryptBlock,
  generateRoundKeys,
  permuteWord,
  roundFunction,
} from "./feistel.ts";
import { InvalidParametersError } from "./utils/errors.ts";
import { hex, toBytes, toString } from "./utils/util.ts";
import { makePRNG } from "../analysis.ts";

const u8 = (...xs: number[]) => new Uint8Array(xs);
const block = toBytes("budapesh");
const key = toBytes("rust");

describe("permuteWord", () => {
  it("is the identity for round 0", () => {
    expect(permuteWord(key, 0)).toEqual(key);
    expect(permuteWord(u8(9, 8, 7, 6, 5), 0)).toEqual(u8(9, 8, 7, 6, 5));
  });

  it("applies the swaps cumulatively", () => {
    expect(toString(permuteWord(key, 1))).toBe("rstu");
    expect(toString(permuteWord(key, 2))).toBe("rust");
    expect(toString(permuteWord(key, 3))).toBe("usrt");
  });

  it("differs from a rotation", () => {
    const w = u8(0, 1, 2, 3, 4);
    expect(permuteWord(w, 1)).toEqual(u8(0, 2, 3, 4, 1));
    expect(permuteWord(w, 2)).toEqual(u8(1, 0, 4, 2, 3));
    expect(permuteWord(w, 3)).toEqual(u8(2, 0, 1, 4, 3));
    expect(permuteWord(w, 2)).not.toEqual(u8(2, 3, 4, 0, 1));
  });

  it("wraps the round index modulo the length", () => {
    expect(permuteWord(u8(0, 1, 2, 3, 4), 5)).toEqual(u8(0, 1, 2, 3, 4));
    expect(permuteWord(key, 5)).toEqual(permuteWord(key, 1));
  });

  it("leaves its input alone", () => {
    const w = u8(0, 1, 2, 3);
    permuteWord(w, 1);
    expect(w).toEqual(u8(0, 1, 2, 3));
  });
});

describe("roundFunction", () => {
  it("computes shl1(~(half ^ key))", () => {
    expect(roundFunction(u8(0x80, 0x01, 0xff, 0x00), u8(0, 0, 0, 0))).toEqual(
      u8(0xfe, 0xfc, 0x00, 0xfe)
    );
    expect(roundFunction(toBytes("pesh"), key)).toEqual(u8(250, 222, 254, 198));
  });

  it("is lossy: different halves can give the same mask", () => {
    expect(roundFunction(u8(0x00), u8(0))).toEqual(roundFunction(u8(0x80), u8(0)));
  });
});

describe("generateRoundKeys", () => {
  it("derives each key from the base key by its round index", () => {
    const keys = generateRoundKeys(key, false, 4);
    expect(keys.map((k) => toString(k))).toEqual(["rust", "rstu", "rust", "usrt"]);
  });

  it("reverses the order for decryption without changing any key", () => {
    const enc = generateRoundKeys(key, false, 7);
    const dec = generateRoundKeys(key, true, 7);
    expect(dec).toHaveLength(7);
    expect(dec).toEqual(enc.slice().reverse());
  });

  it("does not chain keys: a longer schedule starts the same", () => {
    const short = generateRoundKeys(key, false, 3);
    const long = generateRoundKeys(key, false, 10);
    expect(long.slice(0, 3)).toEqual(short);
    expect(long[9]).toEqual(permuteWord(key, 9));
  });

  it("is empty for zero rounds", () => {
    expect(generateRoundKeys(key, false, 0)).toEqual([]);
    expect(generateRoundKeys(key, true, 0)).toEqual([]);
  });
});

describe("cryptRound", () => {
  it("moves the right half left and masks the left half", () => {
    const out = cryptRound(block, key);
    expect(hex.fromBytes(out)).toBe("7065736898ab9aa7");
    expect(toString(out.slice(0, 4))).toBe("pesh");
  });

  it("undoes itself once the halves are swapped back", () => {
    const out = cryptRound(block, key);
    const swapped = new Uint8Array([...out.slice(4), ...out.slice(0, 4)]);
    const back = cryptRound(swapped, key);
    expect(new Uint8Array([...back.slice(4), ...back.slice(0, 4)])).toEqual(block);
  });
});

describe("cryptBlock", () => {
  it("encrypts budapesh under rust with 10 rounds and decrypts it back", () => {
    const ct = encryptBlock(block, key, 10);
    expect(hex.fromBytes(ct)).toBe("32fbb1cac89bcaf7");
    expect(ct).not.toEqual(block);
    expect(toString(decryptBlock(ct, key, 10))).toBe("budapesh");
  });

  it("only swaps the halves with zero rounds", () => {
    expect(toString(cryptBlock(block, key, false, 0))).toBe("peshbuda");
    expect(toString(cryptBlock(block, key, true, 0))).toBe("peshbuda");
  });

  it("with one round, is a single round followed by the final swap", () => {
    expect(hex.fromBytes(encryptBlock(block, key, 1))).toBe("98ab9aa770657368");
  });

  it("round-trips random blocks across sizes and round counts", () => {
    const prng = makePRNG(0xfe15);
    for (const size of [2, 8, 16, 30]) {
      for (const rounds of [0, 1, 3, 10, 33]) {
        const b = prng(size);
        const k = prng(size / 2);
        const ct = encryptBlock(b, k, rounds);
        expect(ct).toHaveLength(size);
        expect(decryptBlock(ct, k, rounds)).toEqual(b);
      }
    }
  });

  it("round-trips even when F discards information", () => {
    // every byte has its top bit set, so shl1 drops a 1 from each
    const b = u8(0xff, 0x80, 0xc3, 0x91, 0xfe, 0xa0, 0x88, 0xf1);
    const k = u8(0x00, 0x00, 0x00, 0x00);
    const ct = encryptBlock(b, k, 5);
    expect(decryptBlock(ct, k, 5)).toEqual(b);
  });

  it("does not mutate the block or key", () => {
    const b = block.slice();
    const k = key.slice();
    cryptBlock(b, k, false, 10);
    expect(b).toEqual(block);
    expect(k).toEqual(key);
  });

  it("truncates with a key shorter than half the block", () => {
    const out = cryptBlock(block, toBytes("ab"), false, 3);
    expect(out).toEqual(u8(35, 94, 188, 133, 156));
  });

  describe("parameter checks", () => {
    it("rejects odd or empty blocks", () => {
      expect(() => cryptBlock(toBytes("abc"), key, false, 1)).toThrow(
        InvalidParametersError
      );
      expect(() => cryptBlock(u8(), key, false, 1)).toThrow(
        "block length must be even and non-zero, got 0 bytes"
      );
    });

    it("rejects an empty key", () => {
      expect(() => cryptBlock(block, u8(), false, 1)).toThrow("key must not be empty");
    });

    it("rejects bad round counts", () => {
      for (const rounds of [-1, 1.5, NaN]) {
        expect(() => cryptBlock(block, key, false, rounds)).toThrow(
          InvalidParametersError
        );
      }
    });
  });
});

describe("FeistelRaw", () => {
  it("derives its block size from the key", () => {
    const c = new FeistelRaw(key, 10);
    expect(c.blockSize).toBe(8);
    expect(c.rounds).toBe(10);
  });

  it("reads and writes at the given offsets", () => {
    const c = new FeistelRaw(key, 10);
    const inp = new Uint8Array(12);
    inp.set(block, 2);
    const out = new Uint8Array(16).fill(0xee);

    c.encryptBlock(inp, 2, out, 4);
    expect(hex.fromBytes(out)).toBe("eeeeeeee32fbb1cac89bcaf7eeeeeeee");

    const back = new Uint8Array(8);
    c.decryptBlock(out, 4, back, 0);
    expect(back).toEqual(block);
  });

  it("works in place", () => {
    const c = new FeistelRaw(key, 10);
    const buf = block.slice();
    c.encryptBlock(buf, 0, buf, 0);
    expect(hex.fromBytes(buf)).toBe("32fbb1cac89bcaf7");
    c.decryptBlock(buf, 0, buf, 0);
    expect(buf).toEqual(block);
  });

  it("checks buffer bounds", () => {
    const c = new FeistelRaw(key, 1);
    expect(() => c.encryptBlock(block, 1, new Uint8Array(8), 0)).toThrow(
      "Input must hold 8 bytes at offset 1"
    );
    expect(() => c.decryptBlock(block, 0, new Uint8Array(7), 0)).toThrow(
      "Output must hold 8 bytes at offset 0"
    );
  });

  it("rejects an empty key or a bad round count", () => {
    expect(() => new FeistelRaw(u8(), 1)).toThrow(InvalidParametersError);
    expect(() => new FeistelRaw(key, -2)).toThrow(
      "rounds must be a non-negative integer, got -2"
    );
  });

  it("is unaffected by later changes to the caller's key", () => {
    const k = key.slice();
    const c = new FeistelRaw(k, 10);
    k.fill(0);
    const out = new Uint8Array(8);
    c.encryptBlock(block, 0, out, 0);
    expect(hex.fromBytes(out)).toBe("32fbb1cac89bcaf7");
  });
});
