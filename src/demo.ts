// Encrypts a sample block and decrypts it back.
//
//   npm run demo
//   npm run demo -- <block> <key> <rounds>
//   FEISTEL_ROUNDS=16 npm run demo

import { decryptBlock, encryptBlock } from "./algorithms/feistel.ts";
import { hex, toBytes, toString } from "./algorithms/utils/util.ts";

const BLOCK = process.argv[2] ?? process.env.FEISTEL_BLOCK ?? "budapesh";
const KEY = process.argv[3] ?? process.env.FEISTEL_KEY ?? "rust";
const ROUNDS = Number(process.argv[4] ?? process.env.FEISTEL_ROUNDS ?? 10);

try {
  const block = toBytes(BLOCK);
  const key = toBytes(KEY);

  const encrypted = encryptBlock(block, key, ROUNDS);
  const decrypted = decryptBlock(encrypted, key, ROUNDS);

  console.log("block:    ", Array.from(block));
  console.log("encrypted:", Array.from(encrypted));
  console.log("decrypted:", Array.from(decrypted));
  console.log(`ciphertext hex: ${hex.fromBytes(encrypted)}`);

  if (toString(decrypted) !== BLOCK) {
    console.error(
      `round trip mismatch (key is ${key.length} bytes, block is ${block.length}; they only round-trip when the key is half the block)`
    );
    process.exit(1);
  }
} catch (e) {
  console.error(e instanceof Error ? `${e.name}: ${e.message}` : e);
  process.exit(1);
}
