// comparison.ts
// Timing and diffusion report for the Feistel cipher across block sizes and
// round counts. Single-block calls only; key schedule is inside the timed call
// because the cipher derives it per block.
//
// Run:
//   npm run bench
//   FEISTEL_BENCH_MS=500 npx tsx src/comparison.ts

import * as os from "node:os";

import { FeistelRaw } from "./algorithms/feistel.ts";
import { makePRNG, avalanche, median, quantile } from "./analysis.ts";

type Sample = {
  iters: number;
  wallNs: number; // after blank subtraction
};

// configuration
const TARGET_NS =
  BigInt(Number(process.env.FEISTEL_BENCH_MS ?? 200)) * 1_000_000n;
const SAMPLES = 5;
const DROP_FIRST = 1; // drop first warm sample
const BLOCK_SIZES = [8, 16, 32] as const;
const ROUNDS = [1, 2, 4, 8, 16] as const;

let sink = 0;

function timeOnce(iters: number, body: () => void): Sample {
  const t0 = process.hrtime.bigint();
  for (let i = 0; i < iters; i++) body();
  const t1 = process.hrtime.bigint();
  return { iters, wallNs: Number(t1 - t0) };
}

// ramp iteration count until TARGET_NS is reached, then measure exactly that pass
function runTimedToTarget(body: () => void): Sample {
  let iters = 1;
  while (true) {
    const t0 = process.hrtime.bigint();
    for (let i = 0; i < iters; i++) body();
    if (process.hrtime.bigint() - t0 >= TARGET_NS) break;
    iters *= 2;
  }
  return timeOnce(iters, body);
}

function measureWithBlank(work: () => void, blank: () => void): Sample {
  const sWork = runTimedToTarget(work);
  const sBlank = timeOnce(sWork.iters, blank);
  return {
    iters: sWork.iters,
    wallNs: Math.max(0, sWork.wallNs - sBlank.wallNs),
  };
}

function round(n: number, d = 2) {
  return Number.isFinite(n) ? Number(n.toFixed(d)) : n;
}

function main() {
  const cpuInfo = os.cpus()?.[0];
  console.log(`Node: ${process.version}`);
  console.log(`Platform: ${process.platform} ${process.arch}`);
  if (cpuInfo) console.log(`CPU: ${cpuInfo.model} @ ${cpuInfo.speed}MHz`);
  console.log(`Target per sample: ${Number(TARGET_NS / 1_000_000n)} ms\n`);

  const prng = makePRNG(0xc0ffee);
  const timing: Record<string, string | number>[] = [];
  const diffusion: Record<string, string | number>[] = [];

  for (const size of BLOCK_SIZES) {
    const key = prng(size / 2);
    const plain = prng(size);

    for (const rounds of ROUNDS) {
      const cipher = new FeistelRaw(key, rounds);
      const out = new Uint8Array(size);

      // correctness check once per case
      const back = new Uint8Array(size);
      cipher.encryptBlock(plain, 0, out, 0);
      cipher.decryptBlock(out, 0, back, 0);
      if (back.some((b, i) => b !== plain[i]))
        throw new Error(`round trip failed for ${size}B/${rounds} rounds`);

      const work = () => {
        cipher.encryptBlock(plain, 0, out, 0);
        sink ^= out[0];
      };
      const blank = () => {
        sink ^= plain[0];
      };

      const kept: Sample[] = [];
      for (let k = 0; k < SAMPLES; k++) {
        const s = measureWithBlank(work, blank);
        if (k >= DROP_FIRST) kept.push(s);
      }
      const nsPerByte = kept.map((s) => s.wallNs / (s.iters * size));

      timing.push({
        block: `${size}B`,
        rounds,
        "ns/byte (p50)": round(median(nsPerByte), 3),
        "ns/byte (p10–p90)": `${round(quantile(nsPerByte, 0.1), 3)}–${round(
          quantile(nsPerByte, 0.9),
          3
        )}`,
        "iters (p50)": Math.trunc(median(kept.map((s) => s.iters))),
      });

      const a = avalanche(plain, key, rounds);
      diffusion.push({
        block: `${size}B`,
        rounds,
        "mean bits": round(a.meanBits),
        min: a.minBits,
        max: a.maxBits,
        ratio: round(a.ratio, 3),
      });
    }
  }

  console.log("Encrypt timing (medians):");
  console.table(timing);
  console.log("\nAvalanche (one flipped plaintext bit -> changed ciphertext bits):");
  console.table(diffusion);
  console.log(`\n(sink ${sink & 0xff})`);
}

try {
  main();
} catch (e) {
  console.error(e);
  process.exit(1);
}
