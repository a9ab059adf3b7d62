import fs from "fs";
import { fileURLToPath } from "url";
import { run } from "./index.js";
import { BENCH_CONFIG } from "./bench-config.js";

type BFInterpreter = (bytes: Buffer | Uint8Array) => unknown;

const benchmark = (method: BFInterpreter, iterations: number, bytes: Buffer): number => {
  for (let i = 0; i < BENCH_CONFIG.WARMUP_ITERATIONS; i++) {
    method(bytes);
  }

  const start = process.hrtime.bigint();
  for (let i = 0; i < iterations; i++) {
    method(bytes);
  }
  const end = process.hrtime.bigint();

  return Number(end - start) / 1e6;
};

// bf/ sits at the project root, beside both src/ and dist/src/
const load = (name: string): Buffer => {
  for (const rel of ["../bf/", "../../bf/"]) {
    const url = new URL(`${rel}${name}.bf`, import.meta.url);
    if (fs.existsSync(url)) return fs.readFileSync(url);
  }
  throw new Error(`Benchmark program not found: ${name}.bf (from ${fileURLToPath(import.meta.url)})`);
};

interface Marks {
  [key: string]: number;
}

const marks: Marks = {};

console.log("Running benchmarks (with warmup)...\n");

for (const { name, iterations } of BENCH_CONFIG.PROGRAMS) {
  console.log(`Testing ${name}...`);
  const bytes = load(name);
  const result = run(bytes);
  if (!result.ok) {
    console.error(result.error.message);
    process.exit(1);
  }
  marks[name] = benchmark(run, iterations, bytes);
}

console.log("\nBenchmark results (ms):");
console.table(marks);
