// src/bench-config.ts
export const BENCH_CONFIG = {
  WARMUP_ITERATIONS: 3,
  PROGRAMS: [
    { name: "hello", iterations: 200 },
    { name: "loops", iterations: 20 },
  ],
} as const;
