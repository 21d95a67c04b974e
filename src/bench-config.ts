// src/bench-config.ts
export const BENCH_CONFIG = {
  WARMUP_ITERATIONS: 3,
  BENCH_ITERATIONS: {
    hello: 200,
    loops: 5,
  },
} as const;

export type BenchProgram = keyof typeof BENCH_CONFIG.BENCH_ITERATIONS;
