import fs from "fs";
import { BENCH_CONFIG, BenchProgram } from "./bench-config.js";
import { compile } from "./compiler.js";
import { Engine } from "./engine.js";
import { BufferOutput } from "./io.js";
import { DISPATCH_MODES, Program } from "./types.js";

type BenchmarkResults = Record<string, Record<string, number>>;

const benchmark = (engine: Engine, iterations: number): number => {
  const output = new BufferOutput();
  const once = () => {
    output.clear();
    engine.run(undefined, output);
  };

  for (let i = 0; i < BENCH_CONFIG.WARMUP_ITERATIONS; i++) {
    once();
  }

  const start = process.hrtime.bigint();
  for (let i = 0; i < iterations; i++) {
    once();
  }
  const end = process.hrtime.bigint();

  return Number(end - start) / 1e6;
};

const main = () => {
  const names = Object.keys(BENCH_CONFIG.BENCH_ITERATIONS).filter(
    (name): name is BenchProgram => name in BENCH_CONFIG.BENCH_ITERATIONS
  );
  const programs = new Map<BenchProgram, Program>(
    names.map((name) => [name, compile(fs.readFileSync(`bf/${name}.bf`))])
  );

  const marks: BenchmarkResults = {};

  console.log("Running benchmarks (with warmup)...\n");

  for (const mode of DISPATCH_MODES) {
    console.log(`Testing dispatch '${mode}'...`);
    marks[mode] = {};
    for (const [name, program] of programs) {
      marks[mode][name] = benchmark(
        new Engine(program, { dispatch: mode }),
        BENCH_CONFIG.BENCH_ITERATIONS[name]
      );
    }
  }

  console.log("\nBenchmark results (ms):");
  console.table(marks);
};

main();
