// src/dispatch/types.ts
import { Tape } from '../tape.js';
import { DispatchMode, InputSource, OutputSink, TraceHook } from '../types.js';

export interface Machine {
  readonly tape: Tape;
  readonly input: InputSource;
  readonly output: OutputSink;
  readonly trace: TraceHook | null;
}

/**
 * Maps opcodes to their effects. Every implementation runs `code` (the
 * packed form of a validated program) from pc 0 until HALT and must be
 * indistinguishable from the others apart from speed.
 */
export interface DispatchStrategy {
  readonly mode: DispatchMode;
  execute(code: Int32Array, machine: Machine): void;
}
