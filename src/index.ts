export { Compiler, compile, compileStream, opMap } from './compiler.js';
export type { SourceChunk } from './compiler.js';
export { Engine, encode, runSource } from './engine.js';
export type { EngineOptions } from './engine.js';
export { getDispatch } from './dispatch/index.js';
export type { DispatchStrategy, Machine } from './dispatch/index.js';
export { disassemble } from './disassemble.js';
export { Tape } from './tape.js';
export { BufferInput, BufferOutput, EMPTY_INPUT, NULL_OUTPUT, StdinInput, StdoutOutput } from './io.js';
export { EngineBusyError, MalformedProgramError, OutOfBoundsTapeError, VmError } from './errors.js';
export type { MalformedReason } from './errors.js';
export { DEFAULT_DISPATCH, DEFAULT_TAPE_SIZE, DISPATCH_MODES, OpCode } from './types.js';
export type {
  DispatchMode,
  ExecutionResult,
  InputSource,
  Instruction,
  OutputSink,
  Program,
  TraceHook,
} from './types.js';
