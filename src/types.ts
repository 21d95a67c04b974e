// src/types.ts
export enum OpCode {
  ADD,
  SUB,
  LEFT,
  RIGHT,
  OPEN,
  CLOSE,
  OUTPUT,
  INPUT,
  HALT,
}

export enum CharCode {
  LT = 60,    // '<'
  GT = 62,    // '>'
  ADD = 43,   // '+'
  COMMA = 44, // ','
  SUB = 45,   // '-'
  DOT = 46,   // '.'
  LB = 91,    // '['
  RB = 93     // ']'
}

export type Instruction =
  | { readonly kind: 'op'; readonly op: OpCode }
  | { readonly kind: 'target'; readonly index: number };

/** Resolved instruction sequence, always terminated by a single HALT. */
export type Program = readonly Instruction[];

export const DEFAULT_TAPE_SIZE = 30000;

export type DispatchMode = 'switch' | 'table' | 'closure' | 'aot';

export const DISPATCH_MODES: readonly DispatchMode[] = ['switch', 'table', 'closure', 'aot'];

export const DEFAULT_DISPATCH: DispatchMode = 'switch';

export type TraceHook = (op: OpCode, pc: number) => void;

export interface InputSource {
  /** Next byte, or null once the source is exhausted. */
  read(): number | null;
}

export interface OutputSink {
  write(byte: number): void;
  flush?(): void;
}

export interface ExecutionResult {
  cursor: number;
  cells: Uint8Array;
}
