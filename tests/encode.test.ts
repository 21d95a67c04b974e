import { describe, it, expect } from 'vitest';
import { compile } from '../src/compiler.js';
import { disassemble } from '../src/disassemble.js';
import { Engine, encode } from '../src/engine.js';
import { MalformedProgramError } from '../src/errors.js';
import { Instruction, OpCode } from '../src/types.js';

const op = (code: OpCode): Instruction => ({ kind: 'op', op: code });
const target = (index: number): Instruction => ({ kind: 'target', index });

// outside the OpCode range
const BOGUS_OPCODE: number = 42;

const catchError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error('expected an error');
};

describe('encode', () => {
  it('packs opcodes and targets into one array', () => {
    expect(Array.from(encode(compile('+[-]')))).toEqual([
      OpCode.ADD,
      OpCode.OPEN,
      6,
      OpCode.SUB,
      OpCode.CLOSE,
      3,
      OpCode.HALT,
    ]);
  });

  it.each<[string, Instruction[], number]>([
    ['an empty program', [], 0],
    ['a missing HALT', [op(OpCode.ADD)], 1],
    ['a HALT before the end', [op(OpCode.HALT), op(OpCode.HALT)], 0],
    ['a stray target', [target(0), op(OpCode.HALT)], 0],
    ['an OPEN without target', [op(OpCode.OPEN), op(OpCode.HALT)], 0],
    ['an unknown opcode', [op(BOGUS_OPCODE), op(OpCode.HALT)], 0],
    ['a CLOSE without OPEN', [op(OpCode.CLOSE), target(0), op(OpCode.HALT)], 0],
    ['an OPEN without CLOSE', [op(OpCode.OPEN), target(2), op(OpCode.HALT)], 0],
    [
      'a mismatched loop target',
      [op(OpCode.OPEN), target(4), op(OpCode.CLOSE), target(0), op(OpCode.HALT)],
      2,
    ],
  ])('rejects %s', (_name, program, position) => {
    const err = catchError(() => encode(program));
    expect(err).toBeInstanceOf(MalformedProgramError);
    expect(err).toMatchObject({ reason: 'invalid-program', position });
  });

  it('is applied when an engine is built', () => {
    expect(() => new Engine([op(OpCode.ADD)])).toThrow(MalformedProgramError);
  });
});

describe('disassemble', () => {
  it('prints one line per opcode with loop targets', () => {
    expect(disassemble(compile('+[-]'))).toBe(
      ['0000  ADD', '0001  OPEN    -> 6', '0003  SUB', '0004  CLOSE   -> 3', '0006  HALT'].join('\n')
    );
  });

  it('shows a target that follows no loop opcode', () => {
    expect(disassemble([target(7), op(OpCode.HALT)])).toBe('0000  <target 7>\n0001  HALT');
  });
});
