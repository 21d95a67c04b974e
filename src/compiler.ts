// src/compiler.ts
import { CharCode, Instruction, OpCode, Program } from './types.js';
import { MalformedProgramError } from './errors.js';

export const opMap: ReadonlyMap<number, OpCode> = new Map<number, OpCode>([
    [CharCode.LT, OpCode.LEFT],
    [CharCode.GT, OpCode.RIGHT],
    [CharCode.ADD, OpCode.ADD],
    [CharCode.SUB, OpCode.SUB],
    [CharCode.LB, OpCode.OPEN],
    [CharCode.RB, OpCode.CLOSE],
    [CharCode.DOT, OpCode.OUTPUT],
    [CharCode.COMMA, OpCode.INPUT],
]);

type Slot = Instruction | { readonly kind: 'pending' };

const PENDING: Slot = { kind: 'pending' };

const op = (code: OpCode): Instruction => ({ kind: 'op', op: code });
const target = (index: number): Instruction => ({ kind: 'target', index });

export type SourceChunk = string | Iterable<number>;

/**
 * Single-pass compiler. Loop targets are resolved as each `]` is seen, so
 * the returned program never needs a bracket-matching pass.
 *
 * Error offsets count UTF-16 code units for string chunks and bytes for
 * byte chunks. A compiler that has thrown a MalformedProgramError refuses
 * any further input.
 */
export class Compiler {
    private readonly slots: Slot[] = [];
    // index of each unmatched OPEN opcode, with its source offset alongside
    private readonly bracketStack: number[] = [];
    private readonly bracketOffsets: number[] = [];
    private offset = 0;
    private finished = false;
    private failed = false;

    feed(chunk: SourceChunk): this {
        this.assertOpen();
        if (typeof chunk === 'string') {
            for (let i = 0; i < chunk.length; i++) {
                this.plant(chunk.charCodeAt(i));
            }
        } else {
            for (const c of chunk) {
                this.plant(c);
            }
        }
        return this;
    }

    finish(): Program {
        this.assertOpen();
        this.finished = true;

        if (this.bracketOffsets.length > 0) {
            this.failed = true;
            throw new MalformedProgramError('unmatched-open', this.bracketOffsets[this.bracketOffsets.length - 1]);
        }
        this.slots.push(op(OpCode.HALT));

        return this.slots.map((slot, index) => {
            if (slot.kind === 'pending') {
                throw new Error(`Unresolved loop target at instruction ${index}`);
            }
            return slot;
        });
    }

    private assertOpen(): void {
        if (this.failed) {
            throw new Error('Compiler failed on malformed input');
        }
        if (this.finished) {
            throw new Error('Compiler already finished');
        }
    }

    private plant(c: number): void {
        const offset = this.offset++;
        const code = opMap.get(c);
        if (code === undefined) {
            return;
        }

        if (code === OpCode.OPEN) {
            this.slots.push(op(code));
            this.bracketStack.push(this.slots.length - 1);
            this.bracketOffsets.push(offset);
            this.slots.push(PENDING);
        } else if (code === OpCode.CLOSE) {
            const start = this.bracketStack.pop();
            if (start === undefined) {
                this.failed = true;
                throw new MalformedProgramError('unmatched-close', offset);
            }
            this.bracketOffsets.pop();
            this.slots.push(op(code));
            const end = this.slots.length - 1;
            this.slots[start + 1] = target(end + 2);
            this.slots.push(target(start + 2));
        } else {
            this.slots.push(op(code));
        }
    }
}

export const compile = (source: SourceChunk): Program => new Compiler().feed(source).finish();

export const compileStream = async (chunks: AsyncIterable<string | Uint8Array>): Promise<Program> => {
    const compiler = new Compiler();
    for await (const chunk of chunks) {
        compiler.feed(chunk);
    }
    return compiler.finish();
};
