// src/dispatch/aot.ts
import { Tape } from '../tape.js';
import { InputSource, OpCode, OutputSink, TraceHook } from '../types.js';
import { DispatchStrategy, Machine } from './types.js';

export type Compiled = (tape: Tape, input: InputSource, output: OutputSink, trace: TraceHook | null) => void;

/**
 * Turns packed code into JavaScript source and evaluates it into a function
 * of the machine parts. Straight-line instructions become one statement each;
 * every jump target opens a `case` of a single `for (;;) switch (pc)`, so the
 * generated code stays flat however deeply loops nest. Blocks fall through
 * into the next case when a loop jump is not taken.
 */
export class AOTCompiler {
    private code: string[] = [];

    constructor(private readonly traced: boolean) { }

    private emit(line: string): void {
        this.code.push(`      ${line}`);
    }

    private emitTrace(op: OpCode, pc: number): void {
        if (this.traced) {
            this.emit(`trace(${op}, ${pc});`);
        }
    }

    source(prog: Int32Array): string {
        const labels = new Set<number>([0]);
        for (let pc = 0; pc < prog.length; pc++) {
            if (prog[pc] === OpCode.OPEN || prog[pc] === OpCode.CLOSE) {
                labels.add(prog[++pc]);
            }
        }

        this.code = [
            '"use strict";',
            'const cells = tape.cells;',
            'let pc = 0;',
            'for (;;) {',
            '  switch (pc) {',
        ];

        let pc = 0;
        while (pc < prog.length) {
            const op = prog[pc];
            if (labels.has(pc)) {
                this.code.push(`    case ${pc}:`);
            }
            this.emitTrace(op, pc);
            switch (op) {
                case OpCode.ADD:
                    this.emit('tape.increment();');
                    break;
                case OpCode.SUB:
                    this.emit('tape.decrement();');
                    break;
                case OpCode.LEFT:
                    this.emit('tape.moveLeft();');
                    break;
                case OpCode.RIGHT:
                    this.emit('tape.moveRight();');
                    break;
                case OpCode.OUTPUT:
                    this.emit('output.write(cells[tape.cursor]);');
                    break;
                case OpCode.INPUT:
                    this.emit('{ const b = input.read(); if (b !== null) cells[tape.cursor] = b; }');
                    break;
                case OpCode.OPEN:
                    this.emit(`if (cells[tape.cursor] === 0) { pc = ${prog[pc + 1]}; continue; }`);
                    pc++;
                    break;
                case OpCode.CLOSE:
                    this.emit(`if (cells[tape.cursor] !== 0) { pc = ${prog[pc + 1]}; continue; }`);
                    pc++;
                    break;
                case OpCode.HALT:
                    this.emit('return;');
                    break;
                default:
                    throw new Error(`Unknown opcode ${op} at pc=${pc}`);
            }
            pc++;
        }

        this.code.push(
            '    default:',
            '      throw new Error("No block at pc=" + pc);',
            '  }',
            '}',
        );
        return this.code.join('\n');
    }

    compile(prog: Int32Array): Compiled {
        const source = this.source(prog);
        let body: Function;
        try {
            body = new Function('tape', 'input', 'output', 'trace', source);
        } catch (e) {
            console.error('Generated code:\n', source);
            throw e;
        }
        return (tape, input, output, trace) => {
            body(tape, input, output, trace);
        };
    }
}

const compiled = new WeakMap<Int32Array, Compiled>();
const compiledTraced = new WeakMap<Int32Array, Compiled>();

export const aotDispatch: DispatchStrategy = {
    mode: 'aot',

    execute(code: Int32Array, { tape, input, output, trace }: Machine): void {
        const cache = trace ? compiledTraced : compiled;
        let fn = cache.get(code);
        if (fn === undefined) {
            fn = new AOTCompiler(trace !== null).compile(code);
            cache.set(code, fn);
        }
        fn(tape, input, output, trace);
    },
};
