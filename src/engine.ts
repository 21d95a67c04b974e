// src/engine.ts
import { compile, SourceChunk } from './compiler.js';
import { getDispatch } from './dispatch/index.js';
import type { DispatchStrategy } from './dispatch/index.js';
import { EngineBusyError, MalformedProgramError } from './errors.js';
import { BufferInput, BufferOutput, EMPTY_INPUT, NULL_OUTPUT } from './io.js';
import { Tape } from './tape.js';
import {
    DEFAULT_DISPATCH,
    DEFAULT_TAPE_SIZE,
    DispatchMode,
    ExecutionResult,
    InputSource,
    OpCode,
    OutputSink,
    Program,
    TraceHook,
} from './types.js';

export interface EngineOptions {
    dispatch?: DispatchMode;
    tapeSize?: number;
    trace?: TraceHook;
}

const invalid = (position: number, detail: string): MalformedProgramError =>
    new MalformedProgramError('invalid-program', position, detail);

/**
 * Packs a program into one Int32Array, opcodes and jump targets sharing the
 * slot sequence. Rejects anything the compiler could not have produced, so
 * the dispatch loops never see a bad opcode or an unmatched jump.
 */
export const encode = (program: Program): Int32Array => {
    const code = new Int32Array(program.length);
    const opens: number[] = [];

    for (let i = 0; i < program.length; i++) {
        const slot = program[i];
        if (slot.kind !== 'op') {
            throw invalid(i, 'jump target without a loop opcode');
        }
        if (OpCode[slot.op] === undefined) {
            throw invalid(i, `unknown opcode ${slot.op}`);
        }
        code[i] = slot.op;

        if (slot.op === OpCode.HALT && i !== program.length - 1) {
            throw invalid(i, 'HALT before the end of the program');
        }
        if (slot.op !== OpCode.OPEN && slot.op !== OpCode.CLOSE) {
            continue;
        }

        const operand = program[i + 1];
        if (operand === undefined || operand.kind !== 'target') {
            throw invalid(i, 'loop opcode without a jump target');
        }
        if (slot.op === OpCode.OPEN) {
            opens.push(i);
        } else {
            const start = opens.pop();
            if (start === undefined) {
                throw invalid(i, 'CLOSE without a matching OPEN');
            }
            if (code[start + 1] !== i + 2 || operand.index !== start + 2) {
                throw invalid(i, `loop targets do not match the loop opened at ${start}`);
            }
        }
        code[i + 1] = operand.index;
        i++;
    }

    if (program.length === 0 || code[program.length - 1] !== OpCode.HALT) {
        throw invalid(program.length, 'missing trailing HALT');
    }
    if (opens.length > 0) {
        throw invalid(opens[opens.length - 1], 'OPEN without a matching CLOSE');
    }
    return code;
};

export class Engine {
    private readonly code: Int32Array;
    private readonly tape: Tape;
    private readonly strategy: DispatchStrategy;
    private readonly trace: TraceHook | null;
    private running = false;

    constructor(program: Program, options: EngineOptions = {}) {
        this.code = encode(program);
        this.tape = new Tape(options.tapeSize ?? DEFAULT_TAPE_SIZE);
        this.strategy = getDispatch(options.dispatch ?? DEFAULT_DISPATCH);
        this.trace = options.trace ?? null;
    }

    static fromSource(source: SourceChunk, options: EngineOptions = {}): Engine {
        return new Engine(compile(source), options);
    }

    get mode(): DispatchMode {
        return this.strategy.mode;
    }

    get cursor(): number {
        return this.tape.cursor;
    }

    get cells(): Uint8Array {
        return this.tape.cells.slice();
    }

    /**
     * Runs the program from a zeroed tape. The sink is flushed whether the
     * program halts or faults; after a fault, a failing flush is logged and
     * the fault is what propagates.
     */
    run(input: InputSource = EMPTY_INPUT, output: OutputSink = NULL_OUTPUT): ExecutionResult {
        if (this.running) {
            throw new EngineBusyError();
        }
        this.running = true;
        this.tape.reset();
        try {
            this.strategy.execute(this.code, {
                tape: this.tape,
                input,
                output,
                trace: this.trace,
            });
        } catch (fault) {
            this.running = false;
            try {
                output.flush?.();
            } catch (flushError) {
                console.error('Output flush failed after fault:', flushError);
            }
            throw fault;
        }
        this.running = false;
        output.flush?.();
        return { cursor: this.tape.cursor, cells: this.cells };
    }
}

export const runSource = (
    source: SourceChunk,
    input: Uint8Array | string = '',
    options: EngineOptions = {}
): Uint8Array => {
    const output = new BufferOutput();
    Engine.fromSource(source, options).run(new BufferInput(input), output);
    return output.bytes();
};
