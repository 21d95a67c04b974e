// src/dispatch/closure.ts
import { OpCode } from '../types.js';
import { DispatchStrategy, Machine } from './types.js';

type Thunk = () => number;

const thread = (code: Int32Array, { tape, input, output }: Machine): Thunk[] => {
    const thunks: Thunk[] = new Array(code.length);
    let pc = 0;
    while (pc < code.length) {
        const next = pc + 1;
        switch (code[pc]) {
            case OpCode.ADD:
                thunks[pc] = () => {
                    tape.increment();
                    return next;
                };
                break;
            case OpCode.SUB:
                thunks[pc] = () => {
                    tape.decrement();
                    return next;
                };
                break;
            case OpCode.LEFT:
                thunks[pc] = () => {
                    tape.moveLeft();
                    return next;
                };
                break;
            case OpCode.RIGHT:
                thunks[pc] = () => {
                    tape.moveRight();
                    return next;
                };
                break;
            case OpCode.OUTPUT:
                thunks[pc] = () => {
                    output.write(tape.current);
                    return next;
                };
                break;
            case OpCode.INPUT:
                thunks[pc] = () => {
                    const byte = input.read();
                    if (byte !== null) {
                        tape.current = byte;
                    }
                    return next;
                };
                break;
            case OpCode.OPEN: {
                const n = code[next];
                const skip = next + 1;
                thunks[pc] = () => (tape.current === 0 ? n : skip);
                pc = skip;
                continue;
            }
            case OpCode.CLOSE: {
                const n = code[next];
                const skip = next + 1;
                thunks[pc] = () => (tape.current !== 0 ? n : skip);
                pc = skip;
                continue;
            }
            case OpCode.HALT:
                thunks[pc] = () => -1;
                break;
            default:
                throw new Error(`Unknown opcode ${code[pc]} at pc=${pc}`);
        }
        pc = next;
    }
    return thunks;
};

/**
 * Direct threading: each instruction is bound once into a closure that
 * carries its own operand and answers the next pc.
 */
export const closureDispatch: DispatchStrategy = {
    mode: 'closure',

    execute(code: Int32Array, machine: Machine): void {
        const thunks = thread(code, machine);
        const { trace } = machine;
        let pc = 0;
        if (trace) {
            while (pc >= 0) {
                trace(code[pc], pc);
                pc = thunks[pc]();
            }
        } else {
            while (pc >= 0) {
                pc = thunks[pc]();
            }
        }
    },
};
