// src/dispatch/switch.ts
import { OpCode } from '../types.js';
import { DispatchStrategy, Machine } from './types.js';

export const switchDispatch: DispatchStrategy = {
    mode: 'switch',

    execute(code: Int32Array, { tape, input, output, trace }: Machine): void {
        let pc = 0;
        for (;;) {
            const op = code[pc++];
            if (trace) trace(op, pc - 1);
            switch (op) {
                case OpCode.ADD:
                    tape.increment();
                    break;
                case OpCode.SUB:
                    tape.decrement();
                    break;
                case OpCode.RIGHT:
                    tape.moveRight();
                    break;
                case OpCode.LEFT:
                    tape.moveLeft();
                    break;
                case OpCode.OUTPUT:
                    output.write(tape.current);
                    break;
                case OpCode.INPUT: {
                    const byte = input.read();
                    if (byte !== null) {
                        tape.current = byte;
                    }
                    break;
                }
                case OpCode.OPEN: {
                    const n = code[pc++];
                    if (tape.current === 0) {
                        pc = n;
                    }
                    break;
                }
                case OpCode.CLOSE: {
                    const n = code[pc++];
                    if (tape.current !== 0) {
                        pc = n;
                    }
                    break;
                }
                case OpCode.HALT:
                    return;
                default:
                    throw new Error(`Unknown opcode ${op} at pc=${pc - 1}`);
            }
        }
    },
};
