// src/dispatch/table.ts
import { OpCode } from '../types.js';
import { DispatchStrategy, Machine } from './types.js';

// pc of the slot after the opcode in, next pc out; HALT answers -1
type Handler = (pc: number) => number;

/**
 * Opcode-indexed handler table, the stand-in for jumping through label
 * addresses: the fetched opcode selects the handler without a branch chain.
 */
export const tableDispatch: DispatchStrategy = {
    mode: 'table',

    execute(code: Int32Array, { tape, input, output, trace }: Machine): void {
        const handlers: Handler[] = [];
        handlers[OpCode.ADD] = (pc) => {
            tape.increment();
            return pc;
        };
        handlers[OpCode.SUB] = (pc) => {
            tape.decrement();
            return pc;
        };
        handlers[OpCode.LEFT] = (pc) => {
            tape.moveLeft();
            return pc;
        };
        handlers[OpCode.RIGHT] = (pc) => {
            tape.moveRight();
            return pc;
        };
        handlers[OpCode.OPEN] = (pc) => (tape.current === 0 ? code[pc] : pc + 1);
        handlers[OpCode.CLOSE] = (pc) => (tape.current !== 0 ? code[pc] : pc + 1);
        handlers[OpCode.OUTPUT] = (pc) => {
            output.write(tape.current);
            return pc;
        };
        handlers[OpCode.INPUT] = (pc) => {
            const byte = input.read();
            if (byte !== null) {
                tape.current = byte;
            }
            return pc;
        };
        handlers[OpCode.HALT] = () => -1;

        let pc = 0;
        while (pc >= 0) {
            const op = code[pc];
            if (trace) trace(op, pc);
            const handler = handlers[op];
            if (handler === undefined) {
                throw new Error(`Unknown opcode ${op} at pc=${pc}`);
            }
            pc = handler(pc + 1);
        }
    },
};
