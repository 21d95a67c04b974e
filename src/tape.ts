// src/tape.ts
import { DEFAULT_TAPE_SIZE } from './types.js';
import { OutOfBoundsTapeError } from './errors.js';

/** Byte cells plus a cursor. Every move is bounds checked. */
export class Tape {
    readonly cells: Uint8Array;
    cursor = 0;

    constructor(size: number = DEFAULT_TAPE_SIZE) {
        if (!Number.isInteger(size) || size < 1) {
            throw new RangeError(`Tape size must be a positive integer, got ${size}`);
        }
        this.cells = new Uint8Array(size);
    }

    get current(): number {
        return this.cells[this.cursor];
    }

    set current(value: number) {
        this.cells[this.cursor] = value;
    }

    increment(): void {
        this.cells[this.cursor] = (this.cells[this.cursor] + 1) & 0xFF;
    }

    decrement(): void {
        this.cells[this.cursor] = (this.cells[this.cursor] - 1) & 0xFF;
    }

    moveLeft(): void {
        if (this.cursor === 0) {
            throw new OutOfBoundsTapeError(-1, this.cells.length);
        }
        this.cursor--;
    }

    moveRight(): void {
        if (this.cursor === this.cells.length - 1) {
            throw new OutOfBoundsTapeError(this.cells.length, this.cells.length);
        }
        this.cursor++;
    }

    reset(): void {
        this.cells.fill(0);
        this.cursor = 0;
    }
}
