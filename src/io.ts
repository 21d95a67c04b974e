// src/io.ts
import fs from 'fs';
import { InputSource, OutputSink } from './types.js';

export const EMPTY_INPUT: InputSource = {
    read: () => null,
};

export const NULL_OUTPUT: OutputSink = {
    write: () => undefined,
};

export class BufferInput implements InputSource {
    private index = 0;
    private readonly bytes: Uint8Array;

    constructor(bytes: Uint8Array | string | readonly number[]) {
        this.bytes = typeof bytes === 'string' ? Buffer.from(bytes, 'latin1') : Uint8Array.from(bytes);
    }

    read(): number | null {
        return this.index < this.bytes.length ? this.bytes[this.index++] : null;
    }

    get consumed(): number {
        return this.index;
    }
}

/** Blocking byte-at-a-time reads from a file descriptor, stdin by default. */
export class StdinInput implements InputSource {
    private readonly buf = Buffer.alloc(1);
    private exhausted = false;

    constructor(private readonly fd: number = process.stdin.fd) { }

    read(): number | null {
        if (this.exhausted) {
            return null;
        }
        const n = fs.readSync(this.fd, this.buf, 0, 1, null);
        if (n === 0) {
            this.exhausted = true;
            return null;
        }
        return this.buf[0];
    }
}

export class BufferOutput implements OutputSink {
    private data = new Uint8Array(256);
    private length = 0;

    write(byte: number): void {
        if (this.length === this.data.length) {
            const grown = new Uint8Array(this.data.length * 2);
            grown.set(this.data);
            this.data = grown;
        }
        this.data[this.length++] = byte;
    }

    bytes(): Uint8Array {
        return this.data.slice(0, this.length);
    }

    text(): string {
        return Buffer.from(this.data.buffer, 0, this.length).toString('latin1');
    }

    clear(): void {
        this.length = 0;
    }
}

export class StdoutOutput implements OutputSink {
    private readonly buf: Buffer;
    private length = 0;

    constructor(capacity = 4096) {
        this.buf = Buffer.alloc(capacity);
    }

    write(byte: number): void {
        this.buf[this.length++] = byte;
        if (this.length === this.buf.length) {
            this.flush();
        }
    }

    flush(): void {
        if (this.length > 0) {
            process.stdout.write(Buffer.from(this.buf.subarray(0, this.length)));
            this.length = 0;
        }
    }
}
