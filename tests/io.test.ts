import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { BufferInput, BufferOutput, EMPTY_INPUT, StdinInput, StdoutOutput } from '../src/io.js';
import { Tape } from '../src/tape.js';
import { OutOfBoundsTapeError } from '../src/errors.js';

describe('BufferInput', () => {
  it('tells a zero byte apart from exhaustion', () => {
    const input = new BufferInput([0, 7]);
    expect(input.read()).toBe(0);
    expect(input.read()).toBe(7);
    expect(input.read()).toBeNull();
    expect(input.read()).toBeNull();
    expect(input.consumed).toBe(2);
  });

  it('reads strings as latin1 bytes', () => {
    const input = new BufferInput('A\xff');
    expect(input.read()).toBe(0x41);
    expect(input.read()).toBe(0xff);
  });

  it('has an always-empty variant', () => {
    expect(EMPTY_INPUT.read()).toBeNull();
  });
});

describe('BufferOutput', () => {
  it('keeps every byte in order past its initial capacity', () => {
    const output = new BufferOutput();
    for (let i = 0; i < 600; i++) {
      output.write(i & 0xff);
    }
    const bytes = output.bytes();
    expect(bytes.length).toBe(600);
    expect(bytes[0]).toBe(0);
    expect(bytes[255]).toBe(255);
    expect(bytes[256]).toBe(0);
    expect(bytes[599]).toBe(599 & 0xff);
  });

  it('renders text and clears', () => {
    const output = new BufferOutput();
    output.write(0x68);
    output.write(0x69);
    expect(output.text()).toBe('hi');
    output.clear();
    expect(output.bytes().length).toBe(0);
  });
});

describe('Tape', () => {
  it('wraps cell values', () => {
    const tape = new Tape(2);
    tape.decrement();
    expect(tape.current).toBe(255);
    tape.increment();
    expect(tape.current).toBe(0);
  });

  it('refuses moves past either end', () => {
    const tape = new Tape(2);
    expect(() => tape.moveLeft()).toThrow(OutOfBoundsTapeError);
    tape.moveRight();
    expect(() => tape.moveRight()).toThrow('Tape cursor moved to 2, outside [0, 1]');
    expect(tape.cursor).toBe(1);
  });

  it('resets cells and cursor', () => {
    const tape = new Tape(3);
    tape.increment();
    tape.moveRight();
    tape.reset();
    expect(tape.cursor).toBe(0);
    expect(Array.from(tape.cells)).toEqual([0, 0, 0]);
  });
});

describe('StdinInput', () => {
  it('reads bytes from its descriptor and then reports exhaustion', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tape-vm-'));
    const file = path.join(dir, 'input.bin');
    fs.writeFileSync(file, Buffer.from([0x41, 0x00]));
    const fd = fs.openSync(file, 'r');
    try {
      const input = new StdinInput(fd);
      expect(input.read()).toBe(0x41);
      expect(input.read()).toBe(0);
      expect(input.read()).toBeNull();
      expect(input.read()).toBeNull();
    } finally {
      fs.closeSync(fd);
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe('StdoutOutput', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes to stdout when the buffer fills and on flush', () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const output = new StdoutOutput(2);

    output.write(1);
    expect(write).not.toHaveBeenCalled();

    output.write(2);
    expect(write).toHaveBeenCalledTimes(1);
    expect(write).toHaveBeenLastCalledWith(Buffer.from([1, 2]));

    output.write(3);
    output.flush();
    expect(write).toHaveBeenCalledTimes(2);
    expect(write).toHaveBeenLastCalledWith(Buffer.from([3]));

    output.flush();
    expect(write).toHaveBeenCalledTimes(2);
  });
});
