#!/usr/bin/env node
// src/cli.ts
import fs from 'fs';
import { compile } from './compiler.js';
import { disassemble } from './disassemble.js';
import { Engine } from './engine.js';
import { StdinInput, StdoutOutput } from './io.js';
import { CliOptions, parseArgs } from './args.js';
import { DEFAULT_DISPATCH, DEFAULT_TAPE_SIZE, DISPATCH_MODES, OpCode } from './types.js';

function printUsage(): void {
    console.log(`
Tape VM

Usage: tape-vm [options] <file...>

Options:
  --dispatch, -d  Dispatch: ${DISPATCH_MODES.join(', ')} [default: ${DEFAULT_DISPATCH}]
  --tape-size     Number of tape cells [default: ${DEFAULT_TAPE_SIZE}]
  --time, -t      Show execution time
  --trace         Print each executed opcode to stderr
  --dump          Print the compiled program instead of running it
  --help, -h      Show this help
`);
}

function runFile(file: string, options: CliOptions, input: StdinInput, output: StdoutOutput): void {
    const program = compile(fs.readFileSync(file));
    if (options.dump) {
        console.log(disassemble(program));
        return;
    }

    const engine = new Engine(program, {
        dispatch: options.dispatch,
        tapeSize: options.tapeSize,
        trace: options.trace ? (op) => console.error(OpCode[op]) : undefined,
    });

    const start = process.hrtime.bigint();
    engine.run(input, output);

    if (options.showTime) {
        const end = process.hrtime.bigint();
        const timeMs = Number(end - start) / 1e6;
        console.error(`\nExecution time: ${timeMs.toFixed(2)}ms`);
    }
}

function main(): void {
    try {
        const options = parseArgs(process.argv.slice(2));
        if (options.help) {
            printUsage();
            process.exit(0);
        }
        if (options.files.length === 0) {
            console.error('No input file specified');
            printUsage();
            process.exit(1);
        }

        const input = new StdinInput();
        const output = new StdoutOutput();
        for (const file of options.files) {
            if (options.files.length > 1) {
                console.error(`# Executing: ${file}`);
            }
            runFile(file, options, input, output);
        }
    } catch (err) {
        console.error(`Error: ${err instanceof Error ? err.message : 'Unknown error'}`);
        process.exit(1);
    }
}

main();
