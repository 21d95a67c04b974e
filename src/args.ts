// src/args.ts
import { DEFAULT_DISPATCH, DEFAULT_TAPE_SIZE, DISPATCH_MODES, DispatchMode } from './types.js';

export interface CliOptions {
    dispatch: DispatchMode;
    tapeSize: number;
    showTime: boolean;
    trace: boolean;
    dump: boolean;
    help: boolean;
    files: string[];
}

const isDispatchMode = (value: string | undefined): value is DispatchMode =>
    DISPATCH_MODES.some((mode) => mode === value);

export function parseArgs(args: string[]): CliOptions {
    const options: CliOptions = {
        dispatch: DEFAULT_DISPATCH,
        tapeSize: DEFAULT_TAPE_SIZE,
        showTime: false,
        trace: false,
        dump: false,
        help: false,
        files: [],
    };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--help' || arg === '-h') {
            options.help = true;
        } else if (arg === '--dispatch' || arg === '-d') {
            const mode = args[++i];
            if (!isDispatchMode(mode)) {
                throw new Error(`Invalid dispatch mode. Use one of: ${DISPATCH_MODES.join(', ')}`);
            }
            options.dispatch = mode;
        } else if (arg === '--tape-size') {
            const size = Number(args[++i]);
            if (!Number.isInteger(size) || size < 1) {
                throw new Error('Tape size must be a positive integer');
            }
            options.tapeSize = size;
        } else if (arg === '--time' || arg === '-t') {
            options.showTime = true;
        } else if (arg === '--trace') {
            options.trace = true;
        } else if (arg === '--dump') {
            options.dump = true;
        } else if (!arg.startsWith('-')) {
            options.files.push(arg);
        } else {
            throw new Error(`Unknown option: ${arg}`);
        }
    }

    return options;
}
