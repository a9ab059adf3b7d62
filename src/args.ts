// src/args.ts
import { type Result, ok, err } from './result.js';

export interface CliOptions {
    file: string;
    input?: string;
    inputFile?: string;
    maxSteps?: number;
    maxCells?: number;
    trace: boolean;
    showTime: boolean;
}

export const USAGE = `
Brainfuck Interpreter

Usage: bf-diag [options] <file>

Options:
  --input, -i <text>        Program input as text
  --input-file, -f <path>   Program input read from a file
  --max-steps, -s <n>       Stop with an error after n steps
  --max-cells, -c <n>       Stop with an error when the tape needs more than n cells
  --trace                   Print run phases to stderr
  --time, -t                Show execution time
  --help, -h                Show this help
`;

const parseCount = (flag: string, value: string | undefined, min: number): Result<number, string> => {
    if (value === undefined) return err(`Missing value for ${flag}`);
    const n = Number(value);
    if (!/^\d+$/.test(value) || !Number.isSafeInteger(n) || n < min) {
        return err(`Invalid value for ${flag}: '${value}' (expected an integer >= ${min})`);
    }
    return ok(n);
};

export function parseArgs(args: readonly string[]): Result<CliOptions | 'help', string> {
    const opts: Omit<CliOptions, 'file'> = { trace: false, showTime: false };
    let file: string | null = null;

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--help' || arg === '-h') {
            return ok('help');
        } else if (arg === '--input' || arg === '-i') {
            const value = args[++i];
            if (value === undefined) return err(`Missing value for ${arg}`);
            opts.input = value;
        } else if (arg === '--input-file' || arg === '-f') {
            const value = args[++i];
            if (value === undefined) return err(`Missing value for ${arg}`);
            opts.inputFile = value;
        } else if (arg === '--max-steps' || arg === '-s') {
            const n = parseCount(arg, args[++i], 0);
            if (!n.ok) return n;
            opts.maxSteps = n.value;
        } else if (arg === '--max-cells' || arg === '-c') {
            const n = parseCount(arg, args[++i], 1);
            if (!n.ok) return n;
            opts.maxCells = n.value;
        } else if (arg === '--trace') {
            opts.trace = true;
        } else if (arg === '--time' || arg === '-t') {
            opts.showTime = true;
        } else if (arg.startsWith('-')) {
            return err(`Unknown option: ${arg}`);
        } else {
            file = arg;
        }
    }

    if (opts.input !== undefined && opts.inputFile !== undefined) {
        return err('Use either --input or --input-file, not both');
    }
    if (!file) {
        return err('No input file specified');
    }
    return ok({ ...opts, file });
}
