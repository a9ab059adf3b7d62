#!/usr/bin/env node
// src/cli.ts
import fs from 'fs';
import { parseArgs, USAGE } from './args.js';
import { run } from './index.js';
import { formatDiagnostic } from './errors.js';
import type { RunOptions } from './interp.js';

function printUsage(): void {
    console.log(USAGE);
}

function main(): void {
    const parsed = parseArgs(process.argv.slice(2));
    if (!parsed.ok) {
        console.error(parsed.error);
        printUsage();
        process.exit(1);
    }
    if (parsed.value === 'help') {
        printUsage();
        process.exit(0);
    }
    const args = parsed.value;

    let source: Buffer;
    let input: Buffer | string | undefined = args.input;
    try {
        source = fs.readFileSync(args.file);
        if (args.inputFile !== undefined) {
            input = fs.readFileSync(args.inputFile);
        }
    } catch (err) {
        console.error(`Error: ${err instanceof Error ? err.message : 'Unknown error'}`);
        process.exit(1);
    }

    const options: Partial<RunOptions> = {
        maxSteps: args.maxSteps,
        maxCells: args.maxCells,
        log: args.trace ? (message: string) => console.error(`[trace] ${message}`) : undefined,
    };

    const start = process.hrtime.bigint();
    const result = run(source, input, options);

    if (args.showTime) {
        const end = process.hrtime.bigint();
        const timeMs = Number(end - start) / 1e6;
        console.error(`\nExecution time: ${timeMs.toFixed(2)}ms`);
    }

    if (!result.ok) {
        console.error(formatDiagnostic(result.error, source, args.file));
        process.exit(1);
    }
    process.stdout.write(result.value);
}

main();
