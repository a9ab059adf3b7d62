// src/index.ts
import type { Input, Source } from './types.js';
import type { BfError } from './errors.js';
import { type Result, andThen } from './result.js';
import { parse } from './parse.js';
import { execute, type RunOptions } from './interp.js';

/** Validate `source`, then execute it against `input`. */
export const run = (source: Source, input?: Input, options: Partial<RunOptions> = {}): Result<string, BfError> => {
    const parsed = parse(source);
    if (parsed.ok) {
        const { ops, jumps } = parsed.value;
        options.log?.(`parsed ${ops.length} ops, ${jumps.size / 2} loops`);
    } else {
        options.log?.(`parse failed: ${parsed.error.message}`);
    }
    return andThen(parsed, prog => execute(prog, input, options));
};

export { parse, scanPositions } from './parse.js';
export { execute, Interpreter, DEFAULT_OPTIONS } from './interp.js';
export type { RunOptions } from './interp.js';
export { BfError, ErrorKind, formatDiagnostic } from './errors.js';
export type { Phase, ErrorDetail } from './errors.js';
export { ok, err, isOk, isErr, map, andThen, unwrapOr } from './result.js';
export type { Result, Ok, Err } from './result.js';
export { Op, OpType } from './types.js';
export type { Position, Program, Source, Input } from './types.js';
