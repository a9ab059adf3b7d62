// src/errors.ts
import type { Position, Source } from './types.js';
import { toText } from './text.js';

export enum ErrorKind {
    UnmatchedOpenBracket = 'UnmatchedOpenBracket',
    UnmatchedCloseBracket = 'UnmatchedCloseBracket',
    PointerUnderflow = 'PointerUnderflow',
    InputExhausted = 'InputExhausted',
    OutputNotUtf8 = 'OutputNotUtf8',
    // only raised when the caller sets a budget in RunOptions
    StepLimit = 'StepLimit',
    MemoryLimit = 'MemoryLimit',
}

export type Phase = 'parse' | 'run';

export type ErrorDetail = Readonly<Record<string, number>>;

interface ErrorDefinition {
    phase: Phase;
    describe: (detail: ErrorDetail) => string;
}

const hex = (byte: number | undefined): string =>
    `0x${(byte ?? 0).toString(16).toUpperCase().padStart(2, '0')}`;

const ERROR_CATALOG: Record<ErrorKind, ErrorDefinition> = {
    [ErrorKind.UnmatchedOpenBracket]: {
        phase: 'parse',
        describe: () => `unmatched '[' (no closing ']')`,
    },
    [ErrorKind.UnmatchedCloseBracket]: {
        phase: 'parse',
        describe: () => `unmatched ']' (no opening '[')`,
    },
    [ErrorKind.PointerUnderflow]: {
        phase: 'run',
        describe: () => `'<' moved the data pointer below cell 0`,
    },
    [ErrorKind.InputExhausted]: {
        phase: 'run',
        describe: ({ consumed }) => `',' found no input left (${consumed ?? 0} byte(s) consumed)`,
    },
    [ErrorKind.OutputNotUtf8]: {
        phase: 'run',
        describe: ({ index, byte }) => `output byte ${index ?? 0} (${hex(byte)}) is not valid UTF-8`,
    },
    [ErrorKind.StepLimit]: {
        phase: 'run',
        describe: ({ limit }) => `step limit of ${limit} reached`,
    },
    [ErrorKind.MemoryLimit]: {
        phase: 'run',
        describe: ({ limit }) => `memory limit of ${limit} cells reached`,
    },
};

/**
 * Every failure of a parse or a run. `message` is a single line naming the
 * phase, the position and the cause; `formatDiagnostic` adds a code frame.
 */
export class BfError extends Error {
    readonly phase: Phase;
    readonly description: string;

    constructor(
        readonly kind: ErrorKind,
        readonly position: Position,
        readonly detail: ErrorDetail = {},
    ) {
        const def = ERROR_CATALOG[kind];
        const description = def.describe(detail);
        super(`${def.phase} error at line ${position.line}, column ${position.column}: ${description}`);
        this.name = 'BfError';
        this.phase = def.phase;
        this.description = description;
    }
}

/**
 * Render an error with the offending source line and a caret under the column:
 *
 *   hello.bf:2:3: run error: '<' moved the data pointer below cell 0
 *    2 | +<
 *      |  ^
 */
export const formatDiagnostic = (error: BfError, source: Source, fileName = '<input>'): string => {
    const { line, column } = error.position;
    const text = (toText(source).split('\n')[line - 1] ?? '').replace(/\r$/, '');
    // keep tabs in the padding so the caret lines up under tabbed source
    const pad = Array.from(text)
        .slice(0, column - 1)
        .map(ch => (ch === '\t' ? '\t' : ' '))
        .join('');
    const gutter = String(line);

    return [
        `${fileName}:${line}:${column}: ${error.phase} error: ${error.description}`,
        ` ${gutter} | ${text}`,
        ` ${' '.repeat(gutter.length)} | ${pad}^`,
    ].join('\n');
};
