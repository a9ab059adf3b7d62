// src/parse.ts
import { Op, OpType, CharCode, type Position, type Program, type Source } from './types.js';
import { BfError, ErrorKind } from './errors.js';
import { type Result, ok, err } from './result.js';
import { toText } from './text.js';

const opMap: Record<number, OpType> = {
    [CharCode.LT]: OpType.LEFT,
    [CharCode.GT]: OpType.RIGHT,
    [CharCode.ADD]: OpType.ADD,
    [CharCode.SUB]: OpType.SUB,
    [CharCode.LB]: OpType.OPEN,
    [CharCode.RB]: OpType.CLOSE,
    [CharCode.DOT]: OpType.OUTPUT,
    [CharCode.COMMA]: OpType.INPUT,
};

/**
 * Position of every character (code point) of `text`, in order. A newline
 * sits at the end of its own line; the character after it starts column 1.
 */
export const scanPositions = (text: string): Position[] => {
    const positions: Position[] = [];
    let line = 1;
    let column = 1;
    let offset = 0;

    for (const ch of text) {
        positions.push({ line, column, offset });
        if (ch.codePointAt(0) === CharCode.LF) {
            line++;
            column = 1;
        } else {
            column++;
        }
        offset++;
    }

    return positions;
};

/**
 * Validate `source` and build its Program. Fails on the first `]` without an
 * opener, or, after the whole scan, on the outermost `[` left unclosed.
 */
export const parse = (source: Source): Result<Program, BfError> => {
    const text = toText(source);
    const positions = scanPositions(text);
    const chars = Array.from(text);
    const ops: Op[] = [];
    const jumps = new Map<number, number>();
    const bracketStack: number[] = [];

    for (let i = 0; i < chars.length; i++) {
        const opType = opMap[chars[i].codePointAt(0) ?? -1];
        if (!opType) continue;

        const op = new Op(opType, positions[i]);
        if (opType === OpType.OPEN) {
            bracketStack.push(ops.length);
        } else if (opType === OpType.CLOSE) {
            const openPos = bracketStack.pop();
            if (openPos === undefined) {
                return err(new BfError(ErrorKind.UnmatchedCloseBracket, op.pos));
            }
            jumps.set(openPos, ops.length);
            jumps.set(ops.length, openPos);
        }
        ops.push(op);
    }

    if (bracketStack.length > 0) {
        return err(new BfError(ErrorKind.UnmatchedOpenBracket, ops[bracketStack[0]].pos));
    }

    return ok({ ops, jumps });
};
