// src/types.ts
export enum OpType {
  LEFT = 'LEFT',
  RIGHT = 'RIGHT',
  ADD = 'ADD',
  SUB = 'SUB',
  OPEN = 'OPEN',
  CLOSE = 'CLOSE',
  OUTPUT = 'OUTPUT',
  INPUT = 'INPUT',
}

export enum CharCode {
  LT = 60,    // '<'
  GT = 62,    // '>'
  ADD = 43,   // '+'
  COMMA = 44, // ','
  SUB = 45,   // '-'
  DOT = 46,   // '.'
  LB = 91,    // '['
  RB = 93,    // ']'
  LF = 10,    // '\n'
}

/** 1-based line and column, plus the 0-based character offset into the source. */
export interface Position {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export class Op {
  constructor(
    public readonly type: OpType,
    public readonly pos: Position,
  ) {}
}

/**
 * A validated program. `jumps` maps every OPEN index to its CLOSE index and
 * every CLOSE index back to its OPEN.
 */
export interface Program {
  readonly ops: readonly Op[];
  readonly jumps: ReadonlyMap<number, number>;
}

export type Source = string | Uint8Array;
export type Input = string | Uint8Array;
