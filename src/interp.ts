// src/interp.ts
import { OpType, type Input, type Program } from './types.js';
import { BfError, ErrorKind } from './errors.js';
import { type Result, ok, err } from './result.js';
import { toBytes, firstInvalidByte, decodeOutput } from './text.js';

export interface RunOptions {
    /** Steps allowed before the run fails with StepLimit. */
    maxSteps: number;
    /** Tape cells allowed before a `>` fails with MemoryLimit. */
    maxCells: number;
    /** Receives trace lines about the phases of a run. */
    log?: (message: string) => void;
}

export const DEFAULT_OPTIONS: Readonly<RunOptions> = {
    maxSteps: Infinity,
    maxCells: Infinity,
};

/**
 * Execution context of a single run. Nothing is shared between instances,
 * so independent runs never interfere.
 */
export class Interpreter {
    private readonly cells: number[] = [0];
    private readonly output: number[] = [];
    // index of the op that wrote each output byte
    private readonly outputSites: number[] = [];
    private readonly input: Uint8Array;
    private readonly options: RunOptions;
    private cc = 0;
    private pc = 0;
    private inputPos = 0;
    private steps = 0;

    constructor(private readonly prog: Program, input?: Input, options: Partial<RunOptions> = {}) {
        this.input = toBytes(input);
        this.options = {
            maxSteps: options.maxSteps ?? DEFAULT_OPTIONS.maxSteps,
            maxCells: options.maxCells ?? DEFAULT_OPTIONS.maxCells,
            log: options.log,
        };
    }

    get tape(): readonly number[] {
        return this.cells;
    }

    get stepCount(): number {
        return this.steps;
    }

    private jumpTarget(pc: number): number {
        const target = this.prog.jumps.get(pc);
        if (target === undefined) {
            throw new Error(`Program has no jump target for op ${pc}`);
        }
        return target;
    }

    private fault(kind: ErrorKind, detail?: Record<string, number>): BfError {
        return new BfError(kind, this.prog.ops[this.pc].pos, detail);
    }

    private step(): BfError | null {
        const op = this.prog.ops[this.pc];

        if (this.steps >= this.options.maxSteps) {
            return this.fault(ErrorKind.StepLimit, { limit: this.options.maxSteps });
        }
        this.steps++;

        switch (op.type) {
            case OpType.LEFT:
                if (this.cc === 0) return this.fault(ErrorKind.PointerUnderflow);
                this.cc--;
                break;
            case OpType.RIGHT:
                if (this.cc + 1 === this.cells.length) {
                    if (this.cells.length >= this.options.maxCells) {
                        return this.fault(ErrorKind.MemoryLimit, { limit: this.options.maxCells });
                    }
                    this.cells.push(0);
                }
                this.cc++;
                break;
            case OpType.ADD:
                this.cells[this.cc] = (this.cells[this.cc] + 1) & 0xFF;
                break;
            case OpType.SUB:
                this.cells[this.cc] = (this.cells[this.cc] - 1) & 0xFF;
                break;
            case OpType.OPEN:
                if (this.cells[this.cc] === 0) {
                    this.pc = this.jumpTarget(this.pc);
                }
                break;
            case OpType.CLOSE:
                if (this.cells[this.cc] !== 0) {
                    this.pc = this.jumpTarget(this.pc);
                }
                break;
            case OpType.OUTPUT:
                this.output.push(this.cells[this.cc]);
                this.outputSites.push(this.pc);
                break;
            case OpType.INPUT:
                if (this.inputPos >= this.input.length) {
                    return this.fault(ErrorKind.InputExhausted, { consumed: this.inputPos });
                }
                this.cells[this.cc] = this.input[this.inputPos++];
                break;
        }
        this.pc++;
        return null;
    }

    private finish(): Result<string, BfError> {
        const bytes = Uint8Array.from(this.output);
        const bad = firstInvalidByte(bytes);
        if (bad >= 0) {
            const site = this.prog.ops[this.outputSites[bad]];
            return err(new BfError(ErrorKind.OutputNotUtf8, site.pos, { index: bad, byte: bytes[bad] }));
        }
        return ok(decodeOutput(bytes));
    }

    run(): Result<string, BfError> {
        while (this.pc < this.prog.ops.length) {
            const fault = this.step();
            if (fault) {
                this.options.log?.(`run stopped after ${this.steps} steps: ${fault.message}`);
                return err(fault);
            }
        }
        this.options.log?.(`run finished after ${this.steps} steps, ${this.cells.length} cells, ${this.output.length} output bytes`);
        return this.finish();
    }
}

export const execute = (prog: Program, input?: Input, options?: Partial<RunOptions>): Result<string, BfError> =>
    new Interpreter(prog, input, options).run();
