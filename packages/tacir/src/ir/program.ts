/**
 * Programs, functions and basic blocks.
 *
 * A program is the arena for its functions; blocks and instructions refer back
 * to their function by index instead of holding a reference to it.
 */

import { AlreadyTerminatedError, InvalidArgumentError, NotFoundError } from './errors.js';
import type { Instruction, Terminator } from './instructions.js';
import type { FunctionType, LIRType } from './types.js';

export type FunctionId = number;
export type BlockId = number;

export type BlockState = 'OPEN' | 'CLOSED';

// ===== Basic Block =====

export class LIRBlock {
    readonly kind = 'block';
    private readonly _instructions: Instruction[] = [];
    private _terminator: Terminator | undefined;

    constructor(
        readonly id: BlockId,
        readonly functionId: FunctionId,
        readonly label: string,
    ) {}

    get instructions(): readonly Instruction[] {
        return this._instructions;
    }

    get terminator(): Terminator | undefined {
        return this._terminator;
    }

    get state(): BlockState {
        return this._terminator === undefined ? 'OPEN' : 'CLOSED';
    }

    get isTerminated(): boolean {
        return this.state === 'CLOSED';
    }

    /** Index of the instruction in this block, or -1 */
    indexOf(instruction: Instruction): number {
        return this._instructions.indexOf(instruction);
    }

    /** Inserts at `index`, which must lie in `[0, instructions.length]` */
    insertInstruction(index: number, instruction: Instruction): void {
        this.assertOpen();
        if (!Number.isInteger(index) || index < 0 || index > this._instructions.length) {
            throw new InvalidArgumentError(`Insertion index ${index} is outside block '${this.label}'`);
        }
        this._instructions.splice(index, 0, instruction);
    }

    setTerminator(terminator: Terminator): Terminator {
        this.assertOpen();
        this._terminator = terminator;
        return terminator;
    }

    private assertOpen(): void {
        if (this._terminator !== undefined) {
            throw new AlreadyTerminatedError(this.label);
        }
    }
}

// ===== Function Argument =====

export class Argument {
    readonly kind = 'argument';

    constructor(
        readonly functionId: FunctionId,
        readonly index: number,
        readonly type: LIRType,
        readonly name: string,
    ) {}
}

// ===== Function =====

export class LIRFunction {
    readonly blocks: LIRBlock[] = [];
    readonly args: Argument[];

    constructor(
        readonly id: FunctionId,
        readonly name: string,
        readonly type: FunctionType,
        argNames: readonly string[] = [],
    ) {
        this.args = type.params.map((paramType, i) => new Argument(id, i, paramType, argNames[i] ?? `arg${i}`));
    }

    get returnType(): LIRType {
        return this.type.returnType;
    }

    /**
     * Appends a new, open block. Emission order follows call order.
     */
    appendBlock(label?: string): LIRBlock {
        const id = this.blocks.length;
        const block = new LIRBlock(id, this.id, label ?? `bb${id}`);
        this.blocks.push(block);
        return block;
    }

    getBlock(id: BlockId): LIRBlock {
        const block = this.blocks[id];
        if (block === undefined) {
            throw new NotFoundError(`Block ${id} not found in function '${this.name}'`);
        }
        return block;
    }

    findBlockOf(instruction: Instruction): LIRBlock | undefined {
        return this.blocks.find(block => block.indexOf(instruction) !== -1);
    }
}

// ===== Program =====

export class LIRProgram {
    readonly functions: LIRFunction[] = [];

    createFunction(name: string, type: FunctionType, argNames: readonly string[] = []): LIRFunction {
        const func = new LIRFunction(this.functions.length, name, type, argNames);
        this.functions.push(func);
        return func;
    }

    getFunction(id: FunctionId): LIRFunction {
        const func = this.functions[id];
        if (func === undefined) {
            throw new NotFoundError(`Function ${id} not found in program`);
        }
        return func;
    }
}
