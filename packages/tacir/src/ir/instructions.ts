/**
 * LIR Instruction definitions
 * All instruction kinds the builder can emit
 */

import type { FunctionId, LIRBlock } from './program.js';
import type { LIRType } from './types.js';
import { boolType, isVoidType, pointerType, voidType } from './types.js';
import type { Value } from './values.js';

// ===== Opcodes =====

export type BinaryOpcode = 'add' | 'sub' | 'mul' | 'udiv' | 'sdiv';

export type CastOpcode =
    | 'trunc' | 'zext' | 'sext'
    | 'fptrunc' | 'fpext'
    | 'bitcast'
    | 'fptoui' | 'uitofp' | 'fptosi' | 'sitofp';

export type MemoryOpcode = 'alloca' | 'load' | 'store';

export type TerminatorOpcode = 'br' | 'ret';

export type CompareFamily = 'icmp' | 'fcmp';

/** Branch targets are the only operands that are not values */
export type Operand = Value | LIRBlock;

// ===== Base Instruction =====

export abstract class AbstractInstruction<TOpcode extends string, TOperand extends Operand> {
    constructor(
        /** Index of the owning function in its program */
        readonly functionId: FunctionId,
        readonly opcode: TOpcode,
        readonly type: LIRType,
        readonly operands: readonly TOperand[],
        /** Display name only; never used to identify the instruction */
        readonly name: string = '',
    ) {}

    get producesValue(): boolean {
        return !isVoidType(this.type);
    }
}

/**
 * An instruction placed in a block's instruction list. Its operands are values.
 */
export class Instruction<TOpcode extends string = string> extends AbstractInstruction<TOpcode, Value> {
    readonly kind = 'instruction';
}

// ===== Arithmetic =====

export class BinaryInstruction extends Instruction<BinaryOpcode> {
    constructor(functionId: FunctionId, opcode: BinaryOpcode, lhs: Value, rhs: Value, name?: string) {
        super(functionId, opcode, lhs.type, [lhs, rhs], name);
    }
}

// ===== Comparison =====

/**
 * The opcode of a comparison is its resolved predicate, e.g. `slt` or `one`.
 */
export class CompareInstruction extends Instruction {
    constructor(
        functionId: FunctionId,
        readonly family: CompareFamily,
        predicate: string,
        lhs: Value,
        rhs: Value,
        name?: string,
    ) {
        super(functionId, predicate, boolType(), [lhs, rhs], name);
    }

    get predicate(): string {
        return this.opcode;
    }
}

// ===== Casts =====

export class CastInstruction extends Instruction<CastOpcode> {
    constructor(functionId: FunctionId, opcode: CastOpcode, value: Value, targetType: LIRType, name?: string) {
        super(functionId, opcode, targetType, [value], name);
    }
}

// ===== Memory Operations =====

export class AllocaInstruction extends Instruction<'alloca'> {
    constructor(
        functionId: FunctionId,
        readonly allocatedType: LIRType,
        count: Value | undefined,
        name?: string,
    ) {
        super(functionId, 'alloca', pointerType(allocatedType), count === undefined ? [] : [count], name);
    }

    get count(): Value | undefined {
        return this.operands[0];
    }
}

export class LoadInstruction extends Instruction<'load'> {
    constructor(functionId: FunctionId, pointer: Value, resultType: LIRType, name?: string) {
        super(functionId, 'load', resultType, [pointer], name);
    }
}

export class StoreInstruction extends Instruction<'store'> {
    constructor(functionId: FunctionId, value: Value, pointer: Value) {
        super(functionId, 'store', voidType(), [value, pointer]);
    }
}

// ===== Terminators =====

/**
 * Occupies the terminator slot of a block. Branch targets appear among its operands.
 */
export class Terminator extends AbstractInstruction<TerminatorOpcode, Operand> {
    readonly kind = 'terminator';

    constructor(functionId: FunctionId, opcode: TerminatorOpcode, operands: readonly Operand[]) {
        super(functionId, opcode, voidType(), operands);
    }
}

export function isBlockOperand(operand: Operand): operand is LIRBlock {
    return operand.kind === 'block';
}
