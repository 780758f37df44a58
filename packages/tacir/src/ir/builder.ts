/**
 * LIR Builder API
 * Cursor-based construction of instructions inside basic blocks
 */

import {
    InvalidArgumentError,
    NotFoundError,
    TypeMismatchError,
    UnpositionedBuilderError
} from './errors.js';

import {
    AllocaInstruction,
    BinaryInstruction,
    CastInstruction,
    CompareInstruction,
    LoadInstruction,
    StoreInstruction,
    Terminator
} from './instructions.js';

import type {
    BinaryOpcode,
    CastOpcode,
    CompareFamily,
    Instruction,
    Operand,
    TerminatorOpcode
} from './instructions.js';

import type { LIRBlock, LIRFunction, LIRProgram } from './program.js';
import type { LIRType } from './types.js';
import { intType, isIntType, pointeeType, typeToString, typesEqual } from './types.js';
import type { ConstantPayload, Value } from './values.js';
import { Constant } from './values.js';

// ===== Comparison Symbols =====

export type CompareSymbol = '>' | '<' | '==' | '!=' | '>=' | '<=';

const CMP_MAP: Readonly<Record<CompareSymbol, string>> = {
    '>': 'gt',
    '<': 'lt',
    '==': 'eq',
    '!=': 'ne',
    '>=': 'ge',
    '<=': 'le',
};

export function isCompareSymbol(op: string): op is CompareSymbol {
    return Object.hasOwn(CMP_MAP, op);
}

// eq/ne carry no signedness
function integerPredicate(prefix: 's' | 'u', cmpop: string): string {
    if (!isCompareSymbol(cmpop)) {
        throw new InvalidArgumentError(`Unknown integer comparison operator '${cmpop}'`);
    }
    const base = CMP_MAP[cmpop];
    return cmpop === '==' || cmpop === '!=' ? base : prefix + base;
}

// Anything that is not a symbol is taken as a predicate already, e.g. 'uno'
function floatPredicate(prefix: 'o' | 'u', cmpop: string): string {
    return isCompareSymbol(cmpop) ? prefix + CMP_MAP[cmpop] : cmpop;
}

// ===== Alloca Count =====

const I32_MAX = 2 ** 31 - 1;

export type AllocaCount =
    | { readonly kind: 'explicit'; readonly value: Value }
    | { readonly kind: 'literal'; readonly value: number }
    | { readonly kind: 'none' };

export function toAllocaCount(count: Value | number | undefined): AllocaCount {
    if (count === undefined) {
        return { kind: 'none' };
    }
    if (typeof count === 'number') {
        return { kind: 'literal', value: count };
    }
    return { kind: 'explicit', value: count };
}

/**
 * Validates the count and normalises it to a value; literals become i32 constants.
 */
export function resolveAllocaCount(count: AllocaCount): Value | undefined {
    switch (count.kind) {
        case 'none':
            return undefined;

        case 'literal':
            if (!Number.isSafeInteger(count.value) || count.value <= 0) {
                throw new InvalidArgumentError(`Alloca count must be a positive integer, got ${count.value}`);
            }
            if (count.value > I32_MAX) {
                throw new InvalidArgumentError(`Alloca count ${count.value} does not fit in i32`);
            }
            return new Constant(intType(32), count.value);

        case 'explicit': {
            const value = count.value;
            if (!isIntType(value.type)) {
                throw new InvalidArgumentError(`Alloca count must be an integer value, got ${typeToString(value.type)}`);
            }
            if (value.kind === 'constant' && !isPositivePayload(value.value)) {
                throw new InvalidArgumentError('Alloca count constant must be positive');
            }
            return value;
        }
    }
}

function isPositivePayload(payload: ConstantPayload): boolean {
    if (typeof payload === 'number') {
        return payload > 0;
    }
    if (typeof payload === 'bigint') {
        return payload > 0n;
    }
    return false;
}

// ===== Builder =====

export class IRBuilder {
    private _block: LIRBlock | undefined;
    private _anchor: number;

    constructor(readonly program: LIRProgram, block?: LIRBlock) {
        this._block = block && this.owned(block);
        this._anchor = block ? block.instructions.length : 0;
    }

    get block(): LIRBlock | undefined {
        return this._block;
    }

    get anchor(): number {
        return this._anchor;
    }

    get function(): LIRFunction {
        return this.program.getFunction(this.requireBlock('function').functionId);
    }

    // ===== Positioning =====

    positionBefore(instruction: Instruction): void {
        const block = this.locate(instruction);
        this._block = block;
        this._anchor = Math.max(0, block.indexOf(instruction) - 1);
    }

    positionAfter(instruction: Instruction): void {
        const block = this.locate(instruction);
        this._block = block;
        this._anchor = Math.min(block.indexOf(instruction) + 1, block.instructions.length);
    }

    positionAtStart(block: LIRBlock): void {
        this._block = this.owned(block);
        this._anchor = 0;
    }

    positionAtEnd(block: LIRBlock): void {
        this._block = this.owned(block);
        this._anchor = block.instructions.length;
    }

    constant(type: LIRType, value: ConstantPayload): Constant {
        return new Constant(type, value);
    }

    // ===== Arithmetic =====

    add(lhs: Value, rhs: Value, name?: string): BinaryInstruction {
        return this.binaryOp('add', lhs, rhs, name);
    }

    sub(lhs: Value, rhs: Value, name?: string): BinaryInstruction {
        return this.binaryOp('sub', lhs, rhs, name);
    }

    mul(lhs: Value, rhs: Value, name?: string): BinaryInstruction {
        return this.binaryOp('mul', lhs, rhs, name);
    }

    udiv(lhs: Value, rhs: Value, name?: string): BinaryInstruction {
        return this.binaryOp('udiv', lhs, rhs, name);
    }

    sdiv(lhs: Value, rhs: Value, name?: string): BinaryInstruction {
        return this.binaryOp('sdiv', lhs, rhs, name);
    }

    // ===== Comparisons =====
    // Operand types are not checked against each other here.

    icmpSigned(cmpop: CompareSymbol, lhs: Value, rhs: Value, name?: string): CompareInstruction {
        return this.compare('icmp', integerPredicate('s', cmpop), lhs, rhs, name);
    }

    icmpUnsigned(cmpop: CompareSymbol, lhs: Value, rhs: Value, name?: string): CompareInstruction {
        return this.compare('icmp', integerPredicate('u', cmpop), lhs, rhs, name);
    }

    fcmpOrdered(cmpop: string, lhs: Value, rhs: Value, name?: string): CompareInstruction {
        return this.compare('fcmp', floatPredicate('o', cmpop), lhs, rhs, name);
    }

    fcmpUnordered(cmpop: string, lhs: Value, rhs: Value, name?: string): CompareInstruction {
        return this.compare('fcmp', floatPredicate('u', cmpop), lhs, rhs, name);
    }

    // ===== Casts =====

    trunc(value: Value, type: LIRType, name?: string): CastInstruction {
        return this.castOp('trunc', value, type, name);
    }

    zext(value: Value, type: LIRType, name?: string): CastInstruction {
        return this.castOp('zext', value, type, name);
    }

    sext(value: Value, type: LIRType, name?: string): CastInstruction {
        return this.castOp('sext', value, type, name);
    }

    fptrunc(value: Value, type: LIRType, name?: string): CastInstruction {
        return this.castOp('fptrunc', value, type, name);
    }

    fpext(value: Value, type: LIRType, name?: string): CastInstruction {
        return this.castOp('fpext', value, type, name);
    }

    bitcast(value: Value, type: LIRType, name?: string): CastInstruction {
        return this.castOp('bitcast', value, type, name);
    }

    fptoui(value: Value, type: LIRType, name?: string): CastInstruction {
        return this.castOp('fptoui', value, type, name);
    }

    uitofp(value: Value, type: LIRType, name?: string): CastInstruction {
        return this.castOp('uitofp', value, type, name);
    }

    fptosi(value: Value, type: LIRType, name?: string): CastInstruction {
        return this.castOp('fptosi', value, type, name);
    }

    sitofp(value: Value, type: LIRType, name?: string): CastInstruction {
        return this.castOp('sitofp', value, type, name);
    }

    // ===== Memory Operations =====

    alloca(type: LIRType, count?: Value | number, name?: string): AllocaInstruction {
        const block = this.requireBlock('alloca');
        const resolved = resolveAllocaCount(toAllocaCount(count));
        return this.insert(new AllocaInstruction(block.functionId, type, resolved, name));
    }

    load(pointer: Value, name?: string): LoadInstruction {
        const block = this.requireBlock('load');
        const resultType = pointeeType(pointer.type);
        return this.insert(new LoadInstruction(block.functionId, pointer, resultType, name));
    }

    store(value: Value, pointer: Value): StoreInstruction {
        const block = this.requireBlock('store');
        return this.insert(new StoreInstruction(block.functionId, value, pointer));
    }

    // ===== Terminators =====

    jump(target: LIRBlock): Terminator {
        return this.terminate('br', [target]);
    }

    branch(cond: Value, trueTarget: LIRBlock, falseTarget: LIRBlock): Terminator {
        return this.terminate('br', [cond, trueTarget, falseTarget]);
    }

    retVoid(): Terminator {
        return this.terminate('ret', []);
    }

    ret(value: Value): Terminator {
        return this.terminate('ret', [value]);
    }

    // ===== Internals =====

    private binaryOp(opcode: BinaryOpcode, lhs: Value, rhs: Value, name?: string): BinaryInstruction {
        const block = this.requireBlock(opcode);
        if (!typesEqual(lhs.type, rhs.type)) {
            throw new TypeMismatchError(lhs.type, rhs.type, opcode);
        }
        return this.insert(new BinaryInstruction(block.functionId, opcode, lhs, rhs, name));
    }

    private compare(family: CompareFamily, predicate: string, lhs: Value, rhs: Value, name?: string): CompareInstruction {
        const block = this.requireBlock(family);
        return this.insert(new CompareInstruction(block.functionId, family, predicate, lhs, rhs, name));
    }

    private castOp(opcode: CastOpcode, value: Value, type: LIRType, name?: string): CastInstruction {
        const block = this.requireBlock(opcode);
        return this.insert(new CastInstruction(block.functionId, opcode, value, type, name));
    }

    private insert<T extends Instruction>(instruction: T): T {
        this.requireBlock(instruction.opcode).insertInstruction(this._anchor, instruction);
        this._anchor += 1;
        return instruction;
    }

    private terminate(opcode: TerminatorOpcode, operands: readonly Operand[]): Terminator {
        const block = this.requireBlock(opcode);
        return block.setTerminator(new Terminator(block.functionId, opcode, operands));
    }

    private requireBlock(operation: string): LIRBlock {
        if (!this._block) {
            throw new UnpositionedBuilderError(operation);
        }
        return this._block;
    }

    private owned(block: LIRBlock): LIRBlock {
        const func = this.program.functions[block.functionId];
        if (func?.blocks[block.id] !== block) {
            throw new NotFoundError(`Block '${block.label}' does not belong to this program`);
        }
        return block;
    }

    private locate(instruction: Instruction): LIRBlock {
        const block = this.program.getFunction(instruction.functionId).findBlockOf(instruction);
        if (!block) {
            throw new NotFoundError(`Instruction '${instruction.opcode}' is not in any block of function ${instruction.functionId}`);
        }
        return block;
    }
}
