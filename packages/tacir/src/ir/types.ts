/**
 * Type descriptors for the LIR
 * Plain immutable values compared structurally
 */

import { InvalidArgumentError } from './errors.js';

// ===== Type Kinds =====

export type TypeKind = 'int' | 'float' | 'pointer' | 'void' | 'array' | 'struct' | 'function';

export type FloatBits = 16 | 32 | 64;

export interface TypeDescriptor {
    readonly kind: TypeKind;
}

export interface IntType extends TypeDescriptor {
    readonly kind: 'int';
    readonly bits: number;
}

export interface FloatType extends TypeDescriptor {
    readonly kind: 'float';
    readonly bits: FloatBits;
}

export interface PointerType extends TypeDescriptor {
    readonly kind: 'pointer';
    readonly pointee: LIRType;
}

export interface VoidType extends TypeDescriptor {
    readonly kind: 'void';
}

export interface ArrayType extends TypeDescriptor {
    readonly kind: 'array';
    readonly element: LIRType;
    readonly count: number;
}

export interface StructType extends TypeDescriptor {
    readonly kind: 'struct';
    readonly fields: readonly LIRType[];
}

export interface FunctionType extends TypeDescriptor {
    readonly kind: 'function';
    readonly returnType: LIRType;
    readonly params: readonly LIRType[];
}

export type LIRType =
    | IntType
    | FloatType
    | PointerType
    | VoidType
    | ArrayType
    | StructType
    | FunctionType;

// ===== Helper Functions =====

export function intType(bits: number): IntType {
    if (!Number.isInteger(bits) || bits <= 0) {
        throw new InvalidArgumentError(`Integer width must be a positive integer, got ${bits}`);
    }
    return { kind: 'int', bits };
}

export function floatType(bits: FloatBits): FloatType {
    return { kind: 'float', bits };
}

export function pointerType(pointee: LIRType): PointerType {
    return { kind: 'pointer', pointee };
}

export function voidType(): VoidType {
    return { kind: 'void' };
}

export function arrayType(element: LIRType, count: number): ArrayType {
    return { kind: 'array', element, count };
}

export function structType(fields: readonly LIRType[]): StructType {
    return { kind: 'struct', fields };
}

export function functionType(returnType: LIRType, params: readonly LIRType[] = []): FunctionType {
    return { kind: 'function', returnType, params };
}

/** 1-bit integer produced by comparisons */
export function boolType(): IntType {
    return intType(1);
}

// ===== Queries =====

export function isIntType(type: LIRType): type is IntType {
    return type.kind === 'int';
}

export function isPointerType(type: LIRType): type is PointerType {
    return type.kind === 'pointer';
}

export function isVoidType(type: LIRType): type is VoidType {
    return type.kind === 'void';
}

/**
 * Structural equality: two descriptors are equal when they have the same kind
 * and all of their components are equal.
 */
export function typesEqual(a: LIRType, b: LIRType): boolean {
    if (a === b) {
        return true;
    }

    switch (a.kind) {
        case 'int':
            return b.kind === 'int' && a.bits === b.bits;
        case 'float':
            return b.kind === 'float' && a.bits === b.bits;
        case 'void':
            return b.kind === 'void';
        case 'pointer':
            return b.kind === 'pointer' && typesEqual(a.pointee, b.pointee);
        case 'array':
            return b.kind === 'array' && a.count === b.count && typesEqual(a.element, b.element);
        case 'struct':
            return b.kind === 'struct' && typeListsEqual(a.fields, b.fields);
        case 'function':
            return b.kind === 'function'
                && typesEqual(a.returnType, b.returnType)
                && typeListsEqual(a.params, b.params);
    }
}

function typeListsEqual(a: readonly LIRType[], b: readonly LIRType[]): boolean {
    return a.length === b.length && a.every((type, i) => typesEqual(type, b[i]));
}

export function pointeeType(type: LIRType): LIRType {
    if (!isPointerType(type)) {
        throw new InvalidArgumentError(`Expected a pointer type, got ${typeToString(type)}`);
    }
    return type.pointee;
}

// ===== Display =====

export function typeToString(type: LIRType): string {
    switch (type.kind) {
        case 'int':
            return `i${type.bits}`;
        case 'float':
            return type.bits === 16 ? 'half' : type.bits === 32 ? 'float' : 'double';
        case 'void':
            return 'void';
        case 'pointer':
            return `${typeToString(type.pointee)}*`;
        case 'array':
            return `[${type.count} x ${typeToString(type.element)}]`;
        case 'struct':
            return `{${type.fields.map(typeToString).join(', ')}}`;
        case 'function':
            return `${typeToString(type.returnType)} (${type.params.map(typeToString).join(', ')})`;
    }
}
