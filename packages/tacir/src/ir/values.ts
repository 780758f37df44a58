/**
 * Operand values: compile-time constants and instruction results
 */

import type { Instruction } from './instructions.js';
import type { Argument } from './program.js';
import type { LIRType } from './types.js';
import { typesEqual } from './types.js';

// ===== Constants =====

export type ConstantPayload = number | bigint | readonly Constant[];

export class Constant {
    readonly kind = 'constant';

    constructor(
        readonly type: LIRType,
        readonly value: ConstantPayload,
    ) {}
}

export function constant(type: LIRType, value: ConstantPayload): Constant {
    return new Constant(type, value);
}

/**
 * Constants have no identity; two constants are the same when their types and
 * payloads match.
 */
export function constantsEqual(a: Constant, b: Constant): boolean {
    if (!typesEqual(a.type, b.type)) {
        return false;
    }
    const x = a.value;
    const y = b.value;
    // NaN equals itself, 0 and -0 differ
    if (typeof x === 'number') {
        return typeof y === 'number' && Object.is(x, y);
    }
    if (typeof x === 'bigint') {
        return x === y;
    }
    if (typeof y === 'number' || typeof y === 'bigint') {
        return false;
    }
    return x.length === y.length && x.every((element, i) => constantsEqual(element, y[i]));
}

// ===== Values =====

export type Value = Constant | Instruction | Argument;

export function isConstant(value: Value): value is Constant {
    return value.kind === 'constant';
}
