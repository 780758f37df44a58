/**
 * Errors raised by the LIR builder.
 * All of them are precondition failures reported at the offending call.
 */

import type { LIRType } from './types.js';
import { typeToString } from './types.js';

export abstract class LIRError extends Error {
    abstract readonly errorType: string;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }

    format(): string {
        return `${this.errorType}: ${this.message}`;
    }
}

/**
 * Operands of a binary arithmetic operation have structurally different types.
 */
export class TypeMismatchError extends LIRError {
    readonly errorType = 'Type Mismatch';

    constructor(
        readonly lhs: LIRType,
        readonly rhs: LIRType,
        operation: string,
    ) {
        super(`Operands of '${operation}' must be the same type, got ${typeToString(lhs)} and ${typeToString(rhs)}`);
    }
}

/**
 * A block already carries its terminator and accepts nothing else.
 */
export class AlreadyTerminatedError extends LIRError {
    readonly errorType = 'Already Terminated';

    constructor(readonly blockLabel: string) {
        super(`Block '${blockLabel}' is already terminated`);
    }
}

export class InvalidArgumentError extends LIRError {
    readonly errorType = 'Invalid Argument';
}

export class NotFoundError extends LIRError {
    readonly errorType = 'Not Found';
}

/**
 * A constructor ran before the builder was positioned on a block.
 */
export class UnpositionedBuilderError extends LIRError {
    readonly errorType = 'Unpositioned Builder';

    constructor(operation: string) {
        super(`Cannot emit '${operation}': the builder is not positioned on a block`);
    }
}
