/**
 * LIR Serializer
 * Converts LIR API objects to .lir text
 */

import { NotFoundError } from './errors.js';
import type { Instruction, Operand, Terminator } from './instructions.js';
import { AllocaInstruction, CastInstruction, CompareInstruction, isBlockOperand } from './instructions.js';
import type { LIRBlock, LIRFunction, LIRProgram } from './program.js';
import { typeToString } from './types.js';
import type { Constant, Value } from './values.js';
import { isConstant } from './values.js';

// ===== Value Names =====

/**
 * Names every value of one function: its user-supplied name when it has one,
 * otherwise a sequence number in emission order. A name already taken gets a
 * `.N` suffix.
 */
class ValueNames {
    private readonly names = new Map<Value, string>();
    private readonly used = new Set<string>();
    private counter = 0;

    constructor(private readonly func: LIRFunction) {
        for (const arg of func.args) {
            this.assign(arg, arg.name);
        }
        for (const block of func.blocks) {
            for (const instruction of block.instructions) {
                if (instruction.producesValue) {
                    this.assign(instruction, instruction.name);
                }
            }
        }
    }

    get(value: Value): string {
        if (isConstant(value)) {
            return serializeConstant(value);
        }
        const name = this.names.get(value);
        if (name === undefined) {
            throw new NotFoundError(`Operand of kind '${value.kind}' is not defined in function '${this.func.name}'`);
        }
        return `%${name}`;
    }

    private assign(value: Value, name: string): void {
        let unique = name || this.nextNumber();
        for (let n = 1; this.used.has(unique); n++) {
            unique = `${name}.${n}`;
        }
        this.used.add(unique);
        this.names.set(value, unique);
    }

    private nextNumber(): string {
        while (this.used.has(String(this.counter))) {
            this.counter++;
        }
        return String(this.counter++);
    }
}

// ===== Constant Serialization =====

function serializeConstant(value: Constant): string {
    const payload = value.value;
    if (typeof payload === 'number' || typeof payload === 'bigint') {
        return payload.toString();
    }
    const elements = payload.map(element => `${typeToString(element.type)} ${serializeConstant(element)}`).join(', ');
    return value.type.kind === 'struct' ? `{ ${elements} }` : `[ ${elements} ]`;
}

// ===== Operand Serialization =====

function serializeOperand(operand: Operand, names: ValueNames): string {
    if (isBlockOperand(operand)) {
        return `label %${operand.label}`;
    }
    return `${typeToString(operand.type)} ${names.get(operand)}`;
}

// ===== Instruction Serialization =====

function serializeInstruction(instruction: Instruction, names: ValueNames): string {
    const [first, second] = instruction.operands;
    const dest = instruction.producesValue ? `${names.get(instruction)} = ` : '';

    if (instruction instanceof CompareInstruction) {
        return `    ${dest}${instruction.family} ${instruction.predicate} ${serializeOperand(first, names)}, ${names.get(second)}`;
    }

    if (instruction instanceof CastInstruction) {
        return `    ${dest}${instruction.opcode} ${serializeOperand(first, names)} to ${typeToString(instruction.type)}`;
    }

    if (instruction instanceof AllocaInstruction) {
        const count = instruction.count ? `, ${serializeOperand(instruction.count, names)}` : '';
        return `    ${dest}alloca ${typeToString(instruction.allocatedType)}${count}`;
    }

    switch (instruction.opcode) {
        case 'load':
            return `    ${dest}load ${typeToString(instruction.type)}, ${serializeOperand(first, names)}`;

        case 'store':
            return `    store ${serializeOperand(first, names)}, ${serializeOperand(second, names)}`;

        default:
            // binary operations share both operand types
            return `    ${dest}${instruction.opcode} ${serializeOperand(first, names)}, ${names.get(second)}`;
    }
}

function serializeTerminator(terminator: Terminator, names: ValueNames): string {
    if (terminator.opcode === 'ret' && terminator.operands.length === 0) {
        return '    ret void';
    }
    const operands = terminator.operands.map(operand => serializeOperand(operand, names)).join(', ');
    return `    ${terminator.opcode} ${operands}`;
}

// ===== Block Serialization =====

function serializeBlock(block: LIRBlock, names: ValueNames): string[] {
    const lines = [`${block.label}:`];
    for (const instruction of block.instructions) {
        lines.push(serializeInstruction(instruction, names));
    }
    if (block.terminator) {
        lines.push(serializeTerminator(block.terminator, names));
    }
    return lines;
}

// ===== Function Serialization =====

export function serializeFunction(func: LIRFunction): string {
    const names = new ValueNames(func);
    const argsStr = func.args.map(arg => `${typeToString(arg.type)} ${names.get(arg)}`).join(', ');

    const lines: string[] = [];
    lines.push(`define ${typeToString(func.returnType)} @${func.name}(${argsStr}) {`);
    for (const block of func.blocks) {
        lines.push(...serializeBlock(block, names));
    }
    lines.push('}');

    return lines.join('\n');
}

// ===== Program Serialization =====

export function serializeProgram(program: LIRProgram): string {
    return program.functions.map(func => serializeFunction(func)).join('\n\n') + '\n';
}

// ===== File Export =====

export function toLIRFile(program: LIRProgram): string {
    return serializeProgram(program);
}
