/**
 * Example: Simple arithmetic using the LIR API
 */

import { IRBuilder, LIRProgram, functionType, intType } from '../ir/index.js';

export function buildArithmeticDemo(): LIRProgram {

    const program = new LIRProgram();
    const i32 = intType(32);

    // define i32 @arith(i32 %a, i32 %b)
    const arith = program.createFunction('arith', functionType(i32, [i32, i32]), ['a', 'b']);
    const [a, b] = arith.args;

    const builder = new IRBuilder(program, arith.appendBlock('entry'));

    const sum = builder.add(a, b, 'sum');
    const diff = builder.sub(a, b, 'diff');
    const prod = builder.mul(sum, diff, 'prod');

    // %quot = sdiv i32 %prod, 2
    const quot = builder.sdiv(prod, builder.constant(i32, 2), 'quot');

    builder.ret(quot);

    return program;
}
