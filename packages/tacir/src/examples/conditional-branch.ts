/**
 * Example: Comparisons feeding conditional and unconditional branches
 */

import { IRBuilder, LIRProgram, floatType, functionType, intType, voidType } from '../ir/index.js';

export function buildConditionalBranchDemo(): LIRProgram {

    const program = new LIRProgram();
    const i1 = intType(1);
    const i32 = intType(32);
    const f64 = floatType(64);

    // Create @max function
    const max = program.createFunction('max', functionType(i32, [i32, i32]), ['a', 'b']);
    const [a, b] = max.args;

    const entry = max.appendBlock('entry');
    const then = max.appendBlock('then');
    const otherwise = max.appendBlock('else');

    const builder = new IRBuilder(program, entry);
    const gt = builder.icmpSigned('>', a, b, 'gt');
    builder.branch(gt, then, otherwise);

    builder.positionAtEnd(then);
    builder.ret(a);

    builder.positionAtEnd(otherwise);
    builder.ret(b);

    // Create @less function
    const less = program.createFunction('less', functionType(i1, [f64, f64]), ['x', 'y']);
    const [x, y] = less.args;

    builder.positionAtEnd(less.appendBlock('entry'));
    builder.ret(builder.fcmpOrdered('<', x, y, 'lt'));

    // Create @noop function
    const noop = program.createFunction('noop', functionType(voidType()));
    const start = noop.appendBlock('start');
    const exit = noop.appendBlock('exit');

    builder.positionAtEnd(start);
    builder.jump(exit);

    builder.positionAtEnd(exit);
    builder.retVoid();

    return program;
}
