/**
 * Example: Stack slots, loads, stores and a widening cast
 */

import { IRBuilder, LIRProgram, functionType, intType } from '../ir/index.js';

export function buildStackMemoryDemo(): LIRProgram {

    const program = new LIRProgram();
    const i32 = intType(32);
    const i64 = intType(64);

    const widen = program.createFunction('widen', functionType(i64, [i32]), ['x']);
    const [x] = widen.args;

    const builder = new IRBuilder(program, widen.appendBlock('entry'));

    // single slot, spilled and reloaded
    const slot = builder.alloca(i32, undefined, 'slot');
    builder.store(x, slot);
    const loaded = builder.load(slot);

    // %buf = alloca i64, i32 4
    const buf = builder.alloca(i64, 4, 'buf');
    const wide = builder.sext(loaded, i64);
    builder.store(wide, buf);

    builder.ret(builder.load(buf, 'result'));

    return program;
}
