/**
 * LIR API - typed three-address-code construction
 */

export * from './types.js';

export * from './errors.js';

export * from './values.js';

export * from './instructions.js';

export { Argument, LIRBlock, LIRFunction, LIRProgram } from './program.js';
export type { BlockId, BlockState, FunctionId } from './program.js';

export { IRBuilder, isCompareSymbol, resolveAllocaCount, toAllocaCount } from './builder.js';
export type { AllocaCount, CompareSymbol } from './builder.js';

export { serializeFunction, serializeProgram, toLIRFile } from './serializer.js';
