import type { LIRProgram } from '../ir/index.js';
import { buildConditionalBranchDemo } from './conditional-branch.js';
import { buildArithmeticDemo } from './simple-arithmetic.js';
import { buildStackMemoryDemo } from './stack-memory.js';

export const DEMOS: Readonly<Record<string, () => LIRProgram>> = {
    'arithmetic': buildArithmeticDemo,
    'stack-memory': buildStackMemoryDemo,
    'conditional-branch': buildConditionalBranchDemo,
};
