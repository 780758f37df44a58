import { describe, expect, test } from "vitest";
import {
    InvalidArgumentError,
    arrayType,
    constant,
    constantsEqual,
    floatType,
    functionType,
    intType,
    pointeeType,
    pointerType,
    structType,
    typeToString,
    typesEqual,
    voidType,
} from "../src/ir/index.js";

describe('Type descriptors', () => {

    test('equality is structural', () => {
        expect(typesEqual(intType(32), intType(32))).toBe(true);
        expect(typesEqual(pointerType(intType(8)), pointerType(intType(8)))).toBe(true);
        expect(typesEqual(
            structType([intType(32), pointerType(floatType(64))]),
            structType([intType(32), pointerType(floatType(64))]),
        )).toBe(true);
        expect(typesEqual(
            functionType(voidType(), [intType(1)]),
            functionType(voidType(), [intType(1)]),
        )).toBe(true);
    });

    test('differing components make types unequal', () => {
        expect(typesEqual(intType(32), intType(64))).toBe(false);
        expect(typesEqual(intType(32), floatType(32))).toBe(false);
        expect(typesEqual(pointerType(intType(8)), pointerType(intType(16)))).toBe(false);
        expect(typesEqual(arrayType(intType(8), 4), arrayType(intType(8), 5))).toBe(false);
        expect(typesEqual(structType([intType(8)]), structType([intType(8), intType(8)]))).toBe(false);
    });

    test('pointeeType unwraps one level of pointer', () => {
        expect(pointeeType(pointerType(pointerType(intType(8))))).toEqual(pointerType(intType(8)));
        expect(() => pointeeType(intType(32))).toThrow(InvalidArgumentError);
    });

    test('integer widths must be positive integers', () => {
        expect(() => intType(0)).toThrow(InvalidArgumentError);
        expect(() => intType(1.5)).toThrow(InvalidArgumentError);
    });

    test('types render in textual form', () => {
        expect(typeToString(intType(1))).toBe('i1');
        expect(typeToString(floatType(16))).toBe('half');
        expect(typeToString(floatType(32))).toBe('float');
        expect(typeToString(pointerType(floatType(64)))).toBe('double*');
        expect(typeToString(arrayType(intType(8), 16))).toBe('[16 x i8]');
        expect(typeToString(structType([intType(32), intType(64)]))).toBe('{i32, i64}');
        expect(typeToString(functionType(voidType(), [intType(32)]))).toBe('void (i32)');
    });
});

describe('Constants', () => {

    test('constants compare by type and payload', () => {
        expect(constantsEqual(constant(intType(32), 5), constant(intType(32), 5))).toBe(true);
        expect(constantsEqual(constant(intType(32), 5), constant(intType(64), 5))).toBe(false);
        expect(constantsEqual(constant(intType(64), 5n), constant(intType(64), 5))).toBe(false);
    });

    test('float payloads compare by identity of the number', () => {
        const nan = constant(floatType(64), NaN);
        expect(constantsEqual(nan, nan)).toBe(true);
        expect(constantsEqual(nan, constant(floatType(64), NaN))).toBe(true);
        expect(constantsEqual(constant(floatType(64), 0), constant(floatType(64), -0))).toBe(false);
    });

    test('composite constants compare element-wise', () => {
        const pair = structType([intType(8), intType(8)]);
        const make = (x: number, y: number) => constant(pair, [constant(intType(8), x), constant(intType(8), y)]);

        expect(constantsEqual(make(1, 2), make(1, 2))).toBe(true);
        expect(constantsEqual(make(1, 2), make(2, 1))).toBe(false);
        expect(constantsEqual(make(1, 2), constant(pair, 1))).toBe(false);
    });
});
