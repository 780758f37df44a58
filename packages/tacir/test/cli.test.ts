import chalk from "chalk";
import { afterEach, describe, expect, test, vi } from "vitest";
import { buildArithmeticDemo } from "../src/examples/simple-arithmetic.js";
import { toLIRFile } from "../src/ir/index.js";
import main from "../src/main.js";

afterEach(() => {
    vi.restoreAllMocks();
});

describe('CLI', () => {

    test('list prints every demo name', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => {});
        main(['node', 'tacir', 'list']);

        expect(log.mock.calls).toEqual([
            ['arithmetic'],
            ['stack-memory'],
            ['conditional-branch'],
        ]);
    });

    test('print writes a header and the program text', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => {});
        main(['node', 'tacir', 'print', 'arithmetic', '--no-color']);

        expect(log.mock.calls).toEqual([
            ['; arithmetic'],
            [toLIRFile(buildArithmeticDemo())],
        ]);
    });

    test('--no-color leaves the shared chalk level alone', () => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        const level = chalk.level;
        main(['node', 'tacir', 'print', 'arithmetic', '--no-color']);
        expect(chalk.level).toBe(level);
    });

    test.each(['constructor', '__proto__', 'toString'])('inherited key %s is not a demo', (name) => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});
        const exit = vi.spyOn(process, 'exit').mockImplementation(() => {
            throw new Error('process.exit');
        });

        expect(() => main(['node', 'tacir', 'print', name, '--no-color'])).toThrow('process.exit');
        expect(exit).toHaveBeenCalledWith(1);
        expect(error).toHaveBeenCalledWith(`Unknown demo '${name}'. Available: arithmetic, stack-memory, conditional-branch`);
    });

    test('an unknown demo is reported and exits with status 1', () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});
        const exit = vi.spyOn(process, 'exit').mockImplementation(() => {
            throw new Error('process.exit');
        });

        expect(() => main(['node', 'tacir', 'print', 'nope', '--no-color'])).toThrow('process.exit');
        expect(exit).toHaveBeenCalledWith(1);
        expect(error).toHaveBeenCalledWith("Unknown demo 'nope'. Available: arithmetic, stack-memory, conditional-branch");
    });
});
