import chalk, { Chalk } from 'chalk';
import type { ChalkInstance } from 'chalk';
import { Command } from 'commander';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as url from 'node:url';
import { DEMOS } from './examples/index.js';
import { LIRError, toLIRFile } from './ir/index.js';
const __dirname = url.fileURLToPath(new URL('.', import.meta.url));

const packagePath = path.resolve(__dirname, '..', 'package.json');

function readPackageVersion(): string {
    const pkg: unknown = JSON.parse(fs.readFileSync(packagePath, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version;
    }
    return '0.0.0';
}

function fail(msg: string, paint: ChalkInstance): never {
    console.error(paint.red(msg));
    process.exit(1);
}

export type PrintOptions = {
    color: boolean;
}

export const listAction = (): void => {
    for (const name of Object.keys(DEMOS)) {
        console.log(name);
    }
};

export const printAction = (demo: string, opts: PrintOptions): void => {
    const paint = opts.color ? chalk : new Chalk({ level: 0 });

    if (!Object.hasOwn(DEMOS, demo)) {
        fail(`Unknown demo '${demo}'. Available: ${Object.keys(DEMOS).join(', ')}`, paint);
    }
    const build = DEMOS[demo];

    let text: string;
    try {
        text = toLIRFile(build());
    } catch (e) {
        if (e instanceof LIRError) {
            fail(e.format(), paint);
        }
        throw e;
    }

    console.log(paint.green(`; ${demo}`));
    console.log(text);
};

export default function(argv: readonly string[] = process.argv): void {
    const program = new Command();

    program.name('tacir').version(readPackageVersion());

    program
        .command('list')
        .description('Lists the bundled demo programs')
        .action(listAction);

    program
        .command('print')
        .argument('<demo>', 'name of the demo program')
        .option('--no-color', 'disable coloured output')
        .description('Builds a demo program and prints its LIR text')
        .action(printAction);

    program.parse(argv);
}
