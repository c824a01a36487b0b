#!/usr/bin/env node
/**
 * @module
 * Command line entry point.
 */
import {
    newTaskRunner,
    RunnerOptions,
} from './index';
import util = require('util');

/**
 * Parsed command line.
 */
export interface CliOptions {
    /** Task file. Default: `tasks.json`. */
    file: string;
    list: boolean;
    dryRun: boolean;
    task?: string;
}

export const usage = 'usage: taskchain [-f <file>] [--list] [--dry-run] <task>';

/**
 * Parses `args` (without the node and script paths). Throws on a usage error.
 */
export function parseArgs(args: string[]): CliOptions {
    const options: CliOptions = {
        dryRun: false,
        file: 'tasks.json',
        list: false,
    };
    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '-f' || arg === '--file') {
            if (i + 1 >= args.length)
                throw new Error(`${arg} requires a filename`);
            options.file = args[++i];
        } else if (arg === '--list') {
            options.list = true;
        } else if (arg === '--dry-run') {
            options.dryRun = true;
        } else if (arg.startsWith('-')) {
            throw new Error(`unknown option ${arg}`);
        } else if (options.task !== undefined) {
            throw new Error(`unexpected argument ${arg}`);
        } else {
            options.task = arg;
        }
    }
    if (!options.list && options.task === undefined)
        throw new Error('no task given');
    return options;
}

/**
 * Options for {@link main}.
 */
export interface MainOptions extends RunnerOptions {
    /** Default: `process.stdout`. */
    stdout?: NodeJS.WritableStream;
    /** Default: `process.stderr`. */
    stderr?: NodeJS.WritableStream;
}

/**
 * Runs the command line. Returns the process exit status.
 */
export async function main(args: string[], mainOptions?: MainOptions): Promise<number> {
    const opts: MainOptions = mainOptions || {};
    const stdout = opts.stdout || process.stdout;
    const stderr = opts.stderr || process.stderr;
    let options: CliOptions;
    try {
        options = parseArgs(args);
    } catch (e) {
        stderr.write(`${e instanceof Error ? e.message : String(e)}\n${usage}\n`);
        return 2;
    }

    try {
        const runner = await newTaskRunner(options.file, opts);
        if (options.list) {
            for (const [name, description] of runner.list())
                stdout.write(`${name}\t${description}\n`);
            return 0;
        }
        if (options.task === undefined)
            return 0;
        if (options.dryRun) {
            stdout.write(runner.plan(options.task).join('\n') + '\n');
            return 0;
        }
        const result = await runner.run(options.task);
        if (result.skipped.length)
            stderr.write(`skipped: ${result.skipped.join(', ')}\n`);
        return result.success ? 0 : 1;
    } catch (e) {
        stderr.write(`${e instanceof Error ? e.message : util.inspect(e)}\n`);
        return 1;
    }
}

if (require.main === module) {
    main(process.argv.slice(2)).then(code => {
        process.exitCode = code;
    }, (e: unknown) => {
        process.stderr.write(`${util.inspect(e)}\n`);
        process.exitCode = 1;
    });
}
