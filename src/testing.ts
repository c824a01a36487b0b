/**
 * @module
 * Helpers shared by the test suites.
 */
import {
    ActionOutcome,
    ActionRunner,
} from './cmdtask';
import {
    Action,
} from './task';
import {
    TaskRecord,
} from './taskfile';
import fs = require('fs-extra');
import os = require('os');
import path = require('path');
import stream = require('stream');

/**
 * Records invoked programs instead of spawning them. Programs in `failing` fail.
 */
export class RecordingRunner implements ActionRunner {
    readonly calls: string[] = [];
    private readonly failing: Set<string>;

    constructor(failing?: Iterable<string>) {
        this.failing = new Set(failing);
    }

    async run(action: Action): Promise<ActionOutcome> {
        this.calls.push(action.program);
        if (this.failing.has(action.program))
            return { reason: 'Command returned code 1, signal null', status: 'failure' };
        return { status: 'success' };
    }
}

/**
 * Writable stream that keeps everything written to it.
 */
export class StringSink extends stream.Writable {
    private readonly chunks: string[] = [];

    _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
        this.chunks.push(chunk.toString());
        callback();
    }

    text(): string {
        return this.chunks.join('');
    }
}

/**
 * Writes `records` to `tasks.json` in a fresh temporary directory and calls `fn` with its path.
 * The directory is removed afterwards.
 */
export async function withTaskFile<T>(records: TaskRecord[], fn: (filename: string) => Promise<T>): Promise<T> {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'taskchain-'));
    try {
        const filename = path.join(dir, 'tasks.json');
        await fs.writeJson(filename, records);
        return await fn(filename);
    } finally {
        await fs.remove(dir);
    }
}

/**
 * Task table used by the command line and API tests.
 */
export const sampleTasks: TaskRecord[] = [
    { command: ['lint-tool', '--strict'], name: 'lint' },
    { command: ['unit-tool'], name: 'unit' },
    { command: ['broken-tool'], name: 'bad' },
    { dependencies: ['lint', 'unit'], description: 'every check', name: 'all' },
    { dependencies: ['bad', 'unit'], name: 'after_bad' },
    { dependencies: ['loop_b'], name: 'loop_a' },
    { dependencies: ['loop_a'], name: 'loop_b' },
];
