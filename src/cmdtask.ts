/**
 * @module
 * Runs task actions as child processes.
 */
import {
    Action,
    ActionContext,
    TaskDefinition,
} from './task';
import childProcess = require('child_process');
import events = require('events');
import stream = require('stream');

export interface ActionSuccess {
    status: 'success';
}

export interface ActionFailureOutcome {
    status: 'failure';
    /** Human-readable failure detail. */
    reason: string;
}

export type ActionOutcome = ActionSuccess | ActionFailureOutcome;

/**
 * Invokes an action and reports how it completed.
 */
export interface ActionRunner {
    run(action: Action, ctx: ActionContext): Promise<ActionOutcome>;
}

/**
 * The parts of a spawned child process that {@link CommandRunner} listens to.
 */
export interface SpawnedProcess extends events.EventEmitter {
    readonly stdout: stream.Readable | null;
    readonly stderr: stream.Readable | null;
}

export type SpawnFunction = (program: string, args: string[]) => SpawnedProcess;

function spawnPiped(program: string, args: string[]): SpawnedProcess {
    return childProcess.spawn(program, args, {
        stdio: ['ignore', 'pipe', 'pipe'],
    });
}

/**
 * Runs actions with `child_process.spawn`, collecting stdout and stderr into the context output.
 */
export class CommandRunner implements ActionRunner {
    private readonly spawn: SpawnFunction;

    constructor(spawn?: SpawnFunction) {
        this.spawn = spawn || spawnPiped;
    }

    run(action: Action, ctx: ActionContext): Promise<ActionOutcome> {
        return new Promise<ActionOutcome>(resolve => {
            let settled = false;
            const settle = (outcome: ActionOutcome) => {
                if (settled)
                    return;
                settled = true;
                resolve(outcome);
            };

            let cp: SpawnedProcess;
            try {
                cp = this.spawn(action.program, [...action.args]);
            } catch (e) {
                return settle(launchFailure(action, e));
            }
            cp.on('error', (e: unknown) => {
                settle(launchFailure(action, e));
            });
            cp.on('close', (code: number | null, signal: string | null) => {
                if (code === 0)
                    return settle({ status: 'success' });
                settle({
                    reason: `Command returned code ${code}, signal ${signal}`,
                    status: 'failure',
                });
            });
            const chunkCallback = (chunk: string | Buffer) => {
                ctx.output.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
            };
            if (cp.stdout)
                cp.stdout.on('data', chunkCallback);
            if (cp.stderr)
                cp.stderr.on('data', chunkCallback);
        });
    }
}

function launchFailure(action: Action, e: unknown): ActionFailureOutcome {
    const message = e instanceof Error ? e.message : String(e);
    return {
        reason: `Failed to launch ${action.program}: ${message}`,
        status: 'failure',
    };
}

/**
 * Returns the shell-quoted command line of `action`.
 */
export function formatAction(action: Action): string {
    return [action.program, ...action.args].map(quote).join(' ');
}

/**
 * Returns the text shown for `task` in progress output and listings.
 */
export function describeTask(task: TaskDefinition): string {
    if (task.description)
        return task.description;
    return task.action ? formatAction(task.action) : task.name;
}

/**
 * Return a shell-escaped version of `x`
 */
export function quote(x: string): string {
    if (!x.length)
        return '\'\'';
    else if (!/[^\w@%+=:,./-]/.test(x))
        return x;

    const y = x.replace(/'/g, `'"'"'`);
    return `'${y}'`;
}
