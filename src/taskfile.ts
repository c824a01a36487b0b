/**
 * @module
 * JSON task tables.
 */
import {
    createRegistry,
    Registry,
} from './registry';
import {
    TaskDefinition,
} from './task';
import fs = require('fs-extra');

/**
 * A task record as written in a task file.
 */
export interface TaskRecord {
    name: string;
    /** Program followed by its arguments. */
    command?: string[];
    dependencies?: string[];
    description?: string;
}

/**
 * Converts a task record into a task definition.
 */
export function taskRecordToDefinition(record: TaskRecord): TaskDefinition {
    const command = record.command;
    return {
        action: command ? { args: command.slice(1), program: command[0] } : undefined,
        dependencies: record.dependencies || [],
        description: record.description,
        name: record.name,
    };
}

/**
 * Parses the contents of a task file. Records are registered in file order.
 *
 * @param source name used in error messages
 */
export function parseTaskFile(contents: string, source: string): Registry {
    const data: unknown = JSON.parse(contents);
    if (!Array.isArray(data))
        throw new Error(`${source}: expected an array of tasks`);
    const records = data.map((x: unknown, i) => validateRecord(x, `${source}: task #${i}`));
    return createRegistry(records.map(taskRecordToDefinition));
}

/**
 * Read task file.
 */
export async function readTaskFile(filename: string): Promise<Registry> {
    const contents = await fs.readFile(filename, 'utf-8');
    return parseTaskFile(contents, filename);
}

const recordKeys = new Set(['name', 'command', 'dependencies', 'description']);

function validateRecord(x: unknown, where: string): TaskRecord {
    if (!isObject(x))
        throw new Error(`${where}: expected an object`);
    const { name, command, dependencies, description } = x;
    if (typeof name !== 'string' || !name.length)
        throw new Error(`${where}: name must be a non-empty string`);
    for (const key of Object.keys(x)) {
        if (!recordKeys.has(key))
            throw new Error(`${where} (${name}): unknown key ${key}`);
    }
    if (command !== undefined && (!isStringArray(command) || !command.length))
        throw new Error(`${where} (${name}): command must be a non-empty array of strings`);
    if (dependencies !== undefined && !isStringArray(dependencies))
        throw new Error(`${where} (${name}): dependencies must be an array of strings`);
    if (description !== undefined && typeof description !== 'string')
        throw new Error(`${where} (${name}): description must be a string`);
    return { command, dependencies, description, name };
}

function isObject(x: unknown): x is Record<string, unknown> {
    return typeof x === 'object' && x !== null && !Array.isArray(x);
}

function isStringArray(x: unknown): x is string[] {
    return Array.isArray(x) && x.every(y => typeof y === 'string');
}
