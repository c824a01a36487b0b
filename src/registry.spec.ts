import {
    suite,
    test,
} from 'mocha-typescript';
import {
    DuplicateTaskError,
    UnknownTaskError,
} from './errors';
import {
    createRegistry,
    Registry,
} from './registry';
import assert = require('assert');

/**
 * Tests for task registration and lookup
 */
@suite('Registry')
export class RegistryTest {
    @test
    'constructor()'(): void {
        const registry = new Registry();
        assert.strictEqual(registry.size, 0);
        assert.strictEqual(registry.isFrozen(), false);
    }

    @test
    'register() and lookup()'(): void {
        const registry = new Registry();
        registry.register({ action: { args: ['fmt'], program: 'cargo' }, dependencies: [], name: 'fmt' });
        const task = registry.lookup('fmt');
        assert.strictEqual(task.name, 'fmt');
        assert.deepStrictEqual(task.action, { args: ['fmt'], program: 'cargo' });
        assert.deepStrictEqual(task.dependencies, []);
    }

    @test
    'register() rejects a duplicate name and keeps the first task'(): void {
        const registry = new Registry();
        registry.register({ action: { args: ['first'], program: 'echo' }, dependencies: [], name: 'x' });
        assert.throws(() => registry.register({ action: { args: ['second'], program: 'echo' }, dependencies: [], name: 'x' }),
                      (e: unknown) => e instanceof DuplicateTaskError && e.taskName === 'x');
        assert.deepStrictEqual(registry.lookup('x').action, { args: ['first'], program: 'echo' });
        assert.strictEqual(registry.size, 1);
    }

    @test
    'register() copies the definition'(): void {
        const registry = new Registry();
        const dependencies = ['a'];
        const args = ['test'];
        registry.register({ action: { args, program: 'cargo' }, dependencies, name: 'x' });
        dependencies.push('b');
        args.push('--release');
        assert.deepStrictEqual(registry.lookup('x').dependencies, ['a']);
        assert.deepStrictEqual(registry.lookup('x').action, { args: ['test'], program: 'cargo' });
    }

    @test
    'register() after freeze()'(): void {
        const registry = new Registry();
        registry.freeze();
        assert.throws(() => registry.register({ dependencies: [], name: 'x' }),
                      /cannot register task x: registry is frozen/);
        assert.strictEqual(registry.has('x'), false);
    }

    @test
    'lookup() of an unknown name'(): void {
        const registry = new Registry();
        assert.throws(() => registry.lookup('nope'),
                      (e: unknown) => e instanceof UnknownTaskError && e.taskName === 'nope' && e.referencedBy === undefined);
    }

    @test
    'createRegistry() registers in order and freezes'(): void {
        const registry = createRegistry([
            { dependencies: [], name: 'b' },
            { dependencies: ['b'], name: 'a' },
            { dependencies: [], name: 'c' },
        ]);
        assert.deepStrictEqual(registry.names(), ['b', 'a', 'c']);
        assert.strictEqual(registry.isFrozen(), true);
    }

    @test
    'createRegistry() with a duplicate name'(): void {
        assert.throws(() => createRegistry([
            { dependencies: [], name: 'x' },
            { dependencies: [], name: 'x' },
        ]), DuplicateTaskError);
    }
}
