import {
    suite,
    test,
} from 'mocha-typescript';
import {
    DuplicateTaskError,
} from './errors';
import {
    createRegistry,
    createSilentProgress,
    createTaskRunner,
    newTaskRunner,
    UnknownTaskError,
} from './index';
import {
    RecordingRunner,
    sampleTasks,
    withTaskFile,
} from './testing';
import assert = require('assert');

/**
 * Tests for the public task runner API
 */
@suite('TaskRunner')
export class TaskRunnerTest {
    @test
    async 'list()'(): Promise<void> {
        const list = await withTaskFile(sampleTasks, async filename =>
            (await newTaskRunner(filename, { progress: createSilentProgress() })).list());
        assert.deepStrictEqual(list, [
            ['lint', 'lint-tool --strict'],
            ['unit', 'unit-tool'],
            ['bad', 'broken-tool'],
            ['all', 'every check'],
            ['after_bad', 'after_bad'],
            ['loop_a', 'loop_a'],
            ['loop_b', 'loop_b'],
        ]);
    }

    @test
    async 'plan()'(): Promise<void> {
        const runner = new RecordingRunner();
        const taskRunner = await withTaskFile(sampleTasks, filename =>
            newTaskRunner(filename, { actionRunner: runner, progress: createSilentProgress() }));
        assert.deepStrictEqual(taskRunner.plan('all'), ['lint', 'unit', 'all']);
        assert.deepStrictEqual(taskRunner.plan('after_bad'), ['bad', 'unit', 'after_bad']);
        assert.throws(() => taskRunner.plan('nope'), UnknownTaskError);
        assert.deepStrictEqual(runner.calls, []);
    }

    @test
    async 'run()'(): Promise<void> {
        const runner = new RecordingRunner(['broken-tool']);
        const taskRunner = await withTaskFile(sampleTasks, filename =>
            newTaskRunner(filename, { actionRunner: runner, progress: createSilentProgress() }));

        const ok = await taskRunner.run('all');
        assert.strictEqual(ok.success, true);
        assert.deepStrictEqual(ok.attempted, ['lint', 'unit', 'all']);

        const failed = await taskRunner.run('after_bad');
        assert.strictEqual(failed.success, false);
        assert.deepStrictEqual(failed.attempted, ['bad']);
        assert.deepStrictEqual(failed.skipped, ['unit', 'after_bad']);
        assert.deepStrictEqual(runner.calls, ['lint-tool', 'unit-tool', 'broken-tool']);
    }

    @test
    async 'newTaskRunner() with a duplicate task'(): Promise<void> {
        await withTaskFile([{ command: ['a'], name: 'x' }, { command: ['b'], name: 'x' }], async filename => {
            await assert.rejects(newTaskRunner(filename, { progress: createSilentProgress() }), DuplicateTaskError);
        });
    }

    @test
    async 'createTaskRunner()'(): Promise<void> {
        const runner = new RecordingRunner();
        const taskRunner = createTaskRunner(createRegistry([
            { action: { args: [], program: 'fmt' }, dependencies: [], name: 'fmt' },
            { dependencies: ['fmt'], name: 'all' },
        ]), { actionRunner: runner, progress: createSilentProgress() });
        assert.deepStrictEqual(taskRunner.list(), [['fmt', 'fmt'], ['all', 'all']]);
        const result = await taskRunner.run('all');
        assert.strictEqual(result.success, true);
        assert.deepStrictEqual(runner.calls, ['fmt']);
    }
}
