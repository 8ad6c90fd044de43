import {
    suite,
    test,
} from '@testdeck/mocha';
import {
    NoDefaultTaskError,
    TaskFailedError,
} from './errors';
import {
    Progress,
} from './progress';
import {
    TaskRegistry,
} from './registry';
import {
    plan,
    run,
} from './runner';
import {
    Task,
} from './task';
import assert = require('assert');

class RecordingProgress implements Progress {
    status = '';
    readonly statuses: string[] = [];
    readonly written: string[] = [];

    write(chunk: Buffer | string): void {
        this.written.push(chunk.toString());
    }

    render(): void {
        this.statuses.push(this.status);
    }

    unrender(): void {
        // nothing to clear
    }
}

/**
 * Registry of a diamond a -> (b, c) -> d whose tasks record their runs in `calls`.
 */
function diamond(calls: string[]): TaskRegistry {
    const task = (name: string, deps: string[]): Task => ({
        deps,
        fn: () => {
            calls.push(name);
        },
        name,
    });
    return new TaskRegistry([
        task('a', ['b', 'c']),
        task('b', ['d']),
        task('c', ['d']),
        task('d', []),
    ]);
}

/**
 * Tests for running tasks
 */
@suite('run()')
export class RunTest {
    @test
    async 'runs dependencies first and each task once'(): Promise<void> {
        const calls: string[] = [];
        const result = await run(diamond(calls), ['a'], new RecordingProgress());
        assert.deepStrictEqual(calls, ['d', 'b', 'c', 'a']);
        assert.deepStrictEqual(result.planned, ['d', 'b', 'c', 'a']);
        assert.deepStrictEqual(result.tasks.map(x => x.name), ['d', 'b', 'c', 'a']);
        assert(result.tasks.every(x => x.durationMs >= 0));
    }

    @test
    async 'runs a prerequisite shared by several requested tasks once'(): Promise<void> {
        const calls: string[] = [];
        await run(diamond(calls), ['b', 'c', 'b'], new RecordingProgress());
        assert.deepStrictEqual(calls, ['d', 'b', 'c']);
    }

    @test
    async 'runs the default task when none is named'(): Promise<void> {
        const calls: string[] = [];
        const registry = diamond(calls);
        registry.setDefault('c');
        await run(registry, [], new RecordingProgress());
        assert.deepStrictEqual(calls, ['d', 'c']);
    }

    @test
    async 'fails without tasks and without a default'(): Promise<void> {
        await assert.rejects(run(diamond([]), [], new RecordingProgress()), NoDefaultTaskError);
    }

    @test
    async 'awaits asynchronous tasks before the next one'(): Promise<void> {
        const calls: string[] = [];
        const registry = new TaskRegistry([
            {
                fn: async () => {
                    await new Promise(resolve => setTimeout(resolve, 5));
                    calls.push('slow');
                },
                name: 'slow',
            },
            { deps: ['slow'], fn: () => { calls.push('fast'); }, name: 'fast' },
        ]);
        await run(registry, ['fast'], new RecordingProgress());
        assert.deepStrictEqual(calls, ['slow', 'fast']);
    }

    @test
    async 'stops at the first failing task'(): Promise<void> {
        const calls: string[] = [];
        const progress = new RecordingProgress();
        const registry = new TaskRegistry([
            { fn: () => { calls.push('setup'); }, name: 'setup' },
            {
                deps: ['setup'],
                fn: ctx => {
                    ctx.log('partial');
                    throw new Error('boom');
                },
                name: 'broken',
            },
            { deps: ['broken'], fn: () => { calls.push('after'); }, name: 'after' },
        ]);
        await assert.rejects(run(registry, ['after'], progress), (error: unknown) => {
            assert(error instanceof TaskFailedError);
            assert.strictEqual(error.taskName, 'broken');
            assert.strictEqual(error.message, 'task broken failed: boom');
            assert(error.cause instanceof Error);
            assert.strictEqual(error.cause.message, 'boom');
            return true;
        });
        assert.deepStrictEqual(calls, ['setup']);
        assert.deepStrictEqual(progress.written, ['partial\n', 'boom\n']);
    }

    @test
    async 'writes task output after the task'(): Promise<void> {
        const progress = new RecordingProgress();
        const registry = new TaskRegistry([
            {
                fn: ctx => {
                    ctx.log(`hello from ${ctx.name}`);
                    ctx.output.push(Buffer.from('raw'));
                },
                name: 'greet',
            },
        ]);
        await run(registry, ['greet'], progress);
        assert.deepStrictEqual(progress.written, ['hello from greet\n', 'raw']);
    }

    @test
    async 'reports progress with descriptions'(): Promise<void> {
        const progress = new RecordingProgress();
        const registry = new TaskRegistry([
            { description: 'Prepare things', name: 'prepare' },
            { deps: ['prepare'], name: 'go' },
        ]);
        await run(registry, ['go'], progress);
        assert.deepStrictEqual(progress.statuses, ['[1/2] Prepare things', '[2/2] go']);
    }

    @test
    async 'dry run prints the plan and runs nothing'(): Promise<void> {
        const calls: string[] = [];
        const progress = new RecordingProgress();
        const result = await run(diamond(calls), ['a'], progress, { dryRun: true });
        assert.deepStrictEqual(calls, []);
        assert.deepStrictEqual(result, { planned: ['d', 'b', 'c', 'a'], tasks: [] });
        assert.deepStrictEqual(progress.written, ['d\n', 'b\n', 'c\n', 'a\n']);
    }
}

@suite('plan()')
export class PlanTest {
    @test
    'plans aggregate tasks after their deps'(): void {
        const registry = new TaskRegistry([
            { name: 'build' },
            { name: 'test' },
            { deps: ['build', 'test'], name: 'all' },
        ]);
        assert.deepStrictEqual(plan(registry, ['all']).map(x => x.name), ['build', 'test', 'all']);
    }
}
