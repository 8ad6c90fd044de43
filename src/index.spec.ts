import {
    suite,
    test,
} from '@testdeck/mocha';
import {
    newBuilder,
    Progress,
    TaskNotFoundError,
} from './index';
import assert = require('assert');

class SilentProgress implements Progress {
    status = '';

    write(): void {
        // discard
    }

    render(): void {
        // discard
    }

    unrender(): void {
        // discard
    }
}

/**
 * Tests for the public builder API
 */
@suite('newBuilder()')
export class BuilderTest {
    @test
    async 'runs added tasks'(): Promise<void> {
        const calls: string[] = [];
        const builder = newBuilder({ progress: new SilentProgress() });
        builder.addTask({ fn: () => { calls.push('compile'); }, name: 'compile' });
        builder.addTask({ deps: ['compile'], fn: () => { calls.push('test'); }, name: 'test' });
        builder.addTask({ deps: ['compile', 'test'], description: 'Everything', name: 'all' });
        builder.setDefault('all');

        assert.deepStrictEqual(builder.plan(), ['compile', 'test', 'all']);
        const result = await builder.run();
        assert.deepStrictEqual(calls, ['compile', 'test']);
        assert.deepStrictEqual(result.tasks.map(x => x.name), ['compile', 'test', 'all']);
        assert.deepStrictEqual(builder.listTasks().map(x => [x.name, x.isDefault]),
            [['compile', false], ['test', false], ['all', true]]);
    }

    @test
    'plan() of an unknown task'(): void {
        const builder = newBuilder({ progress: new SilentProgress() });
        builder.addTask({ deps: ['missing'], name: 'broken' });
        assert.throws(() => builder.plan(['broken']), TaskNotFoundError);
    }
}
