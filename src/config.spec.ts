import {
    suite,
    test,
} from '@testdeck/mocha';
import {
    loadBuildOptions,
} from './config';
import {
    ConfigError,
} from './errors';
import assert = require('assert');

@suite('loadBuildOptions()')
export class LoadBuildOptionsTest {
    @test
    'defaults'(): void {
        const options = loadBuildOptions({});
        assert.strictEqual(options.configuration, 'Debug');
        assert.strictEqual(options.manifestPath, 'workspace.json');
        assert.strictEqual(options.buildNumber, undefined);
        assert.strictEqual(options.versionSuffix, undefined);
        assert.strictEqual(options.artifacts, undefined);
    }

    @test
    'reads the environment'(): void {
        const options = loadBuildOptions({ BUILD_CONFIGURATION: 'Release', BUILD_NUMBER: '42' });
        assert.strictEqual(options.configuration, 'Release');
        assert.strictEqual(options.buildNumber, '42');
        assert.strictEqual(options.versionSuffix, 'build00042');
    }

    @test
    'overrides win over the environment'(): void {
        const options = loadBuildOptions(
            { BUILD_CONFIGURATION: 'Release', BUILD_NUMBER: '42' },
            { artifacts: 'out', buildNumber: '123456', configuration: 'Debug', manifestPath: 'build/workspace.json' },
            '/work',
        );
        assert.strictEqual(options.configuration, 'Debug');
        assert.strictEqual(options.buildNumber, '123456');
        assert.strictEqual(options.versionSuffix, 'build123456');
        assert.strictEqual(options.manifestPath, 'build/workspace.json');
        assert.strictEqual(options.artifacts, '/work/out');
    }

    @test
    'VERSION_SUFFIX wins over the build number'(): void {
        const options = loadBuildOptions({ BUILD_NUMBER: '7', VERSION_SUFFIX: 'beta-1' });
        assert.strictEqual(options.versionSuffix, 'beta-1');
    }

    @test
    'ignores blank values'(): void {
        const options = loadBuildOptions({ BUILD_CONFIGURATION: '  ', BUILD_NUMBER: '' });
        assert.strictEqual(options.configuration, 'Debug');
        assert.strictEqual(options.buildNumber, undefined);
    }

    @test
    'rejects a build number that is not a number'(): void {
        assert.throws(() => loadBuildOptions({ BUILD_NUMBER: 'abc' }), (error: unknown) => {
            assert(error instanceof ConfigError);
            assert.deepStrictEqual(error.issues, ['buildNumber: build number must only contain digits']);
            return true;
        });
    }

    @test
    'rejects a configuration that is not a name'(): void {
        assert.throws(() => loadBuildOptions({}, { configuration: 'Release;rm' }), ConfigError);
    }
}
