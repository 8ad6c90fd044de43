#!/usr/bin/env node
/**
 * @module
 * Command line interface.
 */
import {
    defaultManifestPath,
    loadBuildOptions,
} from './config';
import {
    describeError,
} from './errors';
import {
    createWorkspaceBuilder,
} from './index';
import {
    createProgress,
} from './progress';
import {
    TaskInfo,
} from './task';
import {
    Command,
} from 'commander';
import createDebug = require('debug');

const debug = createDebug('wsbuild:cli');

interface CliOptions {
    list?: boolean;
    dryRun?: boolean;
    manifest: string;
    configuration?: string;
    buildNumber?: string;
    artifacts?: string;
}

/**
 * Formats task metadata as aligned lines, the default task marked with `*`.
 */
export function formatTaskList(tasks: TaskInfo[]): string {
    const width = Math.max(0, ...tasks.map(x => x.name.length));
    return tasks.map(task => {
        const deps = task.deps.length ? ` [${task.deps.join(', ')}]` : '';
        return `${task.isDefault ? '*' : ' '} ${task.name.padEnd(width)}  ${task.description}${deps}\n`;
    }).join('');
}

export function createProgram(out: NodeJS.WritableStream = process.stdout): Command {
    const program = new Command();
    program
        .name('wsbuild')
        .description('Build, test, pack and publish the projects of a workspace')
        .argument('[tasks...]', 'tasks to run, default: the default task')
        .option('-l, --list', 'list tasks')
        .option('-n, --dry-run', 'print the tasks that would run')
        .option('-m, --manifest <path>', 'workspace manifest', defaultManifestPath)
        .option('-c, --configuration <name>', 'build configuration, default: $BUILD_CONFIGURATION or Debug')
        .option('--build-number <n>', 'build number, default: $BUILD_NUMBER')
        .option('--artifacts <dir>', 'artifacts directory, relative to the current directory, default: from the workspace manifest')
        .action(async (tasks: string[], opts: CliOptions) => {
            const options = loadBuildOptions(process.env, {
                artifacts: opts.artifacts,
                buildNumber: opts.buildNumber,
                configuration: opts.configuration,
                manifestPath: opts.manifest,
            });
            debug('build options %o', options);
            const builder = createWorkspaceBuilder({ options, progress: createProgress(out) });

            if (opts.list) {
                out.write(formatTaskList(builder.listTasks()));
                return;
            }

            const result = await builder.run(tasks, { dryRun: opts.dryRun });
            if (!opts.dryRun) {
                const total = result.tasks.reduce((sum, x) => sum + x.durationMs, 0);
                out.write(`${result.tasks.length} tasks done in ${(total / 1000).toFixed(1)}s\n`);
            }
        });
    return program;
}

async function main(argv: string[]): Promise<void> {
    await createProgram().parseAsync(argv);
}

if (require.main === module) {
    main(process.argv).catch(error => {
        debug('%O', error);
        process.stderr.write(`wsbuild: ${describeError(error)}\n`);
        process.exitCode = 1;
    });
}
