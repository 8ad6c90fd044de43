/**
 * @module
 * The standard workspace tasks: clean, restore, build, test, coverage, pack
 * and publish.
 */
import {
    BuildOptions,
} from './config';
import {
    DependencyConflictError,
    PublishConfigurationError,
} from './errors';
import {
    CommandRunner,
} from './exec';
import {
    Project,
} from './manifest';
import {
    TaskRegistry,
} from './registry';
import {
    Task,
    TaskContext,
} from './task';
import {
    Toolchain,
} from './toolchain';
import {
    loadWorkspace,
    Workspace,
} from './workspace';
import fs = require('fs-extra');
import path = require('path');

/**
 * What the workspace tasks run against.
 */
export interface BuildEnvironment {
    options: BuildOptions;
    runner: CommandRunner;
    /** Environment for tool lookup, API keys and spawned commands. Default: `process.env`. */
    env?: NodeJS.ProcessEnv;
    platform?: NodeJS.Platform;
}

/** Name of the task run when none is given. */
export const defaultTaskName = 'default';

/**
 * Loads the workspace and its toolchain on first use, so that tasks can be
 * listed without a workspace manifest.
 */
class WorkspaceTasks {
    private readonly environment: BuildEnvironment;
    private readonly env: NodeJS.ProcessEnv;
    private workspacePromise?: Promise<Workspace>;
    private toolchainValue?: Toolchain;

    constructor(environment: BuildEnvironment) {
        this.environment = environment;
        this.env = environment.env || process.env;
    }

    private get options(): BuildOptions {
        return this.environment.options;
    }

    workspace(): Promise<Workspace> {
        if (!this.workspacePromise)
            this.workspacePromise = loadWorkspace(this.options.manifestPath);
        return this.workspacePromise;
    }

    private async toolchain(): Promise<Toolchain> {
        if (!this.toolchainValue) {
            const workspace = await this.workspace();
            this.toolchainValue = new Toolchain(workspace.manifest.tools, this.env, this.environment.platform);
        }
        return this.toolchainValue;
    }

    private async artifactsDir(): Promise<string> {
        const workspace = await this.workspace();
        if (this.options.artifacts)
            return workspace.resolveArtifactsDir(this.options.artifacts);
        return workspace.artifactsDir;
    }

    private versionSuffixArgs(): string[] {
        return this.options.versionSuffix ? ['--version-suffix', this.options.versionSuffix] : [];
    }

    private exec(ctx: TaskContext, command: string[], cwd: string, redact?: string[]): Promise<void> {
        return this.environment.runner.run(command, {
            cwd,
            env: this.env,
            output: ctx.output,
            redact,
        });
    }

    /**
     * Runs `commandFor` in each project's directory, one after another.
     */
    private async eachProject(ctx: TaskContext, projects: Project[], commandFor: (project: Project) => string[]): Promise<void> {
        if (!projects.length) {
            ctx.log(`${ctx.name}: no projects`);
            return;
        }
        for (const project of projects)
            await this.exec(ctx, commandFor(project), project.dir);
    }

    async clean(ctx: TaskContext): Promise<void> {
        const workspace = await this.workspace();
        const dirs = [await this.artifactsDir()];
        for (const project of workspace.projects)
            dirs.push(path.join(project.dir, 'bin'), path.join(project.dir, 'obj'));
        for (const dir of dirs) {
            if (!(await fs.pathExists(dir)))
                continue;
            await fs.remove(dir);
            ctx.log(`removed ${path.relative(workspace.root, dir)}`);
        }
    }

    async checkDeps(ctx: TaskContext): Promise<void> {
        const workspace = await this.workspace();
        const conflicts = workspace.dependencyConflicts();
        if (conflicts.length)
            throw new DependencyConflictError(conflicts);
        ctx.log(`${workspace.projects.length} projects, no conflicting package versions`);
    }

    async restore(ctx: TaskContext): Promise<void> {
        const workspace = await this.workspace();
        const build = await (await this.toolchain()).resolve('build');
        await this.eachProject(ctx, workspace.buildOrder(), project => [build, 'restore', project.dir]);
    }

    async build(ctx: TaskContext): Promise<void> {
        const workspace = await this.workspace();
        const build = await (await this.toolchain()).resolve('build');
        await this.eachProject(ctx, workspace.buildOrder(), project => [
            build, 'build', project.dir,
            '--configuration', this.options.configuration,
            ...this.versionSuffixArgs(),
        ]);
    }

    async test(ctx: TaskContext): Promise<void> {
        const workspace = await this.workspace();
        const build = await (await this.toolchain()).resolve('build');
        await this.eachProject(ctx, workspace.byKind('test'), project => [
            build, 'test', project.dir,
            '--configuration', this.options.configuration,
            '--no-build',
        ]);
    }

    async coverage(ctx: TaskContext): Promise<void> {
        const workspace = await this.workspace();
        const toolchain = await this.toolchain();
        const build = await toolchain.resolve('build');
        const coverage = await toolchain.resolve('coverage');
        const reportDir = path.join(await this.artifactsDir(), 'coverage');
        await fs.mkdirp(reportDir);
        await this.eachProject(ctx, workspace.byKind('test'), project => [
            coverage,
            '-register:user',
            '-returntargetcode',
            `-target:${build}`,
            `-targetargs:test "${project.dir}" --configuration ${this.options.configuration} --no-build`,
            `-output:${path.join(reportDir, `${project.name}.xml`)}`,
        ]);
    }

    async pack(ctx: TaskContext): Promise<void> {
        const workspace = await this.workspace();
        const build = await (await this.toolchain()).resolve('build');
        const packageDir = path.join(await this.artifactsDir(), 'packages');
        await fs.mkdirp(packageDir);
        await this.eachProject(ctx, workspace.buildOrder().filter(x => x.packable), project => [
            build, 'pack', project.dir,
            '--configuration', this.options.configuration,
            '--no-build',
            '--output', packageDir,
            ...this.versionSuffixArgs(),
        ]);
    }

    async publish(ctx: TaskContext): Promise<void> {
        const workspace = await this.workspace();
        const feed = workspace.manifest.feed;
        if (!feed)
            throw new PublishConfigurationError(`${workspace.manifestPath} has no feed to publish to`);
        const apiKey = this.env[feed.apiKeyVariable];
        if (!apiKey)
            throw new PublishConfigurationError(`set ${feed.apiKeyVariable} to the API key of ${feed.source}`);

        const packageDir = path.join(await this.artifactsDir(), 'packages');
        const files = (await fs.pathExists(packageDir)) ? (await fs.readdir(packageDir)).sort() : [];
        const nuget = await (await this.toolchain()).resolve('package');
        let numPushed = 0;
        for (const file of files) {
            let source: string | undefined;
            if (file.endsWith('.symbols.nupkg'))
                source = feed.symbolSource;
            else if (file.endsWith('.nupkg'))
                source = feed.source;
            if (!source)
                continue;
            await this.exec(ctx, [
                nuget, 'push', path.join(packageDir, file),
                '-Source', source,
                '-ApiKey', apiKey,
                '-NonInteractive',
            ], workspace.root, [apiKey]);
            numPushed++;
        }
        if (!numPushed)
            ctx.log(`publish: no packages in ${path.relative(workspace.root, packageDir)}`);
    }
}

/**
 * Register the workspace tasks and make `default` (build and test) the
 * default task.
 */
export function registerWorkspaceTasks(registry: TaskRegistry, environment: BuildEnvironment): void {
    const tasks = new WorkspaceTasks(environment);
    const definitions: Task[] = [
        {
            description: 'Remove build outputs and artifacts',
            fn: ctx => tasks.clean(ctx),
            name: 'clean',
        },
        {
            description: 'Check that packages are declared with one version',
            fn: ctx => tasks.checkDeps(ctx),
            name: 'check-deps',
        },
        {
            deps: ['check-deps'],
            description: 'Restore package dependencies',
            fn: ctx => tasks.restore(ctx),
            name: 'restore',
        },
        {
            deps: ['restore'],
            description: 'Compile all projects',
            fn: ctx => tasks.build(ctx),
            name: 'build',
        },
        {
            deps: ['build'],
            description: 'Run test projects',
            fn: ctx => tasks.test(ctx),
            name: 'test',
        },
        {
            deps: ['build'],
            description: 'Run test projects under the coverage tool',
            fn: ctx => tasks.coverage(ctx),
            name: 'coverage',
        },
        {
            deps: ['build'],
            description: 'Create packages of packable projects',
            fn: ctx => tasks.pack(ctx),
            name: 'pack',
        },
        {
            deps: ['pack'],
            description: 'Push packages to the feed',
            fn: ctx => tasks.publish(ctx),
            name: 'publish',
        },
        {
            deps: ['build', 'test'],
            description: 'Build and test',
            name: defaultTaskName,
        },
        {
            deps: ['clean', 'test', 'coverage', 'pack'],
            description: 'Clean build with tests, coverage and packages',
            name: 'ci',
        },
    ];
    for (const task of definitions)
        registry.register(task);
    registry.setDefault(defaultTaskName);
}
