/**
 * @module
 * wsbuild Public API
 */
import {
    BuildOptions,
} from './config';
import {
    CommandRunner,
    SpawnCommandRunner,
} from './exec';
import {
    createProgress,
    Progress,
} from './progress';
import {
    TaskRegistry,
} from './registry';
import {
    plan,
    run,
    RunOptions,
    RunResult,
} from './runner';
import {
    Task,
    TaskInfo,
} from './task';
import {
    registerWorkspaceTasks,
} from './tasks';

/**
 * Options for {@link newBuilder}.
 */
export interface BuilderOptions {
    /** Where status and task output go. Default: stdout. */
    progress?: Progress;
}

/**
 * Represents a build to be done.
 */
export interface Builder {
    /** Add a task to the build. */
    addTask(task: Task): void;
    /** Set the task run when none is named. */
    setDefault(name: string): void;
    /** Metadata of every task, in registration order. */
    listTasks(): TaskInfo[];
    /** Names of the tasks `run(names)` would run, in order. */
    plan(names?: string[]): string[];
    /** Run `names` and their dependencies, or the default task if none are given. */
    run(names?: string[], options?: RunOptions): Promise<RunResult>;
}

class BuilderImpl implements Builder {
    private readonly registry: TaskRegistry;
    private readonly progress: Progress;

    constructor(registry: TaskRegistry, progress: Progress) {
        this.registry = registry;
        this.progress = progress;
    }

    addTask(task: Task): void {
        this.registry.register(task);
    }

    setDefault(name: string): void {
        this.registry.setDefault(name);
    }

    listTasks(): TaskInfo[] {
        return this.registry.list();
    }

    plan(names?: string[]): string[] {
        return plan(this.registry, names || []).map(x => x.name);
    }

    run(names?: string[], options?: RunOptions): Promise<RunResult> {
        return run(this.registry, names || [], this.progress, options);
    }
}

/**
 * Construct a new, empty build.
 */
export function newBuilder(options?: BuilderOptions): Builder {
    const progress = (options && options.progress) || createProgress();
    return new BuilderImpl(new TaskRegistry(), progress);
}

/**
 * Options for {@link createWorkspaceBuilder}.
 */
export interface WorkspaceBuilderOptions extends BuilderOptions {
    options: BuildOptions;
    /** Default: a runner that spawns processes. */
    runner?: CommandRunner;
    env?: NodeJS.ProcessEnv;
    platform?: NodeJS.Platform;
}

/**
 * Construct a build that has the workspace tasks.
 */
export function createWorkspaceBuilder(options: WorkspaceBuilderOptions): Builder {
    const registry = new TaskRegistry();
    registerWorkspaceTasks(registry, {
        env: options.env,
        options: options.options,
        platform: options.platform,
        runner: options.runner || new SpawnCommandRunner(),
    });
    return new BuilderImpl(registry, options.progress || createProgress());
}

export {
    Task,
    TaskContext,
    TaskFunction,
    TaskInfo,
} from './task';
export {
    RunOptions,
    RunResult,
    TaskRunRecord,
} from './runner';
export {
    BuildOptions,
    loadBuildOptions,
} from './config';
export {
    CommandOptions,
    CommandRunner,
    SpawnCommandRunner,
} from './exec';
export {
    Progress,
    createProgress,
} from './progress';
export {
    loadWorkspace,
    Workspace,
} from './workspace';
export * from './errors';
