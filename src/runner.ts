/**
 * @module
 * Sequential task execution.
 */
import {
    describeError,
    TaskFailedError,
} from './errors';
import {
    dependencyOrder,
} from './graph';
import {
    Progress,
} from './progress';
import {
    TaskRegistry,
} from './registry';
import {
    createTaskContext,
    Task,
} from './task';
import createDebug = require('debug');

const debug = createDebug('wsbuild:runner');

/**
 * Options for {@link run}.
 */
export interface RunOptions {
    /** Print the plan instead of running it. */
    dryRun?: boolean;
}

/**
 * A task that ran to completion.
 */
export interface TaskRunRecord {
    name: string;
    durationMs: number;
}

export interface RunResult {
    /** Names of the planned tasks, in execution order. */
    planned: string[];
    /** Tasks that ran, in execution order. Empty on a dry run. */
    tasks: TaskRunRecord[];
}

/**
 * Returns the tasks needed to run `names`, dependencies first, each once.
 * With no names, the default task is planned.
 */
export function plan(registry: TaskRegistry, names: string[]): Task[] {
    const roots = names.length ? names : [registry.defaultTask()];
    return dependencyOrder(roots, name => registry.find(name), task => task.deps || []);
}

class Runner {
    private readonly registry: TaskRegistry;
    private readonly progress: Progress;

    constructor(registry: TaskRegistry, progress: Progress) {
        this.registry = registry;
        this.progress = progress;
    }

    async run(names: string[], options: RunOptions): Promise<RunResult> {
        const tasks = plan(this.registry, names);
        const planned = tasks.map(x => x.name);
        debug('plan for %o: %o', names, planned);

        if (options.dryRun) {
            for (const task of tasks)
                this.progress.write(`${task.name}\n`);
            return { planned, tasks: [] };
        }

        const records: TaskRunRecord[] = [];
        let numRun = 0;
        for (const task of tasks) {
            numRun++;
            this.progress.status = `[${numRun}/${tasks.length}] ${task.description || task.name}`;
            this.progress.render();
            records.push(await this.runTask(task));
        }
        this.progress.unrender();
        return { planned, tasks: records };
    }

    private async runTask(task: Task): Promise<TaskRunRecord> {
        const ctx = createTaskContext(task.name);
        const started = Date.now();
        try {
            if (task.fn)
                await task.fn(ctx);
        } catch (error) {
            this.printOutput(ctx.output);
            this.progress.write(`${describeError(error)}\n`);
            this.progress.unrender();
            debug('task %s failed: %O', task.name, error);
            throw new TaskFailedError(task.name, error);
        }
        this.printOutput(ctx.output);
        const durationMs = Date.now() - started;
        debug('task %s finished in %dms', task.name, durationMs);
        return { durationMs, name: task.name };
    }

    private printOutput(output: Buffer[]): void {
        for (const chunk of output)
            this.progress.write(chunk);
    }
}

/**
 * Run `names` and everything they depend on, one task at a time.
 * The first failing task stops the run with a {@link TaskFailedError}.
 */
export function run(registry: TaskRegistry, names: string[], progress: Progress, options?: RunOptions): Promise<RunResult> {
    const runner = new Runner(registry, progress);
    return runner.run(names, options || {});
}
