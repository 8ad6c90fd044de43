/**
 * Context that will be passed to the task function during execution.
 */
export interface TaskContext {
    /** Name of the running task. */
    readonly name: string;
    /** Task output, written to the console once the task finishes. */
    readonly output: Buffer[];
    /** Append a line to the task output. */
    log(line: string): void;
}

/**
 * Function that runs a task.
 */
export type TaskFunction = (ctx: TaskContext) => (Promise<void> | void);

/**
 * Represents a task.
 */
export interface Task {
    /** Task name. */
    name: string;
    /** Task description. Default: the task name. */
    description?: string;
    /** Names of the tasks that must run before this one. */
    deps?: string[];
    /** Task function. Tasks without one only pull in their deps. */
    fn?: TaskFunction;
}

/**
 * Task metadata, for listings and help.
 */
export interface TaskInfo {
    name: string;
    description: string;
    deps: string[];
    isDefault: boolean;
}

/**
 * Constructs a new {@link TaskContext}.
 */
export function createTaskContext(name: string): TaskContext {
    const output: Buffer[] = [];
    return {
        log: line => {
            output.push(Buffer.from(`${line}\n`));
        },
        name,
        output,
    };
}
