/**
 * @module
 * Task registry.
 */
import {
    DuplicateTaskError,
    NoDefaultTaskError,
    TaskNotFoundError,
    WsbuildError,
} from './errors';
import {
    Task,
    TaskInfo,
} from './task';

/**
 * Named tasks known to a build, in registration order.
 */
export class TaskRegistry {
    private readonly tasks: Map<string, Task>;
    private defaultName?: string;

    constructor(tasks?: Iterable<Task>) {
        this.tasks = new Map();
        for (const task of tasks || [])
            this.register(task);
    }

    get size(): number {
        return this.tasks.size;
    }

    register(task: Task): void {
        if (!task.name.trim())
            throw new WsbuildError('task name must not be empty');
        if (this.tasks.has(task.name))
            throw new DuplicateTaskError(task.name);
        this.tasks.set(task.name, task);
    }

    has(name: string): boolean {
        return this.tasks.has(name);
    }

    find(name: string): Task | undefined {
        return this.tasks.get(name);
    }

    get(name: string): Task {
        const task = this.tasks.get(name);
        if (!task)
            throw new TaskNotFoundError(name);
        return task;
    }

    /**
     * Set the task run when none is named. It may be registered later.
     */
    setDefault(name: string): void {
        this.defaultName = name;
    }

    defaultTask(): string {
        if (this.defaultName === undefined)
            throw new NoDefaultTaskError();
        if (!this.tasks.has(this.defaultName))
            throw new TaskNotFoundError(this.defaultName);
        return this.defaultName;
    }

    list(): TaskInfo[] {
        const infos: TaskInfo[] = [];
        for (const task of this.tasks.values()) {
            infos.push({
                deps: task.deps ? [...task.deps] : [],
                description: task.description || task.name,
                isDefault: task.name === this.defaultName,
                name: task.name,
            });
        }
        return infos;
    }
}
