/**
 * @module
 * Error types.
 */

/**
 * Base class of all errors raised by wsbuild.
 */
export class WsbuildError extends Error {
    constructor(message: string, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = new.target.name;
    }
}

export class DuplicateTaskError extends WsbuildError {
    constructor(readonly taskName: string) {
        super(`task ${taskName} is already registered`);
    }
}

export class TaskNotFoundError extends WsbuildError {
    constructor(readonly taskName: string, readonly requiredBy?: string) {
        super(requiredBy ?
            `task ${taskName} (required by ${requiredBy}) is not registered` :
            `task ${taskName} is not registered`);
    }
}

export class NoDefaultTaskError extends WsbuildError {
    constructor() {
        super('no task given and no default task set');
    }
}

export class CircularDependencyError extends WsbuildError {
    /** Node names along the cycle; the first name is repeated at the end. */
    readonly cycle: string[];

    constructor(cycle: string[]) {
        super(`circular dependency detected: ${cycle.join(' -> ')}`);
        this.cycle = cycle;
    }
}

export class TaskFailedError extends WsbuildError {
    constructor(readonly taskName: string, cause: unknown) {
        super(`task ${taskName} failed: ${describeError(cause)}`, cause);
    }
}

export class CommandFailedError extends WsbuildError {
    constructor(readonly command: string, readonly code: number | null, readonly signal: NodeJS.Signals | null) {
        super(`${command} returned code ${code}, signal ${signal}`);
    }
}

export class ToolNotFoundError extends WsbuildError {
    constructor(readonly tool: string, readonly executable: string, readonly overrideVariable: string) {
        super(`${tool} tool ${executable} was not found in ${overrideVariable} or on PATH`);
    }
}

export class ManifestError extends WsbuildError {
    constructor(readonly file: string, message: string, readonly issues: string[] = [], cause?: unknown) {
        super(issues.length ?
            `${file}: ${message}\n${issues.map(x => `  - ${x}`).join('\n')}` :
            `${file}: ${message}`, cause);
    }
}

export class ConfigError extends WsbuildError {
    constructor(readonly issues: string[]) {
        super(`invalid build options\n${issues.map(x => `  - ${x}`).join('\n')}`);
    }
}

export class PublishConfigurationError extends WsbuildError {}

export class DependencyConflictError extends WsbuildError {
    constructor(readonly conflicts: { name: string; versions: { version: string; projects: string[] }[] }[]) {
        super(`packages declared with different versions:\n${conflicts.map(c =>
            `  - ${c.name}: ${c.versions.map(v => `${v.version} (${v.projects.join(', ')})`).join('; ')}`).join('\n')}`);
    }
}

/**
 * Returns the message of `error`, or its string form when it is not an Error.
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
