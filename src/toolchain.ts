/**
 * @module
 * Locates the external tools tasks run.
 */
import {
    ToolNotFoundError,
} from './errors';
import createDebug = require('debug');
import fs = require('fs-extra');
import path = require('path');

const debug = createDebug('wsbuild:toolchain');

/**
 * External tools, by role.
 */
export type ToolKind = 'build' | 'package' | 'coverage';

/**
 * Executable names of the tools.
 */
export type ToolNames = Record<ToolKind, string>;

export const defaultToolNames: ToolNames = {
    build: 'dotnet',
    coverage: 'OpenCover.Console',
    package: 'nuget',
};

/**
 * Name of the variable that overrides the location of `executable`,
 * e.g. `WSBUILD_OPENCOVER_CONSOLE` for `OpenCover.Console`.
 */
export function overrideVariable(executable: string): string {
    return `WSBUILD_${executable.toUpperCase().replace(/[^A-Z0-9]/g, '_')}`;
}

/**
 * Returns the path of `executable`, or undefined if it cannot be found.
 *
 * The override variable wins over the `PATH` search. Names containing a
 * directory are checked as they are. On Windows the `PATHEXT` extensions
 * are tried as well.
 */
export async function findExecutable(
    executable: string,
    env: NodeJS.ProcessEnv = process.env,
    platform: NodeJS.Platform = process.platform,
): Promise<string | undefined> {
    const p = platform === 'win32' ? path.win32 : path.posix;

    const override = env[overrideVariable(executable)];
    if (override)
        return (await isExecutable(override, platform)) ? override : undefined;

    if (executable.includes(p.sep) || executable.includes('/'))
        return (await isExecutable(executable, platform)) ? executable : undefined;

    const dirs = (env.PATH || env.Path || '').split(p.delimiter).filter(x => x.length);
    const names = candidateNames(executable, env, platform);
    for (const dir of dirs) {
        for (const name of names) {
            const candidate = p.join(dir, name);
            if (await isExecutable(candidate, platform))
                return candidate;
        }
    }
    return undefined;
}

function candidateNames(executable: string, env: NodeJS.ProcessEnv, platform: NodeJS.Platform): string[] {
    if (platform !== 'win32')
        return [executable];
    const exts = (env.PATHEXT || '.COM;.EXE;.BAT;.CMD').split(';').filter(x => x.length);
    const hasExt = exts.some(ext => executable.toLowerCase().endsWith(ext.toLowerCase()));
    return hasExt ? [executable] : exts.map(ext => executable + ext.toLowerCase());
}

async function isExecutable(filename: string, platform: NodeJS.Platform): Promise<boolean> {
    try {
        const stats = await fs.stat(filename);
        if (!stats.isFile())
            return false;
        if (platform !== 'win32')
            await fs.access(filename, fs.constants.X_OK);
        return true;
    } catch (e) {
        return false;
    }
}

/**
 * Resolves tools on first use and remembers where they were found.
 */
export class Toolchain {
    readonly names: ToolNames;
    private readonly env: NodeJS.ProcessEnv;
    private readonly platform: NodeJS.Platform;
    private readonly resolved: Map<ToolKind, string>;

    constructor(names?: Partial<ToolNames>, env?: NodeJS.ProcessEnv, platform?: NodeJS.Platform) {
        this.names = { ...defaultToolNames, ...names };
        this.env = env || process.env;
        this.platform = platform || process.platform;
        this.resolved = new Map();
    }

    async resolve(tool: ToolKind): Promise<string> {
        const cached = this.resolved.get(tool);
        if (cached)
            return cached;
        const executable = this.names[tool];
        const found = await findExecutable(executable, this.env, this.platform);
        if (!found)
            throw new ToolNotFoundError(tool, executable, overrideVariable(executable));
        debug('%s tool %s resolved to %s', tool, executable, found);
        this.resolved.set(tool, found);
        return found;
    }
}
