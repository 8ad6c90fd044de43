/**
 * @module
 * Runs external commands.
 */
import {
    CommandFailedError,
    WsbuildError,
} from './errors';
import childProcess = require('child_process');
import createDebug = require('debug');

const debug = createDebug('wsbuild:exec');

export interface CommandOptions {
    /** Working directory. Default: the current directory. */
    cwd?: string;
    /** Environment. Default: the current environment. */
    env?: NodeJS.ProcessEnv;
    /** Receives the command line, stdout and stderr. */
    output: Buffer[];
    /** Strings masked when the command line is echoed, such as API keys. */
    redact?: string[];
}

/**
 * Runs external commands. Tasks go through this so that tests can record
 * commands instead of spawning them.
 */
export interface CommandRunner {
    run(command: string[], options: CommandOptions): Promise<void>;
}

/**
 * {@link CommandRunner} that spawns processes.
 */
export class SpawnCommandRunner implements CommandRunner {
    run(command: string[], options: CommandOptions): Promise<void> {
        if (!command.length)
            return Promise.reject(new WsbuildError('empty command'));
        const line = formatCommand(command, options.redact);
        options.output.push(Buffer.from(`> ${line}\n`));
        debug('spawn %s (cwd %s)', line, options.cwd || process.cwd());
        return new Promise<void>((resolve, reject) => {
            const [cmdFile, ...cmdArgs] = command;
            const cp = childProcess.spawn(cmdFile, cmdArgs, {
                cwd: options.cwd,
                env: options.env,
                stdio: ['ignore', 'pipe', 'pipe'],
            });
            cp.on('error', e => {
                reject(e);
            });
            cp.on('close', (code, signal) => {
                if (code === 0)
                    return resolve();
                reject(new CommandFailedError(line, code, signal));
            });
            const chunkCallback = (chunk: string | Buffer) => {
                options.output.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
            };
            cp.stdout.on('data', chunkCallback);
            cp.stderr.on('data', chunkCallback);
        });
    }
}

/**
 * Returns the command as a shell-escaped line with every `redact` string masked.
 */
export function formatCommand(command: string[], redact?: string[]): string {
    const secrets = (redact || []).filter(x => x.length);
    return command.map(arg => {
        for (const secret of secrets)
            arg = arg.split(secret).join('***');
        return quote(arg);
    }).join(' ');
}

/**
 * Return a shell-escaped version of `x`
 */
export function quote(x: string): string {
    if (!x.length)
        return '\'\'';
    else if (!/[^\w@%+=:,./-]/.test(x))
        return x;

    const y = x.replace(/'/g, `'"'"'`);
    return `'${y}'`;
}
