/**
 * @module
 * Console status.
 */
import readline = require('readline');

/**
 * Console progress status.
 */
export interface Progress {
    status: string;
    /** Write chunk to console. */
    write(chunk: Buffer | string): void;
    /** Renders status. */
    render(): void;
    /** Un-renders status by printing a newline. */
    unrender(): void;
}

/**
 * A stream attached to a terminal, such as `process.stdout` on a console.
 */
export interface TerminalStream extends NodeJS.WritableStream {
    isTTY: true;
    columns: number;
}

function isTerminal(stream: NodeJS.WritableStream): stream is TerminalStream {
    return 'isTTY' in stream && stream.isTTY === true && 'columns' in stream && typeof stream.columns === 'number';
}

/**
 * Keeps the status on a single line that is redrawn in place, cut to the
 * terminal width.
 */
class TerminalProgress implements Progress {
    status: string;
    private readonly stream: TerminalStream;
    private rendered: boolean;

    constructor(stream: TerminalStream) {
        this.status = '';
        this.stream = stream;
        this.rendered = false;
    }

    write(chunk: Buffer | string): void {
        this.unrender();
        this.stream.write(chunk);
    }

    render(): void {
        if (this.rendered)
            readline.cursorTo(this.stream, 0);
        this.stream.write(truncateString(this.status, this.stream.columns));
        if (this.rendered)
            readline.clearLine(this.stream, 1);
        this.rendered = true;
    }

    unrender(): void {
        if (this.rendered) {
            this.stream.write('\n');
            this.rendered = false;
        }
    }
}

/**
 * Prints every status on its own line, for logs and pipes.
 */
class LineProgress implements Progress {
    status: string;
    private readonly stream: NodeJS.WritableStream;

    constructor(stream: NodeJS.WritableStream) {
        this.status = '';
        this.stream = stream;
    }

    write(chunk: Buffer | string): void {
        this.stream.write(chunk);
    }

    render(): void {
        if (this.status)
            this.stream.write(`${this.status}\n`);
    }

    unrender(): void {
        // nothing stays on screen
    }
}

/**
 * Create status.
 */
export function createProgress(stream?: NodeJS.WritableStream): Progress {
    if (!stream)
        stream = process.stdout;
    if (isTerminal(stream))
        return new TerminalProgress(stream);
    return new LineProgress(stream);
}

export function truncateString(x: string, len: number): string {
    if (x.length <= len)
        return x;
    else if (len <= 3)
        return x.substring(0, len);
    else
        return `${x.substring(0, len - 3)}...`;
}
