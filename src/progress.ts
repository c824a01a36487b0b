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
 * Stream that progress is written to. `columns` is set on terminals.
 */
export interface ProgressStream extends NodeJS.WritableStream {
    columns?: number;
}

class ConsoleProgress implements Progress {
    status: string;
    private readonly stream: ProgressStream;
    private rendered: boolean;

    constructor(stream: ProgressStream) {
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

class SilentProgress implements Progress {
    status = '';
    write(): void {}
    render(): void {}
    unrender(): void {}
}

/**
 * Create status.
 */
export function createProgress(stream?: ProgressStream): Progress {
    return new ConsoleProgress(stream || process.stdout);
}

/**
 * Status that discards everything.
 */
export function createSilentProgress(): Progress {
    return new SilentProgress();
}

/**
 * Truncates `x` to `len` characters. Strings are left alone when `len` is unknown.
 */
export function truncateString(x: string, len?: number): string {
    if (len === undefined || x.length <= len)
        return x;
    else if (len <= 3)
        return x.substring(0, len);
    else
        return `${x.substring(0, len - 3)}...`;
}
