import * as fs from "fs";
import { DEFAULT_LEXER_OPTIONS } from "../types/Lexer.js";
import { LexErrorCode, LexerError } from "../types/Errors.js";

/** End-of-input marker returned in place of a byte. */
export const END = -1;

/**
 * Anything the cursor can pull bytes from.
 * `read` fills `into` from the start and returns how many bytes it wrote; 0 means exhausted.
 */
export interface ByteSource {
    readonly name: string;
    read(into: Uint8Array): number;
    close(): void;
}

export class FileSource implements ByteSource {
    readonly name: string;
    private fd: number | null;

    constructor(filePath: string, name: string = filePath) {
        this.name = name;
        try {
            this.fd = fs.openSync(filePath, "r");
        } catch {
            throw new LexerError(LexErrorCode.FileIO, `could not open file ${filePath}`);
        }
    }

    read(into: Uint8Array): number {
        if (this.fd === null) return 0;
        try {
            return fs.readSync(this.fd, into, 0, into.length, null);
        } catch (e) {
            const reason = e instanceof Error ? e.message : String(e);
            throw new LexerError(LexErrorCode.FileIO, `could not read file ${this.name}: ${reason}`);
        }
    }

    close(): void {
        if (this.fd === null) return;
        fs.closeSync(this.fd);
        this.fd = null;
    }
}

export class MemorySource implements ByteSource {
    readonly name: string;
    private readonly data: Buffer;
    private offset = 0;

    constructor(data: Buffer | string, name = "<memory>") {
        this.name = name;
        this.data = typeof data === "string" ? Buffer.from(data, "latin1") : data;
    }

    read(into: Uint8Array): number {
        const n = Math.min(into.length, this.data.length - this.offset);
        this.data.copy(into, 0, this.offset, this.offset + n);
        this.offset += n;
        return n;
    }

    close(): void {}
}

/**
 * Sequential byte cursor over a source, read through a fixed-size window.
 * One byte of lookahead; no rewind.
 */
export class SourceCursor {
    private readonly source: ByteSource;
    private readonly window: Uint8Array;
    private length = 0;
    private position = 0;
    private exhausted = false;
    private last = END;
    private lineNo = 1;

    constructor(source: ByteSource, windowSize: number = DEFAULT_LEXER_OPTIONS.windowSize) {
        if (!Number.isInteger(windowSize) || windowSize < 1) {
            throw new RangeError(`window size must be a positive integer, got ${windowSize}`);
        }
        this.source = source;
        this.window = new Uint8Array(windowSize);
        this.refill();
    }

    get name(): string {
        return this.source.name;
    }

    /** Current line, 1-based. Counts every `\n` consumed so far. */
    get line(): number {
        return this.lineNo;
    }

    /** Consumes and returns the next byte, or END. */
    advance(): number {
        if (this.position === this.length && !this.refill()) {
            this.last = END;
            return END;
        }
        const c = this.window[this.position++] ?? END;
        if (c === 0x0a) this.lineNo++;
        this.last = c;
        return c;
    }

    /** The byte `advance()` would return next. Nothing is consumed. */
    peek(): number {
        if (this.position === this.length && !this.refill()) return END;
        return this.window[this.position] ?? END;
    }

    /** The most recently consumed byte; END before the first byte or once input ran out. */
    current(): number {
        return this.last;
    }

    // Only called when the window is drained.
    private refill(): boolean {
        if (this.exhausted) return false;
        this.length = this.source.read(this.window);
        this.position = 0;
        if (this.length === 0) this.exhausted = true;
        return !this.exhausted;
    }
}
