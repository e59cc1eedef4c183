import { ENCODING, DEFAULT_LEXER_OPTIONS, type ScanLimits } from "../types/Lexer.js";
import { LexErrorCode, LexerError } from "../types/Errors.js";
import { isNameChar } from "./CharClass.js";
import { END, type SourceCursor } from "./SourceCursor.js";

const QUOTE = 0x22;
const BACKSLASH = 0x5c;
const NEWLINE = 0x0a;
const NUL = 0x00;

const NEWLINE_MESSAGE = "non-escaped newline character inside literal string.";
const NEWLINE_HINT = 'add \\ before newline or close this string with "';

/**
 * Fixed-capacity byte accumulator for one span. Full means full: callers
 * decide which error that is.
 */
export class ScanBuffer {
    readonly capacity: number;
    private readonly bytes: Uint8Array;
    private size = 0;

    constructor(capacity: number) {
        this.capacity = capacity;
        this.bytes = new Uint8Array(capacity);
    }

    get length(): number {
        return this.size;
    }

    isFull(): boolean {
        return this.size === this.capacity;
    }

    reset(): void {
        this.size = 0;
    }

    append(c: number): void {
        if (this.isFull()) {
            throw new RangeError(`scan buffer overflow (capacity ${this.capacity})`);
        }
        this.bytes[this.size++] = c;
    }

    toString(): string {
        return Buffer.from(this.bytes.buffer, this.bytes.byteOffset, this.size).toString(ENCODING);
    }
}

/**
 * Pulls string bodies and name/number spans off the cursor.
 */
export class LiteralScanner {
    private readonly cursor: SourceCursor;
    private readonly nameBuffer: ScanBuffer;
    private readonly stringBuffer: ScanBuffer;

    constructor(cursor: SourceCursor, limits: ScanLimits = DEFAULT_LEXER_OPTIONS) {
        checkLimit("name length", limits.maxNameLength);
        checkLimit("string length", limits.maxStringLength);
        this.cursor = cursor;
        this.nameBuffer = new ScanBuffer(limits.maxNameLength);
        this.stringBuffer = new ScanBuffer(limits.maxStringLength);
    }

    /**
     * Reads a string body; the opening quote has been consumed already.
     * Backslashes stay in the result as written. A `"` right after a backslash
     * does not close the string, which also means `"a\\"` is still open.
     * A backslash directly before a newline splices the next line in; both are dropped.
     */
    scanString(): string {
        const buf = this.stringBuffer;
        buf.reset();

        for (;;) {
            const previous = this.cursor.current();
            const c = this.cursor.advance();

            if (c === QUOTE && previous !== BACKSLASH) break;

            if (c === NUL || c === END) {
                this.fail(LexErrorCode.InvalidStringCharacter, "literal string may not contain null character or EOF");
            }

            // raw newline right after the opening quote or after a spliced line
            if (c === NEWLINE) {
                this.fail(LexErrorCode.NonEscapedNewline, NEWLINE_MESSAGE, NEWLINE_HINT, this.cursor.line - 1);
            }

            if (this.cursor.peek() === NEWLINE) {
                if (c === BACKSLASH) {
                    this.cursor.advance();
                    continue;
                }
                this.fail(LexErrorCode.NonEscapedNewline, NEWLINE_MESSAGE, NEWLINE_HINT);
            }

            if (buf.isFull()) {
                this.fail(
                    LexErrorCode.StringLiteralTooLong,
                    `literal string too long (max ${buf.capacity} chars allowed)`
                );
            }
            buf.append(c);
        }

        return buf.toString();
    }

    /**
     * Reads a run of name characters starting with the byte just consumed.
     * Used for identifiers, type names, keywords and integers alike.
     */
    scanName(): string {
        const buf = this.nameBuffer;
        buf.reset();
        buf.append(this.cursor.current());

        while (isNameChar(this.cursor.peek())) {
            if (buf.isFull()) {
                this.fail(
                    LexErrorCode.IdentifierNameTooLong,
                    `identifier or keyword name too long (max ${buf.capacity} chars allowed)`
                );
            }
            buf.append(this.cursor.advance());
        }

        return buf.toString();
    }

    private fail(code: LexErrorCode, message: string, hint?: string, line: number = this.cursor.line): never {
        throw new LexerError(code, message, { file: this.cursor.name, line }, hint);
    }
}

function checkLimit(what: string, value: number): void {
    if (!Number.isInteger(value) || value < 1) {
        throw new RangeError(`${what} limit must be a positive integer, got ${value}`);
    }
}
