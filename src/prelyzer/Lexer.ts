// --- 2. Lexer ---

import { DEFAULT_LEXER_OPTIONS, TokenKind, type LexerOptions, type ScanLimits, type Token, type TokenSink } from "../types/Lexer.js";
import { LexErrorCode, LexerError } from "../types/Errors.js";
import { isNameChar, isWhitespace } from "./CharClass.js";
import { skipComment } from "./CommentSkipper.js";
import { classifySpan } from "./Classifier.js";
import { LiteralScanner } from "./LiteralScanner.js";
import { scanOperator } from "./OperatorScanner.js";
import { END, FileSource, MemorySource, SourceCursor } from "./SourceCursor.js";

const QUOTE = 0x22;

export class Lexer {
    private readonly cursor: SourceCursor;
    private readonly literals: LiteralScanner;

    constructor(cursor: SourceCursor, options: Partial<ScanLimits> = {}) {
        this.cursor = cursor;
        this.literals = new LiteralScanner(cursor, {
            maxNameLength: options.maxNameLength ?? DEFAULT_LEXER_OPTIONS.maxNameLength,
            maxStringLength: options.maxStringLength ?? DEFAULT_LEXER_OPTIONS.maxStringLength,
        });
    }

    /**
     * Lexes the whole input into `sink`. Stops at the first error, which is thrown;
     * tokens written before it stay written.
     */
    run(sink: TokenSink): number {
        let count = 0;
        for (let token = this.next(); token !== null; token = this.next()) {
            sink.write(token);
            count++;
        }
        return count;
    }

    tokenize(): Token[] {
        const tokens: Token[] = [];
        this.run({ write: (token) => tokens.push(token) });
        return tokens;
    }

    /** Next token, or null at end of input. */
    next(): Token | null {
        const cursor = this.cursor;

        for (;;) {
            const c = cursor.advance();
            if (c === END) return null;

            // whitespace and comments produce nothing
            if (isWhitespace(c)) continue;
            if (skipComment(cursor)) continue;

            const site = { file: cursor.name, line: cursor.line };

            if (c === QUOTE) {
                return { kind: TokenKind.String, line: site.line, lexeme: this.literals.scanString() };
            }

            if (!isNameChar(c)) {
                const kind = scanOperator(cursor);
                if (kind === null) {
                    throw new LexerError(
                        LexErrorCode.InvalidCharacter,
                        `invalid character ${String.fromCharCode(c)}`,
                        site
                    );
                }
                return { kind, line: site.line };
            }

            return classifySpan(this.literals.scanName(), site);
        }
    }
}

/** Lexes an in-memory source. */
export function tokenizeText(text: string | Buffer, name = "<memory>", options: Partial<LexerOptions> = {}): Token[] {
    const cursor = new SourceCursor(new MemorySource(text, name), options.windowSize);
    return new Lexer(cursor, options).tokenize();
}

/** Lexes a file from disk; the file is closed on every exit path. */
export function tokenizeFile(filePath: string, options: Partial<LexerOptions> = {}): Token[] {
    const source = new FileSource(filePath);
    try {
        return new Lexer(new SourceCursor(source, options.windowSize), options).tokenize();
    } finally {
        source.close();
    }
}
