import { carriesLexeme, type Token, type TokenSink } from "../types/Lexer.js";

export type RecordFormat = "lex" | "json";

export const RECORD_FORMATS: readonly RecordFormat[] = ["lex", "json"];

/**
 * Shapes tokens into text for one output format.
 */
interface RecordFormatter {
    header(): string;
    record(token: Token, index: number): string;
    footer(count: number): string;
}

/**
 * Line-oriented records:
 *
 *     <line>
 *     <kind>
 *     <lexeme>      (string, integer, identifier and type only)
 */
const lexFormatter: RecordFormatter = {
    header: () => "",
    record: (token) => {
        let out = `${token.line}\n${token.kind}\n`;
        if (carriesLexeme(token.kind) && token.lexeme !== undefined) {
            out += `${token.lexeme}\n`;
        }
        return out;
    },
    footer: () => "",
};

// Lexemes are latin1-decoded bytes; escaping everything past ASCII keeps the
// output valid JSON whatever encoding it is written in.
function asciiJson(value: Record<string, string | number>): string {
    return JSON.stringify(value).replace(
        /[\u0080-\uffff]/g,
        (ch) => `\\u${ch.charCodeAt(0).toString(16).padStart(4, "0")}`
    );
}

const jsonFormatter: RecordFormatter = {
    header: () => "[",
    record: (token, index) => {
        const entry: Record<string, string | number> = { line: token.line, kind: token.kind };
        if (token.lexeme !== undefined) entry.lexeme = token.lexeme;
        return `${index > 0 ? "," : ""}\n    ${asciiJson(entry)}`;
    },
    footer: (count) => (count > 0 ? "\n]\n" : "]\n"),
};

function formatterFor(format: RecordFormat): RecordFormatter {
    switch (format) {
        case "lex":
            return lexFormatter;
        case "json":
            return jsonFormatter;
    }
}

/**
 * TokenSink that renders records and hands the text to `out` in chunks.
 * Call `end()` once the lexer is done; `flush()` pushes out whatever is pending
 * without closing the format (used when a pass fails half way).
 */
export class TokenWriter implements TokenSink {
    private readonly out: (chunk: string) => void;
    private readonly formatter: RecordFormatter;
    private readonly chunkSize: number;
    private pending: string[] = [];
    private pendingLength = 0;
    private count = 0;
    private started = false;

    constructor(out: (chunk: string) => void, format: RecordFormat = "lex", chunkSize = 64 * 1024) {
        this.out = out;
        this.formatter = formatterFor(format);
        this.chunkSize = chunkSize;
    }

    get written(): number {
        return this.count;
    }

    write(token: Token): void {
        if (!this.started) this.start();
        this.push(this.formatter.record(token, this.count));
        this.count++;
    }

    end(): void {
        if (!this.started) this.start();
        this.push(this.formatter.footer(this.count));
        this.flush();
    }

    flush(): void {
        if (this.pendingLength === 0) return;
        const chunk = this.pending.join("");
        this.pending = [];
        this.pendingLength = 0;
        this.out(chunk);
    }

    private start(): void {
        this.started = true;
        this.push(this.formatter.header());
    }

    private push(text: string): void {
        if (text.length === 0) return;
        this.pending.push(text);
        this.pendingLength += text.length;
        if (this.pendingLength >= this.chunkSize) this.flush();
    }
}

/** Renders a complete token list in one go. */
export function generate(tokens: readonly Token[], format: RecordFormat = "lex"): string {
    let text = "";
    const writer = new TokenWriter((chunk) => {
        text += chunk;
    }, format);
    for (const token of tokens) writer.write(token);
    writer.end();
    return text;
}
