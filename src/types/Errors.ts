// --- Fatal errors and exit codes ---

/**
 * One code per failure kind. The numeric value is the process exit code
 * the CLI terminates with.
 */
export enum LexErrorCode {
    IncorrectUsage = 1,
    FileIO = 2,
    IdentifierNameTooLong = 3,
    StringLiteralTooLong = 4,
    WrongInteger32Format = 5,
    UppercaseBooleanKeyword = 6,
    InvalidCharacter = 7,
    InvalidStringCharacter = 8,
    NonEscapedNewline = 9,
}

/** Where in the source a lexical error was detected. */
export interface ErrorSite {
    file: string;
    line: number;
}

export class LexerError extends Error {
    readonly code: LexErrorCode;
    readonly site?: ErrorSite;
    readonly hint?: string;

    constructor(code: LexErrorCode, message: string, site?: ErrorSite, hint?: string) {
        super(message);
        this.name = "LexerError";
        this.code = code;
        this.site = site;
        this.hint = hint;
    }

    /** Error kind name, e.g. "InvalidCharacter". */
    get kind(): string {
        return LexErrorCode[this.code];
    }
}

const RED = "\x1b[31m";
const CYAN = "\x1b[36m";
const RESET = "\x1b[0m";

/**
 * Renders an error the way the tool prints it:
 * `file:line: ERROR: message`, plus a `HINT:` line when the error has one.
 */
export function formatDiagnostic(error: LexerError, options: { color?: boolean } = {}): string {
    const color = options.color ?? true;
    const paint = (code: string, text: string) => (color ? `${code}${text}${RESET}` : text);

    const prefix = error.site ? `${error.site.file}:${error.site.line}: ` : "";
    let out = `${prefix}${paint(RED, "ERROR:")} ${error.message}`;
    if (error.hint) {
        out += `\n${paint(CYAN, "HINT:")} ${error.hint}`;
    }
    return out;
}
