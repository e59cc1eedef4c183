import * as fs from "fs";
import * as path from "path";
import { DEFAULT_LEXER_OPTIONS, ENCODING, type LexerOptions } from "./types/Lexer.js";
import { LexErrorCode, LexerError } from "./types/Errors.js";
import { Lexer } from "./prelyzer/Lexer.js";
import { FileSource, SourceCursor } from "./prelyzer/SourceCursor.js";
import { TokenWriter, type RecordFormat } from "./generator/TokenWriter.js";

/** Output target meaning "standard output". */
export const STDOUT_TARGET = "-";

export interface LexFileOptions extends Partial<LexerOptions> {
    /** Output path; `-` for stdout. Defaults to `<input>-lex` (`<input>-lex.json` for json). */
    output?: string;
    format?: RecordFormat;
    /** Step log; silent when omitted. */
    log?: (message: string) => void;
    /** Used for the stdout target. */
    stdout?: (chunk: Buffer) => void;
}

export interface LexFileResult {
    output: string;
    tokens: number;
}

export function defaultOutputPath(inputFile: string, format: RecordFormat = "lex"): string {
    return format === "json" ? `${inputFile}-lex.json` : `${inputFile}-lex`;
}

/**
 * Lexes `inputFile` and writes its token records.
 * Input and output are closed whatever happens; a failed pass leaves no output file behind.
 */
export function lexFile(inputFile: string, options: LexFileOptions = {}): LexFileResult {
    const log = options.log ?? (() => {});
    const format = options.format ?? "lex";
    const output = options.output ?? defaultOutputPath(inputFile, format);
    const lexerOptions: LexerOptions = {
        windowSize: options.windowSize ?? DEFAULT_LEXER_OPTIONS.windowSize,
        maxNameLength: options.maxNameLength ?? DEFAULT_LEXER_OPTIONS.maxNameLength,
        maxStringLength: options.maxStringLength ?? DEFAULT_LEXER_OPTIONS.maxStringLength,
    };

    log(`[Step 1] Opening source: ${inputFile}`);
    const source = new FileSource(inputFile);

    try {
        if (output !== STDOUT_TARGET && path.resolve(output) === path.resolve(inputFile)) {
            throw new LexerError(LexErrorCode.FileIO, `output file ${output} is the input file`);
        }

        log(`[Step 2] Opening output: ${output === STDOUT_TARGET ? "<stdout>" : output}`);
        const sink = openOutput(output, options.stdout);

        const writer = new TokenWriter(sink.write, format);
        try {
            log(`[Step 3] Lexing (window ${lexerOptions.windowSize} bytes, format ${format})...`);
            const cursor = new SourceCursor(source, lexerOptions.windowSize);
            new Lexer(cursor, lexerOptions).run(writer);
            writer.end();
        } catch (error) {
            // stdout keeps the records produced before the error; a file is removed.
            // Cleanup failures are logged, the lexing error is the one rethrown.
            cleanUp(() => {
                if (output === STDOUT_TARGET) writer.flush();
            }, log);
            cleanUp(() => sink.close(), log);
            cleanUp(() => sink.discard(), log);
            throw error;
        }
        sink.close();

        log(`[Step 4] ${writer.written} tokens written to ${output === STDOUT_TARGET ? "<stdout>" : output}`);
        return { output, tokens: writer.written };
    } finally {
        source.close();
    }
}

function reasonOf(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function cleanUp(step: () => void, log: (message: string) => void): void {
    try {
        step();
    } catch (error) {
        log(`[Cleanup] ${reasonOf(error)}`);
    }
}

interface OutputSink {
    write: (chunk: string) => void;
    close(): void;
    /** Removes what was written, where that is possible. */
    discard(): void;
}

function openOutput(target: string, stdout?: (chunk: Buffer) => void): OutputSink {
    if (target === STDOUT_TARGET) {
        const emit = stdout ?? ((chunk: Buffer) => void process.stdout.write(chunk));
        return {
            write: (chunk) => emit(Buffer.from(chunk, ENCODING)),
            close: () => {},
            discard: () => {},
        };
    }

    let fd: number | null;
    try {
        fd = fs.openSync(target, "w");
    } catch {
        throw new LexerError(LexErrorCode.FileIO, `could not open output file ${target}`);
    }

    return {
        write: (chunk) => {
            if (fd === null) return;
            try {
                fs.writeSync(fd, chunk, null, ENCODING);
            } catch (e) {
                throw new LexerError(LexErrorCode.FileIO, `could not write output file ${target}: ${reasonOf(e)}`);
            }
        },
        close: () => {
            if (fd === null) return;
            fs.closeSync(fd);
            fd = null;
        },
        discard: () => {
            fs.rmSync(target, { force: true });
        },
    };
}
