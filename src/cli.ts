import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import { DEFAULT_LEXER_OPTIONS } from "./types/Lexer.js";
import { LexErrorCode, LexerError, formatDiagnostic } from "./types/Errors.js";
import { RECORD_FORMATS, type RecordFormat } from "./generator/TokenWriter.js";
import { lexFile } from "./pipeline.js";

export const VERSION = "1.0.0";

export interface CliIO {
    /** Standard output; receives help/version text and, byte for byte, `-o -` records. */
    out: (chunk: string | Uint8Array) => void;
    /** Standard error; receives diagnostics and step logs. */
    err: (text: string) => void;
}

interface CliOptions {
    output?: string;
    format: RecordFormat;
    windowSize: number;
    color: boolean;
    verbose?: boolean;
}

const processIO: CliIO = {
    out: (chunk) => void process.stdout.write(chunk),
    err: (text) => void process.stderr.write(text),
};

function parseWindowSize(value: string): number {
    const n = Number(value);
    if (!/^\d+$/.test(value) || !Number.isSafeInteger(n) || n < 1) {
        throw new InvalidArgumentError("must be a positive integer.");
    }
    return n;
}

// --- CLI program ---

export function createProgram(io: CliIO, onDone: (code: number) => void): Command {
    const program = new Command();

    program
        .name("cool-lexer")
        .description("Lexical analyzer: writes the token stream of a source file as line/kind/lexeme records")
        .version(VERSION)
        .argument("<input>", "source file to lex")
        .option("-o, --output <file>", 'output file ("-" for stdout; default: <input>-lex)')
        .addOption(
            new Option("-f, --format <format>", "record format").choices([...RECORD_FORMATS]).default("lex")
        )
        .option(
            "--window-size <bytes>",
            "bytes read from the source per refill",
            parseWindowSize,
            DEFAULT_LEXER_OPTIONS.windowSize
        )
        .option("--no-color", "print diagnostics without ANSI colors")
        .option("--verbose", "log each step to stderr")
        .exitOverride()
        .configureOutput({
            writeOut: io.out,
            writeErr: io.err,
        })
        .action((input: string, options: CliOptions) => {
            try {
                lexFile(input, {
                    output: options.output,
                    format: options.format,
                    windowSize: options.windowSize,
                    log: options.verbose ? (message) => io.err(`${message}\n`) : undefined,
                    stdout: io.out,
                });
                onDone(0);
            } catch (error) {
                if (!(error instanceof LexerError)) throw error;
                io.err(`${formatDiagnostic(error, { color: options.color })}\n`);
                onDone(error.code);
            }
        });

    return program;
}

/**
 * Runs the CLI on `args` (without the node/script prefix) and returns the exit code:
 * 0 on success, otherwise the failing LexErrorCode.
 */
export function run(args: string[], io: CliIO = processIO): number {
    let exitCode: number = 0;
    const program = createProgram(io, (code) => {
        exitCode = code;
    });

    try {
        program.parse(args, { from: "user" });
    } catch (error) {
        if (!(error instanceof CommanderError)) throw error;
        // --help and --version come through here with exit code 0
        return error.exitCode === 0 ? 0 : LexErrorCode.IncorrectUsage;
    }
    return exitCode;
}
