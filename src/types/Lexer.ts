// --- 1. Token model ---

export enum TokenKind {
    LParen = "lparen",
    RParen = "rparen",
    Times = "times",
    Plus = "plus",
    Comma = "comma",
    Minus = "minus",
    Dot = "dot",
    Divide = "divide",
    Colon = "colon",
    Semi = "semi",
    LArrow = "larrow",
    Le = "le",
    Lt = "lt",
    RArrow = "rarrow",
    Equals = "equals",
    At = "at",
    LBrace = "lbrace",
    RBrace = "rbrace",
    Tilde = "tilde",

    String = "string",
    Integer = "integer",
    Identifier = "identifier",
    Type = "type",

    Class = "class",
    Else = "else",
    False = "false",
    Fi = "fi",
    If = "if",
    In = "in",
    Inherits = "inherits",
    IsVoid = "isvoid",
    Let = "let",
    Loop = "loop",
    Pool = "pool",
    Then = "then",
    While = "while",
    Case = "case",
    Esac = "esac",
    New = "new",
    Of = "of",
    Not = "not",
    True = "true",
}

/** Kinds whose record carries the scanned text. */
export type LexemeKind = TokenKind.String | TokenKind.Integer | TokenKind.Identifier | TokenKind.Type;

export interface Token {
    readonly kind: TokenKind;
    readonly line: number; // line of the token's first character, 1-based
    readonly lexeme?: string;
}

export function carriesLexeme(kind: TokenKind): kind is LexemeKind {
    return (
        kind === TokenKind.String ||
        kind === TokenKind.Integer ||
        kind === TokenKind.Identifier ||
        kind === TokenKind.Type
    );
}

// --- 2. Options ---

export const ENCODING = "latin1";

export interface LexerOptions {
    /** Bytes fetched from the source per refill. */
    windowSize: number;
    maxNameLength: number;
    maxStringLength: number;
}

/** The options that belong to the scanner rather than to the cursor. */
export type ScanLimits = Pick<LexerOptions, "maxNameLength" | "maxStringLength">;

export const DEFAULT_LEXER_OPTIONS: Readonly<LexerOptions> = {
    windowSize: 4096,
    maxNameLength: 1024,
    maxStringLength: 1024,
};

export const INT32_MAX = 2147483647;

/** Receives tokens in source order as the lexer produces them. */
export interface TokenSink {
    write(token: Token): void;
}
