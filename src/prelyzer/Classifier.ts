import { INT32_MAX, TokenKind, type Token } from "../types/Lexer.js";
import { type ErrorSite, LexErrorCode, LexerError } from "../types/Errors.js";
import { charCode, isDigit, isUpper } from "./CharClass.js";

const KEYWORDS: ReadonlyMap<string, TokenKind> = new Map(
    [
        TokenKind.Class,
        TokenKind.Else,
        TokenKind.False,
        TokenKind.Fi,
        TokenKind.If,
        TokenKind.In,
        TokenKind.Inherits,
        TokenKind.IsVoid,
        TokenKind.Let,
        TokenKind.Loop,
        TokenKind.Pool,
        TokenKind.Then,
        TokenKind.While,
        TokenKind.Case,
        TokenKind.Esac,
        TokenKind.New,
        TokenKind.Of,
        TokenKind.Not,
        TokenKind.True,
    ].map((kind): [string, TokenKind] => [kind, kind])
);

/** Case-insensitive keyword lookup. */
export function lookupKeyword(span: string): TokenKind | null {
    return KEYWORDS.get(span.toLowerCase()) ?? null;
}

/** Decimal literal that fits a signed 32-bit integer, with no sign. */
export function isInteger32(span: string): boolean {
    if (span.length === 0 || span.length > 10) return false;

    for (let i = 0; i < span.length; i++) {
        if (!isDigit(span.charCodeAt(i))) return false;
    }

    if (span.length === 10 && span.charCodeAt(0) > charCode("2")) return false;

    return Number(span) <= INT32_MAX;
}

/**
 * Turns a scanned name/number span into its token.
 * Throws for a malformed integer or a keyword spelled with a capital first letter.
 */
export function classifySpan(span: string, site: ErrorSite): Token {
    const first = charCode(span);

    if (isDigit(first)) {
        if (isInteger32(span)) {
            return { kind: TokenKind.Integer, line: site.line, lexeme: span };
        }
        throw new LexerError(
            LexErrorCode.WrongInteger32Format,
            `${span} is not a positive 32-bit signed integer (max value allowed ${INT32_MAX})`,
            site
        );
    }

    const keyword = lookupKeyword(span);
    if (keyword !== null) {
        // Applies to every keyword, not just true/false.
        if (isUpper(first)) {
            throw new LexerError(
                LexErrorCode.UppercaseBooleanKeyword,
                `keyword ${keyword} may not start with a capital letter`,
                site
            );
        }
        return { kind: keyword, line: site.line };
    }

    if (isUpper(first)) {
        return { kind: TokenKind.Type, line: site.line, lexeme: span };
    }
    return { kind: TokenKind.Identifier, line: site.line, lexeme: span };
}
