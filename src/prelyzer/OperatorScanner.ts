import { TokenKind } from "../types/Lexer.js";
import type { SourceCursor } from "./SourceCursor.js";

const SINGLE: ReadonlyMap<string, TokenKind> = new Map([
    ["(", TokenKind.LParen],
    [")", TokenKind.RParen],
    ["*", TokenKind.Times],
    ["+", TokenKind.Plus],
    [",", TokenKind.Comma],
    ["-", TokenKind.Minus],
    [".", TokenKind.Dot],
    ["/", TokenKind.Divide],
    [":", TokenKind.Colon],
    [";", TokenKind.Semi],
    ["@", TokenKind.At],
    ["{", TokenKind.LBrace],
    ["}", TokenKind.RBrace],
    ["~", TokenKind.Tilde],
]);

/**
 * Recognizes the operator starting at the byte just consumed.
 * `<-`, `<=` and `=>` take one more byte; the lone `<`/`=` leave the
 * lookahead untouched.
 *
 * @returns null when the byte starts no operator.
 */
export function scanOperator(cursor: SourceCursor): TokenKind | null {
    const ch = String.fromCharCode(cursor.current());

    switch (ch) {
        case "<":
            switch (String.fromCharCode(cursor.peek())) {
                case "-":
                    cursor.advance();
                    return TokenKind.LArrow;
                case "=":
                    cursor.advance();
                    return TokenKind.Le;
                default:
                    return TokenKind.Lt;
            }

        case "=":
            if (cursor.peek() === 0x3e /* > */) {
                cursor.advance();
                return TokenKind.RArrow;
            }
            return TokenKind.Equals;

        default:
            return SINGLE.get(ch) ?? null;
    }
}
