import { END, type SourceCursor } from "./SourceCursor.js";

const DASH = 0x2d;
const LPAREN = 0x28;
const RPAREN = 0x29;
const STAR = 0x2a;
const NEWLINE = 0x0a;

/**
 * Skips a comment that starts at the byte just consumed.
 *
 * - `-- ...` runs through the end of the line (newline included) or end of input.
 * - `(* ... *)` runs through the first `*)`. Not nestable. The search starts at the
 *   opening `(`, so `(*)` already counts as closed. An unterminated block comment
 *   swallows the rest of the input without complaint.
 *
 * @returns false when the cursor is not at a comment; nothing is consumed then.
 */
export function skipComment(cursor: SourceCursor): boolean {
    let c = cursor.current();

    if (c === DASH && cursor.peek() === DASH) {
        do {
            c = cursor.advance();
        } while (c !== NEWLINE && c !== END);
        return true;
    }

    if (c === LPAREN && cursor.peek() === STAR) {
        while (c !== END) {
            if (c === STAR && cursor.peek() === RPAREN) break;
            c = cursor.advance();
        }
        // eat ')' (no-op at end of input)
        cursor.advance();
        return true;
    }

    return false;
}
