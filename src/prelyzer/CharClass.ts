// Byte predicates. END (-1) and bytes above 0x7f fail every check.

export function isWhitespace(c: number): boolean {
    // space \t \n \v \f \r
    return c === 0x20 || (c >= 0x09 && c <= 0x0d);
}

export function isDigit(c: number): boolean {
    return c >= 0x30 && c <= 0x39;
}

export function isUpper(c: number): boolean {
    return c >= 0x41 && c <= 0x5a;
}

export function isLower(c: number): boolean {
    return c >= 0x61 && c <= 0x7a;
}

export function isNameChar(c: number): boolean {
    return isDigit(c) || isUpper(c) || isLower(c) || c === 0x5f;
}

export function charCode(ch: string): number {
    return ch.charCodeAt(0);
}
