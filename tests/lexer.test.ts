import { afterEach, describe, it, expect } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { Lexer, tokenizeFile, tokenizeText } from '../src/prelyzer/Lexer.js';
import { MemorySource, SourceCursor } from '../src/prelyzer/SourceCursor.js';
import { LexErrorCode, LexerError } from '../src/types/Errors.js';
import type { Token } from '../src/types/Lexer.js';
import { kinds, lex, lexError, makeTempDir } from './testUtils.js';

const PROGRAM = [
	'class Main inherits IO {',
	'  main(): Object { out_string("hi\\n") };',
	'};',
	'',
].join('\n');

const LARGER = [
	'(* a list *)',
	'class List {',
	'  isNil() : Bool { true };',
	'  head()  : Int { { abort(); 0; } };',
	'  cons(i : Int) : List {',
	'    (new Cons).init(i, self)',
	'  };',
	'};',
	'-- loops',
	'x <- if n <= 0 then ~1 else case y of z : Int => isvoid z; esac fi;',
	'while not done loop count <- count + 1 pool;',
	'let s : String <- "multi \\',
	'line" in s @ Object.copy();',
	'',
].join('\n');

describe('lexer', () => {
	it('tokenizes a small class', () => {
		expect(lex(PROGRAM)).toEqual([
			{ kind: 'class', line: 1 },
			{ kind: 'type', line: 1, lexeme: 'Main' },
			{ kind: 'inherits', line: 1 },
			{ kind: 'type', line: 1, lexeme: 'IO' },
			{ kind: 'lbrace', line: 1 },
			{ kind: 'identifier', line: 2, lexeme: 'main' },
			{ kind: 'lparen', line: 2 },
			{ kind: 'rparen', line: 2 },
			{ kind: 'colon', line: 2 },
			{ kind: 'type', line: 2, lexeme: 'Object' },
			{ kind: 'lbrace', line: 2 },
			{ kind: 'identifier', line: 2, lexeme: 'out_string' },
			{ kind: 'lparen', line: 2 },
			{ kind: 'string', line: 2, lexeme: 'hi\\n' },
			{ kind: 'rparen', line: 2 },
			{ kind: 'rbrace', line: 2 },
			{ kind: 'semi', line: 2 },
			{ kind: 'rbrace', line: 3 },
			{ kind: 'semi', line: 3 },
		]);
	});

	it('records the line a token starts on', () => {
		expect(lex('a\n\nb\r\nc').map(t => t.line)).toEqual([1, 3, 4]);
	});

	it('a one-byte window gives the same stream as the default', () => {
		const expected = lex(LARGER);
		expect(expected.length).toBeGreaterThan(60);
		expect(lex(LARGER, { windowSize: 1 })).toEqual(expected);
		expect(lex(LARGER, { windowSize: 7 })).toEqual(expected);
	});

	it('covers every keyword', () => {
		expect(kinds('class else false fi if in inherits isvoid let loop pool then while case esac new of not true')).toEqual([
			'class', 'else', 'false', 'fi', 'if', 'in', 'inherits', 'isvoid', 'let', 'loop',
			'pool', 'then', 'while', 'case', 'esac', 'new', 'of', 'not', 'true',
		]);
	});

	it('string continuation keeps later line numbers right', () => {
		const tokens = lex(LARGER);
		const str = tokens.find(t => t.kind === 'string');
		expect(str).toEqual({ kind: 'string', line: 12, lexeme: 'multi line' });
		expect(tokens[tokens.length - 1]).toEqual({ kind: 'semi', line: 13 });
	});

	it('run writes tokens to the sink until the first error', () => {
		const seen: Token[] = [];
		const lexer = new Lexer(new SourceCursor(new MemorySource('a b # c', 'sink.cl')));
		expect(() => lexer.run({ write: t => seen.push(t) })).toThrow(LexerError);
		expect(seen.map(t => t.lexeme)).toEqual(['a', 'b']);
	});

	it('run returns the token count', () => {
		const lexer = new Lexer(new SourceCursor(new MemorySource('x <- 1;')));
		const seen: Token[] = [];
		expect(lexer.run({ write: t => seen.push(t) })).toBe(4);
		expect(seen).toHaveLength(4);
	});

	it('next returns null at end of input', () => {
		const lexer = new Lexer(new SourceCursor(new MemorySource('-- only a comment')));
		expect(lexer.next()).toBeNull();
		expect(lexer.next()).toBeNull();
	});

	it('rejects scan limits below 1 up front', () => {
		const cursor = new SourceCursor(new MemorySource('x'));
		expect(() => new Lexer(cursor, { maxNameLength: 0 })).toThrow(
			new RangeError('name length limit must be a positive integer, got 0')
		);
		expect(() => lex('"s"', { maxStringLength: 0 })).toThrow(
			new RangeError('string length limit must be a positive integer, got 0')
		);
	});

	it('applies the scan limits it is given', () => {
		expect(lexError('abc', { maxNameLength: 2 }).code).toBe(LexErrorCode.IdentifierNameTooLong);
		expect(lex('ab', { maxNameLength: 2 })).toEqual([{ kind: 'identifier', line: 1, lexeme: 'ab' }]);
	});

	it('errors name the source and line', () => {
		let err: unknown;
		try { tokenizeText('ok\n\n  "bad\n"', 'prog.cl'); } catch (e) { err = e; }
		expect(err).toBeInstanceOf(LexerError);
		if (!(err instanceof LexerError)) return;
		expect(err.site).toEqual({ file: 'prog.cl', line: 3 });
		expect(err.code).toBe(LexErrorCode.NonEscapedNewline);
	});

	it('one fatal error per kind', () => {
		expect(lexError('a'.repeat(1025)).kind).toBe('IdentifierNameTooLong');
		expect(lexError(`"${'a'.repeat(1025)}"`).kind).toBe('StringLiteralTooLong');
		expect(lexError('4294967296').kind).toBe('WrongInteger32Format');
		expect(lexError('Class').kind).toBe('UppercaseBooleanKeyword');
		expect(lexError('[').kind).toBe('InvalidCharacter');
		expect(lexError('"abc').kind).toBe('InvalidStringCharacter');
		expect(lexError('"a\nb"').kind).toBe('NonEscapedNewline');
	});
});

describe('tokenizeFile', () => {
	let dir = '';
	afterEach(() => { if (dir) fs.rmSync(dir, { recursive: true, force: true }); dir = ''; });

	it('lexes a file from disk', () => {
		dir = makeTempDir();
		const file = path.join(dir, 'main.cl');
		fs.writeFileSync(file, PROGRAM);
		expect(tokenizeFile(file, { windowSize: 3 })).toEqual(lex(PROGRAM));
	});

	it('missing file is a FileIO error', () => {
		dir = makeTempDir();
		expect(() => tokenizeFile(path.join(dir, 'nope.cl'))).toThrow(/could not open file/);
	});
});
