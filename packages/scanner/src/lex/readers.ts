/**
 * Sub-scanners for the single-run token categories:
 * identifiers, integers, whitespace, comments and invalid characters.
 */

import { TokenKind } from '../core/tokens.ts'
import type { CharacterSource } from '../source/character-source.ts'
import {
	isDigit,
	isHexDigit,
	isIdentifierPart,
	isLineTerminator,
	isWhitespace,
} from './classify.ts'
import { type LexCursor, type ScanStep, step } from './cursor.ts'

/**
 * Consumes characters while `accept` holds, appending them to `prefix`.
 * Returns the collected run and the first rejected character.
 */
function consumeWhile(
	source: CharacterSource,
	prefix: string,
	accept: (char: string) => boolean
): { text: string; lookahead: string | null } {
	let text = prefix
	let char = source.next()
	while (char !== null && accept(char)) {
		text += char
		char = source.next()
	}
	return { lookahead: char, text }
}

export function readIdentifier(lead: string, cursor: LexCursor): ScanStep {
	const { text, lookahead } = consumeWhile(cursor.source, lead, isIdentifierPart)
	return step({ ...cursor.start, kind: TokenKind.Symbol, lexeme: text }, lookahead)
}

function isHexPrefix(char: string | null): boolean {
	return char === 'x' || char === 'X'
}

/** Decimal run, or `0x`/`0X` followed by a hex run. */
export function readInteger(lead: string, cursor: LexCursor): ScanStep {
	const { source } = cursor
	let prefix = lead
	let accept = isDigit

	const marker = source.peek()
	if (lead === '0' && marker !== null && isHexPrefix(marker)) {
		source.next()
		prefix += marker
		accept = isHexDigit
	}

	const { text, lookahead } = consumeWhile(source, prefix, accept)
	return step({ ...cursor.start, kind: TokenKind.Integer, lexeme: text }, lookahead)
}

export function readWhitespace(_lead: string, cursor: LexCursor): ScanStep {
	const { lookahead } = consumeWhile(cursor.source, '', isWhitespace)
	return step({ ...cursor.start, kind: TokenKind.Whitespace }, lookahead)
}

/**
 * Discards a `#` comment through its line terminator.
 * The whole comment collapses into one EndOfLine; the next line's
 * indentation is not measured.
 */
export function readComment(_lead: string, cursor: LexCursor): ScanStep {
	const { source } = cursor
	let char = source.next()
	while (char !== null && !isLineTerminator(char)) {
		char = source.next()
	}
	return step({ ...cursor.start, kind: TokenKind.EndOfLine }, source.next())
}

export function readInvalid(lead: string, cursor: LexCursor): ScanStep {
	return step({ ...cursor.start, char: lead, kind: TokenKind.Invalid }, cursor.source.next())
}
