/**
 * Quoted literal sub-scanners.
 *
 * Only the matching quote and the backslash itself can be escaped, and the
 * escape is kept verbatim: `"a\"b"` has the value `a\"b`. A backslash before
 * any other character is copied through with that character, so `\n` stays
 * two characters.
 */

import type { DiagnosticCode } from '../core/diagnostics.ts'
import { TokenKind } from '../core/tokens.ts'
import { CHAR_QUOTE, ESCAPE, isLineTerminator, STRING_QUOTE } from './classify.ts'
import { type LexCursor, type ScanFailure, type ScanOutcome, step } from './cursor.ts'

interface QuotedText {
	readonly ok: true
	readonly value: string
	readonly lookahead: string | null
}

function unterminated(code: DiagnosticCode, cursor: LexCursor, char: string | null): ScanFailure {
	return { code, found: char === null ? 'EOF' : 'EOL', ok: false, position: cursor.start }
}

function isUnterminated(char: string | null): char is null | '\n' {
	return char === null || isLineTerminator(char)
}

/**
 * Reads up to and including the closing `quote`.
 * A line terminator or end of input before it fails the literal.
 */
function readQuoted(
	quote: string,
	code: DiagnosticCode,
	cursor: LexCursor
): QuotedText | ScanFailure {
	const { source } = cursor
	let value = ''

	for (;;) {
		const char = source.next()
		if (isUnterminated(char)) return unterminated(code, cursor, char)
		if (char === quote) return { lookahead: source.next(), ok: true, value }

		if (char === ESCAPE) {
			const escaped = source.next()
			if (isUnterminated(escaped)) return unterminated(code, cursor, escaped)
			value += char + escaped
			continue
		}

		value += char
	}
}

export function readStringLiteral(_lead: string, cursor: LexCursor): ScanOutcome {
	const result = readQuoted(STRING_QUOTE, 'TKLEX001', cursor)
	if (!result.ok) return result
	return step(
		{ ...cursor.start, kind: TokenKind.StringLiteral, value: result.value },
		result.lookahead
	)
}

export function readCharLiteral(_lead: string, cursor: LexCursor): ScanOutcome {
	const result = readQuoted(CHAR_QUOTE, 'TKLEX002', cursor)
	if (!result.ok) return result
	return step(
		{ ...cursor.start, kind: TokenKind.CharLiteral, value: result.value },
		result.lookahead
	)
}
