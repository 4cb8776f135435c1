/**
 * Punctuation sub-scanner (maximal munch).
 */

import { TokenKind } from '../core/tokens.ts'
import { type LexCursor, type ScanStep, step } from './cursor.ts'

/**
 * Every multi-character punctuator. Each three-character entry extends a
 * two-character one, so growing the lexeme one peeked character at a time
 * finds the longest match without backtracking.
 *
 * `..` is accepted here; rejecting it is left to a parser.
 * `##` is listed but never scanned: `#` always opens a comment.
 */
export const MULTI_CHAR_PUNCTUATORS: ReadonlySet<string> = new Set([
	'!=',
	'##',
	'%=',
	'&&',
	'&=',
	'*=',
	'++',
	'+=',
	'--',
	'-=',
	'->',
	'->*',
	'..',
	'...',
	'/=',
	'::',
	'<=',
	'<<',
	'<<=',
	'==',
	'>=',
	'>>',
	'>>=',
	'||',
	'|=',
])

export const MAX_PUNCTUATOR_LENGTH = 3

export function readPunctuation(lead: string, cursor: LexCursor): ScanStep {
	const { source } = cursor
	let lexeme = lead

	while (lexeme.length < MAX_PUNCTUATOR_LENGTH) {
		const next = source.peek()
		if (next === null || !MULTI_CHAR_PUNCTUATORS.has(lexeme + next)) break
		source.next()
		lexeme += next
	}

	return step({ ...cursor.start, kind: TokenKind.Punctuation, lexeme }, source.next())
}
