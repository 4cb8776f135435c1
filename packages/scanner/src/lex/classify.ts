/**
 * Character predicates and the lead-character classifier.
 * Only ASCII is recognized; every other character is Invalid.
 */

export const CharCategory = {
	CharLiteral: 'char-literal',
	Comment: 'comment',
	Identifier: 'identifier',
	Indentation: 'indentation',
	Integer: 'integer',
	Invalid: 'invalid',
	Punctuation: 'punctuation',
	StringLiteral: 'string-literal',
	Whitespace: 'whitespace',
} as const

export type CharCategory = (typeof CharCategory)[keyof typeof CharCategory]

export const LINE_TERMINATOR = '\n'
export const STRING_QUOTE = '"'
export const CHAR_QUOTE = "'"
export const ESCAPE = '\\'

const COMMENT_LEAD = '#'

export function isCommentLead(char: string): boolean {
	return char === COMMENT_LEAD
}

export function isIdentifierLead(char: string): boolean {
	return /^[A-Za-z_]$/.test(char)
}

export function isIdentifierPart(char: string): boolean {
	return /^[A-Za-z0-9_]$/.test(char)
}

export function isLineTerminator(char: string): boolean {
	return char === LINE_TERMINATOR
}

/** Intra-line whitespace: space, tab, vertical tab, form feed, carriage return. */
export function isWhitespace(char: string): boolean {
	return char === ' ' || char === '\t' || char === '\v' || char === '\f' || char === '\r'
}

export function isDigit(char: string): boolean {
	return /^[0-9]$/.test(char)
}

export function isHexDigit(char: string): boolean {
	return /^[0-9A-Fa-f]$/.test(char)
}

/** Printable ASCII that is neither alphanumeric nor space. */
export function isPunctuation(char: string): boolean {
	return /^[!-\/:-@\[-`{-~]$/.test(char)
}

/**
 * Picks the single category a lead character starts.
 * Tests run in priority order; the first match wins.
 */
export function classify(char: string): CharCategory {
	if (isCommentLead(char)) return CharCategory.Comment
	if (isIdentifierLead(char)) return CharCategory.Identifier
	if (isLineTerminator(char)) return CharCategory.Indentation
	if (isWhitespace(char)) return CharCategory.Whitespace
	if (char === STRING_QUOTE) return CharCategory.StringLiteral
	if (char === CHAR_QUOTE) return CharCategory.CharLiteral
	if (isDigit(char)) return CharCategory.Integer
	if (isPunctuation(char)) return CharCategory.Punctuation
	return CharCategory.Invalid
}
