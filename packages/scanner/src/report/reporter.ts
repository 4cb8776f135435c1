/**
 * Renders tokens in the line format used for golden-file comparison:
 *
 * ```
 * TOKEN["symbol", "x"]
 * TOKEN["whitespace", " "]
 * TOKEN["punctuation", "="]
 * TOKEN["EOF"]
 * ```
 */

import { type Token, TokenKind, type TokenStream } from '../core/tokens.ts'

function assertNever(token: never): never {
	throw new Error(`Unknown token kind: ${JSON.stringify(token)}`)
}

export function formatToken(token: Token): string {
	switch (token.kind) {
		case TokenKind.Symbol:
			return `TOKEN["symbol", "${token.lexeme}"]`
		case TokenKind.Integer:
			return `TOKEN["integer", ${token.lexeme}]`
		case TokenKind.StringLiteral:
			return `TOKEN["literal", "${token.value}"]`
		case TokenKind.CharLiteral:
			return `TOKEN["constant literal", "${token.value}"]`
		case TokenKind.Punctuation:
			return `TOKEN["punctuation", "${token.lexeme}"]`
		case TokenKind.Whitespace:
			return 'TOKEN["whitespace", " "]'
		case TokenKind.EndOfLine:
			return 'TOKEN["EOL"]'
		case TokenKind.Indent:
			return `TOKEN["INDENT": ${token.level}]`
		case TokenKind.Dedent:
			return `TOKEN["DEDENT": ${token.level}]`
		case TokenKind.EndOfFile:
			return 'TOKEN["EOF"]'
		// The invalid character is printed as its code point; it may not be printable.
		case TokenKind.Invalid:
			return `TOKEN["INVALID"${token.char.codePointAt(0) ?? 0}`
		default:
			return assertNever(token)
	}
}

/** One rendered line per token, in stream order. */
export function formatTokens(tokens: Iterable<Token>): string[] {
	return Array.from(tokens, formatToken)
}

export function formatStream(stream: TokenStream): string[] {
	return Array.from(stream, ([, token]) => formatToken(token))
}
