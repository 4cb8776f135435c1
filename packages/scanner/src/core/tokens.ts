/**
 * Token model and append-only token stream.
 * Tokens are plain immutable values; the stream hands out integer IDs.
 */

/** Token kinds - small integer discriminant. */
export const TokenKind = {
	CharLiteral: 103,
	Dedent: 1,
	EndOfFile: 255,
	EndOfLine: 2,
	Indent: 0,
	Integer: 101,
	Invalid: 254,
	Punctuation: 104,
	StringLiteral: 102,
	Symbol: 100,
	Whitespace: 3,
} as const

export type TokenKind = (typeof TokenKind)[keyof typeof TokenKind]

export type TokenId = number & { readonly __brand: 'TokenId' }

export function tokenId(n: number): TokenId {
	return n as TokenId
}

/** 1-indexed position of a token's first character. */
export interface SourcePosition {
	readonly line: number
	readonly column: number
}

export interface SymbolToken extends SourcePosition {
	readonly kind: typeof TokenKind.Symbol
	readonly lexeme: string
}

export interface IntegerToken extends SourcePosition {
	readonly kind: typeof TokenKind.Integer
	readonly lexeme: string
}

/** Escaped quotes and backslashes are kept verbatim in `value`. */
export interface StringLiteralToken extends SourcePosition {
	readonly kind: typeof TokenKind.StringLiteral
	readonly value: string
}

export interface CharLiteralToken extends SourcePosition {
	readonly kind: typeof TokenKind.CharLiteral
	readonly value: string
}

export interface PunctuationToken extends SourcePosition {
	readonly kind: typeof TokenKind.Punctuation
	readonly lexeme: string
}

export interface WhitespaceToken extends SourcePosition {
	readonly kind: typeof TokenKind.Whitespace
}

export interface EndOfLineToken extends SourcePosition {
	readonly kind: typeof TokenKind.EndOfLine
}

export interface IndentToken extends SourcePosition {
	readonly kind: typeof TokenKind.Indent
	readonly level: number
}

export interface DedentToken extends SourcePosition {
	readonly kind: typeof TokenKind.Dedent
	readonly level: number
}

export interface EndOfFileToken extends SourcePosition {
	readonly kind: typeof TokenKind.EndOfFile
}

export interface InvalidToken extends SourcePosition {
	readonly kind: typeof TokenKind.Invalid
	readonly char: string
}

export type Token =
	| SymbolToken
	| IntegerToken
	| StringLiteralToken
	| CharLiteralToken
	| PunctuationToken
	| WhitespaceToken
	| EndOfLineToken
	| IndentToken
	| DedentToken
	| EndOfFileToken
	| InvalidToken

/**
 * Ordered token storage.
 * Append-only while scanning, read-only once handed to a reporter.
 */
export class TokenStream {
	private readonly tokens: Token[] = []

	add(token: Token): TokenId {
		const id = tokenId(this.tokens.length)
		this.tokens.push(token)
		return id
	}

	get(id: TokenId): Token {
		const token = this.tokens[id]
		if (token === undefined) {
			throw new Error(`Invalid TokenId: ${id}`)
		}
		return token
	}

	count(): number {
		return this.tokens.length
	}

	*[Symbol.iterator](): Generator<[TokenId, Token]> {
		for (let i = 0; i < this.tokens.length; i++) {
			const token = this.tokens[i]
			if (token !== undefined) yield [tokenId(i), token]
		}
	}

	toArray(): readonly Token[] {
		return this.tokens.slice()
	}
}
