import type { SourcePosition } from '../core/tokens.ts'

/**
 * Sequential character reader with one character of lookahead.
 * `null` is the end-of-input value; reading past the end keeps returning it.
 */
export interface CharacterSource {
	/** Returns the next character without consuming it. */
	peek(): string | null
	/** Consumes and returns the next character. */
	next(): string | null
	/** Position of the character most recently returned by `next()`. */
	readonly mark: SourcePosition
}

/**
 * UTF-8 Byte Order Mark (BOM) character.
 * Sometimes added by editors; never part of the scanned text.
 */
const UTF8_BOM = '\uFEFF'

function stripBom(text: string): string {
	return text.startsWith(UTF8_BOM) ? text.slice(1) : text
}

/**
 * In-memory character source over a string, read one code point at a time.
 */
export class StringSource implements CharacterSource {
	private readonly chars: readonly string[]
	private index = 0
	private line = 1
	private column = 1
	private lastPosition: SourcePosition = { column: 1, line: 1 }

	constructor(text: string) {
		this.chars = Array.from(stripBom(text))
	}

	peek(): string | null {
		return this.chars[this.index] ?? null
	}

	next(): string | null {
		this.lastPosition = { column: this.column, line: this.line }
		const char = this.chars[this.index]
		if (char === undefined) return null

		this.index++
		if (char === '\n') {
			this.line++
			this.column = 1
		} else {
			this.column++
		}
		return char
	}

	get mark(): SourcePosition {
		return this.lastPosition
	}
}
