import { type Diagnostic, ScanContext } from '../core/context.ts'
import { type Token, TokenKind } from '../core/tokens.ts'
import { StringSource } from '../source/character-source.ts'
import { CharCategory, classify } from './classify.ts'
import type { LexCursor, SubScanner } from './cursor.ts'
import { createIndentTracker, type IndentMode, readIndentation } from './indentation.ts'
import { readCharLiteral, readStringLiteral } from './literals.ts'
import { readPunctuation } from './punctuation.ts'
import { readComment, readIdentifier, readInteger, readInvalid, readWhitespace } from './readers.ts'

export interface ScanOptions {
	/** Indentation tracking, 'single' by default. */
	indentMode?: IndentMode
}

export interface ScanResult {
	succeeded: boolean
}

const SUB_SCANNERS: Readonly<Record<CharCategory, SubScanner>> = {
	[CharCategory.CharLiteral]: readCharLiteral,
	[CharCategory.Comment]: readComment,
	[CharCategory.Identifier]: readIdentifier,
	[CharCategory.Indentation]: readIndentation,
	[CharCategory.Integer]: readInteger,
	[CharCategory.Invalid]: readInvalid,
	[CharCategory.Punctuation]: readPunctuation,
	[CharCategory.StringLiteral]: readStringLiteral,
	[CharCategory.Whitespace]: readWhitespace,
}

/**
 * Scans the context's source text into `context.tokens` in a single pass.
 *
 * Each lead character is classified once and handed to its sub-scanner, which
 * returns the next lookahead; no position is read twice. A completed scan ends
 * with exactly one EndOfFile token. An unterminated literal stops the scan where
 * it was found, reports a diagnostic and appends nothing further.
 *
 * Characters are always read from `context.source`, so diagnostic excerpts
 * quote the text that was scanned.
 */
export function scan(context: ScanContext, options: ScanOptions = {}): ScanResult {
	const { indentMode = 'single' } = options
	const indent = createIndentTracker(indentMode)
	const source = new StringSource(context.source)

	let lookahead = source.next()
	while (lookahead !== null) {
		const cursor: LexCursor = { indent, source, start: source.mark }
		const outcome = SUB_SCANNERS[classify(lookahead)](lookahead, cursor)

		if (!outcome.ok) {
			const { line, column } = outcome.position
			context.emit(outcome.code, line, column, { found: outcome.found })
			return { succeeded: false }
		}

		for (const token of outcome.tokens) {
			context.tokens.add(token)
		}
		lookahead = outcome.lookahead
	}

	context.tokens.add({ ...source.mark, kind: TokenKind.EndOfFile })
	return { succeeded: !context.hasErrors() }
}

export interface TokenizeOptions extends ScanOptions {
	/** Source filename for error messages */
	filename?: string
}

export interface TokenizeSourceResult {
	readonly succeeded: boolean
	readonly tokens: readonly Token[]
	readonly diagnostics: readonly Diagnostic[]
	readonly context: ScanContext
}

/**
 * Scans a string in a fresh context.
 */
export function tokenizeSource(source: string, options: TokenizeOptions = {}): TokenizeSourceResult {
	const { filename, ...scanOptions } = options
	const context = new ScanContext(source, filename)
	const { succeeded } = scan(context, scanOptions)
	return {
		context,
		diagnostics: context.getDiagnostics(),
		succeeded,
		tokens: context.tokens.toArray(),
	}
}
