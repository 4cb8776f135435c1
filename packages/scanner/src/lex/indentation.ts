/**
 * Indentation sub-scanner.
 *
 * Runs on every line terminator: measures the whitespace that opens the next
 * line and compares it with the indentation tracked so far.
 */

import { type SourcePosition, type Token, TokenKind } from '../core/tokens.ts'
import type { CharacterSource } from '../source/character-source.ts'
import { isWhitespace } from './classify.ts'
import type { LexCursor, ScanStep } from './cursor.ts'

/**
 * How indentation changes are tracked.
 * - 'single': compare with the previous measured line only; one token per line break
 * - 'stack': keep every open level; one Dedent per level closed
 */
export type IndentMode = 'single' | 'stack'

export interface IndentTracker {
	readonly mode: IndentMode
	/** Leading whitespace count of the most recently measured line. */
	current: number
	/** Open levels, innermost last. Only grows in 'stack' mode. */
	readonly levels: number[]
}

export function createIndentTracker(mode: IndentMode = 'single'): IndentTracker {
	return { current: 0, levels: [0], mode }
}

export function isIndentMode(value: string): value is IndentMode {
	return value === 'single' || value === 'stack'
}

/**
 * Counts the whitespace characters opening a line, one per character.
 * Stops before the next line terminator, a non-whitespace character or end of input.
 */
export function measureIndent(source: CharacterSource): number {
	let count = 0
	for (let next = source.peek(); next !== null && isWhitespace(next); next = source.peek()) {
		source.next()
		count++
	}
	return count
}

function resolveSingle(count: number, tracker: IndentTracker, start: SourcePosition): Token {
	if (count > tracker.current) {
		tracker.current = count
		return { ...start, kind: TokenKind.Indent, level: count }
	}
	if (count < tracker.current) {
		tracker.current = count
		return { ...start, kind: TokenKind.Dedent, level: count }
	}
	return { ...start, kind: TokenKind.EndOfLine }
}

function topLevel(tracker: IndentTracker): number {
	return tracker.levels[tracker.levels.length - 1] ?? 0
}

/**
 * Pops every level deeper than `count`. A count that falls between two
 * open levels becomes a level of its own.
 */
function resolveStack(count: number, tracker: IndentTracker, start: SourcePosition): Token[] {
	tracker.current = count

	if (count > topLevel(tracker)) {
		tracker.levels.push(count)
		return [{ ...start, kind: TokenKind.Indent, level: count }]
	}

	const tokens: Token[] = []
	while (topLevel(tracker) > count) {
		tracker.levels.pop()
		const below = topLevel(tracker)
		if (below < count) tracker.levels.push(count)
		tokens.push({ ...start, kind: TokenKind.Dedent, level: Math.max(below, count) })
	}

	if (tokens.length === 0) {
		tokens.push({ ...start, kind: TokenKind.EndOfLine })
	}
	return tokens
}

/**
 * Compares a measured count against the tracker, updating it.
 */
export function resolveIndent(
	count: number,
	tracker: IndentTracker,
	start: SourcePosition
): Token[] {
	if (tracker.mode === 'stack') return resolveStack(count, tracker, start)
	return [resolveSingle(count, tracker, start)]
}

export function readIndentation(_lead: string, cursor: LexCursor): ScanStep {
	const { source, indent, start } = cursor
	const count = measureIndent(source)
	const tokens = resolveIndent(count, indent, start)
	return { lookahead: source.next(), ok: true, tokens }
}
