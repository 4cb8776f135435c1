import assert from 'node:assert'
import { describe, it } from 'node:test'
import { TokenKind } from '../../src/core/tokens.ts'
import {
	createIndentTracker,
	isIndentMode,
	measureIndent,
	resolveIndent,
} from '../../src/lex/indentation.ts'
import { StringSource } from '../../src/source/character-source.ts'

const at = { column: 1, line: 1 }

describe('lex/indentation', () => {
	describe('createIndentTracker', () => {
		it('should start at level 0 in single mode', () => {
			assert.deepStrictEqual(createIndentTracker(), { current: 0, levels: [0], mode: 'single' })
		})

		it('should accept stack mode', () => {
			assert.strictEqual(createIndentTracker('stack').mode, 'stack')
		})
	})

	describe('isIndentMode', () => {
		it('should accept the two modes only', () => {
			assert.strictEqual(isIndentMode('single'), true)
			assert.strictEqual(isIndentMode('stack'), true)
			assert.strictEqual(isIndentMode('tabs'), false)
			assert.strictEqual(isIndentMode(''), false)
		})
	})

	describe('measureIndent', () => {
		it('should count whitespace up to the first other character', () => {
			const source = new StringSource(' \t x')
			assert.strictEqual(measureIndent(source), 3)
			assert.strictEqual(source.next(), 'x')
		})

		it('should stop before a line terminator', () => {
			const source = new StringSource('  \nx')
			assert.strictEqual(measureIndent(source), 2)
			assert.strictEqual(source.next(), '\n')
		})

		it('should stop at end of input', () => {
			const source = new StringSource('   ')
			assert.strictEqual(measureIndent(source), 3)
			assert.strictEqual(source.next(), null)
		})

		it('should return 0 when the line starts with content', () => {
			assert.strictEqual(measureIndent(new StringSource('x')), 0)
		})
	})

	describe('resolveIndent in single mode', () => {
		it('should indent, stay and dedent against the previous line only', () => {
			const tracker = createIndentTracker('single')

			assert.deepStrictEqual(resolveIndent(4, tracker, at), [
				{ ...at, kind: TokenKind.Indent, level: 4 },
			])
			assert.deepStrictEqual(resolveIndent(4, tracker, at), [{ ...at, kind: TokenKind.EndOfLine }])
			assert.deepStrictEqual(resolveIndent(1, tracker, at), [
				{ ...at, kind: TokenKind.Dedent, level: 1 },
			])
			assert.strictEqual(tracker.current, 1)
			assert.deepStrictEqual(tracker.levels, [0])
		})
	})

	describe('resolveIndent in stack mode', () => {
		it('should close every deeper level', () => {
			const tracker = createIndentTracker('stack')
			resolveIndent(2, tracker, at)
			resolveIndent(4, tracker, at)
			resolveIndent(8, tracker, at)

			const tokens = resolveIndent(0, tracker, at)
			assert.deepStrictEqual(
				tokens.map((token) => (token.kind === TokenKind.Dedent ? token.level : -1)),
				[4, 2, 0]
			)
			assert.deepStrictEqual(tracker.levels, [0])
			assert.strictEqual(tracker.current, 0)
		})

		it('should open a new level when a dedent lands between two levels', () => {
			const tracker = createIndentTracker('stack')
			resolveIndent(4, tracker, at)

			assert.deepStrictEqual(resolveIndent(2, tracker, at), [
				{ ...at, kind: TokenKind.Dedent, level: 2 },
			])
			assert.deepStrictEqual(tracker.levels, [0, 2])
		})

		it('should emit EOL when the level is unchanged', () => {
			const tracker = createIndentTracker('stack')
			resolveIndent(2, tracker, at)

			assert.deepStrictEqual(resolveIndent(2, tracker, at), [{ ...at, kind: TokenKind.EndOfLine }])
			assert.deepStrictEqual(tracker.levels, [0, 2])
		})
	})
})
