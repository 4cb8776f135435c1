import assert from 'node:assert'
import { describe, it } from 'node:test'
import {
	formatCliDiagnostic,
	formatInvalidIndentModeError,
	formatMissingInputError,
	formatReadError,
	formatScanError,
	getErrorMessage,
	isNodeError,
	parseIndentMode,
	resolveArgv,
	USAGE_EXIT_CODE,
} from '../src/utils.ts'

const commands = new Set(['scan', 'help'])

describe('isNodeError', () => {
	it('should return true for Error with code property', () => {
		const error: NodeJS.ErrnoException = new Error('test')
		error.code = 'ENOENT'
		assert.strictEqual(isNodeError(error), true)
	})

	it('should return false for plain Error', () => {
		assert.strictEqual(isNodeError(new Error('test')), false)
	})

	it('should return false for non-Error', () => {
		assert.strictEqual(isNodeError('string'), false)
		assert.strictEqual(isNodeError(null), false)
		assert.strictEqual(isNodeError(undefined), false)
	})
})

describe('getErrorMessage', () => {
	it('should extract message from Error', () => {
		assert.strictEqual(getErrorMessage(new Error('test message')), 'test message')
	})

	it('should convert non-Error to string', () => {
		assert.strictEqual(getErrorMessage('string error'), 'string error')
		assert.strictEqual(getErrorMessage(42), '42')
	})
})

describe('formatCliDiagnostic', () => {
	it('should prefix the interpolated message with its code', () => {
		assert.strictEqual(
			formatCliDiagnostic('TKCLI002', { path: 'a.src' }),
			'[TKCLI002] file not found: a.src'
		)
	})
})

describe('formatMissingInputError', () => {
	it('should report the missing filename', () => {
		assert.strictEqual(
			formatMissingInputError(),
			'[TKCLI001] Invalid number of arguments. Filename is required.'
		)
	})

	it('should exit with -1 as an 8-bit status', () => {
		assert.strictEqual(USAGE_EXIT_CODE, 255)
	})
})

describe('formatReadError', () => {
	it('should format ENOENT as file not found', () => {
		const error: NodeJS.ErrnoException = new Error('no such file')
		error.code = 'ENOENT'
		assert.strictEqual(
			formatReadError('/path/to/file.src', error),
			'[TKCLI002] file not found: /path/to/file.src'
		)
	})

	it('should format other errors with generic message', () => {
		const error: NodeJS.ErrnoException = new Error('permission denied')
		error.code = 'EACCES'
		assert.strictEqual(
			formatReadError('/path/to/file.src', error),
			'[TKCLI003] cannot read file: permission denied'
		)
	})
})

describe('formatInvalidIndentModeError', () => {
	it('should quote the rejected mode', () => {
		assert.strictEqual(
			formatInvalidIndentModeError('tabs'),
			'[TKCLI004] unknown indent mode "tabs"'
		)
	})
})

describe('formatScanError', () => {
	it('should wrap unexpected errors', () => {
		assert.strictEqual(formatScanError(new Error('boom')), '[TKCLI005] scan failed: boom')
	})
})

describe('parseIndentMode', () => {
	it('should accept known modes', () => {
		assert.strictEqual(parseIndentMode('single'), 'single')
		assert.strictEqual(parseIndentMode('stack'), 'stack')
	})

	it('should reject other values', () => {
		assert.strictEqual(parseIndentMode('STACK'), null)
		assert.strictEqual(parseIndentMode(''), null)
	})
})

describe('resolveArgv', () => {
	it('should route a bare filename to scan', () => {
		assert.deepStrictEqual(resolveArgv(['main.src'], commands), ['scan', 'main.src'])
	})

	it('should route an empty argument list to scan', () => {
		assert.deepStrictEqual(resolveArgv([], commands), ['scan'])
	})

	it('should route scan flags to scan', () => {
		assert.deepStrictEqual(resolveArgv(['--indent-mode', 'stack', 'a.src'], commands), [
			'scan',
			'--indent-mode',
			'stack',
			'a.src',
		])
	})

	it('should keep explicit commands', () => {
		assert.deepStrictEqual(resolveArgv(['scan', 'a.src'], commands), ['scan', 'a.src'])
		assert.deepStrictEqual(resolveArgv(['help'], commands), ['help'])
	})

	it('should keep the version flag', () => {
		assert.deepStrictEqual(resolveArgv(['--version'], commands), ['--version'])
		assert.deepStrictEqual(resolveArgv(['-v'], commands), ['-v'])
	})

	it('should route a bare help flag to scan', () => {
		assert.deepStrictEqual(resolveArgv(['--help'], commands), ['scan', '--help'])
		assert.deepStrictEqual(resolveArgv(['-h'], commands), ['scan', '-h'])
	})
})
