import assert from 'node:assert'
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { after, before, describe, it } from 'node:test'
import { Kernel } from '@adonisjs/ace'
import ScanCommand from '../../src/commands/scan.ts'

interface LogLine {
	message: string
	stream: string
}

async function runScan(argv: string[]): Promise<{ command: ScanCommand; logs: LogLine[] }> {
	const kernel = Kernel.create()
	const command = await kernel.create(ScanCommand, argv)
	command.ui.switchMode('raw')
	await command.exec()
	return { command, logs: command.ui.logger.getLogs() }
}

function messages(logs: LogLine[], stream: 'stdout' | 'stderr'): string[] {
	return logs.filter((log) => log.stream === stream).map((log) => log.message)
}

describe('commands/scan', () => {
	let dir = ''

	before(() => {
		dir = mkdtempSync(join(tmpdir(), 'tokscope-'))
		writeFileSync(join(dir, 'assign.src'), 'x = 1')
		writeFileSync(join(dir, 'nested.src'), 'a\n  b\n    c\nd')
		writeFileSync(join(dir, 'broken.src'), 'x = "abc')
	})

	after(() => {
		rmSync(dir, { force: true, recursive: true })
	})

	it('should print one line per token', async () => {
		const { command, logs } = await runScan([join(dir, 'assign.src')])

		assert.strictEqual(command.exitCode, 0)
		assert.deepStrictEqual(messages(logs, 'stdout'), [
			'TOKEN["symbol", "x"]',
			'TOKEN["whitespace", " "]',
			'TOKEN["punctuation", "="]',
			'TOKEN["whitespace", " "]',
			'TOKEN["integer", 1]',
			'TOKEN["EOF"]',
		])
	})

	it('should emit a single dedent by default', async () => {
		const { logs } = await runScan([join(dir, 'nested.src')])
		const dedents = messages(logs, 'stdout').filter((line) => line.startsWith('TOKEN["DEDENT"'))

		assert.deepStrictEqual(dedents, ['TOKEN["DEDENT": 0]'])
	})

	it('should emit one dedent per level in stack mode', async () => {
		const { logs } = await runScan(['--indent-mode', 'stack', join(dir, 'nested.src')])
		const dedents = messages(logs, 'stdout').filter((line) => line.startsWith('TOKEN["DEDENT"'))

		assert.deepStrictEqual(dedents, ['TOKEN["DEDENT": 2]', 'TOKEN["DEDENT": 0]'])
	})

	it('should reject an unknown indent mode', async () => {
		const { command, logs } = await runScan(['--indent-mode', 'tabs', join(dir, 'assign.src')])

		assert.strictEqual(command.exitCode, 1)
		assert.deepStrictEqual(messages(logs, 'stdout'), [])
	})

	it('should fail with -1 when the filename is missing', async () => {
		const { command, logs } = await runScan([])
		const [error] = messages(logs, 'stderr')

		assert.strictEqual(command.exitCode, 255)
		assert.ok(error?.endsWith('[TKCLI001] Invalid number of arguments. Filename is required.'))
	})

	it('should fail with -1 when the file cannot be opened', async () => {
		const missing = join(dir, 'missing.src')
		const { command, logs } = await runScan([missing])
		const [error] = messages(logs, 'stderr')

		assert.strictEqual(command.exitCode, 255)
		assert.ok(error?.endsWith(`[TKCLI002] file not found: ${missing}`))
	})

	it('should report an unterminated literal and print no tokens', async () => {
		const { command, logs } = await runScan([join(dir, 'broken.src')])
		const [report] = messages(logs, 'stderr')

		assert.strictEqual(command.exitCode, 1)
		assert.deepStrictEqual(messages(logs, 'stdout'), [])
		assert.strictEqual(
			report?.split('\n')[0],
			'error[TKLEX001]: EOF encountered before closing literal quotes'
		)
	})
})
