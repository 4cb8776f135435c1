import { readFile } from 'node:fs/promises'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import {
	formatTokens,
	type IndentMode,
	type TokenizeSourceResult,
	tokenizeSource,
} from '@tokscope/scanner'
import {
	formatInvalidIndentModeError,
	formatMissingInputError,
	formatReadError,
	formatScanError,
	parseIndentMode,
	USAGE_EXIT_CODE,
} from '../utils.ts'

export default class ScanCommand extends BaseCommand {
	static override commandName = 'scan'
	static override description = 'Print the token stream of a source file, one token per line'

	@args.string({ description: 'Source file to scan', required: false })
	declare input?: string

	@flags.string({
		alias: 'm',
		default: 'single',
		description: 'Indentation tracking: single (previous line only) or stack (one DEDENT per level)',
	})
	declare indentMode: string

	private async readSourceFile(path: string): Promise<string | null> {
		try {
			return await readFile(path, 'utf-8')
		} catch (error: unknown) {
			this.logger.error(formatReadError(path, error))
			this.exitCode = USAGE_EXIT_CODE
			return null
		}
	}

	private resolveIndentMode(): IndentMode | null {
		const mode = parseIndentMode(this.indentMode)
		if (mode === null) {
			this.logger.error(formatInvalidIndentModeError(this.indentMode))
			this.exitCode = 1
		}
		return mode
	}

	private scanSource(
		source: string,
		filename: string,
		indentMode: IndentMode
	): TokenizeSourceResult | null {
		try {
			const result = tokenizeSource(source, { filename, indentMode })
			if (!result.succeeded) {
				this.logger.logError(result.context.formatAllDiagnostics())
				this.exitCode = 1
				return null
			}
			return result
		} catch (error: unknown) {
			this.logger.error(formatScanError(error))
			this.exitCode = 1
			return null
		}
	}

	override async run(): Promise<void> {
		if (this.input === undefined) {
			this.logger.error(formatMissingInputError())
			this.exitCode = USAGE_EXIT_CODE
			return
		}

		const indentMode = this.resolveIndentMode()
		if (indentMode === null) return

		const source = await this.readSourceFile(this.input)
		if (source === null) return

		const result = this.scanSource(source, this.input, indentMode)
		if (result === null) return

		for (const line of formatTokens(result.tokens)) {
			this.logger.log(line)
		}
	}
}
