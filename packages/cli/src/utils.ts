import {
	type CliDiagnosticCode,
	type DiagnosticArgs,
	getDiagnostic,
	interpolateMessage,
} from '@tokscope/diagnostics'
import { type IndentMode, isIndentMode } from '@tokscope/scanner'

/**
 * Exit status for usage and file errors: -1 as an 8-bit process status.
 */
export const USAGE_EXIT_CODE = 255

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

/** `[CODE] message` line for a CLI diagnostic. */
export function formatCliDiagnostic(code: CliDiagnosticCode, args?: DiagnosticArgs): string {
	const def = getDiagnostic(code)
	return `[${def.code}] ${interpolateMessage(def.message, args)}`
}

export function formatMissingInputError(): string {
	return formatCliDiagnostic('TKCLI001')
}

export function formatReadError(filePath: string, error: unknown): string {
	if (isNodeError(error) && error.code === 'ENOENT') {
		return formatCliDiagnostic('TKCLI002', { path: filePath })
	}
	return formatCliDiagnostic('TKCLI003', { reason: getErrorMessage(error) })
}

export function formatInvalidIndentModeError(mode: string): string {
	return formatCliDiagnostic('TKCLI004', { mode })
}

export function formatScanError(error: unknown): string {
	return formatCliDiagnostic('TKCLI005', { reason: getErrorMessage(error) })
}

export function parseIndentMode(value: string): IndentMode | null {
	return isIndentMode(value) ? value : null
}

const VERSION_FLAGS: ReadonlySet<string> = new Set(['--version', '-v'])

/**
 * Routes `tokscope <file>`, a bare `tokscope` and a bare `--help` to the scan
 * command. Explicit commands and the version flag pass through untouched.
 */
export function resolveArgv(argv: readonly string[], commands: ReadonlySet<string>): string[] {
	const [first] = argv
	if (first !== undefined && (commands.has(first) || VERSION_FLAGS.has(first))) {
		return [...argv]
	}
	return ['scan', ...argv]
}
