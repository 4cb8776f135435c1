/**
 * CLI diagnostic definitions.
 *
 * Error code format: TKCLI<NUMBER>
 * - TKCLI: CLI errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CLI ERRORS (TKCLI001-099)
// =============================================================================

export const TKCLI001: DiagnosticDef = {
	code: 'TKCLI001',
	description: 'tokscope needs the path of the file to scan.',
	message: 'Invalid number of arguments. Filename is required.',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Run `tokscope <file>`.',
}

export const TKCLI002: DiagnosticDef = {
	code: 'TKCLI002',
	description: "tokscope couldn't find a file at this path.",
	message: 'file not found: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check the path and make sure the file exists.',
}

export const TKCLI003: DiagnosticDef = {
	code: 'TKCLI003',
	description: "The file exists but tokscope can't open it.",
	message: 'cannot read file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have read permission for this file.',
}

export const TKCLI004: DiagnosticDef = {
	code: 'TKCLI004',
	description: "tokscope doesn't recognize this indentation mode.",
	message: 'unknown indent mode "{mode}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use `--indent-mode single` or `--indent-mode stack`.',
}

export const TKCLI005: DiagnosticDef = {
	code: 'TKCLI005',
	description: 'Something unexpected went wrong while scanning.',
	message: 'scan failed: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check your source file, or report this if it seems like a bug.',
}

// =============================================================================
// CATALOG
// =============================================================================

export const CLI_DIAGNOSTICS = {
	TKCLI001,
	TKCLI002,
	TKCLI003,
	TKCLI004,
	TKCLI005,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
