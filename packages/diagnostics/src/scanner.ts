/**
 * Scanner diagnostic definitions.
 *
 * Error code format: TKLEX<NUMBER>
 * - TKLEX: Lexical errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// LEXER ERRORS (TKLEX001-099)
// =============================================================================

export const TKLEX001: DiagnosticDef = {
	code: 'TKLEX001',
	description:
		'A string literal opened with `"` must be closed with `"` on the same line. Scanning stops at the first unterminated string.',
	message: '{found} encountered before closing literal quotes',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Add the closing `"`, or escape a quote inside the string as `\\"`.',
}

export const TKLEX002: DiagnosticDef = {
	code: 'TKLEX002',
	description:
		"A character literal opened with `'` must be closed with `'` on the same line. Scanning stops at the first unterminated character literal.",
	message: '{found} encountered before closing constant quotes',
	severity: DiagnosticSeverity.Error,
	suggestion: "Add the closing `'`, or escape a quote inside the literal as `\\'`.",
}

// =============================================================================
// CATALOG
// =============================================================================

/**
 * Central catalog of all scanner diagnostics.
 */
export const SCANNER_DIAGNOSTICS = {
	TKLEX001,
	TKLEX002,
} as const

/**
 * All valid scanner diagnostic codes.
 */
export type ScannerDiagnosticCode = keyof typeof SCANNER_DIAGNOSTICS
