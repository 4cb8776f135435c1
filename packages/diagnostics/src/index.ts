/**
 * @tokscope/diagnostics
 *
 * Shared diagnostic types and definitions for tokscope packages.
 */

export {
	CLI_DIAGNOSTICS,
	type CliDiagnosticCode,
	TKCLI001,
	TKCLI002,
	TKCLI003,
	TKCLI004,
	TKCLI005,
} from './cli.ts'
export { interpolateMessage } from './interpolate.ts'
export {
	SCANNER_DIAGNOSTICS,
	type ScannerDiagnosticCode,
	TKLEX001,
	TKLEX002,
} from './scanner.ts'
export { type DiagnosticArgs, type DiagnosticDef, DiagnosticSeverity } from './types.ts'

import { CLI_DIAGNOSTICS } from './cli.ts'
import { SCANNER_DIAGNOSTICS } from './scanner.ts'

/**
 * All diagnostics from all packages.
 */
export const DIAGNOSTICS = {
	...SCANNER_DIAGNOSTICS,
	...CLI_DIAGNOSTICS,
} as const

/**
 * All valid diagnostic codes.
 */
export type DiagnosticCode = keyof typeof DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof DIAGNOSTICS)[typeof code] {
	return DIAGNOSTICS[code]
}
