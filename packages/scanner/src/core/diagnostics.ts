/**
 * Re-export diagnostic types and scanner definitions from the shared package.
 */

import { SCANNER_DIAGNOSTICS } from '@tokscope/diagnostics'

export {
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	interpolateMessage,
	SCANNER_DIAGNOSTICS,
	type ScannerDiagnosticCode,
	TKLEX001,
	TKLEX002,
} from '@tokscope/diagnostics'

/**
 * All diagnostic codes the scanner can emit.
 */
export type DiagnosticCode = keyof typeof SCANNER_DIAGNOSTICS

export function getDiagnostic(code: DiagnosticCode): (typeof SCANNER_DIAGNOSTICS)[typeof code] {
	return SCANNER_DIAGNOSTICS[code]
}
