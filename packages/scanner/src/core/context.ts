/**
 * Scan context: the source text, the token stream produced from it,
 * and the diagnostics reported along the way.
 */

import {
	type DiagnosticArgs,
	type DiagnosticCode,
	type DiagnosticDef,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
} from './diagnostics.ts'
import { TokenStream } from './tokens.ts'

export { DiagnosticSeverity } from './diagnostics.ts'

/**
 * A diagnostic message with location information.
 */
export interface Diagnostic {
	/** The diagnostic definition from the catalog */
	readonly def: DiagnosticDef
	/** Interpolated message with arguments applied */
	readonly message: string
	/** Line number (1-indexed) */
	readonly line: number
	/** Column number (1-indexed) */
	readonly column: number
	readonly args?: DiagnosticArgs
}

/**
 * Holds everything one scan produces.
 * A context is scanned once; rescanning the same text takes a fresh context.
 */
export class ScanContext {
	/** Source text as given to the scanner */
	readonly source: string

	/** Source filename for error messages */
	readonly filename: string

	/** Token stream (populated by the scanner) */
	readonly tokens: TokenStream

	private readonly diagnostics: Diagnostic[] = []

	constructor(source: string, filename = '<input>') {
		this.source = source
		this.filename = filename
		this.tokens = new TokenStream()
	}

	/**
	 * Emit a diagnostic by code at a specific location.
	 */
	emit(code: DiagnosticCode, line: number, column: number, args?: DiagnosticArgs): void {
		const def = getDiagnostic(code)
		const message = interpolateMessage(def.message, args)
		this.diagnostics.push({
			column,
			def,
			line,
			message,
			...(args ? { args } : {}),
		})
	}

	hasErrors(): boolean {
		return this.diagnostics.some((d) => d.def.severity === DiagnosticSeverity.Error)
	}

	getDiagnostics(): readonly Diagnostic[] {
		return this.diagnostics
	}

	getSourceLine(line: number): string | undefined {
		return this.source.split('\n')[line - 1]
	}

	private getSeverityLabel(severity: DiagnosticSeverity): string {
		const labels: Record<DiagnosticSeverity, string> = {
			[DiagnosticSeverity.Error]: 'error',
		}
		return labels[severity]
	}

	/**
	 * Format a diagnostic for display.
	 *
	 * Example:
	 * ```
	 * error[TKLEX001]: EOF encountered before closing literal quotes
	 *   --> main.src:2:5
	 *    |
	 *  2 | x = "abc
	 *    |     ^
	 *    |
	 *    = help: Add the closing `"`, or escape a quote inside the string as `\"`.
	 * ```
	 */
	formatDiagnostic(diagnostic: Diagnostic): string {
		const { def } = diagnostic
		const header = `${this.getSeverityLabel(def.severity)}[${def.code}]: ${diagnostic.message}`
		const location = `  --> ${this.filename}:${diagnostic.line}:${diagnostic.column}`

		const sourceLine = this.getSourceLine(diagnostic.line)
		if (sourceLine === undefined) {
			return `${header}\n${location}`
		}

		const pad = ' '.repeat(String(diagnostic.line).length)
		const emptyPrefix = ` ${pad} | `
		const pointer = `${' '.repeat(diagnostic.column - 1)}^`
		const lines = [
			header,
			location,
			emptyPrefix,
			` ${diagnostic.line} | ${sourceLine}`,
			`${emptyPrefix}${pointer}`,
		]

		if (def.suggestion) {
			lines.push(emptyPrefix, `   = help: ${interpolateMessage(def.suggestion, diagnostic.args)}`)
		}

		return lines.join('\n')
	}

	formatAllDiagnostics(): string {
		return this.diagnostics.map((d) => this.formatDiagnostic(d)).join('\n\n')
	}
}
