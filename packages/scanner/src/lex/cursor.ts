import type { DiagnosticCode } from '../core/diagnostics.ts'
import type { SourcePosition, Token } from '../core/tokens.ts'
import type { CharacterSource } from '../source/character-source.ts'
import type { IndentTracker } from './indentation.ts'

/**
 * What a sub-scanner sees: the source positioned just after the lead
 * character, where that lead character started, and the indentation state.
 */
export interface LexCursor {
	readonly source: CharacterSource
	readonly start: SourcePosition
	readonly indent: IndentTracker
}

/**
 * A finished sub-scan: the produced tokens and the next lookahead character,
 * already consumed from the source.
 */
export interface ScanStep {
	readonly ok: true
	readonly tokens: readonly Token[]
	readonly lookahead: string | null
}

/** A sub-scan that hit an unrecoverable condition. */
export interface ScanFailure {
	readonly ok: false
	readonly code: DiagnosticCode
	readonly position: SourcePosition
	readonly found: 'EOL' | 'EOF'
}

export type ScanOutcome = ScanStep | ScanFailure

export type SubScanner = (lead: string, cursor: LexCursor) => ScanOutcome

export function step(token: Token, lookahead: string | null): ScanStep {
	return { lookahead, ok: true, tokens: [token] }
}
