/**
 * Core data structures for the scanner: tokens, the token stream,
 * the scan context and its diagnostics.
 */

export { type Diagnostic, ScanContext } from './context.ts'
export {
	type DiagnosticArgs,
	type DiagnosticCode,
	type DiagnosticDef,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
} from './diagnostics.ts'
export {
	type CharLiteralToken,
	type DedentToken,
	type EndOfFileToken,
	type EndOfLineToken,
	type IndentToken,
	type IntegerToken,
	type InvalidToken,
	type PunctuationToken,
	type SourcePosition,
	type StringLiteralToken,
	type SymbolToken,
	type Token,
	type TokenId,
	TokenKind,
	TokenStream,
	tokenId,
	type WhitespaceToken,
} from './tokens.ts'
