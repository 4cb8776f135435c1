/**
 * tokscope scanner public API
 *
 * Single-pass lexical scanner:
 * - Character source with one character of lookahead
 * - Lead-character classification dispatching to sub-scanners
 * - Maximal munch punctuation, significant indentation
 * - Line-per-token reporter
 */

export {
	type Diagnostic,
	DiagnosticSeverity,
	ScanContext,
} from './core/context.ts'
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
} from './core/tokens.ts'
export {
	CharCategory,
	classify,
	createIndentTracker,
	type IndentMode,
	type IndentTracker,
	isIndentMode,
	MULTI_CHAR_PUNCTUATORS,
	type ScanOptions,
	type ScanResult,
	scan,
	type TokenizeOptions,
	type TokenizeSourceResult,
	tokenizeSource,
} from './lex/index.ts'
export { formatStream, formatToken, formatTokens } from './report/index.ts'
export { type CharacterSource, StringSource } from './source/index.ts'
