/**
 * Lexical analysis module.
 * Classifies lead characters and dispatches to sub-scanners,
 * producing a flat token stream.
 */

export {
	CharCategory,
	classify,
	isCommentLead,
	isDigit,
	isHexDigit,
	isIdentifierLead,
	isIdentifierPart,
	isLineTerminator,
	isPunctuation,
	isWhitespace,
} from './classify.ts'
export type { LexCursor, ScanFailure, ScanOutcome, ScanStep, SubScanner } from './cursor.ts'
export {
	createIndentTracker,
	type IndentMode,
	type IndentTracker,
	isIndentMode,
	measureIndent,
	resolveIndent,
} from './indentation.ts'
export { MULTI_CHAR_PUNCTUATORS } from './punctuation.ts'
export {
	type ScanOptions,
	type ScanResult,
	scan,
	type TokenizeOptions,
	type TokenizeSourceResult,
	tokenizeSource,
} from './scanner.ts'
