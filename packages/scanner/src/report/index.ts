export { formatStream, formatToken, formatTokens } from './reporter.ts'
