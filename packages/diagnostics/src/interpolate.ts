import type { DiagnosticArgs } from './types.ts'

const PLACEHOLDER = /\{(\w+)\}/g

/**
 * Replaces each `{key}` in a catalog template with its argument.
 * Placeholders without a matching argument are left as written.
 */
export function interpolateMessage(template: string, args?: DiagnosticArgs): string {
	if (args === undefined) return template
	return template.replace(PLACEHOLDER, (placeholder, key: string) => {
		const value = args[key]
		return value === undefined ? placeholder : String(value)
	})
}
