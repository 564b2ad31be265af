import type { DiagnosticArgs } from './types.ts'

const PLACEHOLDER = /\{(\w+)\}/g

/**
 * Fills `{name}` placeholders in a catalog template from args.
 * Names without an argument are left in place.
 */
export function interpolateMessage(template: string, args: DiagnosticArgs = {}): string {
	return template.replace(PLACEHOLDER, (placeholder: string, key: string) => {
		const value = args[key]
		return value === undefined ? placeholder : String(value)
	})
}
