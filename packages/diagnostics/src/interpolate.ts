import type { DiagnosticArgs } from './types.ts'

function renderValue(value: DiagnosticArgs[string]): string {
	if (typeof value === 'object') return value.join(', ')
	return String(value)
}

/**
 * Interpolate template arguments into a message.
 * Replaces {key} with the corresponding value from args; list values are joined with ", ".
 * Unknown keys are left in place.
 */
export function interpolateMessage(message: string, args?: DiagnosticArgs): string {
	if (!args) return message
	return message.replace(/\{(\w+)\}/g, (whole, key: string) => {
		const value = args[key]
		return value !== undefined ? renderValue(value) : whole
	})
}

