import type { Expr, FormatField, FormatSegment, StringLiteral } from '../core/nodes.ts'

type EmitExpr = (expr: Expr) => string

/** Double the braces of literal text so `str.format` leaves it unchanged. */
export function escapeBraces(text: string): string {
	return text.replace(/[{}]/g, (brace) => brace + brace)
}

function fieldsOf(segments: readonly FormatSegment[], out: FormatField[]): FormatField[] {
	for (const segment of segments) {
		if (segment.kind !== 'FormatField') continue
		out.push(segment)
		if (segment.spec !== null) fieldsOf(segment.spec, out)
	}
	return out
}

/** Conversion applied to a field; self-documenting fields default to repr. */
function conversionOf(field: FormatField): string | null {
	if (field.conversion !== null) return field.conversion
	return field.debug !== null && field.spec === null ? 'r' : null
}

interface RenderState {
	readonly texts: ReadonlyMap<FormatField, string>
	/** Fields in `.format` argument order; absent when keeping format strings */
	readonly numbered: FormatField[] | null
}

function renderSegments(state: RenderState, segments: readonly FormatSegment[]): string {
	let out = ''
	for (const segment of segments) {
		if (segment.kind === 'FormatText') {
			out += segment.text
			continue
		}
		if (segment.debug !== null) out += escapeBraces(segment.debug)
		let head: string
		if (state.numbered === null) {
			const text = state.texts.get(segment) ?? ''
			head = text.startsWith('{') ? ` ${text}` : text
		} else {
			head = String(state.numbered.length)
			state.numbered.push(segment)
		}
		const conversion = conversionOf(segment)
		out += `{${head}`
		if (conversion !== null) out += `!${conversion}`
		if (segment.spec !== null) out += `:${renderSegments(state, segment.spec)}`
		out += '}'
	}
	return out
}

function plainLiteral(part: StringLiteral, escape: boolean): string {
	const body = escape ? escapeBraces(part.body) : part.body
	return `${part.prefix}${part.quote}${body}${part.quote}`
}

/**
 * Emit adjacent string literals.
 *
 * Format strings are kept when `keepFormat` is set and every field's emitted
 * expression fits inside the literal's quotes. Otherwise all parts are merged
 * into one `str.format` call; implicit concatenation happens before the call,
 * so braces in the plain parts are doubled.
 */
export function emitStrings(parts: readonly StringLiteral[], emitExpr: EmitExpr, keepFormat: boolean): string {
	if (parts.every((part) => part.segments === null)) {
		return parts.map((part) => plainLiteral(part, false)).join(' ')
	}

	const texts = new Map<FormatField, string>()
	let fits = true
	for (const part of parts) {
		if (part.segments === null) continue
		for (const field of fieldsOf(part.segments, [])) {
			const text = emitExpr(field.expr)
			texts.set(field, text)
			if (text.includes(part.quote.charAt(0)) || text.includes('\\')) fits = false
		}
	}

	if (keepFormat && fits) {
		const state: RenderState = { numbered: null, texts }
		return parts
			.map((part) =>
				part.segments === null
					? plainLiteral(part, false)
					: `${part.prefix}${part.quote}${renderSegments(state, part.segments)}${part.quote}`
			)
			.join(' ')
	}

	const numbered: FormatField[] = []
	const state: RenderState = { numbered, texts }
	const literal = parts
		.map((part) =>
			part.segments === null
				? plainLiteral(part, true)
				: `${part.prefix.replace(/f/i, '')}${part.quote}${renderSegments(state, part.segments)}${part.quote}`
		)
		.join(' ')
	const args = numbered.map((field) => texts.get(field) ?? emitExpr(field.expr))
	return `${literal}.format(${args.join(', ')})`
}
