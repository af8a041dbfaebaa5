/**
 * Splits the body of a format string into literal text and replacement fields.
 *
 * Offsets are source offsets: `bodyOffset` is where the body starts. Delimiter
 * balance was already checked by the scanner, so this pass only locates the
 * pieces; field expressions are parsed afterwards with the grammar.
 */

export interface RawText {
	readonly type: 'text'
	readonly text: string
	readonly start: number
	readonly end: number
}

export interface RawField {
	readonly type: 'field'
	/** Expression text, without a self-documenting '=' */
	readonly exprText: string
	readonly exprStart: number
	/** Expression text including '=' and the whitespace around it */
	readonly debug: string | null
	readonly conversion: string | null
	readonly spec: readonly RawSegment[] | null
	readonly start: number
	readonly end: number
}

export type RawSegment = RawText | RawField

const OPENERS = '([{'
const CLOSERS = ')]}'

interface Cursor {
	readonly body: string
	readonly offset: number
	readonly raw: boolean
}

/** Index just past a nested string literal starting at `i`. */
function skipString(body: string, i: number): number {
	const q = body.charAt(i)
	const quote = body.startsWith(q.repeat(3), i) ? q.repeat(3) : q
	let j = i + quote.length
	while (j < body.length) {
		if (body.charAt(j) === '\\') {
			j += 2
			continue
		}
		if (body.startsWith(quote, j)) return j + quote.length
		j++
	}
	return body.length
}

/** Index of the '}' closing a format spec that starts at `i`. */
function specEnd(body: string, i: number): number {
	let depth = 0
	for (let j = i; j < body.length; j++) {
		const ch = body.charAt(j)
		if (ch === '{') depth++
		else if (ch === '}') {
			if (depth === 0) return j
			depth--
		}
	}
	return body.length
}

const DEBUG_SUFFIX = /(?<![=!<>])=\s*$/

function scanField(cursor: Cursor, open: number): RawField {
	const { body, offset } = cursor
	let depth = 0
	let i = open + 1
	let exprEnd = body.length
	while (i < body.length) {
		const ch = body.charAt(i)
		if (ch === '"' || ch === "'") {
			i = skipString(body, i)
			continue
		}
		if (OPENERS.includes(ch)) depth++
		else if (CLOSERS.includes(ch)) {
			if (depth === 0) {
				exprEnd = i
				break
			}
			depth--
		} else if (depth === 0 && ch === '!' && body.charAt(i + 1) !== '=') {
			exprEnd = i
			break
		} else if (depth === 0 && ch === ':') {
			exprEnd = i
			break
		}
		i++
	}

	let rawExpr = body.slice(open + 1, exprEnd)
	let debug: string | null = null
	const debugMatch = DEBUG_SUFFIX.exec(rawExpr)
	if (debugMatch !== null) {
		debug = rawExpr
		rawExpr = rawExpr.slice(0, debugMatch.index)
	}

	let pos = exprEnd
	let conversion: string | null = null
	if (body.charAt(pos) === '!') {
		let j = pos + 1
		while (j < body.length && body.charAt(j) !== ':' && body.charAt(j) !== '}') j++
		conversion = body.slice(pos + 1, j)
		pos = j
	}
	let spec: RawSegment[] | null = null
	if (body.charAt(pos) === ':') {
		const end = specEnd(body, pos + 1)
		spec = splitRange(cursor, pos + 1, end, true)
		pos = end
	}
	const end = Math.min(pos + 1, body.length)
	return {
		conversion,
		debug,
		end: offset + end,
		exprStart: offset + open + 1,
		exprText: rawExpr,
		spec,
		start: offset + open,
		type: 'field',
	}
}

function splitRange(cursor: Cursor, from: number, to: number, inSpec: boolean): RawSegment[] {
	const { body, offset, raw } = cursor
	const segments: RawSegment[] = []
	let textStart = from
	const flush = (end: number): void => {
		if (end > textStart) {
			segments.push({ end: offset + end, start: offset + textStart, text: body.slice(textStart, end), type: 'text' })
		}
	}

	let i = from
	while (i < to) {
		const ch = body.charAt(i)
		if (ch === '\\' && !raw) {
			if (body.startsWith('\\N{', i)) {
				const close = body.indexOf('}', i)
				i = close === -1 ? to : close + 1
			} else {
				i += 2
			}
			continue
		}
		if (ch === '{') {
			if (!inSpec && body.charAt(i + 1) === '{') {
				i += 2
				continue
			}
			flush(i)
			const field = scanField(cursor, i)
			segments.push(field)
			i = field.end - offset
			textStart = i
			continue
		}
		if (ch === '}' && body.charAt(i + 1) === '}') {
			i += 2
			continue
		}
		i++
	}
	flush(Math.min(i, to))
	return segments
}

/**
 * Split a format-string body.
 *
 * @param body - Text between the quotes
 * @param bodyOffset - Source offset of the body's first character
 * @param raw - The literal has an `r` prefix (backslashes are literal)
 */
export function splitFormatBody(body: string, bodyOffset: number, raw: boolean): RawSegment[] {
	return splitRange({ body, offset: bodyOffset, raw }, 0, body.length, false)
}
