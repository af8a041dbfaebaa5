/**
 * Immutable source buffer with line lookup.
 * Offsets are UTF-16 offsets into the normalized text: a leading BOM is
 * dropped and CRLF or lone CR become LF. `toOriginal` maps them back to the
 * text the caller passed in. Columns count code points.
 */

/** Half-open character range [start, end). */
export interface Span {
	readonly start: number
	readonly end: number
}

export function span(start: number, end: number): Span {
	return { end, start }
}

const UTF8_BOM = '\uFEFF'

export function normalizeSource(text: string): string {
	const body = text.startsWith(UTF8_BOM) ? text.slice(1) : text
	return body.replace(/\r\n?/g, '\n')
}

export class SourceText {
	readonly text: string
	readonly filename: string
	private readonly lineStarts: number[]
	private readonly bomLength: number
	/** Normalized offsets of newlines that were CRLF in the original */
	private readonly crlfAt: number[] = []

	constructor(text: string, filename = '<input>') {
		this.text = normalizeSource(text)
		this.filename = filename
		this.lineStarts = [0]
		for (let i = 0; i < this.text.length; i++) {
			if (this.text.charCodeAt(i) === 10) this.lineStarts.push(i + 1)
		}
		this.bomLength = text.startsWith(UTF8_BOM) ? 1 : 0
		let normalized = 0
		for (let i = this.bomLength; i < text.length; i++, normalized++) {
			if (text.charCodeAt(i) === 13 && text.charCodeAt(i + 1) === 10) {
				this.crlfAt.push(normalized)
				i++
			}
		}
	}

	get length(): number {
		return this.text.length
	}

	lineCount(): number {
		return this.lineStarts.length
	}

	clamp(offset: number): number {
		return Math.max(0, Math.min(offset, this.text.length))
	}

	/** 1-based line containing the offset. */
	lineOf(offset: number): number {
		const target = this.clamp(offset)
		let lo = 0
		let hi = this.lineStarts.length - 1
		while (lo < hi) {
			const mid = (lo + hi + 1) >> 1
			const start = this.lineStarts[mid] ?? 0
			if (start <= target) lo = mid
			else hi = mid - 1
		}
		return lo + 1
	}

	/** 1-based column of the offset within its line, in code points. */
	columnOf(offset: number): number {
		const target = this.clamp(offset)
		return [...this.text.slice(this.lineStart(this.lineOf(target)), target)].length + 1
	}

	lineStart(line: number): number {
		return this.lineStarts[line - 1] ?? this.text.length
	}

	lineEnd(line: number): number {
		const next = this.lineStarts[line]
		return next === undefined ? this.text.length : next - 1
	}

	/** Text of a 1-based line without its newline. */
	lineText(line: number): string | undefined {
		if (line < 1 || line > this.lineStarts.length) return undefined
		return this.text.slice(this.lineStart(line), this.lineEnd(line))
	}

	slice(s: Span): string {
		return this.text.slice(s.start, s.end)
	}

	/** Offset in the text passed to the constructor. */
	toOriginal(offset: number): number {
		const target = this.clamp(offset)
		let lo = 0
		let hi = this.crlfAt.length
		while (lo < hi) {
			const mid = (lo + hi) >> 1
			if ((this.crlfAt[mid] ?? target) < target) lo = mid + 1
			else hi = mid
		}
		return target + this.bomLength + lo
	}

	originalSpan(s: Span): Span {
		return span(this.toOriginal(s.start), this.toOriginal(s.end))
	}
}
