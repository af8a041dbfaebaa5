import type { CompilationContext } from '../core/context.ts'
import { TokenKind } from '../core/tokens.ts'

export interface ScanResult {
	succeeded: boolean
}

/**
 * An open delimiter waiting for its close. `text` is the delimiter itself:
 * a bracket, or a string's opening quote.
 */
export interface OpenDelimiter {
	readonly text: string
	readonly offset: number
}

interface ScannerState {
	readonly context: CompilationContext
	readonly text: string
	pos: number
	readonly brackets: OpenDelimiter[]
}

const CLOSERS: Readonly<Record<string, string>> = { '(': ')', '[': ']', '{': '}' }
const OPENERS: Readonly<Record<string, string>> = { ')': '(', ']': '[', '}': '{' }

/** Deepest bracket nesting the scanner accepts. */
export const MAX_NESTING = 200

const OPERATOR_CHARS = new Set('+-*/%@&|^~<>=!.:?$')

const STRING_PREFIX = /(?:[bB][rR]|[rR][bB]|[uU][rR]|[fF][rR]|[rR][fF]|[rRuUbBfF])?(?=["'])/y
const NUMBER =
	/0[xX][0-9a-fA-F_]+[lL]?|0[oO][0-7_]+[lL]?|0[bB][01_]+[lL]?|(?:\d[\d_]*(?:\.[\d_]*)?|\.\d[\d_]*)(?:[eE][+-]?\d[\d_]*)?[jJlL]?/y
const IDENT_START = /[\p{L}_]/u
const IDENT_PART = /[\p{L}\p{N}_]/u

export function closerOf(open: string): string {
	return CLOSERS[open] ?? open
}

function isIdentStart(ch: string): boolean {
	return IDENT_START.test(ch)
}

function isIdentPart(ch: string): boolean {
	return IDENT_PART.test(ch)
}

function addToken(state: ScannerState, kind: TokenKind, start: number, end: number): void {
	const { source } = state.context
	state.context.tokens.add({
		column: source.columnOf(start),
		end,
		kind,
		line: source.lineOf(start),
		start,
	})
}

// =============================================================================
// DELIMITER ERRORS
// =============================================================================

function emitUnclosed(context: CompilationContext, open: OpenDelimiter): void {
	context.emitAt('CPLEX003', open.offset, { expected: closerOf(open.text), open: open.text })
}

function emitUnmatched(context: CompilationContext, close: string, offset: number): void {
	context.emitAt('CPLEX001', offset, { close })
}

function emitMismatched(
	context: CompilationContext,
	open: OpenDelimiter,
	close: string,
	offset: number
): void {
	context.emitRange('CPLEX002', open.offset, offset, {
		close,
		expected: closerOf(open.text),
		open: open.text,
	})
}

/**
 * Apply a closing bracket to a delimiter stack.
 * Returns false after reporting when the close does not pair with the top.
 */
function closeBracket(
	context: CompilationContext,
	stack: OpenDelimiter[],
	close: string,
	offset: number
): boolean {
	const top = stack[stack.length - 1]
	if (top === undefined) {
		emitUnmatched(context, close, offset)
		return false
	}
	if (top.text !== OPENERS[close]) {
		emitMismatched(context, top, close, offset)
		return false
	}
	stack.pop()
	return true
}

// =============================================================================
// STRINGS
// =============================================================================

function matchStringPrefix(text: string, pos: number): string | null {
	STRING_PREFIX.lastIndex = pos
	const m = STRING_PREFIX.exec(text)
	return m === null ? null : m[0]
}

function openingQuote(text: string, pos: number): string {
	const q = text.charAt(pos)
	const triple = q.repeat(3)
	return text.startsWith(triple, pos) ? triple : q
}

/**
 * Scan a format specification after ':' (or a '!' conversion) up to the
 * field's closing brace. Nested fields are allowed.
 */
function scanFormatSpec(state: ScannerState, start: number, quote: string, field: OpenDelimiter): number | null {
	const { text } = state
	let i = start
	while (i < text.length) {
		if (text.startsWith(quote, i) || (quote.length === 1 && text.charAt(i) === '\n')) break
		const ch = text.charAt(i)
		if (ch === '{') {
			const end = scanField(state, i, quote)
			if (end === null) return null
			i = end
			continue
		}
		if (ch === '}') return i + 1
		i++
	}
	emitUnclosed(state.context, field)
	return null
}

/**
 * Scan one replacement field of a format string, starting at its '{'.
 * Returns the offset after the closing '}'.
 */
function scanField(state: ScannerState, open: number, quote: string): number | null {
	const { text, context } = state
	const field: OpenDelimiter = { offset: open, text: '{' }
	const stack: OpenDelimiter[] = [field]
	let i = open + 1
	while (i < text.length) {
		const ch = text.charAt(i)
		const top = stack[stack.length - 1] ?? field
		if (text.startsWith(quote, i) || (quote.length === 1 && ch === '\n')) {
			emitUnclosed(context, top)
			return null
		}
		const prefix = isIdentStart(ch) || ch === '"' || ch === "'" ? matchStringPrefix(text, i) : null
		if (prefix !== null) {
			const end = scanString(state, i, prefix)
			if (end === null) return null
			i = end
			continue
		}
		if (isIdentStart(ch)) {
			i++
			while (i < text.length && isIdentPart(text.charAt(i))) i++
			continue
		}
		if (stack.length === 1 && (ch === ':' || (ch === '!' && text.charAt(i + 1) !== '='))) {
			return scanFormatSpec(state, i + 1, quote, field)
		}
		if (CLOSERS[ch] !== undefined) {
			stack.push({ offset: i, text: ch })
		} else if (OPENERS[ch] !== undefined) {
			if (!closeBracket(context, stack, ch, i)) return null
			if (stack.length === 0) return i + 1
		}
		i++
	}
	emitUnclosed(context, stack[stack.length - 1] ?? field)
	return null
}

/**
 * Scan a string literal (prefix included) starting at `start`.
 * Returns the offset after the closing quote, or null after reporting.
 */
function scanString(state: ScannerState, start: number, prefix: string): number | null {
	const { text, context } = state
	const quoteStart = start + prefix.length
	const quote = openingQuote(text, quoteStart)
	const isFormat = /f/i.test(prefix)
	const isRaw = /r/i.test(prefix)
	const opened: OpenDelimiter = { offset: quoteStart, text: quote }
	let i = quoteStart + quote.length
	while (i < text.length) {
		if (text.startsWith(quote, i)) return i + quote.length
		const ch = text.charAt(i)
		if (ch === '\\') {
			// \N{NAME} escapes are not replacement fields
			const close = isFormat && !isRaw && text.startsWith('\\N{', i) ? text.indexOf('}', i) : -1
			i = close === -1 ? i + 2 : close + 1
			continue
		}
		if (ch === '\n' && quote.length === 1) break
		if (isFormat && ch === '{') {
			if (text.charAt(i + 1) === '{') {
				i += 2
				continue
			}
			const end = scanField(state, i, quote)
			if (end === null) return null
			i = end
			continue
		}
		if (isFormat && ch === '}') {
			if (text.charAt(i + 1) === '}') {
				i += 2
				continue
			}
			emitUnmatched(context, '}', i)
			return null
		}
		i++
	}
	emitUnclosed(context, opened)
	return null
}

// =============================================================================
// MAIN LOOP
// =============================================================================

function scanWhile(text: string, pos: number, pred: (ch: string) => boolean): number {
	let end = pos
	while (end < text.length && pred(text.charAt(end))) end++
	return end
}

function scanNewline(state: ScannerState): void {
	const kind = state.brackets.length > 0 ? TokenKind.JoinedNewline : TokenKind.Newline
	addToken(state, kind, state.pos, state.pos + 1)
	state.pos++
}

function scanComment(state: ScannerState): void {
	const newline = state.text.indexOf('\n', state.pos)
	const end = newline === -1 ? state.text.length : newline
	addToken(state, TokenKind.Comment, state.pos, end)
	state.pos = end
}

function scanBackslash(state: ScannerState): void {
	const next = state.text.charAt(state.pos + 1)
	if (next === '\n' || state.pos + 1 === state.text.length) {
		const end = next === '\n' ? state.pos + 2 : state.pos + 1
		addToken(state, TokenKind.Continuation, state.pos, end)
		state.pos = end
		return
	}
	addToken(state, TokenKind.Operator, state.pos, state.pos + 1)
	state.pos++
}

function scanNumber(state: ScannerState): boolean {
	NUMBER.lastIndex = state.pos
	const m = NUMBER.exec(state.text)
	if (m === null || m[0].length === 0) return false
	addToken(state, TokenKind.Number, state.pos, state.pos + m[0].length)
	state.pos += m[0].length
	return true
}

function scanBracket(state: ScannerState, ch: string): boolean {
	if (CLOSERS[ch] !== undefined) {
		if (state.brackets.length === MAX_NESTING) {
			state.context.emitAt('CPLEX004', state.pos, { max: MAX_NESTING })
			return false
		}
		state.brackets.push({ offset: state.pos, text: ch })
		addToken(state, TokenKind.Open, state.pos, state.pos + 1)
		state.pos++
		return true
	}
	if (!closeBracket(state.context, state.brackets, ch, state.pos)) return false
	addToken(state, TokenKind.Close, state.pos, state.pos + 1)
	state.pos++
	return true
}

/**
 * Scan one token (or skip whitespace). Returns false after reporting an error.
 */
function scanNext(state: ScannerState): boolean {
	const { text } = state
	const ch = text.charAt(state.pos)

	if (ch === ' ' || ch === '\t' || ch === '\x0c') {
		state.pos++
		return true
	}
	if (ch === '\n') {
		scanNewline(state)
		return true
	}
	if (ch === '#') {
		scanComment(state)
		return true
	}
	if (ch === '\\') {
		scanBackslash(state)
		return true
	}

	const prefix = isIdentStart(ch) || ch === '"' || ch === "'" ? matchStringPrefix(text, state.pos) : null
	if (prefix !== null) {
		const end = scanString(state, state.pos, prefix)
		if (end === null) return false
		addToken(state, TokenKind.String, state.pos, end)
		state.pos = end
		return true
	}
	if (isIdentStart(ch)) {
		const end = scanWhile(text, state.pos + 1, isIdentPart)
		addToken(state, TokenKind.Name, state.pos, end)
		state.pos = end
		return true
	}
	if (/\d/.test(ch) || (ch === '.' && /\d/.test(text.charAt(state.pos + 1)))) {
		if (scanNumber(state)) return true
	}
	if (CLOSERS[ch] !== undefined || OPENERS[ch] !== undefined) {
		return scanBracket(state, ch)
	}
	if (OPERATOR_CHARS.has(ch)) {
		const end = scanWhile(text, state.pos + 1, (c) => OPERATOR_CHARS.has(c))
		addToken(state, TokenKind.Operator, state.pos, end)
		state.pos = end
		return true
	}
	// Separators (',', ';', '`') and anything unrecognized become one-character
	// tokens; the grammar reports the latter.
	addToken(state, TokenKind.Operator, state.pos, state.pos + 1)
	state.pos++
	return true
}

/**
 * Tokenize the context's source and validate delimiter nesting.
 * Populates context.tokens; reports CPLEX001-004 on failure.
 */
export function scan(context: CompilationContext): ScanResult {
	const state: ScannerState = {
		brackets: [],
		context,
		pos: 0,
		text: context.source.text,
	}

	while (state.pos < state.text.length) {
		if (!scanNext(state)) return { succeeded: false }
	}

	const open = state.brackets[state.brackets.length - 1]
	if (open !== undefined) {
		emitUnclosed(context, open)
		return { succeeded: false }
	}

	addToken(state, TokenKind.Eof, state.text.length, state.text.length)
	return { succeeded: true }
}
