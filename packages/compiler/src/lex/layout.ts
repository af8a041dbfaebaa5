/**
 * Layout pass: turns physical indentation into block markers for the grammar.
 *
 * Output text format:
 *   ⇥    body        (INDENT - inserted before the line's leading whitespace)
 *   ⇤else:           (DEDENT - one per closed block)
 *   f(a,↵  b)        (newline inside brackets or after a backslash, joined)
 *
 * Newlines inside strings are kept. Blank and comment-only lines get no
 * markers. A final newline is added when missing, followed by the dedents
 * that close every open block.
 */

import type { CompilationContext } from '../core/context.ts'
import { type Token, TokenKind } from '../core/tokens.ts'

export const INDENT = '⇥'
export const DEDENT = '⇤'
export const JOINED = '↵'

/** Stands in for marker characters that occur in the source itself. */
const REPLACEMENT = '�'

const TAB_SIZE = 8

type IndentType = 'tab' | 'space'

/**
 * Maps offsets in the layout text back to source offsets.
 * Markers map to the start of the line they were inserted on.
 */
export class OffsetMap {
	private readonly offsets: readonly number[]
	private readonly sourceLength: number

	constructor(offsets: readonly number[], sourceLength: number) {
		this.offsets = offsets
		this.sourceLength = sourceLength
	}

	toSource(index: number): number {
		if (index < 0) return 0
		return this.offsets[index] ?? this.sourceLength
	}
}

export interface Layout {
	readonly text: string
	readonly offsets: OffsetMap
	/** Source offsets of each top-level statement's first token */
	readonly topLevelStarts: readonly number[]
	/** Source offsets of lines whose mixed indentation was accepted (lenient mode) */
	readonly mixedIndentAt: readonly number[]
}

export interface LayoutResult {
	succeeded: boolean
	layout?: Layout
}

export interface LayoutOptions {
	/** Skip indentation consistency checks */
	lenient?: boolean
}

interface LayoutState {
	readonly context: CompilationContext
	readonly lenient: boolean
	readonly stack: number[]
	fileIndentType: IndentType | null
	/** Marker strings to insert, keyed by source offset */
	readonly inserts: Map<number, string>
	readonly topLevelStarts: number[]
	readonly mixedIndentAt: number[]
	/** Last significant token of the previous logical line opened a block */
	previousOpensBlock: boolean
}

export function indentWidth(indent: string): number {
	let width = 0
	for (const ch of indent) {
		if (ch === '\t') width = (Math.floor(width / TAB_SIZE) + 1) * TAB_SIZE
		else if (ch === '\x0c') width = 0
		else width++
	}
	return width
}

function leadingWhitespace(text: string, start: number): string {
	let end = start
	while (end < text.length && /[ \t\x0c]/.test(text.charAt(end))) end++
	return text.slice(start, end)
}

function classify(ch: string): IndentType | null {
	if (ch === '\t') return 'tab'
	if (ch === ' ') return 'space'
	return null
}

function pluralName(type: IndentType): string {
	return type === 'tab' ? 'tabs' : 'spaces'
}

/**
 * Check the characters of one indentation prefix. Returns false after reporting.
 */
function validateIndentChars(state: LayoutState, indent: string, lineStart: number): boolean {
	const firstType = classify(indent.charAt(0))
	let mixedAt = -1
	for (let i = 1; i < indent.length; i++) {
		const type = classify(indent.charAt(i))
		if (type !== null && type !== firstType) {
			mixedAt = i
			break
		}
	}
	const inconsistent =
		firstType !== null && state.fileIndentType !== null && firstType !== state.fileIndentType
	if (state.fileIndentType === null && firstType !== null) state.fileIndentType = firstType

	if (state.lenient) {
		if (mixedAt !== -1 || inconsistent) state.mixedIndentAt.push(lineStart)
		return true
	}
	if (mixedAt !== -1) {
		state.context.emitAt('CPPARSE002', lineStart + mixedAt)
		return false
	}
	if (inconsistent && firstType !== null && state.fileIndentType !== null) {
		state.context.emitAt('CPPARSE003', lineStart, {
			expected: pluralName(state.fileIndentType),
			found: pluralName(firstType),
		})
		return false
	}
	return true
}

function top(stack: readonly number[]): number {
	return stack[stack.length - 1] ?? 0
}

/**
 * Compare a logical line's indentation with the open blocks and record the
 * markers to insert at its start. Returns false after reporting.
 */
function processLineStart(state: LayoutState, lineStart: number, first: Token): boolean {
	const { context, stack } = state
	const indent = leadingWhitespace(context.source.text, lineStart)
	if (indent.length > 0 && !validateIndentChars(state, indent, lineStart)) return false

	const width = indentWidth(indent)
	const opensBlock = state.previousOpensBlock
	state.previousOpensBlock = false

	if (width > top(stack)) {
		if (!opensBlock && !state.lenient) {
			context.emitAt('CPPARSE008', first.start)
			return false
		}
		stack.push(width)
		state.inserts.set(lineStart, INDENT)
		return true
	}
	if (opensBlock && !state.lenient) {
		context.emitAt('CPPARSE009', first.start)
		return false
	}
	let markers = ''
	while (stack.length > 1 && width < top(stack)) {
		stack.pop()
		markers += DEDENT
	}
	if (width !== top(stack) && !state.lenient) {
		context.emitAt('CPPARSE004', first.start, { validLevels: [...stack] })
		return false
	}
	if (markers.length > 0) state.inserts.set(lineStart, markers)
	if (stack.length === 1) state.topLevelStarts.push(first.start)
	return true
}

function isSignificant(token: Token): boolean {
	return (
		token.kind !== TokenKind.Comment &&
		token.kind !== TokenKind.JoinedNewline &&
		token.kind !== TokenKind.Continuation
	)
}

function joinedOffsets(tokens: Iterable<Token>): Set<number> {
	const joined = new Set<number>()
	for (const token of tokens) {
		if (token.kind === TokenKind.JoinedNewline) joined.add(token.start)
		if (token.kind === TokenKind.Continuation && token.end - token.start === 2) {
			joined.add(token.start + 1)
		}
	}
	return joined
}

function buildText(
	source: string,
	joined: ReadonlySet<number>,
	inserts: ReadonlyMap<number, string>,
	eofMarkers: string
): { text: string; offsets: number[] } {
	const parts: string[] = []
	const offsets: number[] = []
	for (let i = 0; i < source.length; i++) {
		const markers = inserts.get(i)
		if (markers !== undefined) {
			for (const m of markers) {
				parts.push(m)
				offsets.push(i)
			}
		}
		const ch = source.charAt(i)
		if (joined.has(i)) parts.push(JOINED)
		else if (ch === INDENT || ch === DEDENT || ch === JOINED) parts.push(REPLACEMENT)
		else parts.push(ch)
		offsets.push(i)
	}
	const tail = (source.endsWith('\n') ? '' : '\n') + eofMarkers
	for (const ch of tail) {
		parts.push(ch)
		offsets.push(source.length)
	}
	return { offsets, text: parts.join('') }
}

/**
 * Build the layout text from the scanned tokens.
 * Reports CPPARSE002/003/004/008/009 unless lenient.
 */
export function layout(context: CompilationContext, options: LayoutOptions = {}): LayoutResult {
	const state: LayoutState = {
		context,
		fileIndentType: null,
		inserts: new Map(),
		lenient: options.lenient ?? false,
		mixedIndentAt: [],
		previousOpensBlock: false,
		stack: [0],
		topLevelStarts: [],
	}
	const tokens = [...context.tokens].map(([, token]) => token)
	const text = context.source.text

	let lineStart = 0
	let atLineStart = true
	let last: Token | null = null
	for (const token of tokens) {
		if (token.kind === TokenKind.Eof) break
		if (!isSignificant(token)) continue
		if (token.kind === TokenKind.Newline) {
			if (!atLineStart && last !== null) {
				state.previousOpensBlock = text.slice(last.start, last.end) === ':'
			}
			atLineStart = true
			lineStart = token.end
			continue
		}
		if (atLineStart) {
			if (!processLineStart(state, lineStart, token)) return { succeeded: false }
			atLineStart = false
		}
		last = token
	}
	if (!atLineStart && last !== null && text.slice(last.start, last.end) === ':') {
		state.previousOpensBlock = true
	}
	if (state.previousOpensBlock && !state.lenient) {
		context.emitAt('CPPARSE009', text.length)
		return { succeeded: false }
	}

	const eofMarkers = DEDENT.repeat(state.stack.length - 1)
	const built = buildText(text, joinedOffsets(tokens), state.inserts, eofMarkers)
	return {
		layout: {
			mixedIndentAt: state.mixedIndentAt,
			offsets: new OffsetMap(built.offsets, text.length),
			text: built.text,
			topLevelStarts: state.topLevelStarts,
		},
		succeeded: true,
	}
}

/**
 * Prepare a code fragment (a format-string field) for the grammar:
 * newlines are joined and marker characters replaced, keeping length.
 */
export function fragmentText(code: string): string {
	let out = ''
	for (const ch of code) {
		if (ch === '\n') out += JOINED
		else if (ch === INDENT || ch === DEDENT || ch === JOINED) out += REPLACEMENT
		else out += ch
	}
	return out
}
