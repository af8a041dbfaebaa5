/**
 * Diagnostic formatter.
 *
 * Example:
 * ```
 * LexError[CPLEX002]: mismatched open '[' and close ')' (line 1)
 *   --> <input>:1:4
 *    |
 *  1 | [([){[}
 *    |   ~^
 *    |
 *    = help: Close '[' with ']' before closing anything else.
 * ```
 */

import type { Annotation, Diagnostic } from '../core/context.ts'
import { pointOf } from '../core/context.ts'
import { interpolateMessage } from '../core/diagnostics.ts'
import type { RenderedDiagnostic } from '../core/errors.ts'
import type { SourceText } from '../core/source.ts'

/**
 * Pointer row under the annotated line. Columns are 1-based; the caret sits at
 * `caretColumn` even when that is past the end of the line.
 */
function pointerRow(source: SourceText, annotation: Annotation, prefix: string): string {
	const point = source.clamp(pointOf(annotation))
	const caretColumn = source.columnOf(point)
	if (annotation.style === 'caret') return `${prefix} ${' '.repeat(caretColumn - 1)}^`

	const start = source.clamp(annotation.span.start)
	if (source.lineOf(start) < source.lineOf(point)) {
		// the span starts on a line that is not shown
		return `${prefix}\\${'~'.repeat(caretColumn - 1)}^`
	}
	const startColumn = source.columnOf(start)
	return `${prefix} ${' '.repeat(startColumn - 1)}${'~'.repeat(caretColumn - startColumn)}^`
}

/** Header line: `<Kind>[<code>]: <message> (line N)`. */
export function headerOf(diagnostic: Diagnostic): string {
	return `${diagnostic.def.kind}[${diagnostic.def.code}]: ${diagnostic.message} (line ${diagnostic.line})`
}

/**
 * Render a diagnostic as output lines.
 */
export function renderDiagnostic(diagnostic: Diagnostic, source: SourceText): string[] {
	const lines = [headerOf(diagnostic), `  --> ${source.filename}:${diagnostic.line}:${diagnostic.column}`]
	const pad = ' '.repeat(String(diagnostic.line).length)
	const gutter = ` ${pad} |`

	const sourceLine = source.lineText(diagnostic.line)
	const [primary] = diagnostic.annotations
	if (sourceLine !== undefined && primary !== undefined) {
		lines.push(gutter, ` ${diagnostic.line} | ${sourceLine}`, pointerRow(source, primary, gutter))
	}

	const { suggestion } = diagnostic.def
	if (suggestion !== undefined) {
		lines.push(gutter, ` ${pad} = help: ${interpolateMessage(suggestion, diagnostic.args)}`)
	}
	return lines
}

export function formatDiagnostic(diagnostic: Diagnostic, source: SourceText): string {
	return renderDiagnostic(diagnostic, source).join('\n')
}

/**
 * Everything an error object carries about its diagnostic.
 */
export function toRendered(diagnostic: Diagnostic, source: SourceText): RenderedDiagnostic {
	return {
		code: diagnostic.def.code,
		column: diagnostic.column,
		kind: diagnostic.def.kind,
		line: diagnostic.line,
		lines: renderDiagnostic(diagnostic, source),
		message: diagnostic.message,
		spans: diagnostic.annotations.map((a) => source.originalSpan(a.span)),
	}
}
