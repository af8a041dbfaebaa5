/**
 * Compilation context that flows through all phases.
 * Holds the source, the token store and the diagnostic collection.
 */

import type { CompileConfig, CompileMode } from './config.ts'
import {
	type DiagnosticArgs,
	type DiagnosticCode,
	type DiagnosticDef,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
} from './diagnostics.ts'
import { type SourceText, type Span, span } from './source.ts'
import { TokenStore } from './tokens.ts'

export type AnnotationStyle = 'caret' | 'tilde'

/**
 * A marked source range. A caret marks `span.start`; a tilde run covers
 * [start, end) and ends in a caret at `span.end`.
 */
export interface Annotation {
	readonly span: Span
	readonly style: AnnotationStyle
}

/**
 * A diagnostic message with location information.
 */
export interface Diagnostic {
	/** The diagnostic definition from the catalog */
	readonly def: DiagnosticDef
	/** Interpolated message with arguments applied */
	readonly message: string
	/** Line of the pointed-at position (1-indexed) */
	readonly line: number
	/** Column of the pointed-at position (1-indexed) */
	readonly column: number
	/** Primary annotation first */
	readonly annotations: readonly Annotation[]
	/** Template arguments used for message interpolation */
	readonly args?: DiagnosticArgs
}

/** Offset a diagnostic points at: the caret position of its primary annotation. */
export function pointOf(annotation: Annotation): number {
	return annotation.style === 'caret' ? annotation.span.start : annotation.span.end
}

/**
 * The compilation context.
 * Passed through all compilation phases; phases add tokens and diagnostics,
 * never remove them.
 */
export class CompilationContext {
	readonly source: SourceText
	readonly config: CompileConfig
	readonly mode: CompileMode

	/** Token storage (populated by the scanner) */
	readonly tokens: TokenStore

	private readonly diagnostics: Diagnostic[] = []

	constructor(source: SourceText, config: CompileConfig, mode: CompileMode) {
		this.source = source
		this.config = config
		this.mode = mode
		this.tokens = new TokenStore()
	}

	/**
	 * Emit a diagnostic by code with explicit annotations.
	 */
	emit(code: DiagnosticCode, annotations: readonly Annotation[], args?: DiagnosticArgs): void {
		const primary = annotations[0]
		if (primary === undefined) throw new Error(`Diagnostic ${code} needs an annotation`)
		const clamped = annotations.map((a) => ({
			span: span(this.source.clamp(a.span.start), this.source.clamp(Math.max(a.span.start, a.span.end))),
			style: a.style,
		}))
		const point = this.source.clamp(pointOf(primary))
		const def = getDiagnostic(code)
		this.addDiagnosticInternal({
			annotations: clamped,
			column: this.source.columnOf(point),
			def,
			line: this.source.lineOf(point),
			message: interpolateMessage(def.message, args),
			...(args ? { args } : {}),
		})
	}

	/**
	 * Emit a diagnostic pointing at one offset.
	 */
	emitAt(code: DiagnosticCode, offset: number, args?: DiagnosticArgs): void {
		this.emit(code, [{ span: span(offset, offset), style: 'caret' }], args)
	}

	/**
	 * Emit a diagnostic underlining [start, end) and pointing at `end`.
	 * Collapses to a caret when the range is empty.
	 */
	emitRange(code: DiagnosticCode, start: number, end: number, args?: DiagnosticArgs): void {
		const style: AnnotationStyle = start < end ? 'tilde' : 'caret'
		this.emit(code, [{ span: span(start, end), style }], args)
	}

	// ===========================================================================
	// INTERNAL
	// ===========================================================================

	private addDiagnosticInternal(diagnostic: Diagnostic): void {
		this.diagnostics.push(diagnostic)
	}

	// ===========================================================================
	// QUERY METHODS
	// ===========================================================================

	getDiagnostics(): readonly Diagnostic[] {
		return this.diagnostics
	}

	getErrors(): Diagnostic[] {
		return this.diagnostics.filter((d) => d.def.severity === DiagnosticSeverity.Error)
	}

	getWarnings(): Diagnostic[] {
		return this.diagnostics.filter((d) => d.def.severity === DiagnosticSeverity.Warning)
	}
}
