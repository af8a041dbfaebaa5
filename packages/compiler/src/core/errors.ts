import { DiagnosticKind } from '@copra/diagnostics'
import type { Span } from './source.ts'

/**
 * A fatal diagnostic after rendering: everything an error object exposes.
 */
export interface RenderedDiagnostic {
	readonly kind: DiagnosticKind
	readonly code: string
	readonly message: string
	readonly line: number
	readonly column: number
	readonly spans: readonly Span[]
	readonly lines: readonly string[]
}

/**
 * Base class of every compile failure.
 * `message` is the one-line form, `rendered` the full excerpt.
 */
export class CompileError extends Error {
	readonly kind: DiagnosticKind
	readonly code: string
	readonly line: number
	readonly column: number
	readonly spans: readonly Span[]
	readonly traceback: readonly string[]
	readonly diagnosticMessage: string

	constructor(diagnostic: RenderedDiagnostic) {
		super(`${diagnostic.message} (line ${diagnostic.line})`)
		this.name = 'CompileError'
		this.kind = diagnostic.kind
		this.code = diagnostic.code
		this.line = diagnostic.line
		this.column = diagnostic.column
		this.spans = diagnostic.spans
		this.traceback = diagnostic.lines
		this.diagnosticMessage = diagnostic.message
	}

	/** Exception name for shell adapters. */
	get ename(): string {
		return this.kind
	}

	/** Exception value for shell adapters. */
	get evalue(): string {
		return this.message
	}

	get rendered(): string {
		return this.traceback.join('\n')
	}
}

export class LexError extends CompileError {
	constructor(diagnostic: RenderedDiagnostic) {
		super(diagnostic)
		this.name = 'LexError'
	}
}

export class GrammarError extends CompileError {
	constructor(diagnostic: RenderedDiagnostic) {
		super(diagnostic)
		this.name = 'GrammarError'
	}
}

export class TargetError extends CompileError {
	constructor(diagnostic: RenderedDiagnostic) {
		super(diagnostic)
		this.name = 'TargetError'
	}
}

export class StyleError extends CompileError {
	constructor(diagnostic: RenderedDiagnostic) {
		super(diagnostic)
		this.name = 'StyleError'
	}
}

/**
 * Raised for invalid configuration, before any source is looked at.
 */
export class ConfigurationError extends Error {
	readonly option: string

	constructor(option: string, message: string) {
		super(message)
		this.name = 'ConfigurationError'
		this.option = option
	}
}

/**
 * Build the error class matching a diagnostic's kind.
 */
export function errorFor(diagnostic: RenderedDiagnostic): CompileError {
	switch (diagnostic.kind) {
		case DiagnosticKind.Lex:
			return new LexError(diagnostic)
		case DiagnosticKind.Grammar:
			return new GrammarError(diagnostic)
		case DiagnosticKind.Target:
			return new TargetError(diagnostic)
		case DiagnosticKind.Style:
			return new StyleError(diagnostic)
	}
}
