/**
 * Copra Compiler Public API
 *
 * Pipeline: scan → layout → parse → gate → audit → emit.
 * Every phase reports into one CompilationContext; the first fatal
 * diagnostic becomes the thrown error and no output is produced.
 */

import { audit } from './check/auditor.ts'
import { emit } from './codegen/emitter.ts'
import {
	assertCompileMode,
	type CompileConfig,
	CompileMode,
	type ConfigOptions,
	DEFAULT_CONFIG,
	resolveConfig,
	targetRangeOf,
} from './core/config.ts'
import { CompilationContext, type Diagnostic } from './core/context.ts'
import { errorFor } from './core/errors.ts'
import { SourceText } from './core/source.ts'
import { toRendered } from './format/formatter.ts'
import { startRuleFor, trace as traceGrammar } from './grammar/index.ts'
import { type GrammarProfile, profileMatch } from './grammar/profile.ts'
import { type Layout, layout } from './lex/layout.ts'
import { scan } from './lex/scanner.ts'
import { guardNesting, type ParseOptions, parse } from './parse/parser.ts'
import { closeSession, getSession, openSession, type SessionCache, type SessionStats } from './session/cache.ts'
import { gate } from './version/gate.ts'

export { type AuditResult, audit, deprecatedReplacement, type Finding } from './check/auditor.ts'
export { type EmitResult, emit, mangleOperator } from './codegen/emitter.ts'
export {
	type CompileConfig,
	CompileMode,
	type ConfigOptions,
	DEFAULT_CONFIG,
	emitsHeader,
	isCompileMode,
	resolveConfig,
} from './core/config.ts'
export { type Annotation, CompilationContext, type Diagnostic } from './core/context.ts'
export { DiagnosticKind, DiagnosticSeverity } from './core/diagnostics.ts'
export {
	CompileError,
	ConfigurationError,
	GrammarError,
	LexError,
	type RenderedDiagnostic,
	StyleError,
	TargetError,
} from './core/errors.ts'
export type { SyntaxNode, SyntaxTree } from './core/nodes.ts'
export { SourceText, type Span } from './core/source.ts'
export { formatDiagnostic, renderDiagnostic } from './format/formatter.ts'
export type { ChoiceStats, GrammarProfile, RuleStats } from './grammar/profile.ts'
export { type Layout, layout } from './lex/layout.ts'
export { scan } from './lex/scanner.ts'
export { type ParseResult, parse } from './parse/parser.ts'
export type { SessionStats } from './session/cache.ts'
export { checkComplete, type Completeness, completions } from './shell/complete.ts'
export { gate } from './version/gate.ts'
export { displayTarget, getFeature, isValidTarget, knownVersions, supports } from './version/table.ts'

// =============================================================================
// CONFIGURATION
// =============================================================================

let activeConfig: CompileConfig = DEFAULT_CONFIG

/**
 * Replace the process-wide configuration. Missing keys take their defaults,
 * not their previous values.
 *
 * @throws {ConfigurationError} If the target is not recognized
 */
export function configure(options: ConfigOptions = {}): CompileConfig {
	activeConfig = resolveConfig(options)
	return activeConfig
}

export function getConfig(): CompileConfig {
	return activeConfig
}

// =============================================================================
// SESSIONS
// =============================================================================

/**
 * Opt compiles naming `sessionId` into parse reuse. Enabling an active
 * session keeps its state.
 */
export function enableIncremental(sessionId: string): void {
	openSession(sessionId)
}

export function disableIncremental(sessionId: string): void {
	closeSession(sessionId)
}

export function getSessionStats(sessionId: string): SessionStats | undefined {
	return getSession(sessionId)?.getStats()
}

// =============================================================================
// COMPILE
// =============================================================================

export interface CompileOptions {
	/** Configuration for this call instead of the process-wide one */
	config?: ConfigOptions
	/** Incremental session; compiles cold when the session is not enabled */
	session?: string
	/** Path to the source file (for error messages) */
	filename?: string
}

/**
 * The diagnostic a failed phase stopped on. Strict style findings are
 * warnings in the catalog, so they are looked up after real errors.
 */
function fatalDiagnostic(context: CompilationContext): Diagnostic | undefined {
	const diagnostics = context.getDiagnostics()
	return context.getErrors()[0] ?? diagnostics[diagnostics.length - 1]
}

function failure(context: CompilationContext, phase: string): Error {
	const diagnostic = fatalDiagnostic(context)
	if (diagnostic === undefined) return new Error(`${phase} failed without a diagnostic`)
	return errorFor(toRendered(diagnostic, context.source))
}

function laidOut(context: CompilationContext): Layout {
	if (!scan(context).succeeded) throw failure(context, 'Scanning')
	const result = layout(context, { lenient: context.mode === CompileMode.Lenient })
	if (!result.succeeded || result.layout === undefined) throw failure(context, 'Layout')
	return result.layout
}

function parseOptionsFor(session: SessionCache | undefined): ParseOptions {
	if (session === undefined) return {}
	return { match: (input, startRule) => session.match(input, startRule) }
}

/**
 * Translate source text to Python.
 *
 * @param source - Copra source code
 * @param mode - One of the compile modes; `block` by default
 * @returns The translated text
 * @throws {LexError | GrammarError | TargetError | StyleError} On the first fatal diagnostic
 * @throws {ConfigurationError} On an unknown mode or an invalid `options.config`
 */
export function compile(source: string, mode: string = CompileMode.Block, options: CompileOptions = {}): string {
	const compileMode = assertCompileMode(mode)
	const config = options.config === undefined ? activeConfig : resolveConfig(options.config)
	const context = new CompilationContext(new SourceText(source, options.filename), config, compileMode)
	const session = options.session === undefined ? undefined : getSession(options.session)

	// Phase 1: Scanning and layout
	const laid = laidOut(context)

	// Phase 2: Parsing
	const parsed = parse(context, laid, parseOptionsFor(session))
	if (!parsed.succeeded || parsed.tree === undefined) throw failure(context, 'Parsing')
	const { tree } = parsed

	// Phases 3-5 walk the tree recursively
	const emitted = guardNesting(context, laid, () => {
		// Phase 3: Version gate
		if (!gate(context, tree, targetRangeOf(config)).succeeded) return undefined

		// Phase 4: Style audit
		if (!audit(context, tree, laid, { strict: config.strict }).succeeded) return undefined

		// Phase 5: Emission
		const result = emit(context, tree)
		return result.succeeded ? result : undefined
	})
	if (emitted === undefined) throw failure(context, 'Translation')

	return emitted.text
}

/**
 * ohm-js trace of the grammar over the source's layout text, for debugging.
 */
export function trace(source: string, mode: string = CompileMode.Block): string {
	const context = new CompilationContext(new SourceText(source), DEFAULT_CONFIG, assertCompileMode(mode))
	return traceGrammar(laidOut(context).text, startRuleFor(context.mode))
}

/**
 * Grammar usage for one source: rule application counts, how often each
 * alternative of an ordered choice wins, and the match time.
 */
export function profile(source: string, mode: string = CompileMode.Block): GrammarProfile {
	const context = new CompilationContext(new SourceText(source), DEFAULT_CONFIG, assertCompileMode(mode))
	const laid = laidOut(context)
	const profiled = guardNesting(context, laid, () => profileMatch(laid.text, startRuleFor(context.mode)))
	if (profiled === undefined) throw failure(context, 'Profiling')
	return profiled
}
