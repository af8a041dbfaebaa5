import type { MatchResult } from 'ohm-js'
import type { CompilationContext } from '../core/context.ts'
import type { DiagnosticArgs, DiagnosticCode } from '../core/diagnostics.ts'
import { type Pattern, type SyntaxNode, type SyntaxTree, walk } from '../core/nodes.ts'
import { CompileMode } from '../core/config.ts'
import { describeFailure, match, type StartRule, startRuleFor } from '../grammar/index.ts'
import type { Layout } from '../lex/layout.ts'
import { createTreeSemantics } from './semantics.ts'

export interface ParseResult {
	succeeded: boolean
	tree?: SyntaxTree
}

/** Runs the grammar over layout text; the session cache supplies its own. */
export type MatchFunction = (input: string, startRule: StartRule) => MatchResult

export interface ParseOptions {
	readonly match?: MatchFunction
}

interface Problem {
	readonly code: DiagnosticCode
	readonly start: number
	readonly args: DiagnosticArgs
}

/** Start of the top-level statement containing `offset`. */
function statementStart(layout: Layout, offset: number): number {
	let start = offset
	for (const candidate of layout.topLevelStarts) {
		if (candidate > offset) break
		start = candidate
	}
	return start
}

function reportFailure(context: CompilationContext, layout: Layout, result: MatchResult): void {
	const failure = describeFailure(result)
	const at = layout.offsets.toSource(failure.offset)
	context.emitRange('CPPARSE001', statementStart(layout, at), at, { expected: failure.expected })
}

// =============================================================================
// POST-MATCH CHECKS
// =============================================================================

/** Custom operators must be declared before their first use. */
function undeclaredOperators(tree: SyntaxTree): Problem[] {
	const declared = new Map<string, number>()
	const uses: { op: string; start: number }[] = []
	walk(tree, (node) => {
		switch (node.kind) {
			case 'OperatorDecl':
				if (!declared.has(node.op)) declared.set(node.op, node.span.start)
				break
			case 'CustomOp':
				uses.push({ op: node.op, start: node.opSpan.start })
				break
			case 'OpFunc':
			case 'Section':
				if (node.op.type === 'custom') uses.push({ op: node.op.symbol, start: node.op.span.start })
				break
		}
	})
	const problems: Problem[] = []
	for (const use of uses) {
		const at = declared.get(use.op)
		if (at === undefined || at > use.start) {
			problems.push({ args: { op: use.op }, code: 'CPPARSE005', start: use.start })
		}
	}
	return problems
}

function bindsName(pattern: SyntaxNode): boolean {
	let binds = false
	walk(pattern, (node) => {
		switch (node.kind) {
			case 'CapturePattern':
			case 'AsPattern':
				binds = true
				break
			case 'StarPattern':
				if (node.name !== '_') binds = true
				break
			case 'IsInstancePattern':
				if (node.name !== null) binds = true
				break
			case 'MappingPattern':
				if (node.rest !== null) binds = true
				break
		}
		return !binds
	})
	return binds
}

function bindingAlternatives(tree: SyntaxTree): Problem[] {
	const problems: Problem[] = []
	walk(tree, (node) => {
		if (node.kind !== 'OrPattern') return
		const offending = node.patterns.find((alternative: Pattern) => bindsName(alternative))
		if (offending !== undefined) problems.push({ args: {}, code: 'CPPARSE007', start: offending.span.start })
	})
	return problems
}

// =============================================================================
// NESTING
// =============================================================================

/** Start of the longest top-level statement, where deep nesting is likeliest. */
function longestStatementStart(context: CompilationContext, layout: Layout): number {
	const starts = layout.topLevelStarts
	let best = starts[0] ?? 0
	let bestLength = -1
	starts.forEach((start, i) => {
		const length = (starts[i + 1] ?? context.source.text.length) - start
		if (length > bestLength) {
			best = start
			bestLength = length
		}
	})
	return best
}

/**
 * Run a recursive phase, turning a stack overflow into CPPARSE010.
 * Returns undefined after reporting.
 */
export function guardNesting<T>(context: CompilationContext, layout: Layout, phase: () => T): T | undefined {
	try {
		return phase()
	} catch (error) {
		if (!(error instanceof RangeError)) throw error
		context.emitAt('CPPARSE010', longestStatementStart(context, layout))
		return undefined
	}
}

// =============================================================================
// PARSE
// =============================================================================

/**
 * Parse the layout text into a syntax tree.
 * Reports CPPARSE001 on a failed match and CPPARSE010 on nesting too deep to
 * follow, otherwise the first of CPPARSE005/006/007 in source order.
 */
export function parse(context: CompilationContext, layout: Layout, options: ParseOptions = {}): ParseResult {
	const run = options.match ?? match
	const result = guardNesting(context, layout, () => run(layout.text, startRuleFor(context.mode)))
	if (result === undefined) return { succeeded: false }
	if (result.failed()) {
		reportFailure(context, layout, result)
		return { succeeded: false }
	}

	const { semantics, problems } = createTreeSemantics(context.source.text, {
		input: layout.text,
		toSource: (index) => layout.offsets.toSource(index),
	})
	const tree = guardNesting(context, layout, (): SyntaxTree => semantics(result)['tree']())
	if (tree === undefined) return { succeeded: false }

	const found: Problem[] = [
		...problems,
		...bindingAlternatives(tree),
		...(context.mode === CompileMode.Lenient ? [] : undeclaredOperators(tree)),
	]
	const first = found.reduce<Problem | undefined>(
		(best, p) => (best === undefined || p.start < best.start ? p : best),
		undefined
	)
	if (first !== undefined) {
		context.emitAt(first.code, first.start, first.args)
		return { succeeded: false }
	}

	return { succeeded: true, tree }
}
