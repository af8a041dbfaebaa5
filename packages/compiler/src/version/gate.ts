/**
 * Version gate: rejects recognized constructs the configured target cannot run.
 *
 * The grammar accepts every construct for every target; this pass decides
 * afterwards, so a construct takes the same recognition path whether it is
 * accepted or rejected.
 */

import type { CompilationContext } from '../core/context.ts'
import type { DiagnosticArgs } from '../core/diagnostics.ts'
import { childrenOf, type Expr, type Param, type SyntaxNode, type SyntaxTree } from '../core/nodes.ts'
import { compareVersions, displayTarget, getFeature, supports, type TargetRange } from './table.ts'

export type GateDecision =
	| { readonly ok: true }
	| { readonly ok: false; readonly code: 'CPTARGET001' | 'CPTARGET002'; readonly args: DiagnosticArgs }

export interface GateResult {
	succeeded: boolean
}

interface Violation {
	readonly offset: number
	readonly code: 'CPTARGET001' | 'CPTARGET002'
	readonly args: DiagnosticArgs
}

/**
 * Decide whether a feature is usable for a target range.
 * A pure function of its arguments.
 */
export function checkFeature(feature: string, range: TargetRange): GateDecision {
	if (supports(feature, range)) return { ok: true }
	const entry = getFeature(feature)
	const target = displayTarget(range.target)
	if (entry.removed !== undefined && compareVersions(range.lo, entry.minVersion) >= 0) {
		return { args: { description: entry.description, removed: entry.removed, target }, code: 'CPTARGET002', ok: false }
	}
	return { args: { description: entry.description, min: entry.min, target }, code: 'CPTARGET001', ok: false }
}

/** Parameters after `*` or `*args`, excluding `**kwargs`. */
export function keywordOnlyParams(params: readonly Param[]): Param[] {
	const index = params.findIndex((p) => p.mode === 'varargs' || p.mode === 'kwMarker')
	if (index === -1) return []
	return params.slice(index + 1).filter((p) => p.mode === 'plain')
}

// =============================================================================
// TREE WALK
// =============================================================================

interface GateState {
	readonly range: TargetRange
	readonly violations: Violation[]
	/** Starred expressions that are assignment targets */
	readonly targets: Set<SyntaxNode>
}

function requireFeature(state: GateState, feature: string, offset: number): void {
	const decision = checkFeature(feature, state.range)
	if (!decision.ok) state.violations.push({ args: decision.args, code: decision.code, offset })
}

function markTargets(state: GateState, target: Expr): void {
	switch (target.kind) {
		case 'Starred':
			state.targets.add(target)
			markTargets(state, target.value)
			break
		case 'Tuple':
		case 'List':
			for (const elt of target.elts) markTargets(state, elt)
			break
		case 'Paren':
			markTargets(state, target.expr)
			break
	}
}

function checkParams(state: GateState, params: readonly Param[], isLambda: boolean): void {
	for (const param of params) {
		if (param.mode === 'posMarker') requireFeature(state, 'posonly_args', param.span.start)
		if (param.annotation !== null) requireFeature(state, 'function_annotations', param.annotation.span.start)
	}
	for (const param of keywordOnlyParams(params)) {
		// defaults in a def are lowered for older targets
		if (isLambda || param.default === null) requireFeature(state, 'kwonly_args', param.span.start)
	}
}

function isUrPrefix(prefix: string): boolean {
	return prefix.toLowerCase() === 'ur'
}

function visit(state: GateState, node: SyntaxNode, parent: SyntaxNode | null, inAsync: boolean): void {
	let childAsync = inAsync
	switch (node.kind) {
		case 'NamedExpr':
			requireFeature(state, 'assignment_expressions', node.span.start)
			break
		case 'FunctionDef':
			if (node.isAsync) requireFeature(state, 'async_functions', node.span.start)
			checkParams(state, node.params, false)
			if (node.returns !== null) requireFeature(state, 'function_annotations', node.returns.span.start)
			childAsync = node.isAsync
			break
		case 'Lambda':
			checkParams(state, node.params, true)
			childAsync = false
			break
		case 'ClassDef':
			childAsync = false
			break
		case 'For':
			if (node.isAsync) requireFeature(state, 'async_functions', node.span.start)
			markTargets(state, node.target)
			break
		case 'With':
			if (node.isAsync) requireFeature(state, 'async_functions', node.span.start)
			break
		case 'Yield':
			if (inAsync) requireFeature(state, 'async_generators', node.span.start)
			break
		case 'YieldFrom':
			requireFeature(state, 'yield_from', node.span.start)
			break
		case 'CompFor':
			if (node.isAsync) requireFeature(state, 'async_comprehensions', node.span.start)
			markTargets(state, node.target)
			break
		case 'TypeAlias':
			requireFeature(state, 'type_alias_statements', node.span.start)
			break
		case 'BinOp':
			if (node.op === '@') requireFeature(state, 'matrix_multiplication', node.left.span.end)
			break
		case 'AugAssign':
			if (node.op === '@') requireFeature(state, 'matrix_multiplication', node.target.span.end)
			break
		case 'Nonlocal':
			requireFeature(state, 'nonlocal_statements', node.span.start)
			break
		case 'AnnAssign':
			requireFeature(state, 'variable_annotations', node.span.start)
			break
		case 'ExceptHandler':
			if (node.star) requireFeature(state, 'exception_groups', node.span.start)
			break
		case 'Raise':
			if (node.cause !== null) requireFeature(state, 'raise_from', node.cause.span.start)
			break
		case 'Assign':
			for (const target of node.targets) markTargets(state, target)
			break
		case 'Starred':
			if (state.targets.has(node)) {
				requireFeature(state, 'extended_unpacking', node.span.start)
			} else if (parent !== null && (parent.kind === 'Tuple' || parent.kind === 'List' || parent.kind === 'Set')) {
				requireFeature(state, 'iterable_unpacking', node.span.start)
			}
			break
		case 'DictSplat':
			requireFeature(state, 'dict_unpacking', node.span.start)
			break
		case 'StringLiteral':
			if (isUrPrefix(node.prefix)) requireFeature(state, 'ur_string_prefix', node.span.start)
			break
	}
	for (const child of childrenOf(node)) visit(state, child, node, childAsync)
}

/**
 * Check every gated construct in the tree against the target range.
 * Reports the earliest violation as a TargetError diagnostic.
 */
export function gate(context: CompilationContext, tree: SyntaxTree, range: TargetRange): GateResult {
	const state: GateState = { range, targets: new Set(), violations: [] }
	visit(state, tree, null, false)

	const first = state.violations.reduce<Violation | undefined>(
		(best, v) => (best === undefined || v.offset < best.offset ? v : best),
		undefined
	)
	if (first === undefined) return { succeeded: true }
	context.emitAt(first.code, first.offset, first.args)
	return { succeeded: false }
}
