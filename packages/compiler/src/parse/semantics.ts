import type { Node, Semantics } from 'ohm-js'
import type { DiagnosticArgs } from '../core/diagnostics.ts'
import type {
	Alias,
	Arg,
	ClassDefStmt,
	CompareOp,
	CompClause,
	DictEntry,
	ElifClause,
	ExceptHandler,
	Expr,
	FormatField,
	FormatSegment,
	FunctionDefStmt,
	KeywordPattern,
	MappingItem,
	MatchCase,
	NameExpr,
	Param,
	ParamMode,
	Pattern,
	PipeOp,
	SectionOp,
	SliceNode,
	StarPattern,
	Stmt,
	StringLiteral,
	SyntaxTree,
	WithItem,
} from '../core/nodes.ts'
import { type Span, span } from '../core/source.ts'
import { CopraGrammar, describeFailure, StartRule } from '../grammar/index.ts'
import { fragmentText, JOINED } from '../lex/layout.ts'
import { type RawField, type RawSegment, splitFormatBody } from './fstring.ts'

/**
 * How grammar input offsets relate to the source. The main parse matches
 * layout text; format-string fields match a fragment of one literal.
 */
export interface InputFrame {
	readonly input: string
	toSource(index: number): number
}

/** A problem found while building the tree from a successful match. */
export interface SemanticsProblem {
	readonly code: 'CPPARSE006'
	readonly start: number
	readonly end: number
	readonly args: DiagnosticArgs
}

export interface TreeSemantics {
	readonly semantics: Semantics
	readonly problems: SemanticsProblem[]
}

type Trailer = (base: Expr) => Expr

type MappingEntry = MappingItem | { readonly kind: 'rest'; readonly name: string }

const SKIPPED = new Set([' ', '\t', '\x0c', '\n', JOINED, '⇥', '⇤'])

const COMPARE_OPS: readonly CompareOp[] = ['<', '>', '<=', '>=', '==', '!=', 'in', 'not in', 'is', 'is not']
const PIPE_OPS: readonly PipeOp[] = ['|>', '|*>', '|**>', '<|']
const UNARY_OPS = ['-', '+', '~'] as const

function toCompareOp(text: string): CompareOp {
	const op = COMPARE_OPS.find((candidate) => candidate === text)
	if (op === undefined) throw new Error(`Unknown comparison operator: ${text}`)
	return op
}

function toPipeOp(text: string): PipeOp {
	const op = PIPE_OPS.find((candidate) => candidate === text)
	if (op === undefined) throw new Error(`Unknown pipe operator: ${text}`)
	return op
}

function toUnaryOp(text: string): (typeof UNARY_OPS)[number] {
	const op = UNARY_OPS.find((candidate) => candidate === text)
	if (op === undefined) throw new Error(`Unknown unary operator: ${text}`)
	return op
}

function join(a: Span, b: Span): Span {
	return span(a.start, b.end)
}

function child(node: Node, index: number): Node {
	const c = node.children[index]
	if (c === undefined) throw new Error(`${node.ctorName} has no child ${index}`)
	return c
}

function optional<T>(iter: Node, build: (node: Node) => T): T | null {
	const c = iter.children[0]
	return c === undefined ? null : build(c)
}

function listItems(list: Node): Node[] {
	return list.asIteration().children
}

/**
 * Create the tree-building semantics for one parse.
 *
 * Leaf text is always sliced from `source` through the frame's offset map,
 * never read from the matched input, which holds layout markers.
 */
export function createTreeSemantics(source: string, rootFrame: InputFrame): TreeSemantics {
	const semantics = CopraGrammar.createSemantics()
	const problems: SemanticsProblem[] = []
	let frame = rootFrame

	function spanOf(node: Node): Span {
		const { input } = frame
		let s = node.source.startIdx
		let e = node.source.endIdx
		while (s < e) {
			const ch = input.charAt(s)
			if (SKIPPED.has(ch)) s++
			else if (ch === '\\' && input.charAt(s + 1) === JOINED) s += 2
			else if (ch === '#') {
				while (s < e && input.charAt(s) !== '\n' && input.charAt(s) !== JOINED) s++
			} else break
		}
		while (e > s && SKIPPED.has(input.charAt(e - 1))) e--
		if (e <= s) {
			const point = frame.toSource(s)
			return span(point, point)
		}
		return span(frame.toSource(s), frame.toSource(e - 1) + 1)
	}

	function text(node: Node): string {
		const { start, end } = spanOf(node)
		return source.slice(start, end)
	}

	const expr = (node: Node): Expr => node['expr']()
	const exprs = (list: Node): Expr[] => listItems(list).map(expr)
	const stmt = (node: Node): Stmt => node['stmt']()
	const stmts = (node: Node): Stmt[] => node['stmts']()
	const pattern = (node: Node): Pattern => node['pattern']()
	const param = (node: Node): Param => node['param']()
	const params = (node: Node): Param[] => node['params']()
	const arg = (node: Node): Arg => node['arg']()
	const args = (list: Node): Arg[] => listItems(list).map(arg)
	const clauses = (node: Node): CompClause[] => node['clauses']()
	const sectionOp = (node: Node): SectionOp => node['sectionOp']()
	const alias = (node: Node): Alias => node['alias']()
	const definition = (node: Node): FunctionDefStmt | ClassDefStmt => node['definition']()
	const elseSuite = (iter: Node): Stmt[] | null => optional(iter, stmts)
	const asName = (iter: Node): string | null => optional(iter, (n) => text(child(n, 1)))
	/** The expression after a leading token, as in `: T`, `= v` or `-> T`. */
	const wrapped = (node: Node): Expr => expr(child(node, 1))

	function nameExpr(node: Node): NameExpr {
		return { id: text(node), kind: 'Name', span: spanOf(node) }
	}

	/** A comma-separated list as one expression: a tuple unless it is a single bare item. */
	function tupleOrSingle(node: Node, list: Node, trailingComma: Node): Expr {
		const items = exprs(list)
		const only = items[0]
		if (items.length === 1 && only !== undefined && trailingComma.children.length === 0) return only
		return { elts: items, kind: 'Tuple', span: spanOf(node) }
	}

	/** Fold `first (op operand)*` into left-associated binary nodes. */
	function foldLeft(first: Node, ops: Node, operands: Node, build: (op: Node, left: Expr, right: Expr) => Expr): Expr {
		let acc = expr(first)
		ops.children.forEach((op, i) => {
			acc = build(op, acc, expr(child(operands, i)))
		})
		return acc
	}

	function binOp(op: Node, left: Expr, right: Expr): Expr {
		return { kind: 'BinOp', left, op: text(op), right, span: join(left.span, right.span) }
	}

	function buildFunction(
		node: Node,
		name: Node,
		parameters: Node,
		returns: Node,
		body: Stmt[],
		assignment: boolean
	): FunctionDefStmt {
		return {
			assignment,
			body,
			decorators: [],
			isAsync: false,
			kind: 'FunctionDef',
			name: text(name),
			params: params(parameters),
			returns: optional(returns, wrapped),
			span: spanOf(node),
		}
	}

	function buildParam(node: Node, mode: ParamMode, name: Node | null, annotation: Node | null, def: Node | null): Param {
		return {
			annotation: annotation === null ? null : optional(annotation, wrapped),
			default: def === null ? null : optional(def, wrapped),
			kind: 'Param',
			mode,
			name: name === null ? null : text(name),
			span: spanOf(node),
		}
	}

	function comprehension(node: Node, kind: 'ListComp' | 'SetComp' | 'GenExp', elt: Node, comp: Node): Expr {
		return { clauses: clauses(comp), elt: expr(elt), kind, span: spanOf(node) }
	}

	// ===========================================================================
	// FORMAT STRINGS
	// ===========================================================================

	function withFrame<T>(next: InputFrame, run: () => T): T {
		const saved = frame
		frame = next
		try {
			return run()
		} finally {
			frame = saved
		}
	}

	function formatField(field: RawField): FormatField {
		const input = fragmentText(field.exprText)
		const result = CopraGrammar.match(input, StartRule.FString)
		const fieldSpan = span(field.start, field.end)
		const spec = field.spec === null ? null : formatSegments(field.spec)
		if (result.failed()) {
			const failure = describeFailure(result)
			const at = field.exprStart + Math.min(failure.offset, field.exprText.length)
			problems.push({ args: { expected: failure.expected }, code: 'CPPARSE006', end: at, start: at })
			const placeholder: NameExpr = { id: field.exprText, kind: 'Name', span: fieldSpan }
			return { conversion: field.conversion, debug: field.debug, expr: placeholder, kind: 'FormatField', spec, span: fieldSpan }
		}
		const length = field.exprText.length
		const value = withFrame({ input, toSource: (i) => field.exprStart + Math.min(i, length) }, (): Expr =>
			semantics(result)['expr']()
		)
		return { conversion: field.conversion, debug: field.debug, expr: value, kind: 'FormatField', spec, span: fieldSpan }
	}

	function formatSegments(raw: readonly RawSegment[]): FormatSegment[] {
		return raw.map((segment) =>
			segment.type === 'text'
				? { kind: 'FormatText', span: span(segment.start, segment.end), text: segment.text }
				: formatField(segment)
		)
	}

	function stringLiteral(node: Node, isFormat: boolean): StringLiteral {
		const literalSpan = spanOf(node)
		const full = source.slice(literalSpan.start, literalSpan.end)
		const prefix = /^[a-zA-Z]*/.exec(full)?.[0] ?? ''
		const q = full.charAt(prefix.length)
		const quote = full.startsWith(q.repeat(3), prefix.length) ? q.repeat(3) : q
		const bodyStart = prefix.length + quote.length
		const body = full.slice(bodyStart, full.length - quote.length)
		const segments = isFormat
			? formatSegments(splitFormatBody(body, literalSpan.start + bodyStart, /r/i.test(prefix)))
			: null
		return { body, kind: 'StringLiteral', prefix, quote, segments, span: literalSpan }
	}

	// ===========================================================================
	// ROOTS AND STATEMENTS
	// ===========================================================================

	semantics.addOperation<SyntaxTree>('tree', {
		EvalInput(_lead: Node, list: Node, _trail: Node, _end: Node) {
			return { kind: 'Expression', span: spanOf(this), value: expr(list) }
		},
		FileInput(lines: Node, _end: Node) {
			return { body: lines.children.flatMap(stmts), kind: 'Module', span: spanOf(this) }
		},
		SingleInput(_lead: Node, statement: Node, _trail: Node, _end: Node) {
			return { body: stmts(statement), kind: 'Module', span: spanOf(this) }
		},
	})

	semantics.addOperation<Stmt[]>('stmts', {
		CompoundStmt(statement: Node) {
			return [stmt(statement)]
		},
		ElseClause(_kw: Node, _colon: Node, suite: Node) {
			return stmts(suite)
		},
		FinallyClause(_kw: Node, _colon: Node, suite: Node) {
			return stmts(suite)
		},
		Line_blank(_nl: Node) {
			return []
		},
		SimpleLine(list: Node, _semi: Node, _nl: Node) {
			return listItems(list).map(stmt)
		},
		Suite_block(_nls: Node, _indent: Node, first: Node, lines: Node, _dedent: Node) {
			return [...stmts(first), ...lines.children.flatMap(stmts)]
		},
	})

	semantics.addOperation<Stmt>('stmt', {
		AnnAssign(target: Node, _colon: Node, annotation: Node, value: Node) {
			return {
				annotation: expr(annotation),
				kind: 'AnnAssign',
				span: spanOf(this),
				target: expr(target),
				value: optional(value, wrapped),
			}
		},
		AssertStmt(_kw: Node, test: Node, message: Node) {
			return {
				kind: 'Assert',
				msg: optional(message, wrapped),
				span: spanOf(this),
				test: expr(test),
			}
		},
		Assign(lhs: Node, value: Node) {
			return {
				kind: 'Assign',
				span: spanOf(this),
				targets: lhs.children.map((l) => expr(child(l, 0))),
				value: expr(value),
			}
		},
		AssignFuncDef(_def: Node, name: Node, parameters: Node, returns: Node, _eq: Node, body: Node) {
			const value = expr(body)
			const ret: Stmt = { kind: 'Return', span: value.span, value }
			return buildFunction(this, name, parameters, returns, [ret], true)
		},
		AsyncStmt(_kw: Node, body: Node) {
			const inner = stmt(body)
			const whole = spanOf(this)
			switch (inner.kind) {
				case 'FunctionDef':
				case 'For':
				case 'With':
					return { ...inner, isAsync: true, span: whole }
				default:
					throw new Error(`Unexpected async statement: ${inner.kind}`)
			}
		},
		AugAssign(target: Node, op: Node, value: Node) {
			return {
				kind: 'AugAssign',
				op: text(op).slice(0, -1),
				span: spanOf(this),
				target: expr(target),
				value: expr(value),
			}
		},
		BreakStmt(_kw: Node) {
			return { kind: 'Break', span: spanOf(this) }
		},
		ClassDef(_kw: Node, _name: Node, _args: Node, _colon: Node, _suite: Node) {
			return definition(this)
		},
		ContinueStmt(_kw: Node) {
			return { kind: 'Continue', span: spanOf(this) }
		},
		Decorated(decorators: Node, def: Node) {
			return {
				...definition(def),
				decorators: decorators.children.map((d) => expr(child(d, 1))),
				span: spanOf(this),
			}
		},
		DelStmt(_kw: Node, targets: Node, _comma: Node) {
			return { kind: 'Del', span: spanOf(this), targets: exprs(targets) }
		},
		ExprStmt(value: Node) {
			return { kind: 'ExprStmt', span: spanOf(this), value: expr(value) }
		},
		ForStmt(_for: Node, targets: Node, _in: Node, iter: Node, _colon: Node, suite: Node, orelse: Node) {
			return {
				body: stmts(suite),
				isAsync: false,
				iter: expr(iter),
				kind: 'For',
				orelse: elseSuite(orelse),
				span: spanOf(this),
				target: expr(targets),
			}
		},
		FromImportStmt(_from: Node, module: Node, _import: Node, targets: Node) {
			return {
				kind: 'ImportFrom',
				module: text(module),
				names: targets['aliases'](),
				span: spanOf(this),
			}
		},
		FuncDef(_def: Node, _name: Node, _params: Node, _returns: Node, _colon: Node, _suite: Node) {
			return definition(this)
		},
		GlobalStmt(_kw: Node, names: Node) {
			return { kind: 'Global', names: listItems(names).map(text), span: spanOf(this) }
		},
		IfStmt(_if: Node, test: Node, _colon: Node, suite: Node, elifs: Node, orelse: Node) {
			return {
				body: stmts(suite),
				elifs: elifs.children.map((e): ElifClause => e['elif']()),
				kind: 'If',
				orelse: elseSuite(orelse),
				span: spanOf(this),
				test: expr(test),
			}
		},
		ImportStmt(_kw: Node, names: Node) {
			return { kind: 'Import', names: listItems(names).map(alias), span: spanOf(this) }
		},
		MatchStmt(
			_kw: Node,
			subject: Node,
			_colon: Node,
			_nls: Node,
			_indent: Node,
			first: Node,
			rest: Node,
			_dedent: Node
		) {
			const cases: MatchCase[] = [first['matchCase'](), ...rest.children.flatMap((c): MatchCase[] => c['cases']())]
			return { cases, kind: 'Match', span: spanOf(this), subject: expr(subject) }
		},
		NonlocalStmt(_kw: Node, names: Node) {
			return { kind: 'Nonlocal', names: listItems(names).map(text), span: spanOf(this) }
		},
		OperatorDecl(_kw: Node, op: Node) {
			return { kind: 'OperatorDecl', op: text(op), span: spanOf(this) }
		},
		PassStmt(_kw: Node) {
			return { kind: 'Pass', span: spanOf(this) }
		},
		RaiseStmt_from(_kw: Node, exc: Node, _from: Node, cause: Node) {
			return { cause: expr(cause), exc: expr(exc), kind: 'Raise', span: spanOf(this) }
		},
		RaiseStmt_plain(_kw: Node, exc: Node) {
			return { cause: null, exc: optional(exc, expr), kind: 'Raise', span: spanOf(this) }
		},
		ReturnStmt(_kw: Node, value: Node) {
			return { kind: 'Return', span: spanOf(this), value: optional(value, expr) }
		},
		TryStmt_except(_try: Node, _colon: Node, suite: Node, handlers: Node, orelse: Node, finalbody: Node) {
			return {
				body: stmts(suite),
				finalbody: elseSuite(finalbody),
				handlers: handlers.children.map((h): ExceptHandler => h['handler']()),
				kind: 'Try',
				orelse: elseSuite(orelse),
				span: spanOf(this),
			}
		},
		TryStmt_finally(_try: Node, _colon: Node, suite: Node, finalbody: Node) {
			return {
				body: stmts(suite),
				finalbody: stmts(finalbody),
				handlers: [],
				kind: 'Try',
				orelse: null,
				span: spanOf(this),
			}
		},
		TypeAlias(_kw: Node, name: Node, _eq: Node, value: Node) {
			return { kind: 'TypeAlias', name: text(name), span: spanOf(this), value: expr(value) }
		},
		WhileStmt(_kw: Node, test: Node, _colon: Node, suite: Node, orelse: Node) {
			return {
				body: stmts(suite),
				kind: 'While',
				orelse: elseSuite(orelse),
				span: spanOf(this),
				test: expr(test),
			}
		},
		WithStmt(_kw: Node, items: Node, _colon: Node, suite: Node) {
			return {
				body: stmts(suite),
				isAsync: false,
				items: listItems(items).map((i): WithItem => i['withItem']()),
				kind: 'With',
				span: spanOf(this),
			}
		},
	})

	semantics.addOperation<FunctionDefStmt | ClassDefStmt>('definition', {
		AsyncFuncDef(_kw: Node, def: Node) {
			const inner = definition(def)
			if (inner.kind !== 'FunctionDef') throw new Error('Only functions can be async definitions')
			return { ...inner, isAsync: true, span: spanOf(this) }
		},
		ClassDef(_kw: Node, name: Node, classArgs: Node, _colon: Node, suite: Node) {
			return {
				args: optional(classArgs, (c) => args(child(c, 1))),
				body: stmts(suite),
				decorators: [],
				kind: 'ClassDef',
				name: text(name),
				span: spanOf(this),
			}
		},
		FuncDef(_def: Node, name: Node, parameters: Node, returns: Node, _colon: Node, suite: Node) {
			return buildFunction(this, name, parameters, returns, stmts(suite), false)
		},
	})

	semantics.addOperation<Alias>('alias', {
		DottedAsName(dotted: Node, as: Node) {
			return { asname: asName(as), kind: 'Alias', name: text(dotted), span: spanOf(this) }
		},
		ImportAsName(name: Node, as: Node) {
			return { asname: asName(as), kind: 'Alias', name: text(name), span: spanOf(this) }
		},
	})

	semantics.addOperation<Alias[] | null>('aliases', {
		ImportTargets_paren(_open: Node, list: Node, _comma: Node, _close: Node) {
			return listItems(list).map(alias)
		},
		ImportTargets_plain(list: Node) {
			return listItems(list).map(alias)
		},
		ImportTargets_star(_star: Node) {
			return null
		},
	})

	semantics.addOperation<ElifClause>('elif', {
		ElifClause(_kw: Node, test: Node, _colon: Node, suite: Node) {
			return { body: stmts(suite), kind: 'Elif', span: spanOf(this), test: expr(test) }
		},
	})

	semantics.addOperation<ExceptHandler>('handler', {
		ExceptClause(_kw: Node, star: Node, target: Node, _colon: Node, suite: Node) {
			const caught = target.children[0]
			return {
				body: stmts(suite),
				kind: 'ExceptHandler',
				name: caught === undefined ? null : asName(child(caught, 1)),
				span: spanOf(this),
				star: star.children.length > 0,
				type: caught === undefined ? null : expr(child(caught, 0)),
			}
		},
	})

	semantics.addOperation<WithItem>('withItem', {
		WithItem(context: Node, target: Node) {
			return {
				context: expr(context),
				kind: 'WithItem',
				span: spanOf(this),
				target: optional(target, wrapped),
			}
		},
	})

	semantics.addOperation<MatchCase>('matchCase', {
		CaseClause(_kw: Node, patterns: Node, guard: Node, _colon: Node, suite: Node) {
			return {
				body: stmts(suite),
				guard: optional(guard, wrapped),
				kind: 'MatchCase',
				pattern: pattern(patterns),
				span: spanOf(this),
			}
		},
	})

	semantics.addOperation<MatchCase[]>('cases', {
		CaseLine_blank(_nl: Node) {
			return []
		},
		CaseLine_case(clause: Node) {
			return [clause['matchCase']()]
		},
	})

	// ===========================================================================
	// PARAMETERS AND ARGUMENTS
	// ===========================================================================

	semantics.addOperation<Param[]>('params', {
		LambdaParams_paren(_open: Node, list: Node, _comma: Node, _close: Node) {
			return listItems(list).map(param)
		},
		LambdaParams_single(name: Node) {
			return [buildParam(this, 'plain', name, null, null)]
		},
		Parameters(_open: Node, list: Node, _comma: Node, _close: Node) {
			return listItems(list).map(param)
		},
	})

	semantics.addOperation<Param>('param', {
		LambdaParam_kwargs(_stars: Node, name: Node) {
			return buildParam(this, 'kwargs', name, null, null)
		},
		LambdaParam_kwMarker(_star: Node) {
			return buildParam(this, 'kwMarker', null, null, null)
		},
		LambdaParam_plain(name: Node, def: Node) {
			return buildParam(this, 'plain', name, null, def)
		},
		LambdaParam_posMarker(_slash: Node) {
			return buildParam(this, 'posMarker', null, null, null)
		},
		LambdaParam_varargs(_star: Node, name: Node) {
			return buildParam(this, 'varargs', name, null, null)
		},
		Param_kwargs(_stars: Node, name: Node, annotation: Node) {
			return buildParam(this, 'kwargs', name, annotation, null)
		},
		Param_kwMarker(_star: Node) {
			return buildParam(this, 'kwMarker', null, null, null)
		},
		Param_plain(name: Node, annotation: Node, def: Node) {
			return buildParam(this, 'plain', name, annotation, def)
		},
		Param_posMarker(_slash: Node) {
			return buildParam(this, 'posMarker', null, null, null)
		},
		Param_varargs(_star: Node, name: Node, annotation: Node) {
			return buildParam(this, 'varargs', name, annotation, null)
		},
	})

	semantics.addOperation<Arg>('arg', {
		Arg_genexp(elt: Node, comp: Node) {
			const value = comprehension(this, 'GenExp', elt, comp)
			return { kind: 'PositionalArg', span: value.span, value }
		},
		Arg_keyword(name: Node, _eq: Node, value: Node) {
			return { kind: 'KeywordArg', name: text(name), span: spanOf(this), value: expr(value) }
		},
		Arg_kwsplat(_stars: Node, value: Node) {
			return { kind: 'KwStarArg', span: spanOf(this), value: expr(value) }
		},
		Arg_placeholder(_q: Node) {
			return { kind: 'PlaceholderArg', span: spanOf(this) }
		},
		Arg_positional(value: Node) {
			return { kind: 'PositionalArg', span: spanOf(this), value: expr(value) }
		},
		Arg_splat(_star: Node, value: Node) {
			return { kind: 'StarArg', span: spanOf(this), value: expr(value) }
		},
	})

	semantics.addOperation<Trailer>('trailer', {
		Trailer_attr(_dot: Node, name: Node) {
			const end = spanOf(this)
			const attr = text(name)
			return (value) => ({ attr, kind: 'Attribute', span: join(value.span, end), value })
		},
		Trailer_call(_open: Node, list: Node, _comma: Node, _close: Node) {
			const end = spanOf(this)
			const callArgs = args(list)
			return (func) => ({ args: callArgs, func, kind: 'Call', span: join(func.span, end) })
		},
		Trailer_index(_open: Node, subscripts: Node, _close: Node) {
			const end = spanOf(this)
			const list = child(subscripts, 0)
			const slices = listItems(list).map((s): Expr | SliceNode => s['sliceItem']())
			const trailingComma = child(subscripts, 1).children.length > 0
			return (value) => ({ kind: 'Subscript', slices, span: join(value.span, end), trailingComma, value })
		},
		Trailer_partial(_open: Node, list: Node, _comma: Node, _close: Node) {
			const end = spanOf(this)
			const partialArgs = args(list)
			return (func) => ({ args: partialArgs, func, kind: 'Partial', span: join(func.span, end) })
		},
	})

	semantics.addOperation<Expr | SliceNode>('sliceItem', {
		Subscript_index(item: Node) {
			return expr(item)
		},
		Subscript_slice(lower: Node, _colon: Node, upper: Node, step: Node) {
			return {
				kind: 'Slice',
				lower: optional(lower, expr),
				span: spanOf(this),
				step: optional(step, (s) => ({ value: optional(child(s, 1), expr) })),
				upper: optional(upper, expr),
			}
		},
	})

	semantics.addOperation<DictEntry>('dictEntry', {
		DictEntry_pair(key: Node, _colon: Node, value: Node) {
			return { key: expr(key), kind: 'DictPair', span: spanOf(this), value: expr(value) }
		},
		DictEntry_splat(_stars: Node, value: Node) {
			return { kind: 'DictSplat', span: spanOf(this), value: expr(value) }
		},
	})

	semantics.addOperation<CompClause[]>('clauses', {
		CompFor(first: Node, rest: Node) {
			return [first['clause'](), ...rest.children.map((c): CompClause => c['clause']())]
		},
	})

	semantics.addOperation<CompClause>('clause', {
		CompClause_if(_kw: Node, test: Node) {
			return { kind: 'CompIf', span: spanOf(this), test: expr(test) }
		},
		CompForClause(isAsync: Node, _for: Node, targets: Node, _in: Node, iter: Node) {
			return {
				isAsync: isAsync.children.length > 0,
				iter: expr(iter),
				kind: 'CompFor',
				span: spanOf(this),
				target: expr(targets),
			}
		},
	})

	semantics.addOperation<SectionOp>('sectionOp', {
		backtickOp(_open: Node, name: Node, _close: Node) {
			return { func: text(name), type: 'backtick' }
		},
		customOp(_chars: Node) {
			return { span: spanOf(this), symbol: text(this), type: 'custom' }
		},
		sectionOp_arith(_op: Node) {
			return { symbol: text(this), type: 'builtin' }
		},
		sectionOp_compose(_op: Node) {
			return { symbol: '..', type: 'builtin' }
		},
		sectionOp_sym(_op: Node) {
			return { symbol: text(this), type: 'builtin' }
		},
	})

	// ===========================================================================
	// EXPRESSIONS
	// ===========================================================================

	semantics.addOperation<Expr>('expr', {
		AndTest(list: Node) {
			const values = exprs(list)
			const only = values[0]
			if (values.length === 1 && only !== undefined) return only
			return { kind: 'BoolOp', op: 'and', span: spanOf(this), values }
		},
		ArithExpr(first: Node, ops: Node, rest: Node) {
			return foldLeft(first, ops, rest, binOp)
		},
		Atom_attrPartial(_dot: Node, name: Node) {
			return { args: null, attr: text(name), kind: 'AttrPartial', span: spanOf(this) }
		},
		Atom_dict(_open: Node, list: Node, _comma: Node, _close: Node) {
			return {
				entries: listItems(list).map((e): DictEntry => e['dictEntry']()),
				kind: 'Dict',
				span: spanOf(this),
			}
		},
		Atom_dictComp(_open: Node, key: Node, _colon: Node, value: Node, comp: Node, _close: Node) {
			return { clauses: clauses(comp), key: expr(key), kind: 'DictComp', span: spanOf(this), value: expr(value) }
		},
		Atom_ellipsis(_dots: Node) {
			return { kind: 'Constant', span: spanOf(this), value: '...' }
		},
		Atom_emptyDict(_open: Node, _close: Node) {
			return { entries: [], kind: 'Dict', span: spanOf(this) }
		},
		Atom_emptyList(_open: Node, _close: Node) {
			return { elts: [], kind: 'List', span: spanOf(this) }
		},
		Atom_false(_kw: Node) {
			return { kind: 'Constant', span: spanOf(this), value: 'False' }
		},
		Atom_genexp(_open: Node, elt: Node, comp: Node, _close: Node) {
			return comprehension(this, 'GenExp', elt, comp)
		},
		Atom_leftSection(_open: Node, operand: Node, op: Node, _close: Node) {
			return { kind: 'Section', op: sectionOp(op), operand: expr(operand), side: 'left', span: spanOf(this) }
		},
		Atom_list(_open: Node, list: Node, _comma: Node, _close: Node) {
			return { elts: exprs(list), kind: 'List', span: spanOf(this) }
		},
		Atom_listComp(_open: Node, elt: Node, comp: Node, _close: Node) {
			return comprehension(this, 'ListComp', elt, comp)
		},
		Atom_methodPartial(_dot: Node, name: Node, _open: Node, list: Node, _comma: Node, _close: Node) {
			return { args: args(list), attr: text(name), kind: 'AttrPartial', span: spanOf(this) }
		},
		Atom_name(name: Node) {
			return nameExpr(name)
		},
		Atom_none(_kw: Node) {
			return { kind: 'Constant', span: spanOf(this), value: 'None' }
		},
		Atom_number(_n: Node) {
			return { kind: 'Number', span: spanOf(this), text: text(this) }
		},
		Atom_opFunc(_open: Node, op: Node, _close: Node) {
			return { kind: 'OpFunc', op: sectionOp(op), span: spanOf(this) }
		},
		Atom_paren(_open: Node, inner: Node, _close: Node) {
			return { expr: expr(inner), kind: 'Paren', span: spanOf(this) }
		},
		Atom_rightSection(_open: Node, op: Node, operand: Node, _close: Node) {
			return { kind: 'Section', op: sectionOp(op), operand: expr(operand), side: 'right', span: spanOf(this) }
		},
		Atom_set(_open: Node, list: Node, _comma: Node, _close: Node) {
			return { elts: exprs(list), kind: 'Set', span: spanOf(this) }
		},
		Atom_setComp(_open: Node, elt: Node, comp: Node, _close: Node) {
			return comprehension(this, 'SetComp', elt, comp)
		},
		Atom_strings(literals: Node) {
			return {
				kind: 'Strings',
				parts: literals.children.map((l): StringLiteral => l['stringLiteral']()),
				span: spanOf(this),
			}
		},
		Atom_true(_kw: Node) {
			return { kind: 'Constant', span: spanOf(this), value: 'True' }
		},
		Atom_tuple(_open: Node, first: Node, _comma: Node, rest: Node, _trail: Node, _close: Node) {
			return { elts: [expr(first), ...exprs(rest)], kind: 'Tuple', span: spanOf(this) }
		},
		Atom_unit(_open: Node, _close: Node) {
			return { elts: [], kind: 'Tuple', span: spanOf(this) }
		},
		Atom_yield(_open: Node, value: Node, _close: Node) {
			return { expr: expr(value), kind: 'Paren', span: spanOf(this) }
		},
		AwaitExpr_await(_kw: Node, value: Node) {
			return { kind: 'Await', span: spanOf(this), value: expr(value) }
		},
		BackPipeExpr_pipe(func: Node, _op: Node, value: Node) {
			return { kind: 'Pipe', left: expr(func), op: '<|', right: expr(value), span: spanOf(this) }
		},
		BitAndExpr(first: Node, ops: Node, rest: Node) {
			return foldLeft(first, ops, rest, binOp)
		},
		BitOrExpr(first: Node, ops: Node, rest: Node) {
			return foldLeft(first, ops, rest, binOp)
		},
		BitXorExpr(first: Node, ops: Node, rest: Node) {
			return foldLeft(first, ops, rest, binOp)
		},
		Comparison(first: Node, ops: Node, rest: Node) {
			if (ops.children.length === 0) return expr(first)
			return {
				comparators: rest.children.map(expr),
				kind: 'Compare',
				left: expr(first),
				ops: ops.children.map((op): CompareOp => op['compareOp']()),
				span: spanOf(this),
			}
		},
		ComposeExpr(list: Node) {
			const funcs = exprs(list)
			const only = funcs[0]
			if (funcs.length === 1 && only !== undefined) return only
			return { funcs, kind: 'Compose', span: spanOf(this) }
		},
		Factor_unary(op: Node, operand: Node) {
			return { kind: 'UnaryOp', op: toUnaryOp(text(op)), operand: expr(operand), span: spanOf(this) }
		},
		FStringExpr(list: Node, _end: Node) {
			return expr(list)
		},
		InfixExpr(first: Node, ops: Node, rest: Node) {
			return foldLeft(first, ops, rest, (opNode, left, right): Expr => {
				const op = sectionOp(opNode)
				const whole = join(left.span, right.span)
				if (op.type === 'backtick') return { func: op.func, kind: 'InfixCall', left, right, span: whole }
				if (op.type === 'custom') return { kind: 'CustomOp', left, op: op.symbol, opSpan: op.span, right, span: whole }
				return { kind: 'BinOp', left, op: op.symbol, right, span: whole }
			})
		},
		Lambda(parameters: Node, _arrow: Node, body: Node) {
			return { body: expr(body), kind: 'Lambda', params: params(parameters), span: spanOf(this), style: 'arrow' }
		},
		NamedTest_walrus(name: Node, _op: Node, value: Node) {
			return { kind: 'NamedExpr', span: spanOf(this), target: nameExpr(name), value: expr(value) }
		},
		NotTest_not(_kw: Node, operand: Node) {
			return { kind: 'Not', operand: expr(operand), span: spanOf(this) }
		},
		OrTest(list: Node) {
			const values = exprs(list)
			const only = values[0]
			if (values.length === 1 && only !== undefined) return only
			return { kind: 'BoolOp', op: 'or', span: spanOf(this), values }
		},
		PipeExpr(first: Node, ops: Node, rest: Node) {
			return foldLeft(first, ops, rest, (op, left, right): Expr => ({
				kind: 'Pipe',
				left,
				op: toPipeOp(text(op)),
				right,
				span: join(left.span, right.span),
			}))
		},
		Power(base: Node, op: Node, exponent: Node) {
			const left = expr(base)
			const power = exponent.children[0]
			if (power === undefined) return left
			const right = expr(power)
			return { kind: 'BinOp', left, op: '**', right, span: join(left.span, right.span) }
		},
		Primary(atom: Node, trailers: Node) {
			let acc = expr(atom)
			for (const t of trailers.children) {
				const apply: Trailer = t['trailer']()
				acc = apply(acc)
			}
			return acc
		},
		PyLambda(_kw: Node, list: Node, _colon: Node, body: Node) {
			return {
				body: expr(body),
				kind: 'Lambda',
				params: listItems(list).map(param),
				span: spanOf(this),
				style: 'keyword',
			}
		},
		ShiftExpr(first: Node, ops: Node, rest: Node) {
			return foldLeft(first, ops, rest, binOp)
		},
		StarOrNamed_star(_star: Node, value: Node) {
			return { kind: 'Starred', span: spanOf(this), value: expr(value) }
		},
		StmtLambda(_def: Node, parameters: Node, _arrow: Node, body: Node) {
			return { body: expr(body), kind: 'Lambda', params: params(parameters), span: spanOf(this), style: 'statement' }
		},
		Target_star(_star: Node, target: Node) {
			return { kind: 'Starred', span: spanOf(this), value: expr(target) }
		},
		TargetList(list: Node, comma: Node) {
			return tupleOrSingle(this, list, comma)
		},
		Term(first: Node, ops: Node, rest: Node) {
			return foldLeft(first, ops, rest, binOp)
		},
		Ternary_cond(body: Node, _if: Node, test: Node, _else: Node, orelse: Node) {
			return { body: expr(body), kind: 'Ternary', orelse: expr(orelse), span: spanOf(this), test: expr(test) }
		},
		TestList(list: Node, comma: Node) {
			return tupleOrSingle(this, list, comma)
		},
		TestListStarExpr(list: Node, comma: Node) {
			return tupleOrSingle(this, list, comma)
		},
		YieldExpr_from(_yield: Node, _from: Node, value: Node) {
			return { kind: 'YieldFrom', span: spanOf(this), value: expr(value) }
		},
		YieldExpr_plain(_yield: Node, value: Node) {
			return { kind: 'Yield', span: spanOf(this), value: optional(value, expr) }
		},
		signedNumber_complex(neg: Node, real: Node, sign: Node, imag: Node) {
			const realPart: Expr = { kind: 'Number', span: spanOf(real), text: text(real) }
			const left: Expr =
				neg.children.length > 0
					? { kind: 'UnaryOp', op: '-', operand: realPart, span: join(spanOf(neg), realPart.span) }
					: realPart
			const right: Expr = { kind: 'Number', span: spanOf(imag), text: text(imag) }
			return { kind: 'BinOp', left, op: text(sign), right, span: spanOf(this) }
		},
		signedNumber_real(neg: Node, value: Node) {
			const number: Expr = { kind: 'Number', span: spanOf(value), text: text(value) }
			if (neg.children.length === 0) return number
			return { kind: 'UnaryOp', op: '-', operand: number, span: spanOf(this) }
		},
		LiteralPattern_false(_kw: Node) {
			return { kind: 'Constant', span: spanOf(this), value: 'False' }
		},
		LiteralPattern_none(_kw: Node) {
			return { kind: 'Constant', span: spanOf(this), value: 'None' }
		},
		LiteralPattern_strings(literals: Node) {
			return {
				kind: 'Strings',
				parts: literals.children.map((l): StringLiteral => l['stringLiteral']()),
				span: spanOf(this),
			}
		},
		LiteralPattern_true(_kw: Node) {
			return { kind: 'Constant', span: spanOf(this), value: 'True' }
		},
		valueName(first: Node, _dots: Node, rest: Node) {
			let acc: Expr = nameExpr(first)
			for (const part of rest.children) {
				acc = { attr: text(part), kind: 'Attribute', span: join(acc.span, spanOf(part)), value: acc }
			}
			return acc
		},
	})

	semantics.addOperation<CompareOp>('compareOp', {
		compOp_in(_kw: Node) {
			return 'in'
		},
		compOp_is(_kw: Node) {
			return 'is'
		},
		compOp_isNot(_is: Node, _space: Node, _not: Node) {
			return 'is not'
		},
		compOp_notIn(_not: Node, _space: Node, _in: Node) {
			return 'not in'
		},
		compOp_sym(op: Node) {
			return toCompareOp(text(op))
		},
	})

	semantics.addOperation<StringLiteral>('stringLiteral', {
		fStringLit(_prefix: Node, _quoted: Node) {
			return stringLiteral(this, true)
		},
		plainStringLit(_prefix: Node, _quoted: Node) {
			return stringLiteral(this, false)
		},
	})

	// ===========================================================================
	// PATTERNS
	// ===========================================================================

	semantics.addOperation<Pattern>('pattern', {
		ClosedPattern_class(cls: Node, _open: Node, list: Node, _comma: Node, _close: Node) {
			const items = listItems(list).map((a): Pattern | KeywordPattern => a['classArg']())
			const positional: Pattern[] = []
			const keywords: KeywordPattern[] = []
			for (const item of items) {
				if (item.kind === 'KeywordPattern') keywords.push(item)
				else positional.push(item)
			}
			return { cls: text(cls), keywords, kind: 'ClassPattern', positional, span: spanOf(this) }
		},
		ClosedPattern_capture(name: Node) {
			return { kind: 'CapturePattern', name: text(name), span: spanOf(this) }
		},
		ClosedPattern_emptyTuple(_open: Node, _close: Node) {
			return { items: [], kind: 'SequencePattern', span: spanOf(this) }
		},
		ClosedPattern_group(_open: Node, inner: Node, _close: Node) {
			return pattern(inner)
		},
		ClosedPattern_isinstance(name: Node, clauses: Node) {
			const bound = text(name)
			return {
				kind: 'IsInstancePattern',
				name: bound === '_' ? null : bound,
				span: spanOf(this),
				types: clauses.children.map((c) => text(child(c, 1))),
			}
		},
		ClosedPattern_list(_open: Node, list: Node, _comma: Node, _close: Node) {
			return {
				items: listItems(list).map((i): Pattern | StarPattern => i['seqItem']()),
				kind: 'SequencePattern',
				span: spanOf(this),
			}
		},
		ClosedPattern_literal(literal: Node) {
			return { kind: 'LiteralPattern', span: spanOf(this), value: expr(literal) }
		},
		ClosedPattern_mapping(_open: Node, list: Node, _comma: Node, _close: Node) {
			const items: MappingItem[] = []
			let rest: string | null = null
			for (const entry of listItems(list).map((i): MappingEntry => i['mappingEntry']())) {
				if (entry.kind === 'rest') rest = entry.name
				else items.push(entry)
			}
			return { items, kind: 'MappingPattern', rest, span: spanOf(this) }
		},
		ClosedPattern_tuple(_open: Node, first: Node, _comma: Node, rest: Node, _trail: Node, _close: Node) {
			return {
				items: [pattern(first), ...listItems(rest).map(pattern)],
				kind: 'SequencePattern',
				span: spanOf(this),
			}
		},
		ClosedPattern_value(_name: Node) {
			return { dotted: text(this), kind: 'ValuePattern', span: spanOf(this) }
		},
		ClosedPattern_wildcard(_w: Node) {
			return { kind: 'WildcardPattern', span: spanOf(this) }
		},
		OrPattern(list: Node) {
			const patterns = listItems(list).map(pattern)
			const only = patterns[0]
			if (patterns.length === 1 && only !== undefined) return only
			return { kind: 'OrPattern', patterns, span: spanOf(this) }
		},
		Pattern_as(inner: Node, _as: Node, name: Node) {
			return { kind: 'AsPattern', name: text(name), pattern: pattern(inner), span: spanOf(this) }
		},
		PatternList_tuple(first: Node, _comma: Node, rest: Node, _trail: Node) {
			return {
				items: [pattern(first), ...listItems(rest).map(pattern)],
				kind: 'SequencePattern',
				span: spanOf(this),
			}
		},
	})

	semantics.addOperation<Pattern | StarPattern>('seqItem', {
		SeqItemPattern_plain(inner: Node) {
			return pattern(inner)
		},
		SeqItemPattern_star(_star: Node, name: Node) {
			return { kind: 'StarPattern', name: text(name), span: spanOf(this) }
		},
	})

	semantics.addOperation<Pattern | KeywordPattern>('classArg', {
		ClassArgPattern_keyword(name: Node, _eq: Node, inner: Node) {
			return { kind: 'KeywordPattern', name: text(name), pattern: pattern(inner), span: spanOf(this) }
		},
		ClassArgPattern_positional(inner: Node) {
			return pattern(inner)
		},
	})

	semantics.addOperation<MappingEntry>('mappingEntry', {
		MappingItemPattern_pair(key: Node, _colon: Node, value: Node) {
			return { key: expr(key), kind: 'MappingItem', pattern: pattern(value), span: spanOf(this) }
		},
		MappingItemPattern_rest(_stars: Node, name: Node) {
			return { kind: 'rest', name: text(name) }
		},
	})

	return { problems, semantics }
}
