/**
 * Emitter: writes Python source for a syntax tree.
 *
 * Source structure is kept as written (parentheses are tree nodes), so plain
 * operators print in place. Everything lowered to something else prints as a
 * call or a parenthesized lambda, which is safe in any operand position.
 */

import type { CompilationContext } from '../core/context.ts'
import { emitsHeader, targetRangeOf } from '../core/config.ts'
import type {
	Arg,
	ClassDefStmt,
	CompClause,
	DictEntry,
	Expr,
	FunctionDefStmt,
	MatchStmt,
	Param,
	SectionOp,
	SliceNode,
	Stmt,
	SyntaxTree,
	TryStmt,
} from '../core/nodes.ts'
import { keywordOnlyParams } from '../version/gate.ts'
import { supports, type TargetRange, targetIncludesPy2 } from '../version/table.ts'
import { emitStrings } from './fstring.ts'
import { conditionOf, planPattern } from './patterns.ts'
import { OutputWriter } from './writer.ts'

export interface EmitResult {
	succeeded: boolean
	text: string
}

export const HEADER_CODING = '# -*- coding: utf-8 -*-'
export const HEADER_FUTURE = 'from __future__ import print_function, absolute_import, unicode_literals, division'

const ARGS = '_copra_args'
const KWARGS = '_copra_kwargs'
const LEFT = '_copra_x'
const RIGHT = '_copra_y'

/** Expression kinds whose output can take a trailer without parentheses. */
const ATOMIC: ReadonlySet<Expr['kind']> = new Set<Expr['kind']>([
	'Name',
	'Constant',
	'Strings',
	'Tuple',
	'List',
	'Set',
	'Dict',
	'ListComp',
	'SetComp',
	'GenExp',
	'DictComp',
	'Paren',
	'NamedExpr',
	'Lambda',
	'Pipe',
	'Compose',
	'InfixCall',
	'CustomOp',
	'Call',
	'Partial',
	'Subscript',
	'Attribute',
	'AttrPartial',
	'OpFunc',
	'Section',
])

/** `<$>` becomes `_copra_op_U3c_U24_U3e`. */
export function mangleOperator(symbol: string): string {
	let name = '_copra_op'
	for (const ch of symbol) name += `_U${(ch.codePointAt(0) ?? 0).toString(16)}`
	return name
}

function composeText(outer: string, inner: string): string {
	return `(lambda *${ARGS}, **${KWARGS}: ${outer}(${inner}(*${ARGS}, **${KWARGS})))`
}

/**
 * Apply an operator to two already-atomic operand texts.
 */
export function applyOperator(op: SectionOp, left: string, right: string): string {
	switch (op.type) {
		case 'backtick':
			return `${op.func}(${left}, ${right})`
		case 'custom':
			return `${mangleOperator(op.symbol)}(${left}, ${right})`
		case 'builtin':
			switch (op.symbol) {
				case '|>':
					return `${right}(${left})`
				case '|*>':
					return `${right}(*${left})`
				case '|**>':
					return `${right}(**${left})`
				case '<|':
					return `${left}(${right})`
				case '..':
					return composeText(left, right)
				default:
					return `${left} ${op.symbol} ${right}`
			}
	}
}

type Star = '' | '*' | '**'

const PIPE_STARS: Readonly<Record<string, Star>> = { '|*>': '*', '|**>': '**', '|>': '' }

class Emitter {
	private readonly context: CompilationContext
	private readonly range: TargetRange
	private readonly writer: OutputWriter
	private matchCount = 0

	constructor(context: CompilationContext) {
		this.context = context
		this.range = targetRangeOf(context.config)
		this.writer = new OutputWriter(context.config)
	}

	// ===========================================================================
	// ENTRY
	// ===========================================================================

	run(tree: SyntaxTree): string {
		const { writer } = this
		if (emitsHeader(this.context.mode)) {
			writer.line(HEADER_CODING, null)
			if (targetIncludesPy2(this.range)) writer.line(HEADER_FUTURE, null)
		}
		if (tree.kind === 'Expression') {
			writer.line(this.expr(tree.value), this.lineOf(tree.value))
		} else {
			for (const stmt of tree.body) {
				// names of lowered temporaries only need to be unique per top-level statement
				this.matchCount = 0
				this.stmt(stmt)
			}
		}
		return writer.render((n) => this.context.source.lineText(n) ?? '', this.warningsByLine())
	}

	private warningsByLine(): Map<number, string[]> {
		const byLine = new Map<number, string[]>()
		for (const warning of this.context.getWarnings()) {
			const list = byLine.get(warning.line) ?? []
			list.push(warning.message)
			byLine.set(warning.line, list)
		}
		return byLine
	}

	private lineOf(node: { readonly span: { readonly start: number } }): number {
		return this.context.source.lineOf(node.span.start)
	}

	private supports(feature: string): boolean {
		return supports(feature, this.range)
	}

	// ===========================================================================
	// STATEMENTS
	// ===========================================================================

	private body(stmts: readonly Stmt[], line: number): void {
		this.writer.block(line, () => {
			for (const stmt of stmts) this.stmt(stmt)
		})
	}

	private stmt(stmt: Stmt): void {
		const line = this.lineOf(stmt)
		const write = (text: string): void => this.writer.line(text, line)
		switch (stmt.kind) {
			case 'ExprStmt':
				write(this.expr(stmt.value))
				break
			case 'Assign':
				write([...stmt.targets, stmt.value].map((e) => this.expr(e)).join(' = '))
				break
			case 'AugAssign': {
				const star = PIPE_STARS[stmt.op]
				if (star !== undefined) {
					write(`${this.expr(stmt.target)} = ${this.pipe(stmt.value, stmt.target, star)}`)
				} else {
					write(`${this.expr(stmt.target)} ${stmt.op}= ${this.expr(stmt.value)}`)
				}
				break
			}
			case 'AnnAssign': {
				const value = stmt.value === null ? '' : ` = ${this.expr(stmt.value)}`
				write(`${this.expr(stmt.target)}: ${this.expr(stmt.annotation)}${value}`)
				break
			}
			case 'Pass':
				write('pass')
				break
			case 'Break':
				write('break')
				break
			case 'Continue':
				write('continue')
				break
			case 'Return':
				write(stmt.value === null ? 'return' : `return ${this.expr(stmt.value)}`)
				break
			case 'Raise': {
				let text = 'raise'
				if (stmt.exc !== null) text += ` ${this.expr(stmt.exc)}`
				if (stmt.cause !== null) text += ` from ${this.expr(stmt.cause)}`
				write(text)
				break
			}
			case 'Global':
				write(`global ${stmt.names.join(', ')}`)
				break
			case 'Nonlocal':
				write(`nonlocal ${stmt.names.join(', ')}`)
				break
			case 'Del':
				write(`del ${stmt.targets.map((t) => this.expr(t)).join(', ')}`)
				break
			case 'Assert':
				write(`assert ${this.expr(stmt.test)}${stmt.msg === null ? '' : `, ${this.expr(stmt.msg)}`}`)
				break
			case 'Import':
				write(`import ${stmt.names.map((a) => (a.asname === null ? a.name : `${a.name} as ${a.asname}`)).join(', ')}`)
				break
			case 'ImportFrom': {
				const names =
					stmt.names === null
						? '*'
						: stmt.names.map((a) => (a.asname === null ? a.name : `${a.name} as ${a.asname}`)).join(', ')
				write(`from ${stmt.module} import ${names}`)
				break
			}
			case 'OperatorDecl':
				break
			case 'TypeAlias':
				write(`type ${stmt.name} = ${this.expr(stmt.value)}`)
				break
			case 'FunctionDef':
				this.functionDef(stmt, line)
				break
			case 'ClassDef':
				this.classDef(stmt, line)
				break
			case 'If':
				write(`if ${this.expr(stmt.test)}:`)
				this.body(stmt.body, line)
				for (const elif of stmt.elifs) {
					const elifLine = this.lineOf(elif)
					this.writer.line(`elif ${this.expr(elif.test)}:`, elifLine)
					this.body(elif.body, elifLine)
				}
				this.orElse(stmt.orelse, 'else')
				break
			case 'While':
				write(`while ${this.expr(stmt.test)}:`)
				this.body(stmt.body, line)
				this.orElse(stmt.orelse, 'else')
				break
			case 'For':
				write(`${stmt.isAsync ? 'async ' : ''}for ${this.expr(stmt.target)} in ${this.expr(stmt.iter)}:`)
				this.body(stmt.body, line)
				this.orElse(stmt.orelse, 'else')
				break
			case 'Try':
				this.tryStmt(stmt, line)
				break
			case 'With': {
				const items = stmt.items.map((item) =>
					item.target === null ? this.expr(item.context) : `${this.expr(item.context)} as ${this.expr(item.target)}`
				)
				write(`${stmt.isAsync ? 'async ' : ''}with ${items.join(', ')}:`)
				this.body(stmt.body, line)
				break
			}
			case 'Match':
				this.matchStmt(stmt, line)
				break
		}
	}

	private orElse(stmts: readonly Stmt[] | null, keyword: string): void {
		const first = stmts?.[0]
		if (stmts === null || first === undefined) return
		const line = this.lineOf(first)
		this.writer.line(`${keyword}:`, line)
		this.body(stmts, line)
	}

	private functionDef(def: FunctionDefStmt, line: number): void {
		for (const decorator of def.decorators) this.writer.line(`@${this.expr(decorator)}`, this.lineOf(decorator))
		const { text, prologue } = this.signature(def.name, def.params)
		const returns = def.returns === null ? '' : ` -> ${this.expr(def.returns)}`
		this.writer.line(`${def.isAsync ? 'async ' : ''}def ${def.name}(${text})${returns}:`, line)
		this.writer.block(line, () => {
			for (const extra of prologue) this.writer.line(extra, line)
			for (const stmt of def.body) this.stmt(stmt)
		})
	}

	private classDef(def: ClassDefStmt, line: number): void {
		for (const decorator of def.decorators) this.writer.line(`@${this.expr(decorator)}`, this.lineOf(decorator))
		let bases = def.args === null ? '' : this.args(def.args)
		// new-style classes on the 2.x family
		if (bases === '' && targetIncludesPy2(this.range)) bases = 'object'
		this.writer.line(bases === '' ? `class ${def.name}:` : `class ${def.name}(${bases}):`, line)
		this.body(def.body, line)
	}

	private tryStmt(stmt: TryStmt, line: number): void {
		this.writer.line('try:', line)
		this.body(stmt.body, line)
		for (const handler of stmt.handlers) {
			const handlerLine = this.lineOf(handler)
			let head = handler.star ? 'except*' : 'except'
			if (handler.type !== null) head += ` ${this.expr(handler.type)}`
			if (handler.name !== null) head += ` as ${handler.name}`
			this.writer.line(`${head}:`, handlerLine)
			this.body(handler.body, handlerLine)
		}
		this.orElse(stmt.orelse, 'else')
		this.orElse(stmt.finalbody, 'finally')
	}

	private matchStmt(stmt: MatchStmt, line: number): void {
		const { writer } = this
		const n = this.matchCount++
		const subject = `_copra_match_to_${n}`
		const check = `_copra_match_check_${n}`
		writer.line(`${subject} = ${this.expr(stmt.subject)}`, line)
		writer.line(`${check} = False`, line)
		for (const matchCase of stmt.cases) {
			const caseLine = this.lineOf(matchCase)
			const plan = planPattern(matchCase.pattern, subject, (e) => this.expr(e))
			writer.line(`if not ${check}:`, caseLine)
			writer.block(caseLine, () => {
				writer.line(`if ${conditionOf(plan)}:`, caseLine)
				writer.block(caseLine, () => {
					for (const binding of plan.bindings) writer.line(`${binding.name} = ${binding.value}`, caseLine)
					if (matchCase.guard === null) {
						writer.line(`${check} = True`, caseLine)
					} else {
						writer.line(`if ${this.expr(matchCase.guard)}:`, caseLine)
						writer.block(caseLine, () => writer.line(`${check} = True`, caseLine))
					}
				})
				writer.line(`if ${check}:`, caseLine)
				this.body(matchCase.body, caseLine)
			})
		}
	}

	// ===========================================================================
	// PARAMETERS AND ARGUMENTS
	// ===========================================================================

	private param(param: Param, annotate: boolean): string {
		const name = param.name ?? ''
		switch (param.mode) {
			case 'kwMarker':
				return '*'
			case 'posMarker':
				return '/'
			case 'varargs':
			case 'kwargs': {
				const stars = param.mode === 'varargs' ? '*' : '**'
				const annotation = annotate && param.annotation !== null ? `: ${this.expr(param.annotation)}` : ''
				return `${stars}${name}${annotation}`
			}
			case 'plain': {
				if (annotate && param.annotation !== null) {
					const value = param.default === null ? '' : ` = ${this.expr(param.default)}`
					return `${name}: ${this.expr(param.annotation)}${value}`
				}
				return param.default === null ? name : `${name}=${this.expr(param.default)}`
			}
		}
	}

	/**
	 * Parameter list of a def. Keyword-only parameters with defaults move
	 * into `**kwargs` lookups for targets without keyword-only arguments.
	 * Without a declared `**kwargs`, leftover keywords raise as Python would.
	 */
	private signature(name: string, params: readonly Param[]): { text: string; prologue: string[] } {
		const keywordOnly = keywordOnlyParams(params)
		if (keywordOnly.length === 0 || this.supports('kwonly_args')) {
			return { prologue: [], text: params.map((p) => this.param(p, true)).join(', ') }
		}
		const kwargs = params.find((p) => p.mode === 'kwargs')
		const kept = params.filter((p) => p.mode !== 'kwMarker' && p.mode !== 'kwargs' && !keywordOnly.includes(p))
		const kwargsName = kwargs?.name ?? KWARGS
		const text = [...kept.map((p) => this.param(p, true)), `**${kwargsName}`].join(', ')
		const prologue = keywordOnly.map((p) => {
			const param = p.name ?? ''
			const fallback = p.default === null ? 'None' : this.expr(p.default)
			return `${param} = ${kwargsName}.pop("${param}", ${fallback})`
		})
		if (kwargs === undefined) {
			prologue.push(
				`if ${KWARGS}: raise TypeError("${name}() got an unexpected keyword argument '%s'" % next(iter(${KWARGS})))`
			)
		}
		return { prologue, text }
	}

	private arg(arg: Arg): string {
		switch (arg.kind) {
			case 'PositionalArg':
				return this.expr(arg.value)
			case 'KeywordArg':
				return `${arg.name}=${this.expr(arg.value)}`
			case 'StarArg':
				return `*${this.expr(arg.value)}`
			case 'KwStarArg':
				return `**${this.expr(arg.value)}`
			case 'PlaceholderArg':
				return '?'
		}
	}

	private args(args: readonly Arg[]): string {
		return args.map((a) => this.arg(a)).join(', ')
	}

	/** `f(a, ?, b)` is a function of the missing argument. */
	private call(func: string, args: readonly Arg[]): string {
		let count = 0
		const parts = args.map((a) => (a.kind === 'PlaceholderArg' ? `_copra_p${count++}` : this.arg(a)))
		if (count === 0) return `${func}(${parts.join(', ')})`
		const params = Array.from({ length: count }, (_, i) => `_copra_p${i}`)
		return `(lambda ${params.join(', ')}: ${func}(${parts.join(', ')}))`
	}

	// ===========================================================================
	// EXPRESSIONS
	// ===========================================================================

	/** Expression text safe to follow with a call, index or attribute. */
	private atom(e: Expr): string {
		const text = this.expr(e)
		return ATOMIC.has(e.kind) ? text : `(${text})`
	}

	private pipe(func: Expr, value: Expr, star: Star): string {
		if (func.kind === 'Partial' && func.args.every((a) => a.kind === 'PositionalArg')) {
			return `${this.atom(func.func)}(${[...func.args.map((a) => this.arg(a)), star + this.expr(value)].join(', ')})`
		}
		const placeholders = func.kind === 'Call' ? func.args.filter((a) => a.kind === 'PlaceholderArg').length : 0
		if (func.kind === 'Call' && placeholders === 1 && star === '') {
			const filled = func.args.map((a) => (a.kind === 'PlaceholderArg' ? this.expr(value) : this.arg(a)))
			return `${this.atom(func.func)}(${filled.join(', ')})`
		}
		if (func.kind === 'AttrPartial' && star === '') {
			const access = `${this.atom(value)}.${func.attr}`
			return func.args === null ? access : this.call(access, func.args)
		}
		return `${this.atom(func)}(${star}${this.expr(value)})`
	}

	private lambda(params: string, body: string): string {
		return params === '' ? `(lambda: ${body})` : `(lambda ${params}: ${body})`
	}

	private sectionOp(op: SectionOp): string {
		switch (op.type) {
			case 'backtick':
				return op.func
			case 'custom':
				return mangleOperator(op.symbol)
			case 'builtin':
				return this.lambda(`${LEFT}, ${RIGHT}`, applyOperator(op, LEFT, RIGHT))
		}
	}

	private slice(item: Expr | SliceNode): string {
		if (item.kind !== 'Slice') return this.expr(item)
		const lower = item.lower === null ? '' : this.expr(item.lower)
		const upper = item.upper === null ? '' : this.expr(item.upper)
		if (item.step === null) return `${lower}:${upper}`
		return `${lower}:${upper}:${item.step.value === null ? '' : this.expr(item.step.value)}`
	}

	private dictEntry(entry: DictEntry): string {
		return entry.kind === 'DictPair' ? `${this.expr(entry.key)}: ${this.expr(entry.value)}` : `**${this.expr(entry.value)}`
	}

	private clauses(clauses: readonly CompClause[]): string {
		return clauses
			.map((c) =>
				c.kind === 'CompIf'
					? ` if ${this.expr(c.test)}`
					: ` ${c.isAsync ? 'async ' : ''}for ${this.expr(c.target)} in ${this.expr(c.iter)}`
			)
			.join('')
	}

	private list(elts: readonly Expr[]): string {
		return elts.map((e) => this.expr(e)).join(', ')
	}

	expr(e: Expr): string {
		switch (e.kind) {
			case 'Name':
				return e.id
			case 'Number':
				return e.text.replace(/_/g, '')
			case 'Constant':
				return e.value === '...' && targetIncludesPy2(this.range) ? 'Ellipsis' : e.value
			case 'Strings':
				return emitStrings(e.parts, (inner) => this.expr(inner), this.supports('format_strings'))
			case 'Tuple':
				if (e.elts.length === 1) return `(${this.list(e.elts)},)`
				return `(${this.list(e.elts)})`
			case 'List':
				return `[${this.list(e.elts)}]`
			case 'Set':
				return `{${this.list(e.elts)}}`
			case 'Dict':
				return `{${e.entries.map((entry) => this.dictEntry(entry)).join(', ')}}`
			case 'ListComp':
				return `[${this.expr(e.elt)}${this.clauses(e.clauses)}]`
			case 'SetComp':
				return `{${this.expr(e.elt)}${this.clauses(e.clauses)}}`
			case 'GenExp':
				return `(${this.expr(e.elt)}${this.clauses(e.clauses)})`
			case 'DictComp':
				return `{${this.expr(e.key)}: ${this.expr(e.value)}${this.clauses(e.clauses)}}`
			case 'Paren':
				return `(${this.expr(e.expr)})`
			case 'Starred':
				return `*${this.expr(e.value)}`
			case 'NamedExpr':
				return `(${e.target.id} := ${this.expr(e.value)})`
			case 'Lambda':
				return this.lambda(e.params.map((p) => this.param(p, false)).join(', '), this.expr(e.body))
			case 'Ternary':
				return `${this.expr(e.body)} if ${this.expr(e.test)} else ${this.expr(e.orelse)}`
			case 'BoolOp':
				return e.values.map((v) => this.expr(v)).join(` ${e.op} `)
			case 'Not':
				return `not ${this.expr(e.operand)}`
			case 'Compare': {
				let text = this.expr(e.left)
				e.ops.forEach((op, i) => {
					const right = e.comparators[i]
					if (right !== undefined) text += ` ${op} ${this.expr(right)}`
				})
				return text
			}
			case 'Pipe':
				if (e.op === '<|') return this.pipe(e.left, e.right, '')
				return this.pipe(e.right, e.left, PIPE_STARS[e.op] ?? '')
			case 'Compose': {
				const funcs = e.funcs.map((f) => this.atom(f))
				const last = funcs.length - 1
				let inner = `${funcs[last] ?? ''}(*${ARGS}, **${KWARGS})`
				for (let i = last - 1; i >= 0; i--) inner = `${funcs[i] ?? ''}(${inner})`
				return `(lambda *${ARGS}, **${KWARGS}: ${inner})`
			}
			case 'BinOp':
				return `${this.expr(e.left)} ${e.op} ${this.expr(e.right)}`
			case 'InfixCall':
				return `${e.func}(${this.expr(e.left)}, ${this.expr(e.right)})`
			case 'CustomOp':
				return `${mangleOperator(e.op)}(${this.expr(e.left)}, ${this.expr(e.right)})`
			case 'UnaryOp':
				return `${e.op}${this.expr(e.operand)}`
			case 'Await':
				return `await ${this.expr(e.value)}`
			case 'Call':
				return this.call(this.atom(e.func), e.args)
			case 'Partial':
				if (e.args.some((a) => a.kind === 'PlaceholderArg')) return this.call(this.atom(e.func), e.args)
				return `__import__("functools").partial(${[this.expr(e.func), ...e.args.map((a) => this.arg(a))].join(', ')})`
			case 'Subscript':
				return `${this.atom(e.value)}[${e.slices.map((s) => this.slice(s)).join(', ')}${e.trailingComma ? ',' : ''}]`
			case 'Attribute':
				return `${this.atom(e.value)}.${e.attr}`
			case 'AttrPartial': {
				const access = `${LEFT}.${e.attr}`
				return this.lambda(LEFT, e.args === null ? access : this.call(access, e.args))
			}
			case 'OpFunc':
				return this.sectionOp(e.op)
			case 'Section': {
				const operand = this.atom(e.operand)
				return e.side === 'left'
					? this.lambda(RIGHT, applyOperator(e.op, operand, RIGHT))
					: this.lambda(LEFT, applyOperator(e.op, LEFT, operand))
			}
			case 'Yield':
				return e.value === null ? 'yield' : `yield ${this.expr(e.value)}`
			case 'YieldFrom':
				return `yield from ${this.expr(e.value)}`
		}
	}
}

/**
 * Write the tree as Python source for the context's target.
 * Statement output ends with a newline; eval output is one bare expression.
 */
export function emit(context: CompilationContext, tree: SyntaxTree): EmitResult {
	const text = new Emitter(context).run(tree)
	if (text === '' || tree.kind === 'Expression') return { succeeded: true, text }
	return { succeeded: true, text: `${text}\n` }
}

/** Python text of a single expression, for tests and tooling. */
export function emitExpression(context: CompilationContext, expr: Expr): string {
	return new Emitter(context).expr(expr)
}
