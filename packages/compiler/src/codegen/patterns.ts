/**
 * Lowers `match` patterns to a boolean condition plus name bindings.
 *
 * Conditions are ordered so each one only runs once the checks guarding its
 * access expression have passed. Bindings run after the whole condition
 * holds; or-pattern alternatives never bind (the parser rejects them).
 */

import type { ClassPattern, Expr, MappingPattern, Pattern, SequencePattern } from '../core/nodes.ts'

type EmitExpr = (expr: Expr) => string

export interface Binding {
	readonly name: string
	readonly value: string
}

export interface PatternPlan {
	readonly conditions: string[]
	readonly bindings: Binding[]
}

/** Built-in classes whose single positional sub-pattern matches the subject itself. */
const SELF_MATCHING = new Set([
	'bool',
	'bytearray',
	'bytes',
	'dict',
	'float',
	'frozenset',
	'int',
	'list',
	'set',
	'str',
	'tuple',
])

function conjunction(conditions: readonly string[]): string {
	if (conditions.length === 0) return 'True'
	return conditions.join(' and ')
}

function isSingleton(value: Expr): boolean {
	return value.kind === 'Constant' && value.value !== '...'
}

class Planner {
	readonly conditions: string[] = []
	readonly bindings: Binding[] = []
	private readonly emitExpr: EmitExpr

	constructor(emitExpr: EmitExpr) {
		this.emitExpr = emitExpr
	}

	plan(pattern: Pattern, access: string): void {
		switch (pattern.kind) {
			case 'CapturePattern':
				this.bindings.push({ name: pattern.name, value: access })
				break
			case 'WildcardPattern':
				break
			case 'ValuePattern':
				this.conditions.push(`${access} == ${pattern.dotted}`)
				break
			case 'LiteralPattern': {
				const op = isSingleton(pattern.value) ? 'is' : '=='
				this.conditions.push(`${access} ${op} ${this.emitExpr(pattern.value)}`)
				break
			}
			case 'OrPattern': {
				const alternatives = pattern.patterns.map((alternative) => {
					const inner = new Planner(this.emitExpr)
					inner.plan(alternative, access)
					return `(${conjunction(inner.conditions)})`
				})
				this.conditions.push(`(${alternatives.join(' or ')})`)
				break
			}
			case 'AsPattern':
				this.plan(pattern.pattern, access)
				this.bindings.push({ name: pattern.name, value: access })
				break
			case 'SequencePattern':
				this.sequence(pattern, access)
				break
			case 'MappingPattern':
				this.mapping(pattern, access)
				break
			case 'ClassPattern':
				this.classPattern(pattern, access)
				break
			case 'IsInstancePattern':
				for (const type of pattern.types) this.conditions.push(`isinstance(${access}, ${type})`)
				if (pattern.name !== null) this.bindings.push({ name: pattern.name, value: access })
				break
		}
	}

	private sequence(pattern: SequencePattern, access: string): void {
		const star = pattern.items.findIndex((item) => item.kind === 'StarPattern')
		const fixed = star === -1 ? pattern.items.length : pattern.items.length - 1
		this.conditions.push(`isinstance(${access}, (tuple, list))`)
		this.conditions.push(star === -1 ? `len(${access}) == ${fixed}` : `len(${access}) >= ${fixed}`)

		pattern.items.forEach((item, i) => {
			if (item.kind === 'StarPattern') {
				if (item.name === '_') return
				const after = pattern.items.length - i - 1
				const end = after === 0 ? '' : `len(${access}) - ${after}`
				this.bindings.push({ name: item.name, value: `list(${access}[${i}:${end}])` })
				return
			}
			const index = star !== -1 && i > star ? `-${pattern.items.length - i}` : String(i)
			this.plan(item, `${access}[${index}]`)
		})
	}

	private mapping(pattern: MappingPattern, access: string): void {
		this.conditions.push(`isinstance(${access}, dict)`)
		const keys = pattern.items.map((item) => this.emitExpr(item.key))
		keys.forEach((key) => this.conditions.push(`${key} in ${access}`))
		pattern.items.forEach((item, i) => {
			this.plan(item.pattern, `${access}[${keys[i] ?? ''}]`)
		})
		if (pattern.rest !== null) {
			const excluded = keys.length === 0 ? '()' : `(${keys.join(', ')},)`
			this.bindings.push({
				name: pattern.rest,
				value: `dict((k, v) for k, v in ${access}.items() if k not in ${excluded})`,
			})
		}
	}

	private classPattern(pattern: ClassPattern, access: string): void {
		this.conditions.push(`isinstance(${access}, ${pattern.cls})`)
		const [only] = pattern.positional
		if (only !== undefined && pattern.positional.length === 1 && SELF_MATCHING.has(pattern.cls)) {
			this.plan(only, access)
		} else if (pattern.positional.length > 0) {
			const matchArgs = `getattr(type(${access}), "__match_args__", ())`
			this.conditions.push(`len(${matchArgs}) >= ${pattern.positional.length}`)
			pattern.positional.forEach((sub, i) => {
				this.plan(sub, `getattr(${access}, type(${access}).__match_args__[${i}])`)
			})
		}
		for (const keyword of pattern.keywords) {
			this.conditions.push(`hasattr(${access}, "${keyword.name}")`)
			this.plan(keyword.pattern, `${access}.${keyword.name}`)
		}
	}
}

/**
 * Plan how to test `pattern` against the value at `access`.
 */
export function planPattern(pattern: Pattern, access: string, emitExpr: EmitExpr): PatternPlan {
	const planner = new Planner(emitExpr)
	planner.plan(pattern, access)
	return { bindings: planner.bindings, conditions: planner.conditions }
}

export function conditionOf(plan: PatternPlan): string {
	return conjunction(plan.conditions)
}
