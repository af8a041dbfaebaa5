import type { PExpr } from 'ohm-js'
import { CopraGrammar, type StartRule } from './index.ts'

export interface RuleStats {
	readonly rule: string
	/** Nodes the rule produced in the parse tree */
	readonly applications: number
	/** Layout characters those nodes span, summed */
	readonly characters: number
}

/**
 * Usage of one ordered choice whose alternatives are all rule applications.
 * A PEG tries alternatives in order, so every use of alternative `i` first
 * fails alternatives `0..i-1`.
 */
export interface ChoiceStats {
	readonly rule: string
	readonly alternatives: readonly string[]
	/** Times each alternative was the one that matched */
	readonly usage: readonly number[]
	/** Alternatives tried in the grammar's order, failed ones included */
	readonly attempts: number
	/** Attempts saved by trying the most used alternatives first */
	readonly reorderSavings: number
}

export interface GrammarProfile {
	readonly succeeded: boolean
	/** Wall-clock time of the grammar match */
	readonly matchMs: number
	/** Most applied first */
	readonly rules: readonly RuleStats[]
	/** Used choices, largest savings first */
	readonly choices: readonly ChoiceStats[]
}

function alternativesOf(body: PExpr): string[] | undefined {
	if (!('terms' in body) || !Array.isArray(body.terms)) return undefined
	const terms: readonly unknown[] = body.terms
	const names: string[] = []
	for (const term of terms) {
		if (typeof term !== 'object' || term === null || !('ruleName' in term)) return undefined
		if (typeof term.ruleName !== 'string') return undefined
		names.push(term.ruleName)
	}
	return names.length > 1 ? names : undefined
}

const CHOICES: ReadonlyMap<string, readonly string[]> = new Map(
	Object.entries(CopraGrammar.rules).flatMap(([name, info]) => {
		const alternatives = alternativesOf(info.body)
		return alternatives === undefined ? [] : [[name, alternatives] as const]
	})
)

/** Attempts needed when alternative `i` costs `i + 1` tries. */
function attemptsFor(usage: readonly number[]): number {
	return usage.reduce((sum, n, i) => sum + n * (i + 1), 0)
}

function choiceStats(rule: string, alternatives: readonly string[], usage: readonly number[]): ChoiceStats {
	const attempts = attemptsFor(usage)
	const best = attemptsFor([...usage].sort((a, b) => b - a))
	return { alternatives, attempts, reorderSavings: attempts - best, rule, usage }
}

/**
 * Match layout text and count what the grammar did to produce the tree.
 */
export function profileMatch(input: string, startRule: StartRule): GrammarProfile {
	const started = performance.now()
	const result = CopraGrammar.match(input, startRule)
	const matchMs = performance.now() - started
	if (result.failed()) return { choices: [], matchMs, rules: [], succeeded: false }

	const rules = new Map<string, { applications: number; characters: number }>()
	const usage = new Map<string, number[]>()

	const semantics = CopraGrammar.createSemantics()
	semantics.addOperation<void>('profileNodes', {
		_iter(...children) {
			for (const c of children) c['profileNodes']()
		},
		_nonterminal(...children) {
			const stats = rules.get(this.ctorName) ?? { applications: 0, characters: 0 }
			stats.applications++
			stats.characters += this.source.endIdx - this.source.startIdx
			rules.set(this.ctorName, stats)

			const alternatives = CHOICES.get(this.ctorName)
			const [only] = children
			if (alternatives !== undefined && children.length === 1 && only !== undefined) {
				const index = alternatives.indexOf(only.ctorName)
				if (index !== -1) {
					const counts = usage.get(this.ctorName) ?? alternatives.map(() => 0)
					counts[index] = (counts[index] ?? 0) + 1
					usage.set(this.ctorName, counts)
				}
			}
			for (const c of children) c['profileNodes']()
		},
		_terminal() {},
	})
	semantics(result)['profileNodes']()

	const ruleStats = [...rules]
		.map(([rule, stats]): RuleStats => ({ rule, ...stats }))
		.sort((a, b) => b.applications - a.applications || a.rule.localeCompare(b.rule))
	const choices = [...usage]
		.map(([rule, counts]) => choiceStats(rule, CHOICES.get(rule) ?? [], counts))
		.sort((a, b) => b.reorderSavings - a.reorderSavings || a.rule.localeCompare(b.rule))
	return { choices, matchMs, rules: ruleStats, succeeded: true }
}
