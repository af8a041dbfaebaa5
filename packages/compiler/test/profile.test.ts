import assert from 'node:assert'
import { describe, it } from 'node:test'
import { type ChoiceStats, ConfigurationError, GrammarError, type GrammarProfile, profile } from '../src/index.ts'

function choice(result: GrammarProfile, rule: string): ChoiceStats {
	const found = result.choices.find((c) => c.rule === rule)
	assert.ok(found, `no choice stats for ${rule}`)
	return found
}

describe('profile', () => {
	it('should count which alternative of a choice matched', () => {
		const result = profile('\n\nx = 1\n')
		assert.strictEqual(result.succeeded, true)
		assert.deepStrictEqual(choice(result, 'Line'), {
			alternatives: ['Line_stmt', 'Line_blank'],
			attempts: 5,
			reorderSavings: 1,
			rule: 'Line',
			usage: [1, 2],
		})
	})

	it('should report no savings for a choice already in usage order', () => {
		const line = choice(profile('x = 1\ny = 2\n\n'), 'Line')
		assert.deepStrictEqual(line.usage, [2, 1])
		assert.strictEqual(line.attempts, 4)
		assert.strictEqual(line.reorderSavings, 0)
	})

	it('should count failed alternatives tried before the winner', () => {
		const stmt = choice(profile('x = 1\n'), 'Stmt')
		assert.deepStrictEqual(stmt.alternatives, ['CompoundStmt', 'SimpleLine'])
		assert.deepStrictEqual(stmt.usage, [0, 1])
		assert.strictEqual(stmt.attempts, 2)
		assert.strictEqual(stmt.reorderSavings, 1)
	})

	it('should list choices with the largest savings first', () => {
		const { choices } = profile('x = 1\n')
		for (let i = 1; i < choices.length; i++) {
			const previous = choices[i - 1]
			const current = choices[i]
			assert.ok(previous && current && previous.reorderSavings >= current.reorderSavings)
		}
	})

	it('should count rule applications and the text they span', () => {
		const { rules } = profile('\n\nx = 1\n')
		assert.deepStrictEqual(
			rules.find((r) => r.rule === 'Line_blank'),
			{ applications: 2, characters: 2, rule: 'Line_blank' }
		)
		assert.strictEqual(rules.find((r) => r.rule === 'Line')?.applications, 3)
		assert.strictEqual(rules.find((r) => r.rule === 'SimpleLine')?.applications, 1)
	})

	it('should start from the rule of the given mode', () => {
		const { rules } = profile('1 + 2', 'eval')
		assert.strictEqual(rules.find((r) => r.rule === 'EvalInput')?.applications, 1)
		assert.strictEqual(rules.find((r) => r.rule === 'FileInput'), undefined)
	})

	it('should time the match', () => {
		assert.ok(profile('x = 1\n').matchMs >= 0)
	})

	it('should return empty counts when the grammar rejects the input', () => {
		const result = profile('x = = 1\n')
		assert.strictEqual(result.succeeded, false)
		assert.deepStrictEqual(result.rules, [])
		assert.deepStrictEqual(result.choices, [])
	})

	it('should report nesting too deep to match', () => {
		assert.throws(
			() => profile(`x = ${'('.repeat(150)}1${')'.repeat(150)}\n`),
			(error: unknown) => error instanceof GrammarError && error.code === 'CPPARSE010'
		)
	})

	it('should reject an unknown mode', () => {
		assert.throws(() => profile('x\n', 'module'), ConfigurationError)
	})
})
