import assert from 'node:assert'
import { describe, it } from 'node:test'
import { emit, emitExpression } from '../../src/codegen/emitter.ts'
import { conditionOf, type PatternPlan, planPattern } from '../../src/codegen/patterns.ts'
import { parsed } from '../support.ts'

function py(source: string): string {
	const { context, tree } = parsed(source)
	return emit(context, tree).text
}

function planFor(pattern: string): PatternPlan {
	const { context, tree } = parsed(`match s:\n    case ${pattern}:\n        pass\n`)
	const stmt = tree.kind === 'Module' ? tree.body[0] : undefined
	assert.ok(stmt?.kind === 'Match')
	const [first] = stmt.cases
	assert.ok(first)
	return planPattern(first.pattern, 's', (e) => emitExpression(context, e))
}

describe('codegen/patterns', () => {
	it('should bind captures without conditions', () => {
		assert.deepStrictEqual(planFor('x'), { bindings: [{ name: 'x', value: 's' }], conditions: [] })
		assert.strictEqual(conditionOf(planFor('_')), 'True')
	})

	it('should compare singletons by identity and other literals by equality', () => {
		assert.deepStrictEqual(planFor('None').conditions, ['s is None'])
		assert.deepStrictEqual(planFor('-1').conditions, ['s == -1'])
		assert.deepStrictEqual(planFor('"k"').conditions, ['s == "k"'])
	})

	it('should compare dotted names by value', () => {
		assert.deepStrictEqual(planFor('Color.RED').conditions, ['s == Color.RED'])
	})

	it('should check sequence type and length before indexing', () => {
		const plan = planFor('[first, *rest]')
		assert.deepStrictEqual(plan.conditions, ['isinstance(s, (tuple, list))', 'len(s) >= 1'])
		assert.deepStrictEqual(plan.bindings, [
			{ name: 'first', value: 's[0]' },
			{ name: 'rest', value: 'list(s[1:])' },
		])
	})

	it('should index from the end after a star', () => {
		const plan = planFor('[*init, last]')
		assert.deepStrictEqual(plan.bindings, [
			{ name: 'init', value: 'list(s[0:len(s) - 1])' },
			{ name: 'last', value: 's[-1]' },
		])
	})

	it('should check mapping keys and collect the rest', () => {
		const plan = planFor('{"k": v, **others}')
		assert.deepStrictEqual(plan.conditions, ['isinstance(s, dict)', '"k" in s'])
		assert.deepStrictEqual(plan.bindings, [
			{ name: 'v', value: 's["k"]' },
			{ name: 'others', value: 'dict((k, v) for k, v in s.items() if k not in ("k",))' },
		])
	})

	it('should match built-in classes against the subject itself', () => {
		const plan = planFor('int(n)')
		assert.deepStrictEqual(plan.conditions, ['isinstance(s, int)'])
		assert.deepStrictEqual(plan.bindings, [{ name: 'n', value: 's' }])
	})

	it('should read class keywords as attributes', () => {
		assert.strictEqual(conditionOf(planFor('Point(x=0)')), 'isinstance(s, Point) and hasattr(s, "x") and s.x == 0')
	})

	it('should use match arguments for positional class patterns', () => {
		const plan = planFor('Point(a)')
		assert.deepStrictEqual(plan.conditions, [
			'isinstance(s, Point)',
			'len(getattr(type(s), "__match_args__", ())) >= 1',
		])
		assert.deepStrictEqual(plan.bindings, [{ name: 'a', value: 'getattr(s, type(s).__match_args__[0])' }])
	})

	it('should check every type of a chained is pattern', () => {
		const plan = planFor('x is int is str')
		assert.deepStrictEqual(plan.conditions, ['isinstance(s, int)', 'isinstance(s, str)'])
		assert.deepStrictEqual(plan.bindings, [{ name: 'x', value: 's' }])
	})

	it('should join alternatives into one condition', () => {
		assert.deepStrictEqual(planFor('1 | 2').conditions, ['((s == 1) or (s == 2))'])
	})

	it('should bind an as name after the inner pattern', () => {
		const plan = planFor('(1, y) as pair')
		assert.deepStrictEqual(plan.bindings, [
			{ name: 'y', value: 's[1]' },
			{ name: 'pair', value: 's' },
		])
	})
})

describe('codegen/match', () => {
	it('should lower a case into guarded checks', () => {
		const source = 'match x:\n    case [a, b]:\n        y = a\n'
		assert.strictEqual(
			py(source),
			[
				'_copra_match_to_0 = x',
				'_copra_match_check_0 = False',
				'if not _copra_match_check_0:',
				'    if isinstance(_copra_match_to_0, (tuple, list)) and len(_copra_match_to_0) == 2:',
				'        a = _copra_match_to_0[0]',
				'        b = _copra_match_to_0[1]',
				'        _copra_match_check_0 = True',
				'    if _copra_match_check_0:',
				'        y = a',
				'',
			].join('\n')
		)
	})

	it('should try later cases only while nothing matched', () => {
		const source = 'match x:\n    case 0:\n        y = 1\n    case _:\n        y = 2\n'
		assert.strictEqual(
			py(source),
			[
				'_copra_match_to_0 = x',
				'_copra_match_check_0 = False',
				'if not _copra_match_check_0:',
				'    if _copra_match_to_0 == 0:',
				'        _copra_match_check_0 = True',
				'    if _copra_match_check_0:',
				'        y = 1',
				'if not _copra_match_check_0:',
				'    if True:',
				'        _copra_match_check_0 = True',
				'    if _copra_match_check_0:',
				'        y = 2',
				'',
			].join('\n')
		)
	})

	it('should test the guard after binding', () => {
		const source = 'match x:\n    case n if n > 0:\n        pass\n'
		assert.strictEqual(
			py(source),
			[
				'_copra_match_to_0 = x',
				'_copra_match_check_0 = False',
				'if not _copra_match_check_0:',
				'    if True:',
				'        n = _copra_match_to_0',
				'        if n > 0:',
				'            _copra_match_check_0 = True',
				'    if _copra_match_check_0:',
				'        pass',
				'',
			].join('\n')
		)
	})

	it('should number matches within one top-level statement', () => {
		const source = 'def f(x):\n    match x:\n        case 1:\n            return 1\n    match x:\n        case 2:\n            return 2\n'
		const text = py(source)
		assert.ok(text.includes('    _copra_match_to_0 = x\n'))
		assert.ok(text.includes('    _copra_match_to_1 = x\n'))
	})

	it('should restart numbering for each top-level statement', () => {
		const source = 'match x:\n    case 1:\n        pass\nmatch y:\n    case 2:\n        pass\n'
		const text = py(source)
		assert.ok(text.includes('\n_copra_match_to_0 = y\n'))
		assert.strictEqual(text.includes('_copra_match_to_1'), false)
	})
})
