import assert from 'node:assert'
import { afterEach, describe, it } from 'node:test'
import {
	CompileError,
	ConfigurationError,
	compile,
	configure,
	disableIncremental,
	enableIncremental,
	GrammarError,
	getConfig,
	getSessionStats,
	LexError,
	StyleError,
	TargetError,
	trace,
} from '../src/index.ts'

function failureOf(run: () => unknown): CompileError {
	try {
		run()
	} catch (error) {
		assert.ok(error instanceof CompileError, `expected a CompileError, got ${String(error)}`)
		return error
	}
	assert.fail('expected the compile to fail')
}

describe('compile', () => {
	afterEach(() => {
		configure()
	})

	describe('translation', () => {
		it('should translate block input', () => {
			assert.strictEqual(compile('x |> f\n'), 'f(x)\n')
		})

		it('should translate eval input without a trailing newline', () => {
			assert.strictEqual(compile('x |> f', 'eval'), 'f(x)')
		})

		it('should lower format strings for the universal target', () => {
			assert.strictEqual(compile('s = f"{x}"\n'), 's = "{0}".format(x)\n')
		})

		it('should annotate warnings in the output', () => {
			assert.strictEqual(
				compile('reiterable(x)\n'),
				"reiterable(x)  # WARNING: found deprecated built-in 'reiterable' (use tee instead)\n"
			)
		})
	})

	describe('errors', () => {
		it('should throw a LexError with the rendered excerpt', () => {
			const error = failureOf(() => compile('x)'))
			assert.ok(error instanceof LexError)
			assert.strictEqual(error.code, 'CPLEX001')
			assert.strictEqual(error.message, "unmatched close ')' (line 1)")
			assert.strictEqual(error.diagnosticMessage, "unmatched close ')'")
			assert.strictEqual(error.line, 1)
			assert.strictEqual(error.column, 2)
			assert.strictEqual(error.ename, 'LexError')
			assert.strictEqual(error.evalue, error.message)
			assert.deepStrictEqual(error.traceback, [
				"LexError[CPLEX001]: unmatched close ')' (line 1)",
				'  --> <input>:1:2',
				'   |',
				' 1 | x)',
				'   |  ^',
				'   |',
				"   = help: Remove the ')' or add the missing opening delimiter before it.",
			])
			assert.strictEqual(error.rendered, error.traceback.join('\n'))
		})

		it('should place the caret by code points after an astral character', () => {
			const error = failureOf(() => compile('x = \u{1F600} + )'))
			assert.strictEqual(error.code, 'CPLEX001')
			assert.strictEqual(error.column, 9)
			assert.strictEqual(error.traceback[1], '  --> <input>:1:9')
			assert.strictEqual(error.traceback[4], '   |         ^')
		})

		it('should give spans as offsets into the text passed in', () => {
			const source = '\uFEFFa = 1\r\nx)\r\n'
			const error = failureOf(() => compile(source))
			assert.strictEqual(error.line, 2)
			assert.strictEqual(error.column, 2)
			assert.deepStrictEqual(error.spans, [{ end: 9, start: 9 }])
			assert.strictEqual(source.charAt(9), ')')
		})

		it('should name the file in the excerpt', () => {
			const error = failureOf(() => compile('x)', 'block', { filename: 'demo.copra' }))
			assert.strictEqual(error.traceback[1], '  --> demo.copra:1:2')
		})

		it('should throw a GrammarError for input no rule accepts', () => {
			const error = failureOf(() => compile('x = = 1\n'))
			assert.ok(error instanceof GrammarError)
			assert.strictEqual(error.code, 'CPPARSE001')
		})

		it('should reject keyword-only parameters below their version', () => {
			const source = 'def f(*, x): return x\n'
			const error = failureOf(() => compile(source, 'block', { config: { target: '2.7' } }))
			assert.ok(error instanceof TargetError)
			assert.strictEqual(error.code, 'CPTARGET001')
			assert.strictEqual(error.column, 10)
			assert.strictEqual(
				error.message,
				'found keyword-only argument, which requires target 3 or later (current target: 2.7) (line 1)'
			)
			assert.strictEqual(compile(source, 'block', { config: { target: '3.6' } }), 'def f(*, x):\n    return x\n')
		})

		it('should escalate style findings only in strict mode', () => {
			const source = 'import os\nx = 1\n'
			assert.strictEqual(compile(source), 'import os\nx = 1\n')
			const error = failureOf(() => compile(source, 'block', { config: { strict: true } }))
			assert.ok(error instanceof StyleError)
			assert.strictEqual(error.code, 'CPSTYLE002')
			assert.strictEqual(error.message, "found unused import 'os' (line 1)")
			assert.strictEqual(error.column, 8)
		})

		it('should report nesting too deep to translate as a GrammarError', () => {
			const nested = `x = ${'('.repeat(150)}1${')'.repeat(150)}\n`
			const error = failureOf(() => compile(nested))
			assert.ok(error instanceof GrammarError)
			assert.strictEqual(error.code, 'CPPARSE010')
			assert.strictEqual(error.message, 'expression too deeply nested (line 1)')
			assert.strictEqual(error.column, 1)
		})

		it('should point a long pipe chain overflow at its statement', () => {
			const chain = `a = 1\ny = x${' |> f'.repeat(10000)}\n`
			const error = failureOf(() => compile(chain))
			assert.strictEqual(error.code, 'CPPARSE010')
			assert.strictEqual(error.line, 2)
			assert.strictEqual(error.column, 1)
		})

		it('should reject nesting past the bracket limit while scanning', () => {
			const depth = 201
			const error = failureOf(() => compile(`x = ${'['.repeat(depth)}${']'.repeat(depth)}\n`))
			assert.ok(error instanceof LexError)
			assert.strictEqual(error.code, 'CPLEX004')
			assert.strictEqual(error.column, 205)
		})

		it('should reject an unknown mode before reading the source', () => {
			assert.throws(
				() => compile('x)', 'module'),
				(error: unknown) => error instanceof ConfigurationError && error.option === 'mode'
			)
		})

		it('should reject an unknown target', () => {
			assert.throws(() => compile('x\n', 'block', { config: { target: '9.9' } }), ConfigurationError)
		})
	})

	describe('configuration', () => {
		it('should apply the process-wide configuration', () => {
			configure({ target: '3.6' })
			assert.strictEqual(getConfig().target, '3.6')
			assert.strictEqual(compile('s = f"{x}"\n'), 's = f"{x}"\n')
		})

		it('should reset omitted keys to their defaults', () => {
			configure({ strict: true, target: '3.6' })
			configure({ target: '3.8' })
			assert.strictEqual(getConfig().strict, false)
		})

		it('should prefer per-call configuration', () => {
			configure({ target: '3.6' })
			assert.strictEqual(compile('s = f"{x}"\n', 'block', { config: {} }), 's = "{0}".format(x)\n')
		})

		it('should keep the previous configuration when a target is rejected', () => {
			configure({ target: '3.6' })
			assert.throws(() => configure({ target: '1.5' }), ConfigurationError)
			assert.strictEqual(getConfig().target, '3.6')
		})
	})

	describe('incremental sessions', () => {
		it('should produce the same output as a cold compile', () => {
			const def = 'def f(x):\n    return x\n'
			const both = `${def}class A:\n    pass\n`
			enableIncremental('edit')
			compile(def, 'block', { session: 'edit' })
			assert.strictEqual(compile(both, 'block', { session: 'edit' }), compile(both))
			const stats = getSessionStats('edit')
			assert.ok(stats)
			assert.strictEqual(stats.compiles, 2)
			assert.ok(stats.reusedCharacters > 0)
			disableIncremental('edit')
			assert.strictEqual(getSessionStats('edit'), undefined)
		})

		it('should not carry operator declarations between compiles', () => {
			enableIncremental('ops')
			try {
				assert.strictEqual(compile('operator <$>\n', 'block', { session: 'ops' }), '')
				const warm = failureOf(() => compile('f <$> xs\n', 'block', { session: 'ops' }))
				const cold = failureOf(() => compile('f <$> xs\n'))
				assert.strictEqual(warm.code, 'CPPARSE005')
				assert.strictEqual(warm.message, cold.message)
				assert.deepStrictEqual(warm.traceback, cold.traceback)
			} finally {
				disableIncremental('ops')
			}
		})

		it('should compile cold for a session that was never enabled', () => {
			assert.strictEqual(compile('x\n', 'block', { session: 'unknown' }), 'x\n')
			assert.strictEqual(getSessionStats('unknown'), undefined)
		})
	})

	describe('trace', () => {
		it('should trace the grammar over the layout text', () => {
			assert.ok(trace('x = 1\n').includes('FileInput'))
		})
	})
})
