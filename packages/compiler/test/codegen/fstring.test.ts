import assert from 'node:assert'
import { describe, it } from 'node:test'
import { emit } from '../../src/codegen/emitter.ts'
import { escapeBraces } from '../../src/codegen/fstring.ts'
import type { ConfigOptions } from '../../src/core/config.ts'
import { parsed } from '../support.ts'

function py(source: string, options: ConfigOptions = {}): string {
	const { context, tree } = parsed(source, 'eval', options)
	return emit(context, tree).text
}

describe('codegen/fstring', () => {
	describe('escapeBraces', () => {
		it('should double every brace', () => {
			assert.strictEqual(escapeBraces('{a} }{'), '{{a}} }}{{')
			assert.strictEqual(escapeBraces('plain'), 'plain')
		})
	})

	describe('plain strings', () => {
		it('should print literals unchanged', () => {
			assert.strictEqual(py('"a{b}"'), '"a{b}"')
			assert.strictEqual(py("'x' 'y'"), "'x' 'y'")
		})
	})

	describe('kept format strings', () => {
		const modern = { target: '3.8' }

		it('should keep a format string where the target has them', () => {
			assert.strictEqual(py('f"a{x}b"', modern), 'f"a{x}b"')
		})

		it('should write field expressions in output form', () => {
			assert.strictEqual(py('f"{x |> g}"', modern), 'f"{g(x)}"')
		})

		it('should keep conversions and specs', () => {
			assert.strictEqual(py('f"{x!r:>4}"', modern), 'f"{x!r:>4}"')
		})

		it('should expand self-documenting fields', () => {
			assert.strictEqual(py('f"{x=}"', modern), 'f"x={x!r}"')
		})

		it('should keep doubled braces', () => {
			assert.strictEqual(py('f"{{x}}"', modern), 'f"{{x}}"')
		})

		it('should space a field that starts with a brace', () => {
			assert.strictEqual(py('f"{ {1: 2}[k] }"', modern), 'f"{ {1: 2}[k]}"')
		})
	})

	describe('lowered format strings', () => {
		it('should lower to str.format on the 2.x family', () => {
			assert.strictEqual(py('f"a{x}b"'), '"a{0}b".format(x)')
		})

		it('should number fields in order, nested specs included', () => {
			assert.strictEqual(py('f"{x:>{w}} {y}"'), '"{0:>{1}} {2}".format(x, w, y)')
		})

		it('should default self-documenting fields to repr', () => {
			assert.strictEqual(py('f"{x=}"'), '"x={0!r}".format(x)')
		})

		it('should escape braces in plain parts merged into the call', () => {
			assert.strictEqual(py('"{a}" f"{b}"'), '"{{a}}" "{0}".format(b)')
		})

		it('should drop only the format prefix', () => {
			assert.strictEqual(py('rf"\\d{x}"'), 'r"\\d{0}".format(x)')
		})
	})
})
