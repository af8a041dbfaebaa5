import assert from 'node:assert'
import { describe, it } from 'node:test'
import { checkComplete, completions } from '../src/index.ts'

describe('shell', () => {
	describe('checkComplete', () => {
		it('should accept a finished statement', () => {
			assert.strictEqual(checkComplete('x = 1'), 'complete')
			assert.strictEqual(checkComplete('if x:\n    pass\n'), 'complete')
		})

		it('should wait for the body of a block header', () => {
			assert.strictEqual(checkComplete('if x:'), 'incomplete')
			assert.strictEqual(checkComplete('if x:\n    pass\nelse:\n'), 'incomplete')
		})

		it('should wait for open brackets and strings', () => {
			assert.strictEqual(checkComplete('x = (1,'), 'incomplete')
			assert.strictEqual(checkComplete('s = """abc'), 'incomplete')
		})

		it('should wait after a line continuation', () => {
			assert.strictEqual(checkComplete('x = 1 + \\'), 'incomplete')
			assert.strictEqual(checkComplete('x = 1 + \\\n'), 'incomplete')
		})

		it('should reject input that cannot be finished', () => {
			assert.strictEqual(checkComplete('x = )'), 'invalid')
			assert.strictEqual(checkComplete('x = = 1'), 'invalid')
			assert.strictEqual(checkComplete(`x = ${'('.repeat(150)}1${')'.repeat(150)}`), 'invalid')
		})

		it('should use the given mode', () => {
			assert.strictEqual(checkComplete('1 + 2', 'eval'), 'complete')
			assert.strictEqual(checkComplete('x = 1', 'eval'), 'invalid')
		})
	})

	describe('completions', () => {
		it('should list keywords and built-ins with the prefix in order', () => {
			assert.deepStrictEqual(completions('re'), ['recursive_generator', 'reduce', 'repr', 'return', 'reversed'])
			assert.deepStrictEqual(completions('whi'), ['while'])
		})

		it('should list a name found in both tables once', () => {
			assert.deepStrictEqual(completions('ty'), ['type'])
		})

		it('should return nothing for an unknown prefix', () => {
			assert.deepStrictEqual(completions('zzz'), [])
		})
	})
})
