import assert from 'node:assert'
import { describe, it } from 'node:test'
import {
	assertCompileMode,
	CompileMode,
	DEFAULT_CONFIG,
	emitsHeader,
	isCompileMode,
	resolveConfig,
	targetRangeOf,
} from '../../src/core/config.ts'
import { ConfigurationError } from '../../src/core/errors.ts'

describe('core/config', () => {
	describe('resolveConfig', () => {
		it('should fill every default', () => {
			assert.deepStrictEqual(resolveConfig(), DEFAULT_CONFIG)
			assert.strictEqual(DEFAULT_CONFIG.target, '')
			assert.strictEqual(DEFAULT_CONFIG.strict, false)
		})

		it('should keep given options and default the rest', () => {
			const config = resolveConfig({ strict: true, target: '3.8' })
			assert.strictEqual(config.strict, true)
			assert.strictEqual(config.target, '3.8')
			assert.strictEqual(config.minify, false)
			assert.strictEqual(config.keepLines, false)
		})

		it('should treat undefined as missing', () => {
			assert.strictEqual(resolveConfig({ minify: undefined }).minify, false)
		})

		it('should return a frozen value', () => {
			assert.ok(Object.isFrozen(resolveConfig({ target: '3' })))
		})

		it('should reject an unknown target', () => {
			assert.throws(
				() => resolveConfig({ target: '9.9' }),
				(err: unknown) => err instanceof ConfigurationError && err.option === 'target'
			)
		})
	})

	describe('modes', () => {
		it('should recognize every compile mode', () => {
			for (const mode of ['block', 'eval', 'file', 'lenient', 'package', 'single', 'sys']) {
				assert.strictEqual(isCompileMode(mode), true)
			}
			assert.strictEqual(isCompileMode('module'), false)
		})

		it('should throw a ConfigurationError for an unknown mode', () => {
			assert.throws(
				() => assertCompileMode('module'),
				(err: unknown) =>
					err instanceof ConfigurationError && err.option === 'mode' && /unknown compile mode 'module'/.test(err.message)
			)
		})

		it('should emit the header only for file-like modes', () => {
			assert.strictEqual(emitsHeader(CompileMode.File), true)
			assert.strictEqual(emitsHeader(CompileMode.Package), true)
			assert.strictEqual(emitsHeader(CompileMode.Sys), true)
			assert.strictEqual(emitsHeader(CompileMode.Block), false)
			assert.strictEqual(emitsHeader(CompileMode.Eval), false)
		})
	})

	describe('targetRangeOf', () => {
		it('should span every known version for the universal target', () => {
			const range = targetRangeOf(DEFAULT_CONFIG)
			assert.deepStrictEqual(range.lo, [2, 6])
			assert.deepStrictEqual(range.hi, [3, 13])
		})
	})
})
