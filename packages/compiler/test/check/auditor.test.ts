import assert from 'node:assert'
import { describe, it } from 'node:test'
import { audit, deprecatedReplacement } from '../../src/check/auditor.ts'
import type { CompileMode } from '../../src/core/config.ts'
import { parsed } from '../support.ts'

interface AuditOutcome {
	readonly succeeded: boolean
	readonly codes: readonly string[]
	readonly reported: readonly string[]
}

function auditOf(source: string, strict: boolean, mode: CompileMode = 'block'): AuditOutcome {
	const { context, layout, tree } = parsed(source, mode, { strict })
	const result = audit(context, tree, layout, { strict })
	return {
		codes: result.findings.map((f) => f.code),
		reported: context.getDiagnostics().map((d) => d.message),
		succeeded: result.succeeded,
	}
}

describe('check/auditor', () => {
	describe('deprecated built-ins', () => {
		it('should look up replacements', () => {
			assert.strictEqual(deprecatedReplacement('reiterable'), 'tee')
			assert.strictEqual(deprecatedReplacement('map'), undefined)
		})

		it('should warn without failing outside strict mode', () => {
			assert.deepStrictEqual(auditOf('reiterable(xs)\n', false), {
				codes: ['CPSTYLE001'],
				reported: ["found deprecated built-in 'reiterable' (use tee instead)"],
				succeeded: true,
			})
		})

		it('should fail in strict mode', () => {
			assert.strictEqual(auditOf('reiterable(xs)\n', true).succeeded, false)
		})
	})

	describe('unused imports', () => {
		it('should only be checked in strict mode', () => {
			assert.deepStrictEqual(auditOf('import os\nx = 1\n', false), { codes: [], reported: [], succeeded: true })
		})

		it('should report the import in strict mode', () => {
			const { context, layout, tree } = parsed('import os\nx = 1\n', 'block', { strict: true })
			assert.strictEqual(audit(context, tree, layout, { strict: true }).succeeded, false)
			const [d] = context.getDiagnostics()
			assert.ok(d)
			assert.strictEqual(d.message, "found unused import 'os'")
			assert.strictEqual(d.column, 8)
		})

		it('should count a use of the first component of a dotted import', () => {
			assert.strictEqual(auditOf('import os.path\nos.getcwd()\n', true).succeeded, true)
		})

		it('should check the alias of a from import', () => {
			assert.deepStrictEqual(auditOf('from a import b as c\nb\n', true).reported, ["found unused import 'c'"])
		})

		it('should skip NOQA lines and future imports', () => {
			assert.strictEqual(auditOf('import os  # NOQA\n', true).succeeded, true)
			assert.strictEqual(auditOf('from __future__ import division\n', true).succeeded, true)
		})
	})

	describe('tree rules', () => {
		it('should report a chained is pattern', () => {
			assert.deepStrictEqual(auditOf('match x:\n    case y is int is str:\n        pass\n', true).reported, [
				"found chained 'is' in pattern 'y is int is str'",
			])
		})

		it('should report a statement lambda', () => {
			assert.deepStrictEqual(auditOf('f = def (x) -> x\n', true).codes, ['CPSTYLE004'])
		})

		it('should report a format string without fields', () => {
			assert.deepStrictEqual(auditOf('x = f"plain"\n', true).codes, ['CPSTYLE008'])
			assert.strictEqual(auditOf('x = f"{y}"\ny = 1\n', true).succeeded, true)
		})
	})

	describe('token rules', () => {
		it('should report trailing whitespace outside strings', () => {
			assert.deepStrictEqual(auditOf('x = 1  \n', true).codes, ['CPSTYLE006'])
			assert.strictEqual(auditOf('x = """a  \nb"""\n', true).succeeded, true)
		})

		it('should report a semicolon that ends a line', () => {
			assert.deepStrictEqual(auditOf('x = 1;\n', true).codes, ['CPSTYLE007'])
			assert.strictEqual(auditOf('x = 1; y = 2\n', true).succeeded, true)
		})

		it('should report a number ending in a dot', () => {
			assert.deepStrictEqual(auditOf('x = 1.\n', true).reported, ["found bare trailing dot in '1.'"])
		})

		it('should report mixed indentation accepted in lenient mode', () => {
			assert.deepStrictEqual(auditOf('if x:\n \ty = 1\n', true, 'lenient').codes, ['CPSTYLE005'])
		})
	})

	it('should order findings by position and report only the first', () => {
		const outcome = auditOf('import os\nx = 1;  \n', true)
		assert.deepStrictEqual(outcome.codes, ['CPSTYLE002', 'CPSTYLE007', 'CPSTYLE006'])
		assert.deepStrictEqual(outcome.reported, ["found unused import 'os'"])
		assert.strictEqual(outcome.succeeded, false)
	})
})
