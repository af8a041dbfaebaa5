import assert from 'node:assert'
import { describe, it } from 'node:test'
import { DIAGNOSTICS, DiagnosticKind, DiagnosticSeverity, getDiagnostic } from '../src/index.ts'

describe('diagnostic catalog', () => {
	it('keys every entry by its own code', () => {
		for (const [key, def] of Object.entries(DIAGNOSTICS)) {
			assert.strictEqual(def.code, key)
		}
	})

	it('prefixes codes by kind', () => {
		const prefixes: Record<DiagnosticKind, string> = {
			[DiagnosticKind.Grammar]: 'CPPARSE',
			[DiagnosticKind.Lex]: 'CPLEX',
			[DiagnosticKind.Style]: 'CPSTYLE',
			[DiagnosticKind.Target]: 'CPTARGET',
		}
		for (const def of Object.values(DIAGNOSTICS)) {
			assert.ok(def.code.startsWith(prefixes[def.kind]), def.code)
		}
	})

	it('makes style findings warnings and everything else errors', () => {
		for (const def of Object.values(DIAGNOSTICS)) {
			const expected =
				def.kind === DiagnosticKind.Style ? DiagnosticSeverity.Warning : DiagnosticSeverity.Error
			assert.strictEqual(def.severity, expected, def.code)
		}
	})

	it('looks up entries by code', () => {
		assert.strictEqual(getDiagnostic('CPLEX003').message, "unclosed open '{open}'")
		assert.strictEqual(getDiagnostic('CPPARSE010').kind, DiagnosticKind.Grammar)
	})
})
