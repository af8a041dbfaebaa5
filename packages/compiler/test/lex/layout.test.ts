import assert from 'node:assert'
import { describe, it } from 'node:test'
import { DEDENT, fragmentText, INDENT, indentWidth, JOINED, layout } from '../../src/lex/layout.ts'
import { scan } from '../../src/lex/scanner.ts'
import { contextFor, laidOut } from '../support.ts'

function layoutText(source: string): string {
	return laidOut(contextFor(source)).text
}

function layoutFailure(source: string): { code: string; message: string; column: number; line: number } {
	const context = contextFor(source)
	assert.strictEqual(scan(context).succeeded, true)
	const result = layout(context)
	assert.strictEqual(result.succeeded, false)
	const [d] = context.getDiagnostics()
	assert.ok(d)
	return { code: d.def.code, column: d.column, line: d.line, message: d.message }
}

describe('lex/layout', () => {
	describe('markers', () => {
		it('should mark a block with an indent and a final dedent', () => {
			assert.strictEqual(layoutText('if x:\n    y\n'), `if x:\n${INDENT}    y\n${DEDENT}`)
		})

		it('should add a missing final newline', () => {
			assert.strictEqual(layoutText('x = 1'), 'x = 1\n')
		})

		it('should close nested blocks at the line that leaves them', () => {
			assert.strictEqual(
				layoutText('if a:\n  if b:\n    c\nd\n'),
				`if a:\n${INDENT}  if b:\n${INDENT}    c\n${DEDENT}${DEDENT}d\n`
			)
		})

		it('should leave blank and comment lines alone', () => {
			assert.strictEqual(layoutText('if a:\n  b\n\n# note\n  c\n'), `if a:\n${INDENT}  b\n\n# note\n  c\n${DEDENT}`)
		})

		it('should join newlines inside brackets', () => {
			assert.strictEqual(layoutText('f(a,\n  b)\n'), `f(a,${JOINED}  b)\n`)
		})

		it('should join a backslash continuation', () => {
			assert.strictEqual(layoutText('x = \\\n  1\n'), `x = \\${JOINED}  1\n`)
		})

		it('should replace marker characters found in the source', () => {
			assert.strictEqual(layoutText(`x = "${INDENT}"\n`), 'x = "\uFFFD"\n')
		})
	})

	describe('offsets', () => {
		it('should map markers to the start of their line', () => {
			const laid = laidOut(contextFor('if x:\n    y\n'))
			assert.strictEqual(laid.offsets.toSource(6), 6)
			assert.strictEqual(laid.offsets.toSource(7), 6)
			assert.strictEqual(laid.offsets.toSource(11), 10)
			assert.strictEqual(laid.offsets.toSource(13), 12)
			assert.strictEqual(laid.offsets.toSource(-1), 0)
		})

		it('should record where top-level statements start', () => {
			const laid = laidOut(contextFor('a = 1\ndef f():\n  return 2\nb = 3\n'))
			assert.deepStrictEqual(laid.topLevelStarts, [0, 6, 26])
		})
	})

	describe('indentation errors', () => {
		it('should reject an unexpected indent', () => {
			assert.deepStrictEqual(layoutFailure('x\n  y\n'), {
				code: 'CPPARSE008',
				column: 3,
				line: 2,
				message: 'unexpected indent',
			})
		})

		it('should require a body after a colon', () => {
			assert.deepStrictEqual(layoutFailure('if x:\ny\n'), {
				code: 'CPPARSE009',
				column: 1,
				line: 2,
				message: 'expected an indented block',
			})
		})

		it('should require a body at the end of input', () => {
			assert.strictEqual(layoutFailure('if x:\n').code, 'CPPARSE009')
		})

		it('should reject an unindent to an unknown level', () => {
			assert.deepStrictEqual(layoutFailure('if x:\n  y\n z\n'), {
				code: 'CPPARSE004',
				column: 2,
				line: 3,
				message: 'unindent does not match any outer indentation level',
			})
		})

		it('should reject tabs mixed with spaces on one line', () => {
			assert.deepStrictEqual(layoutFailure('if x:\n \ty\n'), {
				code: 'CPPARSE002',
				column: 2,
				line: 2,
				message: 'mixed tabs and spaces in indentation',
			})
		})

		it('should reject a file that switches indentation characters', () => {
			const failure = layoutFailure('if x:\n\ty\nif z:\n    w\n')
			assert.strictEqual(failure.code, 'CPPARSE003')
			assert.strictEqual(failure.message, 'inconsistent indentation: expected tabs, found spaces')
			assert.strictEqual(failure.line, 4)
		})

		it('should accept mixed indentation in lenient mode and remember it', () => {
			const laid = laidOut(contextFor('if x:\n \ty\n', 'lenient'))
			assert.deepStrictEqual(laid.mixedIndentAt, [6])
		})
	})

	describe('helpers', () => {
		it('should measure tabs to the next multiple of eight', () => {
			assert.strictEqual(indentWidth('    '), 4)
			assert.strictEqual(indentWidth('\t'), 8)
			assert.strictEqual(indentWidth('  \t'), 8)
			assert.strictEqual(indentWidth('\t  '), 10)
		})

		it('should prepare fragments without changing their length', () => {
			assert.strictEqual(fragmentText('a\nb'), `a${JOINED}b`)
			assert.strictEqual(fragmentText(`x${DEDENT}`), 'x\uFFFD')
		})
	})
})
