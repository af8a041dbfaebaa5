import assert from 'node:assert'
import { describe, it } from 'node:test'
import fc from 'fast-check'
import { type SyntaxNode, walk } from '../../src/core/nodes.ts'
import { parsed } from '../support.ts'

const KEYWORDS = new Set([
	'and', 'as', 'assert', 'async', 'await', 'break', 'class', 'continue', 'def', 'del', 'elif', 'else',
	'except', 'finally', 'for', 'from', 'global', 'if', 'import', 'in', 'is', 'lambda', 'nonlocal', 'not',
	'or', 'pass', 'raise', 'return', 'try', 'while', 'with', 'yield',
])

const identifier = fc
	.stringMatching(/^[a-z_][a-z0-9_]{0,6}$/)
	.filter((name) => !KEYWORDS.has(name) && name !== '_')

const operand = fc.oneof(identifier, fc.nat({ max: 9999 }).map(String))

const arithmetic: fc.Arbitrary<string> = fc.letrec<{ expr: string }>((tie) => ({
	expr: fc.oneof(
		{ maxDepth: 4 },
		operand,
		fc.tuple(tie('expr'), fc.constantFrom('+', '-', '*', '//', '%'), tie('expr')).map(([l, op, r]) => `${l} ${op} ${r}`),
		tie('expr').map((e) => `(${e})`)
	),
})).expr

function assertSpansInside(root: SyntaxNode, length: number): void {
	walk(root, (node) => {
		assert.ok(node.span.start >= 0 && node.span.start <= node.span.end && node.span.end <= length, node.kind)
	})
}

describe('parse/parser properties', () => {
	it('should parse every arithmetic expression in eval mode', () => {
		fc.assert(
			fc.property(arithmetic, (source) => {
				const { tree } = parsed(source, 'eval')
				assert.strictEqual(tree.kind, 'Expression')
				assertSpansInside(tree, source.length)
			})
		)
	})

	it('should bind the assigned name', () => {
		fc.assert(
			fc.property(identifier, arithmetic, (name, value) => {
				const { tree } = parsed(`${name} = ${value}\n`)
				const stmt = tree.kind === 'Module' ? tree.body[0] : undefined
				assert.ok(stmt?.kind === 'Assign')
				assert.deepStrictEqual(stmt.targets[0], { id: name, kind: 'Name', span: { end: name.length, start: 0 } })
			})
		)
	})

	it('should give one statement per line', () => {
		fc.assert(
			fc.property(fc.array(fc.tuple(identifier, arithmetic), { maxLength: 8, minLength: 1 }), (lines) => {
				const source = lines.map(([name, value]) => `${name} = ${value}\n`).join('')
				const { tree, layout } = parsed(source)
				assert.strictEqual(tree.kind === 'Module' && tree.body.length, lines.length)
				assert.strictEqual(layout.topLevelStarts.length, lines.length)
				assertSpansInside(tree, source.length)
			})
		)
	})
})
