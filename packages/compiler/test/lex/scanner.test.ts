import assert from 'node:assert'
import { describe, it } from 'node:test'
import type { CompilationContext } from '../../src/core/context.ts'
import { type Token, TokenKind } from '../../src/core/tokens.ts'
import { closerOf, MAX_NESTING, scan } from '../../src/lex/scanner.ts'
import { codes, contextFor } from '../support.ts'

function tokensOfKind(context: CompilationContext, kind: TokenKind): Token[] {
	return [...context.tokens].map(([, token]) => token).filter((token) => token.kind === kind)
}

function kinds(text: string): TokenKind[] {
	const context = contextFor(text)
	assert.strictEqual(scan(context).succeeded, true)
	return [...context.tokens].map(([, token]) => token.kind)
}

function texts(text: string): string[] {
	const context = contextFor(text)
	scan(context)
	return [...context.tokens].map(([, token]) => context.source.slice(token))
}

describe('lex/scanner', () => {
	describe('tokens', () => {
		it('should scan a simple assignment', () => {
			assert.deepStrictEqual(kinds('x = 1 # hi\n'), [
				TokenKind.Name,
				TokenKind.Operator,
				TokenKind.Number,
				TokenKind.Comment,
				TokenKind.Newline,
				TokenKind.Eof,
			])
		})

		it('should keep operator runs together', () => {
			assert.deepStrictEqual(texts('x |> f'), ['x', '|>', 'f', ''])
			assert.deepStrictEqual(texts('a <$> b'), ['a', '<$>', 'b', ''])
		})

		it('should scan prefixed strings as one token', () => {
			assert.deepStrictEqual(texts('rb"a\\"b" f\'{x}\''), ['rb"a\\"b"', "f'{x}'", ''])
		})

		it('should scan triple-quoted strings across lines', () => {
			assert.deepStrictEqual(kinds('"""a\nb"""'), [TokenKind.String, TokenKind.Eof])
		})

		it('should scan numbers with underscores, exponents and suffixes', () => {
			assert.deepStrictEqual(texts('1_000 0x_ff 1.5e-3 .5 2j 10L'), ['1_000', '0x_ff', '1.5e-3', '.5', '2j', '10L', ''])
		})

		it('should join newlines inside brackets', () => {
			assert.deepStrictEqual(kinds('f(a,\n b)\n'), [
				TokenKind.Name,
				TokenKind.Open,
				TokenKind.Name,
				TokenKind.Operator,
				TokenKind.JoinedNewline,
				TokenKind.Name,
				TokenKind.Close,
				TokenKind.Newline,
				TokenKind.Eof,
			])
		})

		it('should treat a backslash before a newline as a continuation', () => {
			const context = contextFor('x = 1 + \\\n 2\n')
			scan(context)
			const [continuation] = tokensOfKind(context, TokenKind.Continuation)
			assert.ok(continuation)
			assert.deepStrictEqual([continuation.start, continuation.end], [8, 10])
		})

		it('should record 1-based line and column', () => {
			const context = contextFor('a\n  bc\n')
			scan(context)
			const [, second] = tokensOfKind(context, TokenKind.Name)
			assert.ok(second)
			assert.strictEqual(second.line, 2)
			assert.strictEqual(second.column, 3)
		})

		it('should accept unicode identifiers', () => {
			assert.deepStrictEqual(texts('café = 1'), ['café', '=', '1', ''])
		})
	})

	describe('delimiters', () => {
		it('should report an unclosed bracket at the bracket', () => {
			const context = contextFor('()[(())')
			assert.strictEqual(scan(context).succeeded, false)
			const [d] = context.getDiagnostics()
			assert.ok(d)
			assert.strictEqual(d.def.code, 'CPLEX003')
			assert.strictEqual(d.message, "unclosed open '['")
			assert.strictEqual(d.column, 3)
		})

		it('should report a mismatched close with a range from the open', () => {
			const context = contextFor('[([){[}')
			assert.strictEqual(scan(context).succeeded, false)
			const [d] = context.getDiagnostics()
			assert.ok(d)
			assert.strictEqual(d.def.code, 'CPLEX002')
			assert.strictEqual(d.message, "mismatched open '[' and close ')'")
			assert.deepStrictEqual(d.annotations[0]?.span, { end: 3, start: 2 })
			assert.strictEqual(d.column, 4)
		})

		it('should report an unmatched close', () => {
			const context = contextFor('x)\n')
			assert.strictEqual(scan(context).succeeded, false)
			assert.deepStrictEqual(codes(context), ['CPLEX001'])
			assert.strictEqual(context.getDiagnostics()[0]?.column, 2)
		})

		it('should accept brackets nested up to the limit', () => {
			const nested = '('.repeat(MAX_NESTING) + '1' + ')'.repeat(MAX_NESTING)
			assert.strictEqual(scan(contextFor(`x = ${nested}\n`)).succeeded, true)
		})

		it('should report the bracket that passes the nesting limit', () => {
			const depth = MAX_NESTING + 1
			const context = contextFor(`x = ${'('.repeat(depth)}1${')'.repeat(depth)}\n`)
			assert.strictEqual(scan(context).succeeded, false)
			const [d] = context.getDiagnostics()
			assert.ok(d)
			assert.strictEqual(d.def.code, 'CPLEX004')
			assert.strictEqual(d.message, 'too many nested delimiters (limit 200)')
			assert.strictEqual(d.column, 205)
		})

		it('should stop at the first problem', () => {
			const context = contextFor(')]')
			scan(context)
			assert.strictEqual(context.getDiagnostics().length, 1)
		})

		it('should ignore brackets inside strings and comments', () => {
			assert.strictEqual(scan(contextFor('x = "(["  # ]\n')).succeeded, true)
		})

		it('should name the closer of each opener', () => {
			assert.strictEqual(closerOf('('), ')')
			assert.strictEqual(closerOf('['), ']')
			assert.strictEqual(closerOf('{'), '}')
			assert.strictEqual(closerOf('"'), '"')
		})
	})

	describe('strings', () => {
		it('should report an unclosed string at its quote', () => {
			const context = contextFor('x = "abc\n')
			assert.strictEqual(scan(context).succeeded, false)
			const [d] = context.getDiagnostics()
			assert.ok(d)
			assert.strictEqual(d.message, 'unclosed open \'"\'')
			assert.strictEqual(d.column, 5)
		})

		it('should report an unclosed replacement field', () => {
			const context = contextFor('f"{x"')
			assert.strictEqual(scan(context).succeeded, false)
			const [d] = context.getDiagnostics()
			assert.ok(d)
			assert.strictEqual(d.message, "unclosed open '{'")
			assert.strictEqual(d.column, 3)
		})

		it('should report a lone closing brace in a format string', () => {
			const context = contextFor('f"a}b"')
			assert.strictEqual(scan(context).succeeded, false)
			assert.strictEqual(context.getDiagnostics()[0]?.message, "unmatched close '}'")
		})

		it('should accept doubled braces and nested fields', () => {
			assert.strictEqual(scan(contextFor('f"{{x}} {y:{w}} {d[\'k\']!r}"')).succeeded, true)
		})

		it('should check brackets inside replacement fields', () => {
			const context = contextFor('f"{f(x]}"')
			assert.strictEqual(scan(context).succeeded, false)
			assert.deepStrictEqual(codes(context), ['CPLEX002'])
		})

		it('should not treat braces in plain strings as fields', () => {
			assert.strictEqual(scan(contextFor('"}{"')).succeeded, true)
		})
	})
})
