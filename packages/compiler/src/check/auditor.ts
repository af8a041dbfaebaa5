/**
 * Strict-mode auditor: style and deprecation findings over the tree and tokens.
 *
 * Strict: the first finding in source order is reported and the compile stops.
 * Otherwise only deprecated built-ins are reported, as warnings the emitter
 * turns into inline comments.
 */

import { readFileSync } from 'node:fs'
import type { CompilationContext } from '../core/context.ts'
import type { DiagnosticArgs } from '../core/diagnostics.ts'
import { type Alias, type Stmt, type SyntaxTree, walk } from '../core/nodes.ts'
import { type Token, TokenKind } from '../core/tokens.ts'
import type { Layout } from '../lex/layout.ts'

export type StyleCode =
	| 'CPSTYLE001'
	| 'CPSTYLE002'
	| 'CPSTYLE003'
	| 'CPSTYLE004'
	| 'CPSTYLE005'
	| 'CPSTYLE006'
	| 'CPSTYLE007'
	| 'CPSTYLE008'
	| 'CPSTYLE009'

export interface Finding {
	readonly code: StyleCode
	readonly offset: number
	readonly args: DiagnosticArgs
}

export interface AuditOptions {
	readonly strict: boolean
}

export interface AuditResult {
	succeeded: boolean
	findings: readonly Finding[]
}

function loadDeprecated(): ReadonlyMap<string, string> {
	const raw: unknown = JSON.parse(readFileSync(new URL('./deprecated-builtins.json', import.meta.url), 'utf-8'))
	if (typeof raw !== 'object' || raw === null) throw new Error('Malformed deprecated built-in table')
	const table = new Map<string, string>()
	for (const [name, replacement] of Object.entries(raw)) {
		if (typeof replacement !== 'string') throw new Error(`Malformed replacement for ${name}`)
		table.set(name, replacement)
	}
	return table
}

const DEPRECATED = loadDeprecated()

export function deprecatedReplacement(name: string): string | undefined {
	return DEPRECATED.get(name)
}

// =============================================================================
// TREE RULES
// =============================================================================

function deprecatedNames(tree: SyntaxTree): Finding[] {
	const findings: Finding[] = []
	walk(tree, (node) => {
		if (node.kind !== 'Name') return
		const replacement = DEPRECATED.get(node.id)
		if (replacement !== undefined) {
			findings.push({ args: { name: node.id, replacement }, code: 'CPSTYLE001', offset: node.span.start })
		}
	})
	return findings
}

/** Name an import binds in the importing scope. */
function boundName(alias: Alias, fromImport: boolean): string {
	if (alias.asname !== null) return alias.asname
	return fromImport ? alias.name : (alias.name.split('.')[0] ?? alias.name)
}

const NOQA = /#.*\bNOQA\b/i

function hasNoqa(context: CompilationContext, stmt: Stmt): boolean {
	const { source } = context
	const first = source.lineOf(stmt.span.start)
	const last = source.lineOf(stmt.span.end)
	for (let line = first; line <= last; line++) {
		if (NOQA.test(source.lineText(line) ?? '')) return true
	}
	return false
}

function unusedImports(context: CompilationContext, tree: SyntaxTree): Finding[] {
	if (tree.kind !== 'Module') return []
	const used = new Set<string>()
	walk(tree, (node) => {
		if (node.kind === 'Name') used.add(node.id)
	})
	const findings: Finding[] = []
	for (const stmt of tree.body) {
		if (stmt.kind !== 'Import' && stmt.kind !== 'ImportFrom') continue
		if (stmt.kind === 'ImportFrom' && (stmt.names === null || stmt.module === '__future__')) continue
		if (hasNoqa(context, stmt)) continue
		const aliases = stmt.kind === 'Import' ? stmt.names : (stmt.names ?? [])
		for (const alias of aliases) {
			const name = boundName(alias, stmt.kind === 'ImportFrom')
			if (!used.has(name)) findings.push({ args: { name }, code: 'CPSTYLE002', offset: alias.span.start })
		}
	}
	return findings
}

function treeFindings(context: CompilationContext, tree: SyntaxTree): Finding[] {
	const findings: Finding[] = []
	walk(tree, (node) => {
		switch (node.kind) {
			case 'IsInstancePattern':
				if (node.types.length > 1) {
					findings.push({
						args: { pattern: context.source.slice(node.span) },
						code: 'CPSTYLE003',
						offset: node.span.start,
					})
				}
				break
			case 'Lambda':
				if (node.style === 'statement') findings.push({ args: {}, code: 'CPSTYLE004', offset: node.span.start })
				break
			case 'StringLiteral':
				if (node.segments !== null && !node.segments.some((s) => s.kind === 'FormatField')) {
					findings.push({ args: {}, code: 'CPSTYLE008', offset: node.span.start })
				}
				break
		}
	})
	return findings
}

// =============================================================================
// TOKEN RULES
// =============================================================================

function tokenText(context: CompilationContext, token: Token): string {
	return context.source.text.slice(token.start, token.end)
}

function trailingWhitespace(context: CompilationContext, strings: readonly Token[]): Finding[] {
	const { source } = context
	const insideString = (offset: number): boolean => strings.some((t) => offset >= t.start && offset < t.end)
	const findings: Finding[] = []
	for (let line = 1; line <= source.lineCount(); line++) {
		const text = source.lineText(line) ?? ''
		const trimmed = text.replace(/[ \t\x0c]+$/, '')
		if (trimmed.length === text.length || trimmed.length === 0) continue
		const offset = source.lineStart(line) + trimmed.length
		if (!insideString(offset)) findings.push({ args: {}, code: 'CPSTYLE006', offset })
	}
	return findings
}

function isLineEnd(token: Token | undefined): boolean {
	return token === undefined || token.kind === TokenKind.Newline || token.kind === TokenKind.Eof
}

function straySemicolons(context: CompilationContext, tokens: readonly Token[]): Finding[] {
	const significant = tokens.filter((t) => t.kind !== TokenKind.Comment)
	const findings: Finding[] = []
	significant.forEach((token, i) => {
		if (token.kind !== TokenKind.Operator || tokenText(context, token) !== ';') return
		const previous = significant[i - 1]
		const next = significant[i + 1]
		const leading = previous === undefined || previous.kind === TokenKind.Newline
		const doubled = next !== undefined && next.kind === TokenKind.Operator && tokenText(context, next) === ';'
		if (leading || doubled || isLineEnd(next)) findings.push({ args: {}, code: 'CPSTYLE007', offset: token.start })
	})
	return findings
}

function trailingDots(context: CompilationContext, tokens: readonly Token[]): Finding[] {
	const findings: Finding[] = []
	for (const token of tokens) {
		if (token.kind !== TokenKind.Number) continue
		const literal = tokenText(context, token)
		if (literal.endsWith('.')) findings.push({ args: { literal }, code: 'CPSTYLE009', offset: token.start })
	}
	return findings
}

function tokenFindings(context: CompilationContext, layout: Layout): Finding[] {
	const tokens = [...context.tokens].map(([, token]) => token)
	const strings = tokens.filter((t) => t.kind === TokenKind.String)
	return [
		...layout.mixedIndentAt.map((offset): Finding => ({ args: {}, code: 'CPSTYLE005', offset })),
		...trailingWhitespace(context, strings),
		...straySemicolons(context, tokens),
		...trailingDots(context, tokens),
	]
}

// =============================================================================
// AUDIT
// =============================================================================

function byOffset(a: Finding, b: Finding): number {
	return a.offset - b.offset || a.code.localeCompare(b.code)
}

/**
 * Run the style rules. Findings come back ordered by source position.
 */
export function audit(
	context: CompilationContext,
	tree: SyntaxTree,
	layout: Layout,
	options: AuditOptions
): AuditResult {
	if (!options.strict) {
		const findings = deprecatedNames(tree).sort(byOffset)
		for (const finding of findings) context.emitAt(finding.code, finding.offset, finding.args)
		return { findings, succeeded: true }
	}

	const findings = [
		...deprecatedNames(tree),
		...unusedImports(context, tree),
		...treeFindings(context, tree),
		...tokenFindings(context, layout),
	].sort(byOffset)
	const first = findings[0]
	if (first === undefined) return { findings, succeeded: true }
	context.emitAt(first.code, first.offset, first.args)
	return { findings, succeeded: false }
}
