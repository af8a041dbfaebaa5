/**
 * Queries for interactive shells: input completeness and name completion.
 */

import { readFileSync } from 'node:fs'
import { CompileMode, DEFAULT_CONFIG } from '../core/config.ts'
import { CompilationContext } from '../core/context.ts'
import { SourceText } from '../core/source.ts'
import { layout } from '../lex/layout.ts'
import { scan } from '../lex/scanner.ts'
import { parse } from '../parse/parser.ts'

export type Completeness = 'complete' | 'incomplete' | 'invalid'

function loadNames(): readonly string[] {
	const raw: unknown = JSON.parse(readFileSync(new URL('./names.json', import.meta.url), 'utf-8'))
	if (typeof raw !== 'object' || raw === null) throw new Error('Malformed name table')
	const names = new Set<string>()
	for (const list of Object.values(raw)) {
		if (!Array.isArray(list)) throw new Error('Malformed name table')
		for (const name of list) {
			if (typeof name === 'string') names.add(name)
		}
	}
	return [...names].sort()
}

const NAMES = loadNames()

/**
 * Keywords and built-in names starting with `prefix`, sorted.
 */
export function completions(prefix: string): string[] {
	return NAMES.filter((name) => name.startsWith(prefix))
}

/** Codes that mean the input stopped early rather than went wrong. */
const UNFINISHED = new Set(['CPLEX003', 'CPPARSE009'])

function stoppedEarly(context: CompilationContext): boolean {
	const [first] = context.getErrors()
	return first !== undefined && UNFINISHED.has(first.def.code)
}

/**
 * Whether a shell should run the input or ask for another line.
 */
export function checkComplete(source: string, mode: CompileMode = CompileMode.Single): Completeness {
	if (/\\\n?$/.test(source)) return 'incomplete'
	const context = new CompilationContext(new SourceText(source), DEFAULT_CONFIG, mode)
	if (!scan(context).succeeded) return stoppedEarly(context) ? 'incomplete' : 'invalid'
	const laid = layout(context, { lenient: mode === CompileMode.Lenient })
	if (laid.layout === undefined) return stoppedEarly(context) ? 'incomplete' : 'invalid'
	return parse(context, laid.layout).succeeded ? 'complete' : 'invalid'
}
