import { type CompileConfig, type CompileMode, type ConfigOptions, resolveConfig } from '../src/core/config.ts'
import { CompilationContext } from '../src/core/context.ts'
import type { SyntaxTree } from '../src/core/nodes.ts'
import { SourceText } from '../src/core/source.ts'
import { type Layout, layout } from '../src/lex/layout.ts'
import { scan } from '../src/lex/scanner.ts'
import { type ParseOptions, parse } from '../src/parse/parser.ts'

export function contextFor(
	text: string,
	mode: CompileMode = 'block',
	options: ConfigOptions = {}
): CompilationContext {
	const config: CompileConfig = resolveConfig(options)
	return new CompilationContext(new SourceText(text, 'test.copra'), config, mode)
}

/** Scan and lay out; throws when either phase fails. */
export function laidOut(context: CompilationContext): Layout {
	if (!scan(context).succeeded) throw new Error(`scan failed: ${firstMessage(context)}`)
	const result = layout(context, { lenient: context.mode === 'lenient' })
	if (result.layout === undefined) throw new Error(`layout failed: ${firstMessage(context)}`)
	return result.layout
}

export interface Parsed {
	readonly context: CompilationContext
	readonly layout: Layout
	readonly tree: SyntaxTree
}

/** Run the front end to a tree; throws on any failure. */
export function parsed(
	text: string,
	mode: CompileMode = 'block',
	options: ConfigOptions = {},
	parseOptions: ParseOptions = {}
): Parsed {
	const context = contextFor(text, mode, options)
	const laid = laidOut(context)
	const result = parse(context, laid, parseOptions)
	if (result.tree === undefined) throw new Error(`parse failed: ${firstMessage(context)}`)
	return { context, layout: laid, tree: result.tree }
}

/** Run the front end expecting a failure; returns the context holding it. */
export function failedParse(text: string, mode: CompileMode = 'block'): CompilationContext {
	const context = contextFor(text, mode)
	const result = parse(context, laidOut(context))
	if (result.succeeded) throw new Error('parse unexpectedly succeeded')
	return context
}

export function firstMessage(context: CompilationContext): string {
	return context.getDiagnostics()[0]?.message ?? '(no diagnostic)'
}

export function codes(context: CompilationContext): string[] {
	return context.getDiagnostics().map((d) => d.def.code)
}
