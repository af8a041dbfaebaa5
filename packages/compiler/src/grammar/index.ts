import { readFileSync } from 'node:fs'
import type { Grammar, Matcher, MatchResult } from 'ohm-js'
import * as ohm from 'ohm-js'
import { CompileMode } from '../core/config.ts'

/**
 * Copra grammar source, read from copra.ohm beside this module.
 *
 * The grammar matches layout text (see lex/layout.ts), where blocks are
 * delimited by ⇥ and ⇤ markers and joined newlines are ↵.
 */
export const grammarSource = readFileSync(new URL('./copra.ohm', import.meta.url), 'utf-8')

/**
 * The compiled Copra grammar.
 */
export const CopraGrammar: Grammar = ohm.grammar(grammarSource)

export const StartRule = {
	Eval: 'EvalInput',
	File: 'FileInput',
	FString: 'FStringExpr',
	Single: 'SingleInput',
} as const

export type StartRule = (typeof StartRule)[keyof typeof StartRule]

/**
 * Grammar entry point for a compile mode.
 */
export function startRuleFor(mode: CompileMode): StartRule {
	switch (mode) {
		case CompileMode.Eval:
			return StartRule.Eval
		case CompileMode.Single:
			return StartRule.Single
		case CompileMode.Block:
		case CompileMode.File:
		case CompileMode.Lenient:
		case CompileMode.Package:
		case CompileMode.Sys:
			return StartRule.File
	}
}

/**
 * Match layout text against the grammar without extracting semantics.
 */
export function match(input: string, startRule: StartRule = StartRule.File): MatchResult {
	return CopraGrammar.match(input, startRule)
}

/**
 * A fresh matcher for incremental parsing. Its memo table survives
 * `replaceInputRange` outside the replaced range.
 */
export function createMatcher(): Matcher {
	return CopraGrammar.matcher()
}

/**
 * Trace a parse for debugging purposes.
 *
 * @param input - Layout text
 * @returns Trace string
 */
export function trace(input: string, startRule: StartRule = StartRule.File): string {
	return CopraGrammar.trace(input, startRule).toString()
}

const LOCATION_PREFIX = /^Line \d+, col \d+: /

/**
 * Failure offset and expected-set description of a failed match.
 */
export interface MatchFailure {
	readonly offset: number
	readonly expected: string
}

export function describeFailure(result: MatchResult): MatchFailure {
	const text = result.shortMessage ?? result.message ?? 'unexpected input'
	return {
		expected: text.replace(LOCATION_PREFIX, ''),
		offset: result.getInterval().startIdx,
	}
}
