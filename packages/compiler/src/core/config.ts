/**
 * Compile configuration.
 *
 * Configurations are immutable values. The process-wide active configuration
 * lives in the public API module and is only replaced through `configure`.
 */

import { parseTarget, type TargetRange } from '../version/table.ts'
import { ConfigurationError } from './errors.ts'

export const CompileMode = {
	Block: 'block',
	Eval: 'eval',
	File: 'file',
	Lenient: 'lenient',
	Package: 'package',
	Single: 'single',
	Sys: 'sys',
} as const

export type CompileMode = (typeof CompileMode)[keyof typeof CompileMode]

export interface CompileConfig {
	/** Host version or family to translate for; '' means every supported version */
	readonly target: string
	/** Escalate style findings to errors */
	readonly strict: boolean
	/** Annotate emitted lines with their source line number */
	readonly lineNumbers: boolean
	/** Annotate emitted lines with their original source text */
	readonly keepLines: boolean
	/** Compact output */
	readonly minify: boolean
}

export type ConfigOptions = { readonly [K in keyof CompileConfig]?: CompileConfig[K] | undefined }

export const DEFAULT_CONFIG: CompileConfig = Object.freeze({
	keepLines: false,
	lineNumbers: false,
	minify: false,
	strict: false,
	target: '',
})

const MODES: ReadonlySet<string> = new Set(Object.values(CompileMode))

export function isCompileMode(mode: string): mode is CompileMode {
	return MODES.has(mode)
}

/**
 * Fill defaults and validate.
 *
 * @throws {ConfigurationError} If the target is not recognized
 */
export function resolveConfig(options: ConfigOptions = {}): CompileConfig {
	const config: CompileConfig = Object.freeze({
		keepLines: options.keepLines ?? DEFAULT_CONFIG.keepLines,
		lineNumbers: options.lineNumbers ?? DEFAULT_CONFIG.lineNumbers,
		minify: options.minify ?? DEFAULT_CONFIG.minify,
		strict: options.strict ?? DEFAULT_CONFIG.strict,
		target: options.target ?? DEFAULT_CONFIG.target,
	})
	parseTarget(config.target)
	return config
}

export function targetRangeOf(config: CompileConfig): TargetRange {
	return parseTarget(config.target)
}

export function assertCompileMode(mode: string): CompileMode {
	if (!isCompileMode(mode)) {
		throw new ConfigurationError('mode', `unknown compile mode '${mode}' (expected one of: ${[...MODES].join(', ')})`)
	}
	return mode
}

/** Modes whose output starts with the module header. */
export function emitsHeader(mode: CompileMode): boolean {
	return mode === CompileMode.File || mode === CompileMode.Package || mode === CompileMode.Sys
}
