/**
 * Compiler diagnostic definitions.
 *
 * Error code format: CP<PHASE><NUMBER>
 * - CPLEX: Delimiter and quote errors (001-099)
 * - CPPARSE: Grammar and indentation errors (001-099)
 * - CPTARGET: Target version errors (001-099)
 * - CPSTYLE: Strict-mode findings (001-099)
 */

import { type DiagnosticDef, DiagnosticKind, DiagnosticSeverity } from './types.ts'

// =============================================================================
// LEXICAL ERRORS (CPLEX001-099)
// =============================================================================

export const CPLEX001: DiagnosticDef = {
	code: 'CPLEX001',
	description: 'This closing delimiter has no opening delimiter to pair with.',
	kind: DiagnosticKind.Lex,
	message: "unmatched close '{close}'",
	severity: DiagnosticSeverity.Error,
	suggestion: "Remove the '{close}' or add the missing opening delimiter before it.",
}

export const CPLEX002: DiagnosticDef = {
	code: 'CPLEX002',
	description: 'The most recent open delimiter is closed by a delimiter of a different kind.',
	kind: DiagnosticKind.Lex,
	message: "mismatched open '{open}' and close '{close}'",
	severity: DiagnosticSeverity.Error,
	suggestion: "Close '{open}' with '{expected}' before closing anything else.",
}

export const CPLEX003: DiagnosticDef = {
	code: 'CPLEX003',
	description: 'The input ended while this delimiter or string was still open.',
	kind: DiagnosticKind.Lex,
	message: "unclosed open '{open}'",
	severity: DiagnosticSeverity.Error,
	suggestion: "Add the matching '{expected}'.",
}

export const CPLEX004: DiagnosticDef = {
	code: 'CPLEX004',
	description: 'Brackets may nest at most 200 levels deep.',
	kind: DiagnosticKind.Lex,
	message: 'too many nested delimiters (limit {max})',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Move inner parts of the expression into named variables.',
}

// =============================================================================
// GRAMMAR ERRORS (CPPARSE001-099)
// =============================================================================

export const CPPARSE001: DiagnosticDef = {
	code: 'CPPARSE001',
	description: 'No grammar rule accepts the input at this position.',
	kind: DiagnosticKind.Grammar,
	message: 'parsing failed: {expected}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check for typos or missing keywords.',
}

export const CPPARSE002: DiagnosticDef = {
	code: 'CPPARSE002',
	description: 'A single indentation prefix mixes tabs and spaces.',
	kind: DiagnosticKind.Grammar,
	message: 'mixed tabs and spaces in indentation',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Pick either tabs or spaces and stick with it for the whole file.',
}

export const CPPARSE003: DiagnosticDef = {
	code: 'CPPARSE003',
	description: 'This file started indenting with {expected}, so every indented line must use {expected}.',
	kind: DiagnosticKind.Grammar,
	message: 'inconsistent indentation: expected {expected}, found {found}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use {expected} here to match the rest of the file.',
}

export const CPPARSE004: DiagnosticDef = {
	code: 'CPPARSE004',
	description: 'When you unindent, you need to go back to a column used by an enclosing block.',
	kind: DiagnosticKind.Grammar,
	message: 'unindent does not match any outer indentation level',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Unindent to one of these widths: {validLevels}.',
}

export const CPPARSE005: DiagnosticDef = {
	code: 'CPPARSE005',
	description: 'Custom operators must be declared with an operator statement before they can be used.',
	kind: DiagnosticKind.Grammar,
	message: "undefined custom operator '{op}'",
	severity: DiagnosticSeverity.Error,
	suggestion: "Add 'operator {op}' to declare it.",
}

export const CPPARSE006: DiagnosticDef = {
	code: 'CPPARSE006',
	description: 'An expression inside a format string could not be parsed.',
	kind: DiagnosticKind.Grammar,
	message: 'invalid format string expression: {expected}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check the code between the braces, and double literal braces as {{ or }}.',
}

export const CPPARSE007: DiagnosticDef = {
	code: 'CPPARSE007',
	description: 'Alternatives joined with | are tried one by one, so they cannot capture names.',
	kind: DiagnosticKind.Grammar,
	message: 'or-pattern alternatives cannot bind names',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Bind the whole alternative with `as` instead.',
}

export const CPPARSE008: DiagnosticDef = {
	code: 'CPPARSE008',
	description: 'This line is indented but the line before it does not open a block.',
	kind: DiagnosticKind.Grammar,
	message: 'unexpected indent',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Remove the indentation or end the previous line with a colon.',
}

export const CPPARSE009: DiagnosticDef = {
	code: 'CPPARSE009',
	description: 'A block header must be followed by at least one indented statement.',
	kind: DiagnosticKind.Grammar,
	message: 'expected an indented block',
	severity: DiagnosticSeverity.Error,
	suggestion: "Indent the body, or write 'pass' for an empty block.",
}

export const CPPARSE010: DiagnosticDef = {
	code: 'CPPARSE010',
	description: 'The statement nests expressions deeper than the compiler can follow.',
	kind: DiagnosticKind.Grammar,
	message: 'expression too deeply nested',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Split the statement into smaller ones with intermediate variables.',
}

// =============================================================================
// TARGET ERRORS (CPTARGET001-099)
// =============================================================================

export const CPTARGET001: DiagnosticDef = {
	code: 'CPTARGET001',
	description: 'This construct is not available on every version the configured target covers.',
	kind: DiagnosticKind.Target,
	message: 'found {description}, which requires target {min} or later (current target: {target})',
	severity: DiagnosticSeverity.Error,
	suggestion: "Configure target '{min}' or rewrite the construct.",
}

export const CPTARGET002: DiagnosticDef = {
	code: 'CPTARGET002',
	description: 'This construct was removed from the host language in a version the target covers.',
	kind: DiagnosticKind.Target,
	message:
		'found {description}, which is unavailable from target {removed} on (current target: {target})',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Configure a target older than {removed} or rewrite the construct.',
}

// =============================================================================
// STYLE FINDINGS (CPSTYLE001-099)
// =============================================================================

export const CPSTYLE001: DiagnosticDef = {
	code: 'CPSTYLE001',
	description: 'This built-in is kept for compatibility and will be removed.',
	kind: DiagnosticKind.Style,
	message: "found deprecated built-in '{name}' (use {replacement} instead)",
	severity: DiagnosticSeverity.Warning,
}

export const CPSTYLE002: DiagnosticDef = {
	code: 'CPSTYLE002',
	description: 'This module-level import is never referenced.',
	kind: DiagnosticKind.Style,
	message: "found unused import '{name}'",
	severity: DiagnosticSeverity.Warning,
	suggestion: "Remove the import, or add a '# NOQA' comment to keep it.",
}

export const CPSTYLE003: DiagnosticDef = {
	code: 'CPSTYLE003',
	description: "Chaining 'is' checks in a pattern is legacy syntax.",
	kind: DiagnosticKind.Style,
	message: "found chained 'is' in pattern '{pattern}'",
	severity: DiagnosticSeverity.Warning,
	suggestion: "Use a single 'is' check with a tuple of types.",
}

export const CPSTYLE004: DiagnosticDef = {
	code: 'CPSTYLE004',
	description: 'A statement lambda whose body is a single expression can use the arrow form.',
	kind: DiagnosticKind.Style,
	message: 'found statement lambda with an expression-only body',
	severity: DiagnosticSeverity.Warning,
	suggestion: "Write '(params) -> expression' instead.",
}

export const CPSTYLE005: DiagnosticDef = {
	code: 'CPSTYLE005',
	description: 'Indentation mixes tabs and spaces.',
	kind: DiagnosticKind.Style,
	message: 'found mixed tabs and spaces in indentation',
	severity: DiagnosticSeverity.Warning,
}

export const CPSTYLE006: DiagnosticDef = {
	code: 'CPSTYLE006',
	description: 'This line ends with whitespace.',
	kind: DiagnosticKind.Style,
	message: 'found trailing whitespace',
	severity: DiagnosticSeverity.Warning,
}

export const CPSTYLE007: DiagnosticDef = {
	code: 'CPSTYLE007',
	description: 'A semicolon is only needed between statements on the same line.',
	kind: DiagnosticKind.Style,
	message: 'found stray semicolon',
	severity: DiagnosticSeverity.Warning,
}

export const CPSTYLE008: DiagnosticDef = {
	code: 'CPSTYLE008',
	description: 'A format string without replacement fields is a plain string.',
	kind: DiagnosticKind.Style,
	message: 'found format string with no interpolated expressions',
	severity: DiagnosticSeverity.Warning,
	suggestion: "Drop the 'f' prefix.",
}

export const CPSTYLE009: DiagnosticDef = {
	code: 'CPSTYLE009',
	description: 'A number ending in a bare dot reads like an attribute access.',
	kind: DiagnosticKind.Style,
	message: "found bare trailing dot in '{literal}'",
	severity: DiagnosticSeverity.Warning,
	suggestion: 'Write the fractional part explicitly, as in 1.0.',
}

/**
 * All compiler diagnostics indexed by code.
 */
export const COMPILER_DIAGNOSTICS = {
	CPLEX001,
	CPLEX002,
	CPLEX003,
	CPLEX004,
	CPPARSE001,
	CPPARSE002,
	CPPARSE003,
	CPPARSE004,
	CPPARSE005,
	CPPARSE006,
	CPPARSE007,
	CPPARSE008,
	CPPARSE009,
	CPPARSE010,
	CPSTYLE001,
	CPSTYLE002,
	CPSTYLE003,
	CPSTYLE004,
	CPSTYLE005,
	CPSTYLE006,
	CPSTYLE007,
	CPSTYLE008,
	CPSTYLE009,
	CPTARGET001,
	CPTARGET002,
} as const

export type CompilerDiagnosticCode = keyof typeof COMPILER_DIAGNOSTICS
