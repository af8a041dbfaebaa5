/**
 * @copra/diagnostics
 *
 * Shared diagnostic types and definitions for the copra packages.
 */

export {
	COMPILER_DIAGNOSTICS,
	type CompilerDiagnosticCode,
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
} from './compiler.ts'
export { interpolateMessage } from './interpolate.ts'
export {
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticKind,
	DiagnosticSeverity,
} from './types.ts'

import { COMPILER_DIAGNOSTICS } from './compiler.ts'

/**
 * All diagnostics from all packages.
 */
export const DIAGNOSTICS = {
	...COMPILER_DIAGNOSTICS,
} as const

/**
 * All valid diagnostic codes.
 */
export type DiagnosticCode = keyof typeof DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof DIAGNOSTICS)[typeof code] {
	return DIAGNOSTICS[code]
}

