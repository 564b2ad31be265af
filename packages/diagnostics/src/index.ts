/**
 * @eoc/diagnostics
 *
 * Shared diagnostic types and definitions for the EO compiler packages.
 */

export {
	CLI_DIAGNOSTICS,
	type CliDiagnosticCode,
	EOCLI001,
	EOCLI002,
	EOCLI003,
	EOCLI004,
} from './cli.ts'
export {
	COMPILER_DIAGNOSTICS,
	type CompilerDiagnosticCode,
	EOCLASS001,
	EOCLASS002,
	EOCLASS003,
	EOCLASS004,
	EOCLASS005,
	EOCLASS006,
	EOCLASS007,
	EOCLASS008,
	EOCLASS009,
	EOCLASS010,
	EOEMIT001,
	EOEMIT002,
	EOEXPR001,
	EOEXPR002,
	EOEXPR003,
	EOLEX001,
	EOLEX002,
	EOLEX003,
	EOLEX004,
	EOLEX005,
	EOLEX006,
	EOPARSE001,
	EOPARSE002,
} from './compiler.ts'
export { interpolateMessage } from './interpolate.ts'
export {
	type CompilerDiagnosticDef,
	type CompileStage,
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	type DiagnosticSeverity as DiagnosticSeverityType,
} from './types.ts'

import { CLI_DIAGNOSTICS } from './cli.ts'
import { COMPILER_DIAGNOSTICS } from './compiler.ts'

/**
 * All diagnostics from all packages.
 */
export const DIAGNOSTICS = {
	...COMPILER_DIAGNOSTICS,
	...CLI_DIAGNOSTICS,
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

/**
 * Check if a code is a valid diagnostic code.
 */
export function isValidDiagnosticCode(code: string): code is DiagnosticCode {
	return code in DIAGNOSTICS
}
