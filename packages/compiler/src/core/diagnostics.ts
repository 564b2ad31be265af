/**
 * Re-export diagnostic types and compiler definitions from shared package.
 */

import { COMPILER_DIAGNOSTICS, type CompilerDiagnosticDef } from '@eoc/diagnostics'

export {
	COMPILER_DIAGNOSTICS,
	type CompilerDiagnosticCode,
	type CompilerDiagnosticDef,
	type CompileStage,
	type DiagnosticArgs,
	DiagnosticSeverity,
	interpolateMessage,
} from '@eoc/diagnostics'

/**
 * All valid diagnostic codes for the compiler.
 */
export type DiagnosticCode = keyof typeof COMPILER_DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): CompilerDiagnosticDef {
	return COMPILER_DIAGNOSTICS[code]
}

/**
 * Check if a code is a valid diagnostic code.
 */
export function isValidDiagnosticCode(code: string): code is DiagnosticCode {
	return code in COMPILER_DIAGNOSTICS
}
