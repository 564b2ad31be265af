/**
 * CLI diagnostic definitions.
 *
 * Error code format: EOCLI<NUMBER>
 * - EOCLI: CLI errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CLI ERRORS (EOCLI001-099)
// =============================================================================

export const EOCLI001: DiagnosticDef = {
	code: 'EOCLI001',
	description: "The compiler couldn't find a file at this path.",
	message: 'file not found: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check the path and make sure the file exists.',
}

export const EOCLI002: DiagnosticDef = {
	code: 'EOCLI002',
	description: "The file exists but the compiler can't open it.",
	message: 'cannot read file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have read permission for this file.',
}

export const EOCLI003: DiagnosticDef = {
	code: 'EOCLI003',
	description: "The compiler couldn't save the generated Java files.",
	message: 'cannot write output: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have write permission for the output directory.',
}

export const EOCLI004: DiagnosticDef = {
	code: 'EOCLI004',
	description: 'Something unexpected went wrong during compilation.',
	message: 'compilation failed: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check your source file, or report this if it seems like a bug.',
}

// =============================================================================
// CATALOG
// =============================================================================

export const CLI_DIAGNOSTICS = {
	EOCLI001,
	EOCLI002,
	EOCLI003,
	EOCLI004,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
