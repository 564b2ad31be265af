/**
 * Diagnostic severity levels.
 */
export const DiagnosticSeverity = {
	Error: 0,
	Note: 2,
	Warning: 1,
} as const

export type DiagnosticSeverity = (typeof DiagnosticSeverity)[keyof typeof DiagnosticSeverity]

/**
 * Pipeline stage a compiler diagnostic belongs to.
 */
export type CompileStage = 'lex' | 'parse' | 'classify' | 'expression' | 'emit'

/**
 * Diagnostic definition in the catalog.
 */
export interface DiagnosticDef {
	readonly code: string
	readonly severity: DiagnosticSeverity
	readonly message: string
	readonly description: string
	readonly suggestion?: string
}

/**
 * Compiler diagnostics also name the stage that raises them.
 */
export interface CompilerDiagnosticDef extends DiagnosticDef {
	readonly stage: CompileStage
}

/**
 * Template arguments for diagnostic messages.
 */
export type DiagnosticArgs = Record<string, string | number>
