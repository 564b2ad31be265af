/**
 * Error taxonomy of the pipeline.
 *
 * Each stage has its own error class carrying the diagnostic that stopped it.
 * `compile()` never lets a stage error escape on its own: it wraps it in one
 * CompileError that keeps the stage, code and location.
 */

import type { Diagnostic } from './context.ts'
import type { CompileStage } from './diagnostics.ts'

export class StageError extends Error {
	readonly stage: CompileStage
	readonly code: string
	readonly line: number
	readonly column: number

	constructor(diagnostic: Diagnostic, options?: ErrorOptions) {
		super(diagnostic.message, options)
		this.name = 'StageError'
		this.stage = diagnostic.def.stage
		this.code = diagnostic.def.code
		this.line = diagnostic.line
		this.column = diagnostic.column
	}
}

/** Malformed characters or indentation. */
export class LexError extends StageError {
	constructor(diagnostic: Diagnostic, options?: ErrorOptions) {
		super(diagnostic, options)
		this.name = 'LexError'
	}
}

/** Grammar violation. */
export class ParseError extends StageError {
	constructor(diagnostic: Diagnostic, options?: ErrorOptions) {
		super(diagnostic, options)
		this.name = 'ParseError'
	}
}

/** Inconsistent declaration shape. */
export class ClassificationError extends StageError {
	constructor(diagnostic: Diagnostic, options?: ErrorOptions) {
		super(diagnostic, options)
		this.name = 'ClassificationError'
	}
}

/** Malformed expression tree. */
export class ExpressionError extends StageError {
	constructor(diagnostic: Diagnostic, options?: ErrorOptions) {
		super(diagnostic, options)
		this.name = 'ExpressionError'
	}
}

/** A sink rejected the output. */
export class EmitError extends StageError {
	constructor(diagnostic: Diagnostic, options?: ErrorOptions) {
		super(diagnostic, options)
		this.name = 'EmitError'
	}
}

/**
 * Build the stage error matching a diagnostic's stage.
 */
export function createStageError(diagnostic: Diagnostic, options?: ErrorOptions): StageError {
	switch (diagnostic.def.stage) {
		case 'lex':
			return new LexError(diagnostic, options)
		case 'parse':
			return new ParseError(diagnostic, options)
		case 'classify':
			return new ClassificationError(diagnostic, options)
		case 'expression':
			return new ExpressionError(diagnostic, options)
		case 'emit':
			return new EmitError(diagnostic, options)
	}
}

/**
 * The single error `compile()` raises.
 * `message` is the formatted report; `reason` is the bare diagnostic message.
 */
export class CompileError extends Error {
	readonly stage: CompileStage
	readonly code: string
	readonly reason: string
	readonly line: number
	readonly column: number
	readonly stageError: StageError

	constructor(formatted: string, stageError: StageError) {
		super(formatted, { cause: stageError })
		this.name = 'CompileError'
		this.stage = stageError.stage
		this.code = stageError.code
		this.reason = stageError.message
		this.line = stageError.line
		this.column = stageError.column
		this.stageError = stageError
	}
}
