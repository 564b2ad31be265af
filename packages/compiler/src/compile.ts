import { classify } from './check/classifier.ts'
import { type EmittedUnit, emit } from './codegen/index.ts'
import { CompilationContext } from './core/context.ts'
import { CompileError, createStageError } from './core/errors.ts'
import { tokenize } from './lex/tokenizer.ts'
import { parse } from './parse/parser.ts'

/**
 * Options for the compile function.
 */
export interface CompileOptions {
	/** Path to the source file (for error messages) */
	filename?: string
}

const decoder = new TextDecoder('utf-8')

/**
 * Source text as a string. Byte input is read as UTF-8; a leading BOM is
 * dropped by the scanner either way.
 */
export function decodeSource(source: string | Uint8Array): string {
	return typeof source === 'string' ? source : decoder.decode(source)
}

/**
 * Throw the context's first error as a CompileError.
 */
export function fail(context: CompilationContext, cause?: unknown): never {
	const error = context.getErrors()[0]
	if (error === undefined) {
		throw new Error('compilation stopped without reporting a diagnostic')
	}
	const stageError = createStageError(error, cause === undefined ? undefined : { cause })
	throw new CompileError(context.formatDiagnostic(error), stageError)
}

/**
 * Run every phase on a fresh context and return the units in declaration
 * order. Throws CompileError at the first failing phase.
 */
export function runPipeline(context: CompilationContext): EmittedUnit[] {
	// Phase 1: Tokenization
	if (!tokenize(context).succeeded) fail(context)

	// Phase 2: Parsing
	if (!parse(context).succeeded) fail(context)

	// Phase 3: Classification
	if (!classify(context).succeeded) fail(context)

	// Phase 4: Expressions and emission
	const result = emit(context)
	if (!result.succeeded) fail(context)

	return result.units
}

/**
 * Compile EO source to Java compilation units.
 *
 * This is the main entry point for compilation. It chains all phases:
 * 1. Tokenization (source → tokens)
 * 2. Parsing (tokens → declaration tree)
 * 3. Classification (interface or class, shape rules)
 * 4. Emission (declarations → Java text, compiling every expression)
 *
 * Nothing is written to any sink; see Program for that.
 *
 * @throws {CompileError} If any phase fails
 */
export function compile(source: string | Uint8Array, options: CompileOptions = {}): EmittedUnit[] {
	const context = new CompilationContext(decodeSource(source), options.filename)
	return runPipeline(context)
}
