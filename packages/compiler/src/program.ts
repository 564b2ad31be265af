/**
 * Program façade: compiles one source unit and delivers every compiled
 * declaration to its sink.
 *
 * The whole unit is compiled in memory first; sinks are written only after
 * every declaration has compiled, in declaration order.
 */

import { mkdirSync } from 'node:fs'
import { join } from 'node:path'
import type { EmittedUnit } from './codegen/index.ts'
import { type CompileOptions, decodeSource, fail, runPipeline } from './compile.ts'
import type { ObjectDecl } from './core/ast.ts'
import { CompilationContext } from './core/context.ts'
import { fileSink, type Sink, type SinkResolver } from './sinks.ts'

export const JAVA_EXTENSION = '.java'

export interface DirectoryTarget {
	/** Created, with its parents, when missing. */
	readonly directory: string
}

export type ProgramTarget = SinkResolver | Sink | DirectoryTarget

function isDirectoryTarget(target: ProgramTarget): target is DirectoryTarget {
	return typeof target === 'object' && 'directory' in target
}

/**
 * File name for a declaration's unit.
 */
export function javaFileName(name: string): string {
	return `${name}${JAVA_EXTENSION}`
}

function describe(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

export class Program {
	private readonly source: string
	private readonly target: ProgramTarget
	private readonly options: CompileOptions

	constructor(source: string | Uint8Array, target: ProgramTarget, options: CompileOptions = {}) {
		this.source = decodeSource(source)
		this.target = target
		this.options = options
	}

	/**
	 * Compile and deliver. Returns the units that were written.
	 *
	 * @throws {CompileError} If compilation fails (no sink is touched) or a
	 *   sink rejects its unit (units before it stay written)
	 */
	compile(): EmittedUnit[] {
		const context = new CompilationContext(this.source, this.options.filename)
		const units = runPipeline(context)
		const resolve = this.resolver(units, context)

		const declarations = context.declarations ?? []
		units.forEach((unit, index) => {
			this.deliver(unit, resolve, declarations[index], context)
		})
		return units
	}

	private resolver(units: readonly EmittedUnit[], context: CompilationContext): SinkResolver {
		const target = this.target
		if (typeof target === 'function') return target

		if (isDirectoryTarget(target)) {
			return (name) => fileSink(join(target.directory, javaFileName(name)))
		}

		if (units.length > 1) {
			context.emit('EOEMIT002', 1, 1, { count: units.length })
			fail(context)
		}
		return () => target
	}

	private deliver(
		unit: EmittedUnit,
		resolve: SinkResolver,
		decl: ObjectDecl | undefined,
		context: CompilationContext
	): void {
		try {
			if (isDirectoryTarget(this.target)) {
				mkdirSync(this.target.directory, { recursive: true })
			}
			resolve(unit.name).write(unit.text)
		} catch (error) {
			context.emit('EOEMIT001', decl?.line ?? 1, decl?.column ?? 1, {
				name: unit.name,
				reason: describe(error),
			})
			fail(context, error)
		}
	}
}
