import { mkdir, readFile } from 'node:fs/promises'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import { type EmittedUnit, Program, type ProgramTarget, streamSink } from '@eoc/compiler'
import { formatCompileError, formatReadError, formatWriteError, resolveOutputPath } from '../utils.ts'

export default class BuildCommand extends BaseCommand {
	static override commandName = 'build'
	static override description = 'Compile an EO source file to Java, one file per declaration'

	@args.string({ description: 'Input .eo file to compile' })
	declare input: string

	@flags.string({ alias: 'o', description: 'Output directory (created if not exists)' })
	declare output?: string

	@flags.boolean({ description: 'Print the Java sources to stdout instead of writing files' })
	declare stdout: boolean

	@flags.boolean({ alias: 'q', description: 'Do not report written files' })
	declare quiet: boolean

	private async readSourceFile(): Promise<Uint8Array | null> {
		try {
			return await readFile(this.input)
		} catch (error: unknown) {
			this.logger.error(formatReadError(this.input, error))
			this.exitCode = 1
			return null
		}
	}

	private async prepareOutputDirectory(): Promise<boolean> {
		try {
			await mkdir(this.output ?? '.', { recursive: true })
			return true
		} catch (error: unknown) {
			this.logger.error(formatWriteError(error))
			this.exitCode = 1
			return false
		}
	}

	private target(): ProgramTarget {
		if (this.stdout) {
			const sink = streamSink(process.stdout)
			return () => sink
		}
		return { directory: this.output ?? '.' }
	}

	private compileSource(source: Uint8Array): EmittedUnit[] | null {
		try {
			return new Program(source, this.target(), { filename: this.input }).compile()
		} catch (error: unknown) {
			this.logger.error(formatCompileError(error))
			this.exitCode = 1
			return null
		}
	}

	private report(units: readonly EmittedUnit[]): void {
		if (this.quiet || this.stdout) return
		for (const unit of units) {
			this.logger.success(`Wrote ${resolveOutputPath(this.output, unit.name)}`)
		}
	}

	override async run(): Promise<void> {
		const source = await this.readSourceFile()
		if (source === null) return

		if (!this.stdout && !(await this.prepareOutputDirectory())) return

		const units = this.compileSource(source)
		if (units === null) return

		this.report(units)
	}
}
