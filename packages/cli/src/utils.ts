import { join } from 'node:path'
import { CompileError, javaFileName } from '@eoc/compiler'
import {
	type DiagnosticDef,
	EOCLI001,
	EOCLI002,
	EOCLI003,
	EOCLI004,
	interpolateMessage,
} from '@eoc/diagnostics'

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

function formatCliDiagnostic(def: DiagnosticDef, args: Record<string, string>): string {
	return `[${def.code}] ${interpolateMessage(def.message, args)}`
}

export function formatReadError(filePath: string, error: unknown): string {
	if (isNodeError(error) && error.code === 'ENOENT') {
		return formatCliDiagnostic(EOCLI001, { path: filePath })
	}
	return formatCliDiagnostic(EOCLI002, { reason: getErrorMessage(error) })
}

export function formatWriteError(error: unknown): string {
	return formatCliDiagnostic(EOCLI003, { reason: getErrorMessage(error) })
}

/**
 * A CompileError already carries its formatted report; anything else is
 * unexpected and gets the generic message.
 */
export function formatCompileError(error: unknown): string {
	if (error instanceof CompileError) {
		return error.message
	}
	return formatCliDiagnostic(EOCLI004, { reason: getErrorMessage(error) })
}

export function resolveOutputPath(outputDir: string | undefined, name: string): string {
	return join(outputDir ?? '.', javaFileName(name))
}
