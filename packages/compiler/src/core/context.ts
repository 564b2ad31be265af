/**
 * Unified compilation context that flows through all phases.
 * Contains the token store, the declaration tree and diagnostic collection.
 */

import type { ObjectDecl, SourceLocation } from './ast.ts'
import {
	type CompilerDiagnosticDef,
	type DiagnosticArgs,
	type DiagnosticCode,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
} from './diagnostics.ts'
import { type TokenId, TokenStore } from './tokens.ts'

export { DiagnosticSeverity } from './diagnostics.ts'

/**
 * A diagnostic message with location information.
 */
export interface Diagnostic {
	/** The diagnostic definition from the catalog */
	readonly def: CompilerDiagnosticDef
	/** Interpolated message with arguments applied */
	readonly message: string
	/** Line number (1-indexed) */
	readonly line: number
	/** Column number (1-indexed) */
	readonly column: number
	/** Template arguments used for message interpolation */
	readonly args?: DiagnosticArgs
	/** Token associated with this diagnostic (if available) */
	readonly tokenId?: TokenId
}

/**
 * Branded type for string IDs.
 * Used for identifier names and literal values interned in StringStore.
 */
export type StringId = number & { readonly __brand: 'StringId' }

export function stringId(n: number): StringId {
	return n as StringId
}

/**
 * Dense array storage for interned strings.
 * Same string always returns same ID.
 */
export class StringStore {
	private readonly strings: string[] = []
	private readonly stringToId: Map<string, StringId> = new Map()

	/** Intern a string, returning its ID. Same string always returns same ID. */
	intern(s: string): StringId {
		const existing = this.stringToId.get(s)
		if (existing !== undefined) return existing

		const id = stringId(this.strings.length)
		this.strings.push(s)
		this.stringToId.set(s, id)
		return id
	}

	get(id: StringId): string {
		const s = this.strings[id]
		if (s === undefined) throw new Error(`Invalid StringId: ${id}`)
		return s
	}

	count(): number {
		return this.strings.length
	}

	isValid(id: StringId): boolean {
		return id >= 0 && id < this.strings.length
	}
}

/**
 * The unified compilation context.
 * Passed through all compilation phases.
 *
 * Design principles:
 * - Append-only: phases add to stores, never rewrite previous phase data
 * - Centralized diagnostics: all errors collected in one place
 * - One context per compilation; nothing outlives it
 */
export class CompilationContext {
	/** Original source code */
	readonly source: string

	/** Source filename for error messages */
	readonly filename: string

	/** Interned strings for names and literal values (populated by tokenizer) */
	readonly strings: StringStore

	/** Token storage (populated by tokenizer) */
	readonly tokens: TokenStore

	/** Declaration tree (populated by parser) */
	declarations: ObjectDecl[] | null = null

	/** Collected diagnostics */
	private readonly diagnostics: Diagnostic[] = []

	/** Track if any errors have been reported */
	private errorCount = 0

	constructor(source: string, filename = '<input>') {
		this.source = source
		this.filename = filename
		this.strings = new StringStore()
		this.tokens = new TokenStore()
	}

	/**
	 * Emit a diagnostic by code at a specific location.
	 */
	emit(code: DiagnosticCode, line: number, column: number, args?: DiagnosticArgs): void {
		const def = getDiagnostic(code)
		const message = interpolateMessage(def.message, args)
		this.addDiagnostic({
			column,
			def,
			line,
			message,
			...(args ? { args } : {}),
		})
	}

	/**
	 * Emit a diagnostic by code at a token's location.
	 */
	emitAtToken(code: DiagnosticCode, tokenId: TokenId, args?: DiagnosticArgs): void {
		const token = this.tokens.get(tokenId)
		const def = getDiagnostic(code)
		const message = interpolateMessage(def.message, args)
		this.addDiagnostic({
			column: token.column,
			def,
			line: token.line,
			message,
			tokenId,
			...(args ? { args } : {}),
		})
	}

	/**
	 * Emit a diagnostic by code at a tree node's location.
	 */
	emitAtNode(code: DiagnosticCode, node: SourceLocation, args?: DiagnosticArgs): void {
		this.emit(code, node.line, node.column, args)
	}

	private addDiagnostic(diagnostic: Diagnostic): void {
		this.diagnostics.push(diagnostic)
		if (diagnostic.def.severity === DiagnosticSeverity.Error) {
			this.errorCount++
		}
	}

	// ===========================================================================
	// QUERY METHODS
	// ===========================================================================

	hasErrors(): boolean {
		return this.errorCount > 0
	}

	getErrorCount(): number {
		return this.errorCount
	}

	getDiagnostics(): readonly Diagnostic[] {
		return this.diagnostics
	}

	getErrors(): Diagnostic[] {
		return this.diagnostics.filter((d) => d.def.severity === DiagnosticSeverity.Error)
	}

	getSourceLine(line: number): string | undefined {
		const lines = this.source.split('\n')
		return lines[line - 1]?.replace(/\r$/, '')
	}

	// ===========================================================================
	// FORMATTING
	// ===========================================================================

	private getSeverityLabel(severity: DiagnosticSeverity): string {
		const labels: Record<DiagnosticSeverity, string> = {
			[DiagnosticSeverity.Error]: 'error',
			[DiagnosticSeverity.Warning]: 'warning',
			[DiagnosticSeverity.Note]: 'note',
		}
		return labels[severity]
	}

	private buildSourceContext(
		diagnostic: Diagnostic,
		sourceLine: string
	): { emptyPrefix: string; lines: string[] } {
		const lineNumWidth = String(diagnostic.line).length
		const pad = ' '.repeat(lineNumWidth)
		const linePrefix = ` ${diagnostic.line} | `
		const emptyPrefix = ` ${pad} | `
		const pointer = `${' '.repeat(Math.max(0, diagnostic.column - 1))}^`

		return {
			emptyPrefix,
			lines: [emptyPrefix, `${linePrefix}${sourceLine}`, `${emptyPrefix}${pointer}`],
		}
	}

	/**
	 * Format a diagnostic for display (Rust-style output).
	 *
	 * Example:
	 * ```
	 * error[EOLEX003]: unindent to 1 doesn't match any enclosing block
	 *   --> car.eo:4:2
	 *    |
	 *  4 |  String name():
	 *    |  ^
	 *    |
	 *    = help: Unindent to one of: 0, 2.
	 * ```
	 */
	formatDiagnostic(diagnostic: Diagnostic): string {
		const { def } = diagnostic
		const severityLabel = this.getSeverityLabel(def.severity)
		const header = `${severityLabel}[${def.code}]: ${diagnostic.message}`
		const location = `  --> ${this.filename}:${diagnostic.line}:${diagnostic.column}`

		const sourceLine = this.getSourceLine(diagnostic.line)
		if (sourceLine === undefined) {
			return `${header}\n${location}`
		}

		const { emptyPrefix, lines: contextLines } = this.buildSourceContext(diagnostic, sourceLine)
		const lines = [header, location, ...contextLines]

		if (def.suggestion) {
			const suggestion = interpolateMessage(def.suggestion, diagnostic.args)
			lines.push(emptyPrefix, `   = help: ${suggestion}`)
		}

		return lines.join('\n')
	}

	formatAllDiagnostics(): string {
		return this.diagnostics.map((d) => this.formatDiagnostic(d)).join('\n\n')
	}
}
