import type { CompilationContext } from '../core/context.ts'
import { KEYWORDS, type Token, TokenKind } from '../core/tokens.ts'

type IndentType = 'tab' | 'space'

export interface TokenizeResult {
	succeeded: boolean
}

interface ScannerState {
	lineNumber: number
	expectedIndentType: IndentType | null
	/** Widths of the open blocks, innermost last. Always starts with 0. */
	indentStack: number[]
	/** Open parentheses; line breaks inside them are layout only. */
	parenDepth: number
}

const UTF8_BOM = '\uFEFF'

const ESCAPES: ReadonlyMap<string, string> = new Map([
	['"', '"'],
	['\\', '\\'],
	['n', '\n'],
	['r', '\r'],
	['t', '\t'],
])

const PUNCTUATION: ReadonlyMap<string, TokenKind> = new Map<string, TokenKind>([
	[':=', TokenKind.Assign],
	[':', TokenKind.Colon],
	[',', TokenKind.Comma],
	['(', TokenKind.LeftParen],
	[')', TokenKind.RightParen],
	['@', TokenKind.At],
	['=', TokenKind.Equals],
])

const NUMBER_PATTERN = /^-?\d+(?:\.\d+)?/

function classifyWhitespace(char: string): IndentType | null {
	if (char === '\t') return 'tab'
	if (char === ' ') return 'space'
	return null
}

function pluralName(type: IndentType): string {
	return type === 'tab' ? 'tabs' : 'spaces'
}

function findWhitespaceEnd(line: string): number {
	let pos = 0
	while (pos < line.length && classifyWhitespace(line.charAt(pos)) !== null) {
		pos++
	}
	return pos
}

function detectMixedIndent(
	line: string,
	end: number
): { type: IndentType | null; mixedAt: number | null } {
	if (end === 0) return { mixedAt: null, type: null }

	const firstType = classifyWhitespace(line.charAt(0))
	for (let i = 1; i < end; i++) {
		if (classifyWhitespace(line.charAt(i)) !== firstType) {
			return { mixedAt: i + 1, type: firstType }
		}
	}
	return { mixedAt: null, type: firstType }
}

function isIdentifierStart(char: string): boolean {
	return /[A-Za-z_]/.test(char)
}

function isIdentifierPart(char: string): boolean {
	return /[A-Za-z0-9_]/.test(char)
}

function isDigit(char: string): boolean {
	return char >= '0' && char <= '9'
}

/** Blank and comment-only lines carry no tokens. */
function isBlank(content: string): boolean {
	const trimmed = content.trim()
	return trimmed.length === 0 || trimmed.startsWith('#')
}

/**
 * Checks the line's leading whitespace is all one character and matches the
 * character the file started with.
 */
function validateIndentType(
	line: string,
	count: number,
	state: ScannerState,
	context: CompilationContext
): boolean {
	const { type, mixedAt } = detectMixedIndent(line, count)
	if (type === null) return true

	if (mixedAt !== null) {
		context.emit('EOLEX001', state.lineNumber, mixedAt, { expected: pluralName(type) })
		return false
	}
	if (state.expectedIndentType === null) {
		state.expectedIndentType = type
		return true
	}
	if (type !== state.expectedIndentType) {
		context.emit('EOLEX005', state.lineNumber, 1, {
			expected: pluralName(state.expectedIndentType),
			found: pluralName(type),
		})
		return false
	}
	return true
}

/**
 * Compares the line's width against the indent stack.
 * Returns false on a dangling dedent.
 */
function* emitIndentation(
	width: number,
	state: ScannerState,
	context: CompilationContext
): Generator<Token, boolean> {
	const stack = state.indentStack
	const top = stack[stack.length - 1] ?? 0

	if (width > top) {
		stack.push(width)
		yield { column: 1, kind: TokenKind.Indent, line: state.lineNumber, payload: stack.length - 1 }
		return true
	}

	const validLevels = stack.join(', ')
	while (stack.length > 1 && width < (stack[stack.length - 1] ?? 0)) {
		stack.pop()
		yield { column: 1, kind: TokenKind.Dedent, line: state.lineNumber, payload: stack.length - 1 }
	}

	if (width !== stack[stack.length - 1]) {
		context.emit('EOLEX003', state.lineNumber, width + 1, { validLevels, width })
		return false
	}
	return true
}

/**
 * Reads a string literal starting at the opening quote.
 * Returns the decoded value and the index after the closing quote.
 */
function readString(
	line: string,
	start: number,
	state: ScannerState,
	context: CompilationContext
): { value: string; end: number } | null {
	let value = ''
	let pos = start + 1

	while (pos < line.length) {
		const char = line.charAt(pos)
		if (char === '"') {
			return { end: pos + 1, value }
		}
		if (char === '\\') {
			if (pos + 1 >= line.length) break
			const next = line.charAt(pos + 1)
			const escaped = ESCAPES.get(next)
			if (escaped === undefined) {
				context.emit('EOLEX006', state.lineNumber, pos + 1, { sequence: `\\${next}` })
				return null
			}
			value += escaped
			pos += 2
			continue
		}
		value += char
		pos++
	}

	context.emit('EOLEX002', state.lineNumber, start + 1)
	return null
}

function scanPunctuation(line: string, pos: number): { kind: TokenKind; length: number } | null {
	for (const [text, kind] of PUNCTUATION) {
		if (line.startsWith(text, pos)) return { kind, length: text.length }
	}
	return null
}

function trackParens(kind: TokenKind, state: ScannerState): void {
	if (kind === TokenKind.LeftParen) state.parenDepth++
	if (kind === TokenKind.RightParen && state.parenDepth > 0) state.parenDepth--
}

/**
 * Scans identifiers, literals and punctuation up to the end of the line or a
 * `#` comment. Returns false after reporting an error.
 */
function* scanContent(
	line: string,
	state: ScannerState,
	context: CompilationContext
): Generator<Token, boolean> {
	const lineNumber = state.lineNumber
	let pos = 0

	while (pos < line.length) {
		const char = line.charAt(pos)
		if (classifyWhitespace(char) !== null) {
			pos++
			continue
		}
		if (char === '#') break

		const column = pos + 1

		if (isIdentifierStart(char)) {
			let end = pos + 1
			while (end < line.length && isIdentifierPart(line.charAt(end))) end++
			const word = line.slice(pos, end)
			const keyword = KEYWORDS.get(word)
			yield keyword !== undefined
				? { column, kind: keyword, line: lineNumber, payload: 0 }
				: { column, kind: TokenKind.Identifier, line: lineNumber, payload: context.strings.intern(word) }
			pos = end
			continue
		}

		if (isDigit(char) || (char === '-' && isDigit(line.charAt(pos + 1)))) {
			const text = NUMBER_PATTERN.exec(line.slice(pos))?.[0] ?? char
			yield {
				column,
				kind: TokenKind.NumberLiteral,
				line: lineNumber,
				payload: context.strings.intern(text),
			}
			pos += text.length
			continue
		}

		if (char === '"') {
			const literal = readString(line, pos, state, context)
			if (literal === null) return false
			yield {
				column,
				kind: TokenKind.StringLiteral,
				line: lineNumber,
				payload: context.strings.intern(literal.value),
			}
			pos = literal.end
			continue
		}

		const punctuation = scanPunctuation(line, pos)
		if (punctuation !== null) {
			trackParens(punctuation.kind, state)
			yield { column, kind: punctuation.kind, line: lineNumber, payload: 0 }
			pos += punctuation.length
			continue
		}

		context.emit('EOLEX004', lineNumber, column, { char })
		return false
	}

	return true
}

function* scanLine(
	line: string,
	state: ScannerState,
	context: CompilationContext
): Generator<Token, boolean> {
	if (isBlank(line)) return true

	if (state.parenDepth === 0) {
		const width = findWhitespaceEnd(line)
		if (!validateIndentType(line, width, state, context)) return false
		if (!(yield* emitIndentation(width, state, context))) return false
	}

	if (!(yield* scanContent(line, state, context))) return false

	if (state.parenDepth === 0) {
		yield { column: line.length + 1, kind: TokenKind.Newline, line: state.lineNumber, payload: 0 }
	}
	return true
}

function* finishScan(state: ScannerState): Generator<Token> {
	while (state.indentStack.length > 1) {
		state.indentStack.pop()
		yield {
			column: 1,
			kind: TokenKind.Dedent,
			line: state.lineNumber,
			payload: state.indentStack.length - 1,
		}
	}
	yield { column: 1, kind: TokenKind.Eof, line: state.lineNumber, payload: 0 }
}

function stripBom(source: string): string {
	return source.startsWith(UTF8_BOM) ? source.slice(1) : source
}

function createScannerState(): ScannerState {
	return {
		expectedIndentType: null,
		indentStack: [0],
		lineNumber: 0,
		parenDepth: 0,
	}
}

/**
 * Lazily scans the context's source into tokens.
 *
 * Indentation becomes INDENT/DEDENT tokens through an explicit width stack;
 * each non-blank line outside parentheses ends with NEWLINE. The sequence
 * ends with EOF, or stops early after the first error is reported on the
 * context.
 */
export function* scan(context: CompilationContext): Generator<Token, void> {
	const state = createScannerState()
	const lines = stripBom(context.source).split('\n')

	for (let i = 0; i < lines.length; i++) {
		const line = lines[i]
		if (line === undefined) continue
		state.lineNumber = i + 1
		if (!(yield* scanLine(line.replace(/\r$/, ''), state, context))) return
	}

	yield* finishScan(state)
}

/**
 * Tokenizes source code, populating context.tokens.
 */
export function tokenize(context: CompilationContext): TokenizeResult {
	for (const token of scan(context)) {
		context.tokens.add(token)
	}
	return { succeeded: !context.hasErrors() }
}
