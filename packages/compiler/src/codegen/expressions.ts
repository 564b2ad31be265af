/**
 * Expression compiler: renders EO expressions as Java expression text.
 *
 * Every call becomes an object construction, whatever its name: `if`,
 * `plus` and the like are ordinary objects. A bare identifier resolves to a
 * stored field, a parameter in scope, or a no-argument construction, and the
 * outcome is recorded on the reference.
 */

import type { CallExpr, Expression, LiteralValue, ReferenceExpr } from '../core/ast.ts'
import type { CompilationContext } from '../core/context.ts'

/**
 * Names visible where an expression is compiled.
 */
export interface ExpressionScope {
	/** Stored attributes, reached through `this`. */
	readonly fields: ReadonlySet<string>
	/** Parameters in scope, used as plain locals. */
	readonly parameters: ReadonlySet<string>
	/**
	 * Set when compiling a default value: the slot it belongs to and the
	 * defaulted slots that have no value at that point.
	 */
	readonly defaultOf?: {
		readonly slot: string
		readonly unavailable: ReadonlySet<string>
	}
}

export const EMPTY_SCOPE: ExpressionScope = {
	fields: new Set(),
	parameters: new Set(),
}

const NUMBER = /^-?\d+(?:\.\d+)?$/
const INT_MIN = -(2n ** 31n)
const INT_MAX = 2n ** 31n - 1n
const LONG_MIN = -(2n ** 63n)
const LONG_MAX = 2n ** 63n - 1n

const JAVA_ESCAPES: ReadonlyMap<string, string> = new Map([
	['"', '\\"'],
	['\\', '\\\\'],
	['\b', '\\b'],
	['\f', '\\f'],
	['\n', '\\n'],
	['\r', '\\r'],
	['\t', '\\t'],
])

/**
 * Quotes a value as a Java string literal.
 */
export function javaString(value: string): string {
	let out = '"'
	for (const char of value) {
		const escaped = JAVA_ESCAPES.get(char)
		if (escaped !== undefined) {
			out += escaped
		} else if (char < ' ') {
			out += `\\u${char.charCodeAt(0).toString(16).padStart(4, '0')}`
		} else {
			out += char
		}
	}
	return `${out}"`
}

/**
 * Integers outside the `int` range need the `long` suffix and must fit a
 * `long`; fractions are `double` literals as written.
 */
function javaNumber(text: string): string | null {
	if (!NUMBER.test(text)) return null
	if (text.includes('.')) return text
	const value = BigInt(text)
	if (value < LONG_MIN || value > LONG_MAX) return null
	return value < INT_MIN || value > INT_MAX ? `${text}L` : text
}

function compileLiteral(
	literal: LiteralValue,
	node: Expression,
	context: CompilationContext
): string | null {
	switch (literal.kind) {
		case 'string':
			return javaString(literal.value)
		case 'boolean':
			return literal.value ? 'true' : 'false'
		case 'number': {
			const text = javaNumber(literal.text)
			if (text === null) {
				context.emitAtNode('EOEXPR002', node, { text: literal.text })
			}
			return text
		}
	}
}

function compileReference(
	expr: ReferenceExpr,
	scope: ExpressionScope,
	context: CompilationContext
): string | null {
	const defaultOf = scope.defaultOf
	if (defaultOf !== undefined && defaultOf.unavailable.has(expr.name)) {
		context.emitAtNode('EOEXPR003', expr, { name: expr.name, slot: defaultOf.slot })
		return null
	}
	if (scope.fields.has(expr.name)) {
		expr.binding = 'field'
		return `this.${expr.name}`
	}
	if (scope.parameters.has(expr.name)) {
		expr.binding = 'parameter'
		return expr.name
	}
	expr.binding = 'constructor'
	return `new ${expr.name}()`
}

function compileCall(
	expr: CallExpr,
	scope: ExpressionScope,
	context: CompilationContext
): string | null {
	if (expr.name.length === 0) {
		context.emitAtNode('EOEXPR001', expr)
		return null
	}

	const args: string[] = []
	for (const arg of expr.args) {
		const text = compileExpression(arg, scope, context)
		if (text === null) return null
		args.push(text)
	}
	return `new ${expr.name}(${args.join(', ')})`
}

/**
 * Renders an expression as Java text, or returns null after reporting the
 * first problem on the context.
 */
export function compileExpression(
	expr: Expression,
	scope: ExpressionScope,
	context: CompilationContext
): string | null {
	switch (expr.type) {
		case 'literal':
			return compileLiteral(expr.literal, expr, context)
		case 'reference':
			return compileReference(expr, scope, context)
		case 'call':
			return compileCall(expr, scope, context)
	}
}
