/**
 * Emitter: renders each classified declaration as one Java compilation unit.
 *
 * Interfaces list their method signatures; a parameter default adds a
 * `default` method. Classes list fields, then constructors, then methods,
 * each group in source order.
 */

import {
	type AttributeMember,
	DeclKind,
	type MethodMember,
	methods,
	type ObjectDecl,
	type Parameter,
	storedAttributes,
} from '../core/ast.ts'
import type { CompilationContext } from '../core/context.ts'
import { compileExpression, type ExpressionScope } from './expressions.ts'
import { JavaWriter } from './writer.ts'

export {
	compileExpression,
	EMPTY_SCOPE,
	type ExpressionScope,
	javaString,
} from './expressions.ts'
export { JavaWriter } from './writer.ts'

export type UnitKind = 'interface' | 'class'

/**
 * One compiled declaration, ready for a sink.
 */
export interface EmittedUnit {
	readonly name: string
	readonly kind: UnitKind
	readonly text: string
}

export interface EmitResult {
	succeeded: boolean
	units: EmittedUnit[]
}

/** A constructor or method slot: a name, its type and an optional default. */
interface Slot {
	readonly name: string
	readonly typeName: string
	readonly default: AttributeMember['default']
}

/**
 * Splits slots at the first default. Classification guarantees every slot
 * after it is defaulted too.
 */
function splitDefaults(slots: readonly Slot[]): { required: Slot[]; defaulted: Slot[] } {
	const index = slots.findIndex((slot) => slot.default !== null)
	if (index === -1) return { defaulted: [], required: [...slots] }
	return { defaulted: slots.slice(index), required: slots.slice(0, index) }
}

function hasDefaults(slots: readonly Slot[]): boolean {
	return slots.some((slot) => slot.default !== null)
}

function formalList(slots: readonly Slot[]): string {
	return slots.map((slot) => `final ${slot.typeName} ${slot.name}`).join(', ')
}

/**
 * Arguments for delegating from a shortened signature: the required names
 * as passed, then each default compiled in the given scope.
 */
function delegationArgs(
	slots: readonly Slot[],
	fields: ReadonlySet<string>,
	context: CompilationContext
): string[] | null {
	const { required, defaulted } = splitDefaults(slots)
	const unavailable = new Set(defaulted.map((slot) => slot.name))
	const parameters = new Set(required.map((slot) => slot.name))
	const args = required.map((slot) => slot.name)

	for (const slot of defaulted) {
		if (slot.default === null) continue
		const scope: ExpressionScope = {
			defaultOf: { slot: slot.name, unavailable },
			fields,
			parameters,
		}
		const text = compileExpression(slot.default, scope, context)
		if (text === null) return null
		args.push(text)
	}
	return args
}

function implementsClause(decl: ObjectDecl, keyword: 'implements' | 'extends'): string {
	if (decl.interfaces.length === 0) return ''
	return ` ${keyword} ${decl.interfaces.map((ref) => ref.name).join(', ')}`
}

// =============================================================================
// INTERFACES
// =============================================================================

function emitDefaultMethod(
	method: MethodMember,
	out: JavaWriter,
	context: CompilationContext
): boolean {
	const args = delegationArgs(method.parameters, new Set(), context)
	if (args === null) return false

	const { required } = splitDefaults(method.parameters)
	out
		.blank()
		.open(`default ${method.returnType} ${method.name}(${formalList(required)})`)
		.line(`return this.${method.name}(${args.join(', ')});`)
		.close()
	return true
}

function emitInterface(decl: ObjectDecl, context: CompilationContext): string | null {
	const out = new JavaWriter()
	const all = methods(decl)

	out.open(`public interface ${decl.name}${implementsClause(decl, 'extends')}`)
	for (const method of all) {
		out.line(`${method.returnType} ${method.name}(${formalList(method.parameters)});`)
	}
	for (const method of all) {
		if (!hasDefaults(method.parameters)) continue
		if (!emitDefaultMethod(method, out, context)) return null
	}
	out.close()

	return out.toString()
}

// =============================================================================
// CLASSES
// =============================================================================

function emitFields(attributes: readonly AttributeMember[], out: JavaWriter): void {
	for (const attribute of attributes) {
		out.line(`private final ${attribute.typeName} ${attribute.name};`)
	}
}

/**
 * Secondary constructor taking only the attributes without a default and
 * delegating to the full constructor.
 */
function emitSecondaryConstructor(
	decl: ObjectDecl,
	attributes: readonly AttributeMember[],
	out: JavaWriter,
	context: CompilationContext
): boolean {
	// Fields are not readable before this(...) returns.
	const args = delegationArgs(attributes, new Set(), context)
	if (args === null) return false

	const { required } = splitDefaults(attributes)
	out
		.blank()
		.open(`public ${decl.name}(${formalList(required)})`)
		.line(`this(${args.join(', ')});`)
		.close()
	return true
}

function emitConstructor(
	decl: ObjectDecl,
	attributes: readonly AttributeMember[],
	out: JavaWriter
): void {
	out.blank().open(`public ${decl.name}(${formalList(attributes)})`)
	for (const attribute of attributes) {
		out.line(`this.${attribute.name} = ${attribute.name};`)
	}
	out.close()
}

function emitMethod(
	method: MethodMember,
	fields: ReadonlySet<string>,
	out: JavaWriter,
	context: CompilationContext
): boolean {
	if (method.body === null) return true

	const scope: ExpressionScope = {
		fields,
		parameters: new Set(method.parameters.map((param: Parameter) => param.name)),
	}
	const body = compileExpression(method.body, scope, context)
	if (body === null) return false

	out
		.blank()
		.open(`public ${method.returnType} ${method.name}(${formalList(method.parameters)})`)
		.line(`return ${body};`)
		.close()

	if (!hasDefaults(method.parameters)) return true

	const args = delegationArgs(method.parameters, fields, context)
	if (args === null) return false

	const { required } = splitDefaults(method.parameters)
	out
		.blank()
		.open(`public ${method.returnType} ${method.name}(${formalList(required)})`)
		.line(`return this.${method.name}(${args.join(', ')});`)
		.close()
	return true
}

function emitClass(decl: ObjectDecl, context: CompilationContext): string | null {
	const out = new JavaWriter()
	const attributes = storedAttributes(decl)
	const fields = new Set(attributes.map((attribute) => attribute.name))

	out.open(`public final class ${decl.name}${implementsClause(decl, 'implements')}`)
	emitFields(attributes, out)

	if (attributes.length > 0) {
		if (hasDefaults(attributes) && !emitSecondaryConstructor(decl, attributes, out, context)) {
			return null
		}
		emitConstructor(decl, attributes, out)
	}

	for (const method of methods(decl)) {
		if (!emitMethod(method, fields, out, context)) return null
	}
	out.close()

	return out.toString()
}

/**
 * Renders every classified declaration in context.declarations, in order.
 * Nothing is written anywhere; the units are returned in memory.
 */
export function emit(context: CompilationContext): EmitResult {
	const units: EmittedUnit[] = []

	for (const decl of context.declarations ?? []) {
		const isInterface = decl.kind === DeclKind.Interface
		const text = isInterface ? emitInterface(decl, context) : emitClass(decl, context)
		if (text === null) {
			return { succeeded: false, units: [] }
		}
		units.push({ kind: isInterface ? 'interface' : 'class', name: decl.name, text })
	}

	return { succeeded: true, units }
}
