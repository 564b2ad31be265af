/**
 * Classifier: decides whether each declaration is an interface or a class
 * and rejects declarations whose shape fits neither.
 *
 * Rules run per declaration in source order:
 * - declaration names are unique within the unit
 * - "as" names are valid identifiers and listed once
 * - member names are unique; parameter names are unique per method
 * - defaults form a trailing suffix
 * - members agree with the derived kind
 */

import {
	type AttributeMember,
	DeclKind,
	type Expression,
	type MethodMember,
	methods,
	type ObjectDecl,
	type SourceLocation,
	storedAttributes,
} from '../core/ast.ts'
import type { CompilationContext } from '../core/context.ts'

export interface ClassifyResult {
	succeeded: boolean
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/
const RESERVED = new Set(['as', 'false', 'object', 'true'])

function isValidIdentifier(name: string): boolean {
	return IDENTIFIER.test(name) && !RESERVED.has(name)
}

/**
 * Derived kind: a declaration with no stored attribute and no method body
 * declares only signatures.
 */
export function deriveKind(decl: ObjectDecl): DeclKind {
	const hasStored = storedAttributes(decl).length > 0
	const hasBody = methods(decl).some((method) => method.body !== null)
	return hasStored || hasBody ? DeclKind.Class : DeclKind.Interface
}

function checkUniqueName(
	decl: ObjectDecl,
	seen: Map<string, ObjectDecl>,
	context: CompilationContext
): boolean {
	const first = seen.get(decl.name)
	if (first !== undefined) {
		context.emitAtNode('EOCLASS001', decl, { line: first.line, name: decl.name })
		return false
	}
	seen.set(decl.name, decl)
	return true
}

function checkInterfaces(decl: ObjectDecl, context: CompilationContext): boolean {
	const listed = new Set<string>()
	for (const ref of decl.interfaces) {
		if (!isValidIdentifier(ref.name)) {
			context.emitAtNode('EOCLASS002', ref, { interface: ref.name, name: decl.name })
			return false
		}
		if (listed.has(ref.name)) {
			context.emitAtNode('EOCLASS003', ref, { interface: ref.name, name: decl.name })
			return false
		}
		listed.add(ref.name)
	}
	return true
}

function checkUniqueParameters(
	decl: ObjectDecl,
	method: MethodMember,
	context: CompilationContext
): boolean {
	const names = new Set<string>()
	for (const param of method.parameters) {
		if (names.has(param.name)) {
			context.emitAtNode('EOCLASS005', param, {
				method: method.name,
				name: decl.name,
				param: param.name,
			})
			return false
		}
		names.add(param.name)
	}
	return true
}

function checkUniqueMembers(decl: ObjectDecl, context: CompilationContext): boolean {
	const names = new Set<string>()
	for (const member of decl.members) {
		if (names.has(member.name)) {
			context.emitAtNode('EOCLASS004', member, { member: member.name, name: decl.name })
			return false
		}
		names.add(member.name)
		if (member.type === 'method' && !checkUniqueParameters(decl, member, context)) {
			return false
		}
	}
	return true
}

interface Slot extends SourceLocation {
	readonly name: string
	readonly default: Expression | null
}

/**
 * Once a slot carries a default, every later slot must carry one too.
 */
function checkTrailingDefaults(
	slots: readonly Slot[],
	where: string,
	context: CompilationContext
): boolean {
	let defaulted: Slot | null = null
	for (const slot of slots) {
		if (slot.default !== null) {
			defaulted ??= slot
			continue
		}
		if (defaulted !== null) {
			context.emitAtNode('EOCLASS006', slot, { defaulted: defaulted.name, slot: slot.name, where })
			return false
		}
	}
	return true
}

function checkDefaults(decl: ObjectDecl, context: CompilationContext): boolean {
	if (!checkTrailingDefaults(storedAttributes(decl), `the constructor of '${decl.name}'`, context)) {
		return false
	}
	return methods(decl).every((method) =>
		checkTrailingDefaults(method.parameters, `'${decl.name}.${method.name}'`, context)
	)
}

function checkUndecorated(
	decl: ObjectDecl,
	kind: DeclKind,
	context: CompilationContext
): boolean {
	const undecorated = decl.members.find(
		(member): member is AttributeMember => member.type === 'attribute' && !member.decorated
	)
	if (undecorated === undefined) return true

	const code = kind === DeclKind.Interface ? 'EOCLASS007' : 'EOCLASS008'
	context.emitAtNode(code, undecorated, {
		member: undecorated.name,
		name: decl.name,
		type: undecorated.typeName,
	})
	return false
}

function checkMethodKinds(decl: ObjectDecl, context: CompilationContext): boolean {
	const all = methods(decl)
	const abstract = all.find((method) => method.body === null)
	if (abstract === undefined) return true

	const concrete = all.find((method) => method.body !== null)
	if (concrete !== undefined) {
		context.emitAtNode('EOCLASS009', abstract, {
			abstract: abstract.name,
			concrete: concrete.name,
			name: decl.name,
		})
		return false
	}

	const attribute = storedAttributes(decl)[0]
	if (attribute !== undefined) {
		context.emitAtNode('EOCLASS010', abstract, {
			abstract: abstract.name,
			attribute: attribute.name,
			name: decl.name,
		})
		return false
	}
	return true
}

function classifyDeclaration(
	decl: ObjectDecl,
	seen: Map<string, ObjectDecl>,
	context: CompilationContext
): boolean {
	if (!checkUniqueName(decl, seen, context)) return false
	if (!checkInterfaces(decl, context)) return false
	if (!checkUniqueMembers(decl, context)) return false
	if (!checkDefaults(decl, context)) return false

	const kind = deriveKind(decl)
	if (!checkUndecorated(decl, kind, context)) return false
	if (!checkMethodKinds(decl, context)) return false

	decl.kind = kind
	return true
}

/**
 * Annotates every declaration in context.declarations with its kind.
 * Stops at the first violation.
 */
export function classify(context: CompilationContext): ClassifyResult {
	const declarations = context.declarations ?? []
	const seen = new Map<string, ObjectDecl>()

	for (const decl of declarations) {
		if (!classifyDeclaration(decl, seen, context)) {
			return { succeeded: false }
		}
	}
	return { succeeded: true }
}
