/**
 * Declaration tree produced by the parser.
 *
 * The tree is owned by one compilation. After parsing, only two things
 * change in place: the classifier sets `ObjectDecl.kind`, and the expression
 * compiler sets `ReferenceExpr.binding`.
 */

/**
 * Position of the first token of a node (1-indexed).
 */
export interface SourceLocation {
	readonly line: number
	readonly column: number
}

/**
 * Derived interface-vs-class classification of a declaration.
 */
export const DeclKind = {
	Class: 1,
	Interface: 0,
} as const

export type DeclKind = (typeof DeclKind)[keyof typeof DeclKind]

// =============================================================================
// EXPRESSIONS
// =============================================================================

export type LiteralValue =
	| { readonly kind: 'string'; readonly value: string }
	| { readonly kind: 'number'; readonly text: string }
	| { readonly kind: 'boolean'; readonly value: boolean }

export interface LiteralExpr extends SourceLocation {
	readonly type: 'literal'
	readonly literal: LiteralValue
}

/**
 * What a bare identifier turned out to mean:
 * - field: a stored attribute of the enclosing declaration
 * - parameter: a parameter in scope at that point
 * - constructor: anything else, constructed with no arguments
 */
export type ReferenceBinding = 'field' | 'parameter' | 'constructor'

export interface ReferenceExpr extends SourceLocation {
	readonly type: 'reference'
	readonly name: string
	binding: ReferenceBinding | null
}

/**
 * Function application; compiles to object construction.
 */
export interface CallExpr extends SourceLocation {
	readonly type: 'call'
	readonly name: string
	readonly args: readonly Expression[]
}

export type Expression = LiteralExpr | ReferenceExpr | CallExpr

// =============================================================================
// MEMBERS
// =============================================================================

export interface AttributeMember extends SourceLocation {
	readonly type: 'attribute'
	readonly typeName: string
	readonly name: string
	/** Marked with `@`: a stored field rather than a signature-only value. */
	readonly decorated: boolean
	readonly default: Expression | null
}

export interface Parameter extends SourceLocation {
	readonly typeName: string
	readonly name: string
	readonly default: Expression | null
}

export interface MethodMember extends SourceLocation {
	readonly type: 'method'
	readonly returnType: string
	readonly name: string
	readonly parameters: readonly Parameter[]
	/** Absent for abstract methods. */
	readonly body: Expression | null
}

export type Member = AttributeMember | MethodMember

// =============================================================================
// DECLARATIONS
// =============================================================================

export interface InterfaceRef extends SourceLocation {
	readonly name: string
}

export interface ObjectDecl extends SourceLocation {
	readonly type: 'object'
	readonly name: string
	readonly interfaces: readonly InterfaceRef[]
	readonly members: readonly Member[]
	/** Set by the classifier. */
	kind: DeclKind | null
}

/**
 * Decorated attributes in source order: the fields and constructor parameters.
 */
export function storedAttributes(decl: ObjectDecl): AttributeMember[] {
	return decl.members.filter(
		(member): member is AttributeMember => member.type === 'attribute' && member.decorated
	)
}

export function methods(decl: ObjectDecl): MethodMember[] {
	return decl.members.filter((member): member is MethodMember => member.type === 'method')
}
