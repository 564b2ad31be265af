/**
 * Core data structures for the EO compiler.
 */

export {
	type AttributeMember,
	type CallExpr,
	DeclKind,
	type Expression,
	type InterfaceRef,
	type LiteralExpr,
	type LiteralValue,
	type Member,
	type MethodMember,
	methods,
	type ObjectDecl,
	type Parameter,
	type ReferenceBinding,
	type ReferenceExpr,
	type SourceLocation,
	storedAttributes,
} from './ast.ts'
export {
	CompilationContext,
	type Diagnostic,
	type StringId,
	StringStore,
	stringId,
} from './context.ts'
export {
	COMPILER_DIAGNOSTICS,
	type CompileStage,
	type DiagnosticArgs,
	type DiagnosticCode,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
	isValidDiagnosticCode,
} from './diagnostics.ts'
export {
	ClassificationError,
	CompileError,
	createStageError,
	EmitError,
	ExpressionError,
	LexError,
	ParseError,
	StageError,
} from './errors.ts'
export { type Token, type TokenId, TokenKind, TokenStore, tokenId } from './tokens.ts'
