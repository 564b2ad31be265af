/**
 * EO Compiler Public API
 *
 * Compiles EO, an indentation-structured object notation, to Java source:
 * - Dense token storage with integer IDs (TokenStore, StringStore)
 * - A declaration tree built by an ohm-js grammar over the token stream
 * - Unified CompilationContext flowing through all phases
 */

export { type ClassifyResult, classify, deriveKind } from './check/index.ts'
export {
	compileExpression,
	EMPTY_SCOPE,
	type EmitResult,
	type EmittedUnit,
	type ExpressionScope,
	emit,
	JavaWriter,
	javaString,
	type UnitKind,
} from './codegen/index.ts'
export { type CompileOptions, compile, decodeSource } from './compile.ts'
export {
	type AttributeMember,
	type CallExpr,
	ClassificationError,
	CompilationContext,
	CompileError,
	type CompileStage,
	DeclKind,
	type Diagnostic,
	type DiagnosticCode,
	DiagnosticSeverity,
	EmitError,
	type Expression,
	ExpressionError,
	type InterfaceRef,
	LexError,
	type LiteralExpr,
	type LiteralValue,
	type Member,
	type MethodMember,
	methods,
	type ObjectDecl,
	type Parameter,
	ParseError,
	type ReferenceBinding,
	type ReferenceExpr,
	type SourceLocation,
	StageError,
	storedAttributes,
	type Token,
	type TokenId,
	TokenKind,
	TokenStore,
	tokenId,
} from './core/index.ts'
export { EoGrammar, grammarSource } from './grammar/index.ts'
export { scan, type TokenizeResult, tokenize } from './lex/index.ts'
export { matchOnly, type ParseResult, parse } from './parse/parser.ts'
export {
	type DirectoryTarget,
	JAVA_EXTENSION,
	javaFileName,
	Program,
	type ProgramTarget,
} from './program.ts'
export {
	discardSink,
	fileSink,
	type MemorySink,
	memorySink,
	type Sink,
	type SinkResolver,
	streamSink,
} from './sinks.ts'
