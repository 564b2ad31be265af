import type { Node } from 'ohm-js'
import type {
	AttributeMember,
	Expression,
	InterfaceRef,
	Member,
	MethodMember,
	ObjectDecl,
	Parameter,
	SourceLocation,
} from '../core/ast.ts'
import type { CompilationContext, StringId } from '../core/context.ts'
import { TOKEN_TEXT, type Token, type TokenId, TokenKind, tokenId } from '../core/tokens.ts'
import { EoGrammar, LAYOUT_TEXT } from '../grammar/index.ts'

export interface ParseResult {
	succeeded: boolean
	declarations?: ObjectDecl[]
}

/**
 * Rendered grammar input plus the offset at which each token starts.
 * Offsets ascend with token IDs, so lookups can binary search.
 */
interface RenderedTokens {
	text: string
	offsets: number[]
}

function tokenToOhmString(token: Token, context: CompilationContext): string {
	switch (token.kind) {
		case TokenKind.Indent:
			return LAYOUT_TEXT.indent
		case TokenKind.Dedent:
			return LAYOUT_TEXT.dedent
		case TokenKind.Newline:
			return LAYOUT_TEXT.newline
		case TokenKind.Eof:
			return ''
		case TokenKind.Identifier:
		case TokenKind.NumberLiteral:
			return context.strings.get(token.payload as StringId)
		case TokenKind.StringLiteral:
			return JSON.stringify(context.strings.get(token.payload as StringId))
		default:
			return TOKEN_TEXT[token.kind] ?? ''
	}
}

function generateNewlines(currentLine: number, targetLine: number): string {
	return '\n'.repeat(Math.max(0, targetLine - currentLine))
}

/**
 * Renders tokens for the grammar, keeping each token on its source line so
 * grammar line numbers match the source.
 */
function renderTokens(context: CompilationContext): RenderedTokens {
	const parts: string[] = []
	const offsets: number[] = []
	let offset = 0
	let currentLine = 1

	for (const [, token] of context.tokens) {
		const newlines = generateNewlines(currentLine, token.line)
		parts.push(newlines)
		offset += newlines.length
		currentLine = Math.max(currentLine, token.line)

		const str = tokenToOhmString(token, context)
		offsets.push(offset)
		parts.push(str, ' ')
		offset += str.length + 1
	}

	return { offsets, text: parts.join('') }
}

/**
 * First token starting at or after an input offset; the last token (EOF)
 * when the offset is past every token.
 */
function tokenIdAtOffset(rendered: RenderedTokens, offset: number): TokenId {
	let low = 0
	let high = rendered.offsets.length - 1
	while (low < high) {
		const mid = (low + high) >> 1
		if ((rendered.offsets[mid] ?? 0) < offset) {
			low = mid + 1
		} else {
			high = mid
		}
	}
	return tokenId(Math.max(0, low))
}

/**
 * Converts a 1-based grammar line/column to an input offset.
 */
function offsetOf(text: string, line: number, column: number): number {
	let offset = 0
	for (let l = 1; l < line; l++) {
		const next = text.indexOf('\n', offset)
		if (next === -1) break
		offset = next + 1
	}
	return offset + column - 1
}

function describeToken(token: Token, context: CompilationContext): string {
	switch (token.kind) {
		case TokenKind.Indent:
			return 'an indented block'
		case TokenKind.Dedent:
			return 'end of block'
		case TokenKind.Newline:
			return 'end of line'
		case TokenKind.Eof:
			return 'end of input'
		case TokenKind.StringLiteral:
			return 'a string'
		case TokenKind.Identifier:
		case TokenKind.NumberLiteral:
			return `'${context.strings.get(token.payload as StringId)}'`
		default:
			return `'${TOKEN_TEXT[token.kind] ?? ''}'`
	}
}

const SHORT_MESSAGE = /^Line (\d+), col (\d+): (.*)$/s

/**
 * Reports a failed match at the token where the grammar gave up.
 */
function reportFailure(
	context: CompilationContext,
	rendered: RenderedTokens,
	shortMessage: string | undefined
): void {
	const found = SHORT_MESSAGE.exec(shortMessage ?? '')
	const offset = found ? offsetOf(rendered.text, Number(found[1]), Number(found[2])) : 0
	const expected = found?.[3] ?? shortMessage ?? 'unexpected input'
	const id = tokenIdAtOffset(rendered, offset)
	const token = context.tokens.get(id)

	context.emitAtToken('EOPARSE001', id, {
		detail: `${expected}, found ${describeToken(token, context)}`,
	})
}

function createDeclarationSemantics(context: CompilationContext, rendered: RenderedTokens) {
	const semantics = EoGrammar.createSemantics()

	function tokenFor(node: Node): Token {
		return context.tokens.get(tokenIdAtOffset(rendered, node.source.startIdx))
	}

	function locate(node: Node): SourceLocation {
		const token = tokenFor(node)
		return { column: token.column, line: token.line }
	}

	function optional<T>(node: Node, operation: string): T | null {
		const child = node.children[0]
		return child !== undefined ? child[operation]() : null
	}

	semantics.addOperation<Expression>('toExpr', {
		booleanLit(keyword: Node) {
			return {
				...locate(this),
				literal: { kind: 'boolean', value: keyword.sourceString === 'true' },
				type: 'literal',
			}
		},
		Call(name: Node, _open: Node, args: Node, _close: Node) {
			return {
				...locate(this),
				args: args.asIteration().children.map((arg: Node): Expression => arg['toExpr']()),
				name: name.sourceString,
				type: 'call',
			}
		},
		Expr(expr: Node) {
			return expr['toExpr']()
		},
		ident(_start: Node, _rest: Node) {
			return { ...locate(this), binding: null, name: this.sourceString, type: 'reference' }
		},
		literal(literal: Node) {
			return literal['toExpr']()
		},
		numberLit(_sign: Node, _digits: Node, _dot: Node, _fraction: Node) {
			return { ...locate(this), literal: { kind: 'number', text: this.sourceString }, type: 'literal' }
		},
		stringLit(_open: Node, _chars: Node, _close: Node) {
			const token = tokenFor(this)
			return {
				...locate(this),
				literal: { kind: 'string', value: context.strings.get(token.payload as StringId) },
				type: 'literal',
			}
		},
	})

	semantics.addOperation<Expression>('toDefault', {
		AttributeDefault(_assign: Node, expr: Node) {
			return expr['toExpr']()
		},
		ParamDefault(_equals: Node, expr: Node) {
			return expr['toExpr']()
		},
	})

	semantics.addOperation<Expression | null>('toBody', {
		MethodTail_abstract(_newline: Node) {
			return null
		},
		MethodTail_body(_colon: Node, _nl: Node, _indent: Node, expr: Node, _nl2: Node, _dedent: Node) {
			return expr['toExpr']()
		},
	})

	semantics.addOperation<Parameter>('toParam', {
		Param(typeName: Node, name: Node, defaultValue: Node) {
			return {
				...locate(this),
				default: optional<Expression>(defaultValue, 'toDefault'),
				name: name.sourceString,
				typeName: typeName.sourceString,
			}
		},
	})

	semantics.addOperation<Member>('toMember', {
		Attribute_abstract(typeName: Node, name: Node, _newline: Node): AttributeMember {
			return {
				...locate(this),
				decorated: false,
				default: null,
				name: name.sourceString,
				type: 'attribute',
				typeName: typeName.sourceString,
			}
		},
		Attribute_stored(
			typeName: Node,
			_at: Node,
			name: Node,
			defaultValue: Node,
			_newline: Node
		): AttributeMember {
			return {
				...locate(this),
				decorated: true,
				default: optional<Expression>(defaultValue, 'toDefault'),
				name: name.sourceString,
				type: 'attribute',
				typeName: typeName.sourceString,
			}
		},
		Member(member: Node) {
			return member['toMember']()
		},
		Method(
			returnType: Node,
			name: Node,
			_open: Node,
			params: Node,
			_close: Node,
			tail: Node
		): MethodMember {
			return {
				...locate(this),
				body: tail['toBody'](),
				name: name.sourceString,
				parameters: params.asIteration().children.map((p: Node): Parameter => p['toParam']()),
				returnType: returnType.sourceString,
				type: 'method',
			}
		},
	})

	semantics.addOperation<InterfaceRef[]>('toInterfaces', {
		AsClause(_as: Node, names: Node) {
			return names.asIteration().children.map(
				(name: Node): InterfaceRef => ({ ...locate(name), name: name.sourceString })
			)
		},
	})

	semantics.addOperation<ObjectDecl>('toDecl', {
		ObjectDecl(
			_object: Node,
			name: Node,
			asClause: Node,
			_colon: Node,
			_newline: Node,
			_indent: Node,
			members: Node,
			_dedent: Node
		) {
			return {
				...locate(this),
				interfaces: optional<InterfaceRef[]>(asClause, 'toInterfaces') ?? [],
				kind: null,
				members: members.children.map((m: Node): Member => m['toMember']()),
				name: name.sourceString,
				type: 'object',
			}
		},
	})

	semantics.addOperation<ObjectDecl[]>('toDecls', {
		Program(decls: Node, _end: Node) {
			return decls.children.map((d: Node): ObjectDecl => d['toDecl']())
		},
	})

	return semantics
}

/** Deepest call nesting the parser accepts. */
export const MAX_CALL_DEPTH = 256

/**
 * The opening parenthesis that first exceeds MAX_CALL_DEPTH, if any.
 */
function findExcessiveNesting(context: CompilationContext): TokenId | null {
	let depth = 0
	for (const [id, token] of context.tokens) {
		if (token.kind === TokenKind.LeftParen && ++depth > MAX_CALL_DEPTH) return id
		if (token.kind === TokenKind.RightParen && depth > 0) depth--
	}
	return null
}

function reportTooDeep(context: CompilationContext, id: TokenId): ParseResult {
	context.emitAtToken('EOPARSE002', id, { limit: MAX_CALL_DEPTH })
	return { succeeded: false }
}

/**
 * Parses tokens from context.tokens into the declaration tree.
 * On the first grammar violation nothing is handed on: context.declarations
 * stays null and a single EOPARSE001 or EOPARSE002 diagnostic is reported.
 */
export function parse(context: CompilationContext): ParseResult {
	const tooDeep = findExcessiveNesting(context)
	if (tooDeep !== null) return reportTooDeep(context, tooDeep)

	const rendered = renderTokens(context)
	try {
		const matchResult = EoGrammar.match(rendered.text)

		if (matchResult.failed()) {
			reportFailure(context, rendered, matchResult.shortMessage)
			return { succeeded: false }
		}

		const semantics = createDeclarationSemantics(context, rendered)
		const declarations: ObjectDecl[] = semantics(matchResult)['toDecls']()
		context.declarations = declarations

		return { declarations, succeeded: true }
	} catch (error) {
		// Stack exhausted below the nesting cap
		if (!(error instanceof RangeError)) throw error
		return reportTooDeep(context, tokenId(0))
	}
}

export function matchOnly(context: CompilationContext): boolean {
	if (findExcessiveNesting(context) !== null) return false
	try {
		return EoGrammar.match(renderTokens(context).text).succeeded()
	} catch (error) {
		if (!(error instanceof RangeError)) throw error
		return false
	}
}
