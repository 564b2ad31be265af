/**
 * Token storage using dense arrays with integer IDs.
 */

/** Token kinds - small integer discriminant. */
export const TokenKind = {
	As: 11,
	Assign: 8,
	At: 7,
	Colon: 3,
	Comma: 4,
	Dedent: 1,

	// Special (255)
	Eof: 255,
	Equals: 9,
	False: 13,

	// Identifiers and literals (100-199)
	Identifier: 100,
	// Structural tokens (0-9)
	Indent: 0,
	LeftParen: 5,
	Newline: 2,
	NumberLiteral: 102,

	// Keywords (10-99)
	Object: 10,
	RightParen: 6,
	StringLiteral: 101,
	True: 12,
} as const

export type TokenKind = (typeof TokenKind)[keyof typeof TokenKind]

export type TokenId = number & { readonly __brand: 'TokenId' }

export function tokenId(n: number): TokenId {
	return n as TokenId
}

/**
 * A single token - fixed size, no pointers.
 * Payload meaning depends on kind:
 * - Indent/Dedent: indent level after the token
 * - Identifier: StringId of the name
 * - StringLiteral: StringId of the decoded value
 * - NumberLiteral: StringId of the literal text
 * - everything else: 0
 */
export interface Token {
	readonly kind: TokenKind
	readonly line: number
	readonly column: number
	readonly payload: number
}

/**
 * Dense array storage for tokens.
 * Append-only during tokenization phase.
 */
export class TokenStore {
	private readonly tokens: Token[] = []

	add(token: Token): TokenId {
		const id = this.tokens.length as TokenId
		this.tokens.push(token)
		return id
	}

	get(id: TokenId): Token {
		const token = this.tokens[id]
		if (token === undefined) {
			throw new Error(`Invalid TokenId: ${id}`)
		}
		return token
	}

	count(): number {
		return this.tokens.length
	}

	isValid(id: TokenId): boolean {
		return id >= 0 && id < this.tokens.length
	}

	*[Symbol.iterator](): Generator<[TokenId, Token]> {
		for (let i = 0; i < this.tokens.length; i++) {
			const token = this.tokens[i]
			if (token !== undefined) yield [i as TokenId, token]
		}
	}
}

/**
 * Fixed spellings of punctuation and keyword tokens.
 */
export const TOKEN_TEXT: Partial<Record<TokenKind, string>> = {
	[TokenKind.As]: 'as',
	[TokenKind.Assign]: ':=',
	[TokenKind.At]: '@',
	[TokenKind.Colon]: ':',
	[TokenKind.Comma]: ',',
	[TokenKind.Equals]: '=',
	[TokenKind.False]: 'false',
	[TokenKind.LeftParen]: '(',
	[TokenKind.Object]: 'object',
	[TokenKind.RightParen]: ')',
	[TokenKind.True]: 'true',
}

/**
 * Keyword spellings, looked up when an identifier is scanned.
 */
export const KEYWORDS: ReadonlyMap<string, TokenKind> = new Map<string, TokenKind>([
	['as', TokenKind.As],
	['false', TokenKind.False],
	['object', TokenKind.Object],
	['true', TokenKind.True],
])
