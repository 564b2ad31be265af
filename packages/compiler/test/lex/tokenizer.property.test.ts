import { describe, it } from 'node:test'
import fc from 'fast-check'
import { CompilationContext } from '../../src/core/context.ts'
import { TokenKind, tokenId } from '../../src/core/tokens.ts'
import { tokenize } from '../../src/lex/tokenizer.ts'

function getTokenSequence(ctx: CompilationContext): Array<{ kind: number; line: number; column: number }> {
	const tokens: Array<{ kind: number; line: number; column: number }> = []
	for (const [, token] of ctx.tokens) {
		tokens.push({ column: token.column, kind: token.kind, line: token.line })
	}
	return tokens
}

// Lines built from EO-ish fragments at random indentation
const eoLikeSourceArb = fc
	.array(
		fc.tuple(
			fc.integer({ max: 3, min: 0 }),
			fc.constantFrom(
				'object a:',
				'object b as X, Y:',
				'Integer @n := 1',
				'String name():',
				'"text"',
				'plus(n, 1)',
				'f(a,',
				'b)',
				'# comment',
				''
			)
		),
		{ maxLength: 12 }
	)
	.map((lines) => lines.map(([depth, text]) => `${'  '.repeat(depth)}${text}`).join('\n'))

const inputArb = fc.oneof(fc.string(), eoLikeSourceArb)

describe('lex/tokenizer properties', () => {
	describe('safety properties', () => {
		it('never throws on arbitrary string input', () => {
			fc.assert(
				fc.property(inputArb, (input) => {
					const ctx = new CompilationContext(input)
					tokenize(ctx)
					return true
				}),
				{ numRuns: 1000 }
			)
		})

		it('ends with EOF exactly when scanning succeeds', () => {
			fc.assert(
				fc.property(inputArb, (input) => {
					const ctx = new CompilationContext(input)
					const result = tokenize(ctx)
					const count = ctx.tokens.count()
					const endsWithEof =
						count > 0 && ctx.tokens.get(tokenId(count - 1)).kind === TokenKind.Eof
					return result.succeeded === endsWithEof
				}),
				{ numRuns: 1000 }
			)
		})

		it('reports at most one error', () => {
			fc.assert(
				fc.property(inputArb, (input) => {
					const ctx = new CompilationContext(input)
					tokenize(ctx)
					return ctx.getErrorCount() <= 1
				}),
				{ numRuns: 500 }
			)
		})
	})

	describe('determinism properties', () => {
		it('same input always produces same token sequence', () => {
			fc.assert(
				fc.property(inputArb, (input) => {
					const ctx1 = new CompilationContext(input)
					const ctx2 = new CompilationContext(input)
					tokenize(ctx1)
					tokenize(ctx2)
					return JSON.stringify(getTokenSequence(ctx1)) === JSON.stringify(getTokenSequence(ctx2))
				}),
				{ numRuns: 1000 }
			)
		})
	})

	describe('structural properties', () => {
		it('every token has valid line and column (>= 1)', () => {
			fc.assert(
				fc.property(inputArb, (input) => {
					const ctx = new CompilationContext(input)
					tokenize(ctx)
					return getTokenSequence(ctx).every((t) => t.line >= 1 && t.column >= 1)
				}),
				{ numRuns: 1000 }
			)
		})

		it('token lines never decrease', () => {
			fc.assert(
				fc.property(inputArb, (input) => {
					const ctx = new CompilationContext(input)
					tokenize(ctx)
					const lines = getTokenSequence(ctx).map((t) => t.line)
					return lines.every((line, i) => i === 0 || line >= (lines[i - 1] ?? 0))
				}),
				{ numRuns: 1000 }
			)
		})

		it('balances INDENT and DEDENT on success', () => {
			fc.assert(
				fc.property(eoLikeSourceArb, (input) => {
					const ctx = new CompilationContext(input)
					if (!tokenize(ctx).succeeded) return true
					const kinds = getTokenSequence(ctx).map((t) => t.kind)
					const indents = kinds.filter((k) => k === TokenKind.Indent).length
					const dedents = kinds.filter((k) => k === TokenKind.Dedent).length
					return indents === dedents
				}),
				{ numRuns: 500 }
			)
		})

		it('never lets the open block count go negative', () => {
			fc.assert(
				fc.property(eoLikeSourceArb, (input) => {
					const ctx = new CompilationContext(input)
					tokenize(ctx)
					let depth = 0
					for (const { kind } of getTokenSequence(ctx)) {
						if (kind === TokenKind.Indent) depth++
						if (kind === TokenKind.Dedent) depth--
						if (depth < 0) return false
					}
					return true
				}),
				{ numRuns: 500 }
			)
		})
	})
})
