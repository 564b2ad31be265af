import assert from 'node:assert'
import { describe, it } from 'node:test'
import { classify, deriveKind } from '../../src/check/classifier.ts'
import { DeclKind, type ObjectDecl } from '../../src/core/ast.ts'
import { CompilationContext } from '../../src/core/context.ts'
import { tokenize } from '../../src/lex/tokenizer.ts'
import { parse } from '../../src/parse/parser.ts'

function classifySource(source: string): { ctx: CompilationContext; succeeded: boolean } {
	const ctx = new CompilationContext(source)
	assert.strictEqual(tokenize(ctx).succeeded, true, 'fixture should tokenize')
	assert.strictEqual(parse(ctx).succeeded, true, ctx.formatAllDiagnostics())
	return { ctx, succeeded: classify(ctx).succeeded }
}

function kinds(source: string): Array<DeclKind | null> {
	const { ctx, succeeded } = classifySource(source)
	assert.strictEqual(succeeded, true, ctx.formatAllDiagnostics())
	return (ctx.declarations ?? []).map((decl) => decl.kind)
}

function classificationError(source: string): {
	code: string
	line: number
	column: number
	message: string
} {
	const { ctx, succeeded } = classifySource(source)
	assert.strictEqual(succeeded, false)
	const errors = ctx.getErrors()
	assert.strictEqual(errors.length, 1)
	const error = errors[0]
	assert.ok(error)
	assert.strictEqual(error.def.stage, 'classify')
	return { code: error.def.code, column: error.column, line: error.line, message: error.message }
}

describe('check/classifier', () => {
	describe('kind', () => {
		it('should classify a declaration with a stored attribute and a body as a class', () => {
			const source = 'object car as Serializable:\n  Integer @vin\n  String name():\n    "Mercedes-Benz"'
			assert.deepStrictEqual(kinds(source), [DeclKind.Class])
		})

		it('should classify signatures only as an interface', () => {
			assert.deepStrictEqual(kinds('object Book:\n  Text text()\n  Integer pages(Integer from)\n'), [
				DeclKind.Interface,
			])
		})

		it('should classify stored attributes without methods as a class', () => {
			const source = 'object zero as Number, Comparable:\n  Integer @a\n  Integer @b\n'
			assert.deepStrictEqual(kinds(source), [DeclKind.Class])
		})

		it('should classify methods with bodies and no attributes as a class', () => {
			assert.deepStrictEqual(kinds('object one:\n  Integer value():\n    1\n'), [DeclKind.Class])
		})

		it('should classify every sibling', () => {
			assert.deepStrictEqual(kinds('object A:\n  T x()\nobject b:\n  T @y\n'), [
				DeclKind.Interface,
				DeclKind.Class,
			])
		})
	})

	describe('deriveKind', () => {
		it('should derive kind without validating', () => {
			const decl: ObjectDecl = {
				column: 1,
				interfaces: [],
				kind: null,
				line: 1,
				members: [
					{ column: 3, decorated: false, default: null, line: 2, name: 'x', type: 'attribute', typeName: 'T' },
				],
				name: 'a',
				type: 'object',
			}
			assert.strictEqual(deriveKind(decl), DeclKind.Interface)
			assert.strictEqual(decl.kind, null)
		})
	})

	describe('names', () => {
		it('should reject a duplicate declaration name', () => {
			const error = classificationError('object a:\n  T x()\nobject a:\n  T y()\n')

			assert.deepStrictEqual(error, {
				code: 'EOCLASS001',
				column: 1,
				line: 3,
				message: "duplicate declaration 'a'",
			})
		})

		it('should reject an interface listed twice', () => {
			const error = classificationError('object a as X, X:\n  T x()\n')

			assert.deepStrictEqual(error, {
				code: 'EOCLASS003',
				column: 16,
				line: 1,
				message: "interface 'X' is listed twice in 'a'",
			})
		})

		it('should reject an interface name that is not an identifier', () => {
			const ctx = new CompilationContext('')
			ctx.declarations = [
				{
					column: 1,
					interfaces: [{ column: 13, line: 1, name: 'java.io.Serializable' }],
					kind: null,
					line: 1,
					members: [
						{ body: null, column: 3, line: 2, name: 'x', parameters: [], returnType: 'T', type: 'method' },
					],
					name: 'a',
					type: 'object',
				},
			]

			assert.strictEqual(classify(ctx).succeeded, false)
			assert.strictEqual(ctx.getErrors()[0]?.def.code, 'EOCLASS002')
			assert.strictEqual(
				ctx.getErrors()[0]?.message,
				"'java.io.Serializable' is not a valid interface name in 'a'"
			)
		})

		it('should reject a duplicate member', () => {
			const error = classificationError('object a:\n  T @x\n  T x():\n    y\n')

			assert.deepStrictEqual(error, {
				code: 'EOCLASS004',
				column: 3,
				line: 3,
				message: "duplicate member 'x' in 'a'",
			})
		})

		it('should reject a duplicate parameter', () => {
			const error = classificationError('object a:\n  T f(T p, T p)\n')

			assert.deepStrictEqual(error, {
				code: 'EOCLASS005',
				column: 12,
				line: 2,
				message: "duplicate parameter 'p' in 'a.f'",
			})
		})
	})

	describe('defaults', () => {
		it('should accept defaults on the trailing attributes', () => {
			assert.deepStrictEqual(kinds('object a:\n  T @x\n  T @y := 1\n  T @z := 2\n'), [DeclKind.Class])
		})

		it('should reject a required attribute after a defaulted one', () => {
			const error = classificationError('object a:\n  T @x := 1\n  T @y\n')

			assert.deepStrictEqual(error, {
				code: 'EOCLASS006',
				column: 3,
				line: 3,
				message: "'y' has no default but follows defaulted 'x' in the constructor of 'a'",
			})
		})

		it('should reject a required parameter after a defaulted one', () => {
			const error = classificationError('object a:\n  T f(T p = 1, T q)\n')

			assert.deepStrictEqual(error, {
				code: 'EOCLASS006',
				column: 16,
				line: 2,
				message: "'q' has no default but follows defaulted 'p' in 'a.f'",
			})
		})
	})

	describe('kind consistency', () => {
		it('should reject an attribute in an interface', () => {
			const error = classificationError('object Book:\n  Text text\n')

			assert.deepStrictEqual(error, {
				code: 'EOCLASS007',
				column: 3,
				line: 2,
				message: "attribute 'text' is not allowed in interface 'Book'",
			})
		})

		it('should reject an undecorated attribute in a class', () => {
			const error = classificationError('object a:\n  T @x\n  Text text\n')

			assert.deepStrictEqual(error, {
				code: 'EOCLASS008',
				column: 3,
				line: 3,
				message: "abstract attribute 'text' in class 'a'",
			})
		})

		it('should reject abstract and concrete methods together', () => {
			const error = classificationError('object a:\n  T f()\n  T g():\n    x\n')

			assert.deepStrictEqual(error, {
				code: 'EOCLASS009',
				column: 3,
				line: 2,
				message: "'a' mixes abstract method 'f' with concrete method 'g'",
			})
		})

		it('should reject an abstract method next to stored attributes', () => {
			const error = classificationError('object a:\n  T @x\n  T f()\n')

			assert.deepStrictEqual(error, {
				code: 'EOCLASS010',
				column: 3,
				line: 3,
				message: "'a' declares abstract method 'f' next to stored attribute 'x'",
			})
		})
	})

	describe('fail fast', () => {
		it('should stop at the first violation and leave later kinds unset', () => {
			const { ctx, succeeded } = classifySource(
				'object ok:\n  T x()\nobject bad:\n  T @y\n  T f()\nobject also:\n  T f(T p, T p)\n'
			)

			assert.strictEqual(succeeded, false)
			assert.strictEqual(ctx.getErrorCount(), 1)
			assert.deepStrictEqual(
				ctx.declarations?.map((d) => d.kind),
				[DeclKind.Interface, null, null]
			)
		})
	})
})
