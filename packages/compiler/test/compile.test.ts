import assert from 'node:assert'
import { describe, it } from 'node:test'
import {
	ClassificationError,
	CompileError,
	compile,
	ExpressionError,
	LexError,
	ParseError,
} from '../src/index.ts'

const CAR = 'object car as Serializable:\n  Integer @vin\n  String name():\n    "Mercedes-Benz"'

const CAR_JAVA = [
	'public final class car implements Serializable {',
	'    private final Integer vin;',
	'',
	'    public car(final Integer vin) {',
	'        this.vin = vin;',
	'    }',
	'',
	'    public String name() {',
	'        return "Mercedes-Benz";',
	'    }',
	'}',
	'',
].join('\n')

const BOOK = 'object Book:\n  Text text()\n'
const BOOK_JAVA = 'public interface Book {\n    Text text();\n}\n'

function compileError(source: string, filename?: string): CompileError {
	try {
		compile(source, filename === undefined ? {} : { filename })
	} catch (error) {
		assert.ok(error instanceof CompileError, `expected CompileError, got ${String(error)}`)
		return error
	}
	assert.fail('expected compilation to fail')
}

describe('compile (unified API)', () => {
	describe('basic compilation', () => {
		it('should compile a class', () => {
			assert.deepStrictEqual(compile(CAR), [{ kind: 'class', name: 'car', text: CAR_JAVA }])
		})

		it('should compile an interface', () => {
			assert.deepStrictEqual(compile(BOOK), [{ kind: 'interface', name: 'Book', text: BOOK_JAVA }])
		})

		it('should compile sibling declarations in source order', () => {
			const units = compile(`${BOOK}${CAR}`)

			assert.deepStrictEqual(
				units.map((u) => u.name),
				['Book', 'car']
			)
			assert.strictEqual(units[0]?.text, BOOK_JAVA)
			assert.strictEqual(units[1]?.text, CAR_JAVA)
		})

		it('should compile an empty unit to nothing', () => {
			assert.deepStrictEqual(compile(''), [])
			assert.deepStrictEqual(compile('# only a comment\n'), [])
		})
	})

	describe('source forms', () => {
		it('should read UTF-8 bytes', () => {
			const bytes = new TextEncoder().encode(BOOK)
			assert.deepStrictEqual(compile(bytes), compile(BOOK))
		})

		it('should skip a byte order mark', () => {
			const bytes = new Uint8Array([0xef, 0xbb, 0xbf, ...new TextEncoder().encode(BOOK)])
			assert.strictEqual(compile(bytes)[0]?.text, BOOK_JAVA)
			assert.strictEqual(compile(`\uFEFF${BOOK}`)[0]?.text, BOOK_JAVA)
		})

		it('should accept CRLF line endings', () => {
			assert.strictEqual(compile('object Book:\r\n  Text text()\r\n')[0]?.text, BOOK_JAVA)
		})

		it('should accept tab indentation', () => {
			assert.strictEqual(compile('object Book:\n\tText text()\n')[0]?.text, BOOK_JAVA)
		})
	})

	describe('determinism', () => {
		it('should produce identical output for identical input', () => {
			const source = `${BOOK}${CAR}\nobject fibonacci:\n  Integer @n := 1\n  Integer value():\n    plus(n, 1)\n`
			assert.deepStrictEqual(compile(source), compile(source))
		})
	})

	describe('error handling', () => {
		it('should report prose as a parse error', () => {
			const error = compileError('This is just some prose about cars')

			assert.strictEqual(error.stage, 'parse')
			assert.strictEqual(error.code, 'EOPARSE001')
			assert.deepStrictEqual([error.line, error.column], [1, 1])
			assert.ok(error.stageError instanceof ParseError)
			assert.strictEqual(error.cause, error.stageError)
			assert.strictEqual(error.reason, error.stageError.message)
		})

		it('should format the report with the file name', () => {
			const error = compileError('This is just some prose about cars', 'prose.eo')
			const lines = error.message.split('\n')

			assert.ok(lines[0]?.startsWith('error[EOPARSE001]: syntax error: '))
			assert.strictEqual(lines[1], '  --> prose.eo:1:1')
			assert.strictEqual(lines[3], ' 1 | This is just some prose about cars')
			assert.strictEqual(lines[4], '   | ^')
		})

		it('should report an unterminated string as a lex error', () => {
			const error = compileError('object a:\n  T b():\n    "open\n')

			assert.strictEqual(error.code, 'EOLEX002')
			assert.ok(error.stageError instanceof LexError)
			assert.deepStrictEqual([error.line, error.column], [3, 5])
			assert.strictEqual(error.reason, 'unterminated string literal')
		})

		it('should report inconsistent indentation as a lex error', () => {
			const error = compileError('object a:\n  T x()\n\tT y()\n')

			assert.strictEqual(error.code, 'EOLEX005')
			assert.strictEqual(error.reason, 'expected spaces, found tabs')
		})

		it('should report a duplicate declaration as a classification error', () => {
			const error = compileError(`${BOOK}${BOOK}`)

			assert.strictEqual(error.code, 'EOCLASS001')
			assert.ok(error.stageError instanceof ClassificationError)
			assert.deepStrictEqual([error.line, error.column], [3, 1])
		})

		it('should report an unusable default as an expression error', () => {
			const error = compileError('object p:\n  Integer @x := y\n  Integer @y := 1\n')

			assert.strictEqual(error.stage, 'expression')
			assert.ok(error.stageError instanceof ExpressionError)
			assert.deepStrictEqual([error.line, error.column], [2, 17])
		})

		it('should compile calls nested 200 deep', () => {
			const source = `object nest:\n  T v():\n    ${'f('.repeat(200)}1${')'.repeat(200)}\n`
			assert.strictEqual(compile(source).length, 1)
		})

		it('should report calls nested beyond the limit as a parse error', () => {
			const error = compileError(`object nest:\n  T v():\n    ${'f('.repeat(1000)}1${')'.repeat(1000)}\n`)

			assert.strictEqual(error.code, 'EOPARSE002')
			assert.ok(error.stageError instanceof ParseError)
			assert.strictEqual(error.reason, 'calls nested deeper than 256 levels')
			assert.deepStrictEqual([error.line, error.column], [3, 518])
		})

		it('should report only the first problem', () => {
			const error = compileError('object a:\n  T @x\n  T f()\nobject a:\n  T g()\n')

			assert.strictEqual(error.code, 'EOCLASS010')
		})
	})
})
