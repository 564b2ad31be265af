import assert from 'node:assert'
import { join } from 'node:path'
import { describe, it } from 'node:test'
import { CompileError, compile } from '@eoc/compiler'
import {
	formatCompileError,
	formatReadError,
	formatWriteError,
	getErrorMessage,
	isNodeError,
	resolveOutputPath,
} from '../src/utils.ts'

function errnoError(message: string, code: string): NodeJS.ErrnoException {
	const error = new Error(message) as NodeJS.ErrnoException
	error.code = code
	return error
}

describe('isNodeError', () => {
	it('should return true for Error with code property', () => {
		assert.strictEqual(isNodeError(errnoError('test', 'ENOENT')), true)
	})

	it('should return false for plain Error', () => {
		assert.strictEqual(isNodeError(new Error('test')), false)
	})

	it('should return false for non-Error', () => {
		assert.strictEqual(isNodeError('string'), false)
		assert.strictEqual(isNodeError(null), false)
		assert.strictEqual(isNodeError(undefined), false)
		assert.strictEqual(isNodeError(42), false)
	})
})

describe('getErrorMessage', () => {
	it('should extract message from Error', () => {
		assert.strictEqual(getErrorMessage(new Error('test message')), 'test message')
	})

	it('should convert non-Error to string', () => {
		assert.strictEqual(getErrorMessage('string error'), 'string error')
		assert.strictEqual(getErrorMessage(42), '42')
		assert.strictEqual(getErrorMessage(null), 'null')
	})
})

describe('formatReadError', () => {
	it('should report a missing file with its path', () => {
		const error = errnoError('no such file', 'ENOENT')
		assert.strictEqual(formatReadError('/path/to/car.eo', error), '[EOCLI001] file not found: /path/to/car.eo')
	})

	it('should report other read failures with their reason', () => {
		const error = errnoError('permission denied', 'EACCES')
		assert.strictEqual(formatReadError('/path/to/car.eo', error), '[EOCLI002] cannot read file: permission denied')
	})

	it('should handle non-Error values', () => {
		assert.strictEqual(formatReadError('/path', 'odd failure'), '[EOCLI002] cannot read file: odd failure')
	})
})

describe('formatWriteError', () => {
	it('should report the reason', () => {
		const error = errnoError('read-only file system', 'EROFS')
		assert.strictEqual(formatWriteError(error), '[EOCLI003] cannot write output: read-only file system')
	})
})

describe('formatCompileError', () => {
	it('should pass the formatted report of a CompileError through', () => {
		let caught: unknown
		try {
			compile('object car\n', { filename: 'car.eo' })
		} catch (error) {
			caught = error
		}

		assert.ok(caught instanceof CompileError)
		assert.strictEqual(formatCompileError(caught), caught.message)
		assert.ok(formatCompileError(caught).startsWith('error[EOPARSE001]: '))
	})

	it('should wrap anything else', () => {
		assert.strictEqual(formatCompileError(new Error('boom')), '[EOCLI004] compilation failed: boom')
	})
})

describe('resolveOutputPath', () => {
	it('should place the unit in the output directory', () => {
		assert.strictEqual(resolveOutputPath('/out/java', 'car'), join('/out/java', 'car.java'))
	})

	it('should default to the current directory', () => {
		assert.strictEqual(resolveOutputPath(undefined, 'Book'), 'Book.java')
	})
})
