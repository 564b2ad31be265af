const INDENT = '    '

/**
 * Line-oriented text builder for Java source.
 * Output uses four-space indentation and `\n` line endings.
 */
export class JavaWriter {
	private readonly lines: string[] = []
	private depth = 0

	line(text: string): this {
		this.lines.push(`${INDENT.repeat(this.depth)}${text}`)
		return this
	}

	/** Blank line between members; never doubled, never first in a block. */
	blank(): this {
		const last = this.lines[this.lines.length - 1]
		if (last !== undefined && last !== '' && !last.endsWith('{')) {
			this.lines.push('')
		}
		return this
	}

	open(header: string): this {
		this.line(`${header} {`)
		this.depth++
		return this
	}

	close(): this {
		if (this.depth === 0) {
			throw new Error('JavaWriter: close() without a matching open()')
		}
		this.depth--
		return this.line('}')
	}

	/** Complete text with a trailing newline. */
	toString(): string {
		if (this.depth !== 0) {
			throw new Error(`JavaWriter: ${this.depth} block(s) left open`)
		}
		return `${this.lines.join('\n')}\n`
	}
}
