/**
 * Output sinks. A sink receives the complete text of one compilation unit.
 */

import { writeFileSync } from 'node:fs'
import type { Writable } from 'node:stream'

export interface Sink {
	write(text: string): void
}

/**
 * Maps a declaration name to the sink that receives its unit.
 */
export type SinkResolver = (name: string) => Sink

export interface MemorySink extends Sink {
	/** Every text written, in order. */
	readonly writes: readonly string[]
	/** All writes concatenated. */
	text(): string
}

export function memorySink(): MemorySink {
	const writes: string[] = []
	return {
		text: () => writes.join(''),
		write(text) {
			writes.push(text)
		},
		writes,
	}
}

/**
 * Forwards each unit to a writable stream. The stream stays open.
 *
 * A stream that has ended, been destroyed or failed rejects the write by
 * throwing. A failure the stream reports later through its `'error'` event
 * is kept and thrown by the next write.
 */
export function streamSink(stream: Writable): Sink {
	let failure: Error | null = null
	stream.on('error', (error: Error) => {
		failure = error
	})

	return {
		write(text) {
			const error = failure ?? stream.errored
			if (error) throw error
			if (stream.writableEnded || stream.destroyed) {
				throw new Error('stream is no longer writable')
			}
			stream.write(text)
		},
	}
}

export function discardSink(): Sink {
	return {
		write() {},
	}
}

/**
 * Writes the unit to a file, replacing any previous content.
 */
export function fileSink(path: string): Sink {
	return {
		write(text) {
			writeFileSync(path, text, 'utf8')
		},
	}
}
