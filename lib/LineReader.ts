/**
 * @copyright Sister Software
 * @license AGPL-3.0
 * @author Teffen Ellis, et al.
 */

import { TextDecoder } from "node:util"
import { CharacterSequence, CharacterSequenceInput, Delimiters } from "./CharacterSequence.js"
import { createChunkIterator } from "./node/fs.js"
import { AsyncChunkIterator, DEFAULT_HIGH_WATER_MARK, isAsyncChunkIterator, LineSource } from "./shared.js"

/**
 * A decoded line, along with how many raw bytes it occupied in the source.
 */
export interface DelimitedLine {
	/**
	 * The decoded line, without its terminator.
	 */
	text: string

	/**
	 * The byte length of the line in the source, terminator included.
	 */
	byteLength: number

	/**
	 * The zero-based position of the line in the source.
	 */
	index: number
}

export interface LineReaderInit {
	/**
	 * The sequence which ends a line. When omitted, a line ends at LF, CRLF or a lone CR.
	 *
	 * A carriage return left before the delimiter is dropped from the decoded text.
	 */
	delimiter?: CharacterSequenceInput

	/**
	 * The encoding to use when decoding each line. Invalid sequences are replaced with U+FFFD.
	 *
	 * @default "utf-8"
	 */
	encoding?: string

	/**
	 * The maximum number of lines to yield.
	 *
	 * @default Infinity
	 */
	take?: number

	/**
	 * The buffer chunk size to read from a file, i.e. the high-water mark for the file read.
	 *
	 * @default 64 KiB
	 */
	highWaterMark?: number
}

function concatBytes(head: Uint8Array, tail: Uint8Array): Uint8Array {
	const merged = new Uint8Array(head.byteLength + tail.byteLength)

	merged.set(head)
	merged.set(tail, head.byteLength)

	return merged
}

function joinBytes(parts: readonly Uint8Array[], byteLength: number): Uint8Array {
	if (parts.length === 1 && parts[0]) return parts[0]

	const joined = new Uint8Array(byteLength)
	let offset = 0

	for (const part of parts) {
		joined.set(part, offset)
		offset += part.byteLength
	}

	return joined
}

/**
 * The position and length of a line terminator within a buffer.
 */
type TerminatorMatch = [start: number, length: number]

/**
 * Find the next universal line terminator: LF, CRLF or a lone CR.
 *
 * A CR in the last byte is left undecided, since the next chunk may begin with its LF.
 */
function findUniversalTerminator(buffer: Uint8Array, from: number): TerminatorMatch | undefined {
	for (let idx = from; idx < buffer.byteLength; idx++) {
		const byte = buffer[idx]

		if (byte === Delimiters.LineFeed) return [idx, 1]
		if (byte !== Delimiters.CarriageReturn) continue
		if (idx + 1 === buffer.byteLength) return undefined

		return [idx, buffer[idx + 1] === Delimiters.LineFeed ? 2 : 1]
	}

	return undefined
}

/**
 * An asynchronous iterator over the lines of a byte stream.
 *
 * Only the current, incomplete line is buffered, so memory use is bounded by the longest line
 * rather than the size of the source.
 *
 * ```ts
 * const lines = await LineReader.fromAsync("people.txt")
 *
 * for await (const { text } of lines) {
 * 	console.log(text)
 * }
 * ```
 */
export class LineReader implements AsyncIterable<DelimitedLine> {
	/**
	 * Create a line iterator from a file path or an existing byte stream.
	 *
	 * Files are opened eagerly, so a missing or unreadable file rejects here rather than mid-read.
	 */
	static async fromAsync(source: LineSource, init: LineReaderInit = {}): Promise<LineReader> {
		const chunkIterator = isAsyncChunkIterator(source)
			? source
			: await createChunkIterator(source, {
					highWaterMark: init.highWaterMark ?? DEFAULT_HIGH_WATER_MARK,
				})

		return new LineReader(chunkIterator, init)
	}

	readonly #source: AsyncChunkIterator
	readonly #needle: CharacterSequence | undefined
	readonly #decoder: TextDecoder
	readonly #take: number

	constructor(source: AsyncChunkIterator, init: LineReaderInit = {}) {
		this.#source = source
		this.#needle = init.delimiter === undefined ? undefined : new CharacterSequence(init.delimiter)
		this.#decoder = new TextDecoder(init.encoding ?? "utf-8", { fatal: false })
		this.#take = Math.max(0, init.take ?? Infinity)
	}

	#findTerminator(buffer: Uint8Array, from: number): TerminatorMatch | undefined {
		if (!this.#needle) return findUniversalTerminator(buffer, from)

		const start = this.#needle.search(buffer, from)

		return start === -1 ? undefined : [start, this.#needle.byteLength]
	}

	#decodeLine(bytes: Uint8Array, byteLength: number, index: number): DelimitedLine {
		const contentEnd =
			bytes.byteLength > 0 && bytes[bytes.byteLength - 1] === Delimiters.CarriageReturn
				? bytes.byteLength - 1
				: bytes.byteLength

		return {
			text: this.#decoder.decode(bytes.subarray(0, contentEnd)),
			byteLength,
			index,
		}
	}

	/**
	 * Release the source without reading it, e.g. when the destination could not be opened.
	 */
	public async close(): Promise<void> {
		await this.#source[Symbol.asyncIterator]().return?.()
	}

	async *[Symbol.asyncIterator](): AsyncGenerator<DelimitedLine> {
		if (this.#take === 0) return

		// Trailing bytes which may begin a terminator completed by the next chunk.
		const overlap = this.#needle ? this.#needle.byteLength - 1 : 1

		// The unterminated line is kept as its settled parts, plus a short tail which may yet
		// begin a terminator. Only the tail is searched again when the next chunk arrives.
		let parts: Uint8Array[] = []
		let partsLength = 0
		let tail: Uint8Array = new Uint8Array(0)
		let lineCount = 0

		for await (const chunk of this.#source) {
			const buffer = tail.byteLength > 0 ? concatBytes(tail, chunk) : chunk

			let lineStart = 0
			let match = this.#findTerminator(buffer, 0)

			while (match) {
				const [terminatorStart, terminatorLength] = match
				const content = buffer.subarray(lineStart, terminatorStart)
				const line = joinBytes([...parts, content], partsLength + content.byteLength)

				yield this.#decodeLine(line, line.byteLength + terminatorLength, lineCount)

				lineCount++
				if (lineCount >= this.#take) return

				parts = []
				partsLength = 0
				lineStart = terminatorStart + terminatorLength
				match = this.#findTerminator(buffer, lineStart)
			}

			const rest = buffer.subarray(lineStart)
			const tailStart = Math.max(0, rest.byteLength - overlap)

			if (tailStart > 0) {
				parts.push(rest.subarray(0, tailStart))
				partsLength += tailStart
			}

			tail = rest.subarray(tailStart)
		}

		// The last line may lack a terminator, or end in a lone CR. A source ending in LF has no such line.
		if (partsLength + tail.byteLength > 0) {
			const line = joinBytes([...parts, tail], partsLength + tail.byteLength)

			yield this.#decodeLine(line, line.byteLength, lineCount)
		}
	}
}

/**
 * Read only the first line of a source, closing it afterwards.
 *
 * @returns The first line, or an empty string when the source is empty.
 */
export async function readFirstLine(source: LineSource, init: LineReaderInit = {}): Promise<string> {
	const lines = await LineReader.fromAsync(source, { ...init, take: 1 })

	for await (const line of lines) {
		return line.text
	}

	return ""
}
