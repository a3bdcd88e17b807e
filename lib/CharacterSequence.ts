/**
 * @copyright Sister Software
 * @license AGPL-3.0
 * @author Teffen Ellis, et al.
 */

/**
 * A possible input for a character sequence:
 *
 * - A single character code.
 * - A string of characters.
 * - An array of bytes.
 */
export type CharacterSequenceInput = number | string | Uint8Array

/**
 * Character codes which frame lines of text.
 */
export const Delimiters = {
	/**
	 * Newline (␊)
	 */
	LineFeed: 10,

	/**
	 * Carriage return (␍)
	 */
	CarriageReturn: 13,
} as const satisfies Record<string, number>

export const VisibleCharacterMap = new Map<string, string>([
	["\n", "␤"],
	["\r", "␍"],
	["\t", "␉"],
	[" ", "␠"],
	["\0", "␀"],
])

/**
 * Replace invisible characters with their Unicode control pictures, e.g. a tab with `␉`.
 */
export function debugAsVisibleCharacters(input: string): string {
	return Array.from(input, (character) => VisibleCharacterMap.get(character) ?? character).join("")
}

export function normalizeCharacterInput(input: CharacterSequenceInput): Uint8Array {
	switch (typeof input) {
		case "number":
			if (!Number.isInteger(input)) {
				throw new TypeError(`Numeric delimiters must be integers. Received: ${input}`)
			}

			return Uint8Array.from([input])
		case "string":
			return new TextEncoder().encode(input)
		default:
			return input
	}
}

/**
 * An encoded sequence of characters, typically bytes representing a delimiter.
 *
 * Unlike a string, this class is optimized for searching raw bytes, which lets a reader find line
 * boundaries without decoding the chunk first.
 */
export class CharacterSequence extends Uint8Array {
	/**
	 * A jump table for the Boyer-Moore-Horspool search algorithm.
	 */
	#skipIndex: number[]

	/**
	 * Perform a Boyer-Moore-Horspool search for the pattern in the text.
	 *
	 * @param haystack The encoded text to search.
	 * @param start The byte index to start searching from.
	 * @param end The byte index to stop searching at.
	 *
	 * @returns The byte index of the pattern in the text, or -1 if not found.
	 */
	public search(haystack: Uint8Array, start: number = 0, end = haystack.length): number {
		const sequenceLength = this.length

		let startIndex = Math.max(0, start)

		while (startIndex <= end - sequenceLength) {
			let lastIndex = sequenceLength - 1

			// Match pattern from right to left
			while (lastIndex >= 0 && this[lastIndex] === haystack[startIndex + lastIndex]) {
				lastIndex--
			}

			if (lastIndex < 0) return startIndex

			const windowByte = haystack[startIndex + sequenceLength - 1] ?? 0

			startIndex += this.#skipIndex[windowByte] ?? sequenceLength
		}

		return -1
	}

	public decode(encoding: string = "utf-8"): string {
		return new TextDecoder(encoding).decode(this)
	}

	constructor(input: CharacterSequenceInput = Delimiters.LineFeed) {
		const bytes = normalizeCharacterInput(input)

		if (bytes.length === 0) {
			throw new TypeError("A character sequence cannot be empty.")
		}

		super(bytes)

		this.#skipIndex = new Array<number>(256).fill(this.length)

		for (let i = 0; i < this.length - 1; i++) {
			const byte = this[i] ?? 0
			this.#skipIndex[byte] = this.length - 1 - i
		}
	}
}
