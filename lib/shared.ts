/**
 * @copyright Sister Software
 * @license AGPL-3.0
 * @author Teffen Ellis, et al.
 */

/**
 * The literal PostgreSQL's `COPY ... CSV` reads as SQL `NULL` when it appears unquoted.
 */
export const NULL_SENTINEL = "\\N"

/**
 * Column names, compared case-insensitively, whose values are normalized as `DD.MM.YYYY` dates.
 */
export const DEFAULT_DATE_COLUMNS = ["birthday", "date"] as const satisfies readonly string[]

/**
 * Appended to the source's base name to form the destination file name.
 */
export const DEFAULT_DESTINATION_SUFFIX = "_pg"

/**
 * The buffer chunk size used when reading a source file.
 */
export const DEFAULT_HIGH_WATER_MARK = 4096 * 16 // 64 KiB

/**
 * An asynchronous iterable byte stream.
 *
 * Note that as an iterable this will drained of all bytes when iterated over.
 */
export type AsyncChunkIterator = AsyncIterable<Uint8Array>

/**
 * A source of delimited text: either a file path or an already-open byte stream.
 */
export type LineSource = string | URL | AsyncChunkIterator

/**
 * Observer notified as a source is consumed.
 *
 * Progress is advisory. Observers must not throw.
 */
export interface ProgressObserver {
	/**
	 * @param bytesRead - Raw bytes consumed so far, line terminators included.
	 * @param totalBytes - The byte length of the whole source, or `0` when unknown.
	 */
	onProgress(bytesRead: number, totalBytes: number): void

	/**
	 * Called once reading stops, whether or not the conversion succeeded, before anything else is
	 * logged.
	 */
	onComplete?(): void
}

/**
 * Type-predicate to determine if a value is an asynchronous byte stream.
 */
export function isAsyncChunkIterator(input: unknown): input is AsyncChunkIterator {
	return Boolean(input && typeof input === "object" && Symbol.asyncIterator in input)
}
