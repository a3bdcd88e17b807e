/**
 * @copyright Sister Software
 * @license AGPL-3.0
 * @author Teffen Ellis, et al.
 */

import { open, stat } from "node:fs/promises"
import { AsyncChunkIterator, DEFAULT_HIGH_WATER_MARK } from "../shared.js"

export interface CreateChunkIteratorOptions {
	/**
	 * The buffer chunk size to read from the file, i.e. the high-water mark for the file read.
	 */
	highWaterMark?: number
}

/**
 * Read the size of a file.
 *
 * @returns The file size in bytes.
 */
export async function readFileSize(source: string | URL): Promise<number> {
	return stat(source).then(({ size }) => size)
}

/**
 * Open a file and create an async chunk iterator over its bytes.
 *
 * The file handle is closed once the iterator is drained or returned early.
 */
export async function createChunkIterator(
	source: string | URL,
	{ highWaterMark = DEFAULT_HIGH_WATER_MARK }: CreateChunkIteratorOptions = {}
): Promise<AsyncChunkIterator> {
	if (!source) {
		throw new TypeError("Cannot create a chunk iterator from an empty source.")
	}

	const handle = await open(source, "r")

	return handle.createReadStream({
		highWaterMark,
		autoClose: true,
	})
}
