/**
 * @copyright Sister Software
 * @license AGPL-3.0
 * @author Teffen Ellis, et al.
 */

import { stringify } from "csv-stringify/sync"
import { open } from "node:fs/promises"
import type { WriteStream } from "node:fs"

export interface CSVWriterInit {
	/**
	 * Whether to prefix the file with a UTF-8 byte order mark.
	 *
	 * @default true
	 */
	bom?: boolean
}

/**
 * Writes records to a CSV file, one record at a time.
 */
export interface CSVWriter {
	/**
	 * Write a single record. Fields are quoted only when they contain a comma, a double quote or a
	 * line break.
	 */
	write(record: readonly string[]): Promise<void>

	/**
	 * Flush and close the file.
	 */
	dispose(): Promise<void>
}

/**
 * Creates a writer for CSV files, suitable for PostgreSQL's `COPY ... WITH (FORMAT csv)`.
 *
 * The file is opened before this resolves, so an unwritable destination rejects here.
 */
export async function createCSVWriter(filePath: string, init: CSVWriterInit = {}): Promise<CSVWriter> {
	const { bom = true } = init

	const handle = await open(filePath, "w")
	const writer: WriteStream = handle.createWriteStream({ encoding: "utf8", autoClose: true })

	let bomPending = bom
	let streamError: Error | undefined

	// Write failures also reach the write callbacks. `dispose` reports the first one.
	writer.on("error", (error) => {
		streamError ??= error
	})

	const writeChunk = (content: string): Promise<void> => {
		return new Promise((resolve, reject) => {
			writer.write(content, "utf8", (error) => {
				if (error) {
					reject(error)
					return
				}

				resolve()
			})
		})
	}

	const write = async (record: readonly string[]): Promise<void> => {
		const content = stringify([Array.from(record)], {
			bom: bomPending,
			record_delimiter: "\r\n",
		})

		bomPending = false

		await writeChunk(content)
	}

	const dispose = () => {
		return new Promise<void>((resolve, reject) => {
			writer.close(() => {
				if (streamError) {
					reject(streamError)
					return
				}

				resolve()
			})
		})
	}

	return {
		write,
		dispose,
	}
}
