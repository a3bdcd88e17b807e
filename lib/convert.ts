/**
 * @copyright Sister Software
 * @license AGPL-3.0
 * @author Teffen Ellis, et al.
 */

import { rm } from "node:fs/promises"
import * as path from "node:path"
import { ConfigurationError } from "./errors.js"
import { LineReader, readFirstLine } from "./LineReader.js"
import { Logger, silentLogger } from "./logger.js"
import { readFileSize } from "./node/fs.js"
import { createRecordTransformer, RecordTransformerInit } from "./RecordTransformer.js"
import { detectSeparator, SeparatorCandidate } from "./separators.js"
import { DEFAULT_DESTINATION_SUFFIX, DEFAULT_HIGH_WATER_MARK, ProgressObserver } from "./shared.js"
import { createCSVWriter } from "./writer.js"

/**
 * Derive the destination of a conversion, a CSV file beside the source.
 *
 * ```ts
 * deriveDestination("/data/people.txt") // "/data/people_pg.csv"
 * ```
 */
export function deriveDestination(sourcePath: string, suffix: string = DEFAULT_DESTINATION_SUFFIX): string {
	const { dir, name } = path.parse(sourcePath)

	return path.join(dir, `${name}${suffix}.csv`)
}

/**
 * Guess the separator of a file from its first line.
 *
 * This is a pass of its own: the file is closed again once the first line is read.
 */
export async function detectSeparatorFromFile(
	source: string,
	highWaterMark: number = DEFAULT_HIGH_WATER_MARK
): Promise<SeparatorCandidate> {
	const sampleLine = await readFirstLine(source, { highWaterMark })

	return detectSeparator(sampleLine)
}

export interface ConvertFileInit extends RecordTransformerInit {
	/**
	 * Path to the delimited text file.
	 */
	source: string

	/**
	 * Path of the CSV file to write. Overwritten if present.
	 */
	destination: string

	/**
	 * Notified after each line is written.
	 */
	observer?: ProgressObserver

	logger?: Logger

	/**
	 * @default 64 KiB
	 */
	highWaterMark?: number

	/**
	 * Whether to prefix the output with a UTF-8 byte order mark.
	 *
	 * @default true
	 */
	bom?: boolean

	/**
	 * Count of leading source lines to skip, e.g. `1` for a source with its own header line.
	 *
	 * @default 0
	 */
	drop?: number
}

export interface ConversionSummary {
	destination: string

	/**
	 * The number of data records written, header excluded.
	 */
	recordCount: number

	/**
	 * The number of source bytes consumed.
	 */
	bytesRead: number
}

/**
 * Convert a delimited text file into a CSV file ready for `COPY ... WITH (FORMAT csv, NULL '\N')`.
 *
 * The header is written first, then one record per source line, in source order. Lines are read
 * and written one at a time.
 *
 * If anything fails once the destination is opened, the partial destination file is removed and
 * the error is rethrown.
 *
 * @throws {ConfigurationError} When the column list is empty, or the destination is the source.
 * @throws {InvalidPatternError} When the separator does not compile.
 */
export async function convertFile({
	source,
	destination,
	observer,
	logger = silentLogger,
	highWaterMark = DEFAULT_HIGH_WATER_MARK,
	bom = true,
	drop = 0,
	...transformerInit
}: ConvertFileInit): Promise<ConversionSummary> {
	if (path.resolve(destination) === path.resolve(source)) {
		throw new ConfigurationError(`The destination would overwrite the source: ${destination}`)
	}

	const transform = createRecordTransformer(transformerInit)

	logger.debug(`Separator pattern: ${transform.pattern.source}`)
	const dateColumnNames = transform.dateColumnIndices.map((idx) => transform.columns[idx])
	logger.debug(`Date columns: ${dateColumnNames.join(", ") || "none"}`)

	const totalBytes = await readFileSize(source)
	const lines = await LineReader.fromAsync(source, { highWaterMark })

	logger.info(`Reading from: ${source}`)
	logger.info(`Writing to: ${destination}`)

	const writer = await createCSVWriter(destination, { bom }).catch(async (error: unknown) => {
		await lines.close()
		throw error
	})

	let bytesRead = 0
	let recordCount = 0

	try {
		try {
			await writer.write(transform.columns)

			for await (const line of lines) {
				bytesRead += line.byteLength

				if (line.index < drop) {
					logger.debug(`Skipping line ${line.index + 1}`)
				} else {
					await writer.write(transform(line.text))
					recordCount++
				}

				observer?.onProgress(bytesRead, totalBytes)
			}
		} finally {
			observer?.onComplete?.()
		}

		await writer.dispose()
	} catch (error) {
		await writer.dispose().catch((disposeError: unknown) => {
			logger.debug("Failed to close the destination after an error.", disposeError)
		})

		await lines.close()
		await rm(destination, { force: true })

		throw error
	}

	logger.info(`Done. Wrote ${recordCount} records to ${path.basename(destination)}`)

	return {
		destination,
		recordCount,
		bytesRead,
	}
}
