/**
 * @copyright Sister Software
 * @license AGPL-3.0
 * @author Teffen Ellis, et al.
 * @file Resolves a source and its settings, then converts it.
 */

import * as path from "node:path"
import { normalizeColumnNames } from "../../lib/casing.js"
import { debugAsVisibleCharacters } from "../../lib/CharacterSequence.js"
import { ConversionSummary, convertFile, deriveDestination, detectSeparatorFromFile } from "../../lib/convert.js"
import { Logger, silentLogger } from "../../lib/logger.js"
import { parseColumnList } from "../../lib/RecordTransformer.js"
import { compileSeparatorPattern, SeparatorCandidate, separatorExpression } from "../../lib/separators.js"
import { DEFAULT_DESTINATION_SUFFIX, DEFAULT_HIGH_WATER_MARK, ProgressObserver } from "../../lib/shared.js"
import { FileChooser, resolveSource } from "../fs/index.js"

/**
 * Supplies the settings a user would otherwise be asked for.
 *
 * The conversion itself never prompts. It only receives the answers.
 */
export interface ConversionPrompter {
	/**
	 * Ask for a path, directory or URL.
	 */
	askSource(): Promise<string>

	/**
	 * Pick a file when the source is a directory.
	 */
	chooseFile: FileChooser

	/**
	 * Confirm the detected separator or replace it.
	 *
	 * @param suggested The detected separator.
	 * @param expression The detected separator written as a regular expression.
	 * @returns The separator expression to use.
	 */
	confirmSeparator(suggested: SeparatorCandidate, expression: string): Promise<string>

	/**
	 * Ask for the comma-separated column names.
	 */
	askColumns(): Promise<string>
}

export interface RunConversionInit {
	/**
	 * A path, directory or URL. Asked for when omitted.
	 */
	source?: string

	/**
	 * The separator expression. When omitted, the detected separator is confirmed with the prompter.
	 */
	separator?: string

	/**
	 * Use the detected separator without confirming it.
	 */
	acceptDetectedSeparator?: boolean

	/**
	 * Comma-separated column names. Asked for when omitted.
	 */
	columns?: string

	/**
	 * Snake-case and de-duplicate the column names.
	 */
	normalizeColumns?: boolean

	/**
	 * The destination path. Derived from the source when omitted.
	 */
	output?: string

	/**
	 * @default "_pg"
	 */
	suffix?: string

	nullValue?: string
	dateColumns?: Iterable<string>
	highWaterMark?: number

	/**
	 * Count of leading source lines to skip.
	 */
	drop?: number

	prompter: ConversionPrompter
	logger?: Logger
	observer?: ProgressObserver

	/**
	 * Used to download remote sources.
	 */
	fetch?: typeof globalThis.fetch

	/**
	 * Where remote sources are downloaded to.
	 */
	temporaryDirectory?: string

	/**
	 * The directory derived destinations of remote sources are written to.
	 *
	 * @default process.cwd()
	 */
	workingDirectory?: string
}

/**
 * The local file name a remote source would have had, e.g. `people.txt` for
 * `https://example.com/exports/people.txt?v=2`.
 */
export function remoteFileName(url: string): string {
	const { pathname } = new URL(url)
	const baseName = path.posix.basename(pathname)

	return baseName || "download.txt"
}

/**
 * Resolve the source, settle the separator and columns, and convert.
 *
 * Remote sources are downloaded to a temporary file, which is deleted whether or not the
 * conversion succeeds.
 */
export async function runConversion(init: RunConversionInit): Promise<ConversionSummary> {
	const {
		prompter,
		logger = silentLogger,
		suffix = DEFAULT_DESTINATION_SUFFIX,
		highWaterMark = DEFAULT_HIGH_WATER_MARK,
		workingDirectory = process.cwd(),
	} = init

	const input = init.source ?? (await prompter.askSource())

	const source = await resolveSource(input, {
		chooseFile: prompter.chooseFile,
		fetch: init.fetch,
		temporaryDirectory: init.temporaryDirectory,
		logger,
	})

	try {
		const suggested = await detectSeparatorFromFile(source.path, highWaterMark)
		const suggestedExpression = separatorExpression(suggested)

		logger.info(`Detected separator: ${debugAsVisibleCharacters(suggested)}`)

		let separator = init.separator

		if (separator === undefined) {
			separator = init.acceptDetectedSeparator
				? suggestedExpression
				: await prompter.confirmSeparator(suggested, suggestedExpression)
		}

		// Compiled before asking for columns, so a bad expression fails straight away.
		const pattern = compileSeparatorPattern(separator)

		const columnList = parseColumnList(init.columns ?? (await prompter.askColumns()))
		const columns = init.normalizeColumns ? normalizeColumnNames(columnList) : columnList

		const destination =
			init.output ??
			(source.remote
				? deriveDestination(path.join(workingDirectory, remoteFileName(input.trim())), suffix)
				: deriveDestination(source.path, suffix))

		return await convertFile({
			source: source.path,
			destination,
			separator: pattern,
			columns,
			nullValue: init.nullValue,
			dateColumns: init.dateColumns,
			highWaterMark,
			drop: init.drop,
			observer: init.observer,
			logger,
		})
	} finally {
		await source.cleanup()
	}
}
