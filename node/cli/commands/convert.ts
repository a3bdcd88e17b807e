/**
 * @copyright Sister Software
 * @license AGPL-3.0
 * @author Teffen Ellis, et al.
 * @file Yargs command to convert a delimited text file into a PostgreSQL-ready CSV file.
 */

import { ArgumentsCamelCase, Argv } from "yargs"
import { createLogger } from "../../../lib/logger.js"
import { splitNameList } from "../../../lib/RecordTransformer.js"
import { createProgressReporter } from "../progress.js"
import { createTerminalPrompter, TerminalPrompter } from "../prompter.js"
import { runConversion } from "../run.js"
import { commonCommandsBuilder, PluckArgv } from "../utils.js"

export const command = "$0 [source]"
export const describe = "Convert a delimited text file into a CSV file for PostgreSQL's COPY"

export const builder = (argv: Argv) => commonCommandsBuilder(argv)

export type ConvertCommandArgs = PluckArgv<typeof builder>

export const handler = async (argv: ArgumentsCamelCase<ConvertCommandArgs>) => {
	const logger = createLogger({ level: argv.debug ? "debug" : "info" })
	const progress = createProgressReporter()

	// Only opened when something has to be asked, so headless runs never touch STDIN.
	let terminalPrompter: TerminalPrompter | undefined
	const prompter = () => (terminalPrompter ??= createTerminalPrompter())

	try {
		await runConversion({
			source: argv.source,
			separator: argv.separator,
			acceptDetectedSeparator: argv.yes,
			columns: argv.columns,
			normalizeColumns: argv.normalizeColumns,
			output: argv.output,
			suffix: argv.suffix,
			nullValue: argv.nullValue,
			dateColumns: splitNameList(argv.dateColumns),
			highWaterMark: argv.readerHighWaterMark,
			drop: argv.drop,
			logger,
			observer: argv.progress && process.stderr.isTTY ? progress : undefined,
			prompter: {
				askSource: () => prompter().askSource(),
				chooseFile: (candidates) => prompter().chooseFile(candidates),
				confirmSeparator: (suggested, expression) => prompter().confirmSeparator(suggested, expression),
				askColumns: () => prompter().askColumns(),
			},
		})
	} catch (error) {
		logger.error(error instanceof Error ? error.message : String(error))

		if (argv.debug) {
			logger.debug("Stack trace:", error)
		}

		process.exitCode = 1
	} finally {
		terminalPrompter?.close()
	}
}
