/**
 * @copyright Sister Software
 * @license AGPL-3.0
 * @author Teffen Ellis, et al.
 */

import { Argv } from "yargs"
import yargs from "yargs/yargs"
import * as convertCommand from "./commands/convert.js"

/**
 * Create the command line parser for the given arguments, without parsing them yet.
 */
export function createCommandLine(args: string[]): Argv {
	const argv = yargs(args)

	return argv
		.command(convertCommand)
		.usage(
			[
				// ---
				"Convert a delimited text file into a CSV file ready for PostgreSQL's COPY.",
				"",
				"$0 [source]",
			].join("\n")
		)
		.example("$0 people.txt", "Detect the separator, then ask for it and the column names")
		.example("$0 people.txt -y -c id,name,birthday", "Convert without asking anything")
		.example("$0 https://example.com/people.txt", "Download, convert, and delete the download")
		.epilogue("Empty fields are written as \\N. Dates in birthday and date columns become YYYY-MM-DD.")
		.strict()
		.wrap(Math.min(120, argv.terminalWidth()))
		.scriptName("txt2pg")
}
