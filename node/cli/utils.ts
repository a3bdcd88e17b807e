/**
 * @copyright Sister Software
 * @license AGPL-3.0
 * @author Teffen Ellis, et al.
 */

import { Argv } from "yargs"
import { DEFAULT_DATE_COLUMNS, DEFAULT_DESTINATION_SUFFIX, DEFAULT_HIGH_WATER_MARK, NULL_SENTINEL } from "../../lib/shared.js"

export type PluckArgv<T extends (...args: never[]) => unknown> = ReturnType<T> extends Argv<infer U> ? U : never

export const commonCommandsBuilder = (argv: Argv) => {
	return argv
		.positional("source", {
			description: "Path to a delimited .txt file, a directory of them, or an http(s) URL",
			type: "string",
		})
		.option("separator", {
			alias: "s",
			description: "Field separator, as a regular expression",
			defaultDescription: "detected, then confirmed",
			string: true,
		})
		.option("yes", {
			alias: "y",
			description: "Use the detected separator without confirming it",
			default: false,
			boolean: true,
		})
		.option("columns", {
			alias: "c",
			description: "Comma-separated column names, in order",
			defaultDescription: "asked for",
			string: true,
		})
		.option("normalize-columns", {
			description: "Convert column names to snake_case and de-duplicate them",
			default: false,
			boolean: true,
		})
		.option("output", {
			alias: "o",
			description: "Path to the destination CSV file",
			defaultDescription: "<source name><suffix>.csv",
			string: true,
			normalize: true,
		})
		.option("suffix", {
			description: "Suffix appended to the source name to form the destination name",
			default: DEFAULT_DESTINATION_SUFFIX,
			string: true,
		})
		.option("null-value", {
			alias: "n",
			description: "Value written for empty fields and invalid dates",
			default: NULL_SENTINEL,
			string: true,
		})
		.option("date-columns", {
			alias: "d",
			description: "Comma-separated columns holding DD.MM.YYYY dates, matched case-insensitively",
			default: DEFAULT_DATE_COLUMNS.join(","),
			string: true,
		})
		.option("drop", {
			alias: "p",
			description: "Number of leading lines to skip, e.g. 1 for a source with a header line",
			default: 0,
			number: true,
		})
		.option("progress", {
			description: "Show progress while converting",
			default: true,
			boolean: true,
		})
		.option("reader-high-water-mark", {
			alias: "w",
			description: "High water mark for the read stream",
			default: DEFAULT_HIGH_WATER_MARK,
			number: true,
		})
		.option("debug", {
			alias: "v",
			description: "Debug mode",
			default: false,
			boolean: true,
		})
}

export type CommonCommandArgs = PluckArgv<typeof commonCommandsBuilder>
