/**
 * @copyright Sister Software
 * @license AGPL-3.0
 * @author Teffen Ellis, et al.
 */

import { normalizeDate } from "./dates.js"
import { ConfigurationError } from "./errors.js"
import { compileSeparatorPattern } from "./separators.js"
import { DEFAULT_DATE_COLUMNS, NULL_SENTINEL } from "./shared.js"

/**
 * Split a comma-separated list of names, dropping blank entries.
 */
export function splitNameList(input: string): string[] {
	return input
		.split(",")
		.map((name) => name.trim())
		.filter(Boolean)
}

/**
 * Parse a comma-separated list of column names, e.g. `"id, name, birthday"`.
 *
 * Blank entries are dropped. Names need not be unique.
 *
 * @throws {ConfigurationError} When no column name remains.
 */
export function parseColumnList(input: string): string[] {
	const columns = splitNameList(input)

	if (columns.length === 0) {
		throw new ConfigurationError("No column names were provided.")
	}

	return columns
}

/**
 * Find the positions of the columns whose values are dates.
 */
export function findDateColumnIndices(
	columns: readonly string[],
	dateColumnNames: Iterable<string> = DEFAULT_DATE_COLUMNS
): number[] {
	const names = new Set(Array.from(dateColumnNames, (name) => name.toLowerCase()))

	return columns.flatMap((column, idx) => (names.has(column.toLowerCase()) ? [idx] : []))
}

export interface RecordTransformerInit {
	/**
	 * The separator, either as a regular expression source or an already compiled pattern.
	 *
	 * A string is compiled once with {@linkcode compileSeparatorPattern}.
	 */
	separator: string | RegExp

	/**
	 * The output column names. Every record is padded or truncated to this length.
	 */
	columns: readonly string[]

	/**
	 * The value written in place of empty fields and invalid dates.
	 *
	 * @default "\\N"
	 */
	nullValue?: string

	/**
	 * Names of the columns holding `DD.MM.YYYY` dates.
	 *
	 * @default ["birthday", "date"]
	 */
	dateColumns?: Iterable<string>
}

/**
 * Converts one line of delimited text into one output record.
 */
export interface RecordTransformer {
	readonly columns: readonly string[]
	readonly pattern: RegExp
	readonly dateColumnIndices: readonly number[]
	readonly nullValue: string

	(line: string): string[]
}

/**
 * Split a line into exactly `columnCount` trimmed fields.
 *
 * Missing fields are padded and extra fields are dropped. Empty fields become `nullValue`.
 */
export function splitFields(line: string, pattern: RegExp, columnCount: number, nullValue: string): string[] {
	const rawFields = line.split(pattern)
	const record = new Array<string>(columnCount)

	for (let idx = 0; idx < columnCount; idx++) {
		// A separator with a capture group may yield `undefined` for a group which didn't participate.
		const field = (rawFields[idx] ?? "").trim()

		record[idx] = field || nullValue
	}

	return record
}

/**
 * Create a transformer bound to a single compiled separator pattern and column specification.
 *
 * ```ts
 * const transform = createRecordTransformer({ separator: "\\|", columns: ["id", "name", "birthday"] })
 *
 * transform("1|Alice|01.01.1990") // ["1", "Alice", "1990-01-01"]
 * transform("2|Bob|") // ["2", "Bob", "\\N"]
 * ```
 *
 * @throws {ConfigurationError} When the column list is empty.
 * @throws {InvalidPatternError} When the separator does not compile.
 */
export function createRecordTransformer({
	separator,
	columns: columnsInput,
	nullValue = NULL_SENTINEL,
	dateColumns,
}: RecordTransformerInit): RecordTransformer {
	if (columnsInput.length === 0) {
		throw new ConfigurationError("At least one column is required.")
	}

	const columns = Object.freeze(Array.from(columnsInput))
	const pattern = typeof separator === "string" ? compileSeparatorPattern(separator) : separator
	const dateColumnIndices = Object.freeze(findDateColumnIndices(columns, dateColumns))

	const transform = (line: string): string[] => {
		const record = splitFields(line, pattern, columns.length, nullValue)

		for (const idx of dateColumnIndices) {
			record[idx] = normalizeDate(record[idx] ?? nullValue, nullValue)
		}

		return record
	}

	return Object.assign(transform, { columns, pattern, dateColumnIndices, nullValue })
}

/**
 * Transform a single line. Compiles the separator on every call, so prefer
 * {@linkcode createRecordTransformer} when converting more than one line.
 */
export function transformLine(line: string, init: RecordTransformerInit): string[] {
	return createRecordTransformer(init)(line)
}
