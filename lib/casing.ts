/**
 * @copyright Sister Software
 * @license AGPL-3.0
 * @author Teffen Ellis, et al.
 */

import { snakeCase } from "change-case"

/**
 * Converts a name to snake_case, unless the name is already in all caps.
 */
export function smartSnakeCase(name: string): string {
	const normalizedName = name
		// Remove periods after capital letters, e.g. "U.S.A." -> "USA"
		.replace(/([A-Z])(\.+)/g, "$1")
		.trim()

	if (normalizedName.toUpperCase() === normalizedName) {
		return (
			normalizedName
				// Replace all non-word characters with underscores...
				.replace(/\W{1,}/g, "_")
				// ...and then replace all sequences of underscores with a single underscore.
				.replace(/_{2,}/g, "_")
		)
	}

	return snakeCase(normalizedName)
}

/**
 * Given an array of column names, normalize them to ensure they are unique and usable as SQL
 * identifiers.
 *
 * Repeated names are suffixed with their occurrence count, e.g. `name`, `name_2`, `name_3`.
 */
export function normalizeColumnNames(columnHeaders: Iterable<string>): string[] {
	const columnInputCountMap = new Map<string, number>()
	const distinctColumns: string[] = []

	for (const columnHeader of columnHeaders) {
		const keyableName = smartSnakeCase(columnHeader)
		const headerCount = (columnInputCountMap.get(keyableName) ?? 0) + 1

		columnInputCountMap.set(keyableName, headerCount)
		distinctColumns.push(headerCount === 1 ? keyableName : `${keyableName}_${headerCount}`)
	}

	return distinctColumns
}
