/**
 * @copyright Sister Software
 * @license AGPL-3.0
 * @author Teffen Ellis, et al.
 */

import { NULL_SENTINEL } from "./shared.js"

const DIGITS = /^\d+$/

export function isLeapYear(year: number): boolean {
	return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

export function daysInMonth(year: number, month: number): number {
	switch (month) {
		case 2:
			return isLeapYear(year) ? 29 : 28
		case 4:
		case 6:
		case 9:
		case 11:
			return 30
		default:
			return 31
	}
}

/**
 * Convert a `DD.MM.YYYY` date into an ISO-8601 calendar date, `YYYY-MM-DD`.
 *
 * Whitespace around each component is ignored. Anything else, including dates which don't exist
 * such as `31.02.2020`, becomes the NULL sentinel.
 *
 * ```ts
 * normalizeDate("05.03.2020") // "2020-03-05"
 * normalizeDate("5 . 3.2020") // "2020-03-05"
 * normalizeDate("2020-03-05") // "\\N"
 * ```
 */
export function normalizeDate(raw: string, nullValue: string = NULL_SENTINEL): string {
	const components = raw.split(".").map((component) => component.trim())

	if (components.length !== 3) return nullValue

	const [dayInput = "", monthInput = "", yearInput = ""] = components

	if (yearInput.length !== 4) return nullValue
	if (!DIGITS.test(dayInput) || !DIGITS.test(monthInput) || !DIGITS.test(yearInput)) return nullValue

	const day = parseInt(dayInput, 10)
	const month = parseInt(monthInput, 10)
	const year = parseInt(yearInput, 10)

	if (year < 1 || month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
		return nullValue
	}

	return [
		// ---
		yearInput,
		String(month).padStart(2, "0"),
		String(day).padStart(2, "0"),
	].join("-")
}
