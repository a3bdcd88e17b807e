/**
 * @copyright Sister Software
 * @license AGPL-3.0
 * @author Teffen Ellis, et al.
 */

import { InvalidPatternError } from "./errors.js"

/**
 * Separators considered when guessing how a line is delimited, in tie-break priority order.
 */
export const SeparatorCandidates = ["|", ",", ";", "\t"] as const

export type SeparatorCandidate = (typeof SeparatorCandidates)[number]

/**
 * How each candidate is written as a regular expression.
 */
const SeparatorExpressions = {
	"|": "\\|",
	",": ",",
	";": ";",
	"\t": "\\t",
} as const satisfies Record<SeparatorCandidate, string>

/**
 * Count the non-overlapping occurrences of a single-character needle.
 */
function countOccurrences(haystack: string, needle: string): number {
	let count = 0
	let index = haystack.indexOf(needle)

	while (index !== -1) {
		count++
		index = haystack.indexOf(needle, index + needle.length)
	}

	return count
}

/**
 * Guess the field separator of a delimited line.
 *
 * Each candidate is counted in the line and the most frequent one wins. On a tie, including a line
 * with none of the candidates at all, the earlier entry of {@linkcode SeparatorCandidates} wins,
 * which makes `|` the default.
 */
export function detectSeparator(sampleLine: string): SeparatorCandidate {
	let best: SeparatorCandidate = SeparatorCandidates[0]
	let bestCount = -1

	for (const candidate of SeparatorCandidates) {
		const count = countOccurrences(sampleLine, candidate)

		if (count > bestCount) {
			best = candidate
			bestCount = count
		}
	}

	return best
}

/**
 * The regular expression a user would type for a candidate, e.g. `\|` for a vertical bar.
 */
export function separatorExpression(candidate: SeparatorCandidate): string {
	return SeparatorExpressions[candidate]
}

/**
 * Compile a separator expression into a pattern which also consumes the whitespace around each
 * separator.
 *
 * @param expression A regular expression source, e.g. `\|`, `,` or `\s{2,}`.
 * @throws {InvalidPatternError} When the expression is empty or does not compile.
 */
export function compileSeparatorPattern(expression: string): RegExp {
	if (!expression) {
		throw new InvalidPatternError(expression)
	}

	try {
		return new RegExp(`\\s*(?:${expression})\\s*`)
	} catch (error) {
		throw new InvalidPatternError(expression, { cause: error })
	}
}
