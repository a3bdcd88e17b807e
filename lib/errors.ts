/**
 * @copyright Sister Software
 * @license AGPL-3.0
 * @author Teffen Ellis, et al.
 */

/**
 * A problem with what the user asked for, e.g. an empty column list.
 *
 * These abort the run before any output is written.
 */
export class ConfigurationError extends Error {
	override name = "ConfigurationError"

	constructor(message: string, options?: ErrorOptions) {
		super(message, options)
	}
}

/**
 * The separator expression could not be compiled into a regular expression.
 */
export class InvalidPatternError extends ConfigurationError {
	override name = "InvalidPatternError"

	constructor(
		public readonly expression: string,
		options?: ErrorOptions
	) {
		super(`Invalid separator expression: ${JSON.stringify(expression)}`, options)
	}
}

/**
 * The input could not be turned into a readable local file.
 */
export class SourceResolutionError extends ConfigurationError {
	override name = "SourceResolutionError"
}
