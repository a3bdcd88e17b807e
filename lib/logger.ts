/**
 * @copyright Sister Software
 * @license AGPL-3.0
 * @author Teffen Ellis, et al.
 */

import * as Colorette from "colorette"

export type LogLevel = "debug" | "info" | "warn" | "error"

const LogLevelPriority = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
} as const satisfies Record<LogLevel, number>

type Colors = ReturnType<typeof Colorette.createColors>

function createLevelTags(colors: Colors): Record<LogLevel, string> {
	return {
		debug: colors.dim("[DEBUG]"),
		info: colors.cyan("[INFO]"),
		warn: colors.yellow("[WARN]"),
		error: colors.red(colors.bold("[ERROR]")),
	}
}

export type LogMethod = (message: string, ...details: unknown[]) => void

export interface Logger {
	debug: LogMethod
	info: LogMethod
	warn: LogMethod
	error: LogMethod
}

/**
 * The subset of `console` a logger writes to.
 */
export type LogSink = Pick<Console, "debug" | "info" | "warn" | "error">

export interface LoggerInit {
	/**
	 * Messages below this level are discarded.
	 *
	 * @default "info"
	 */
	level?: LogLevel

	/**
	 * @default console
	 */
	sink?: LogSink

	/**
	 * Whether to colour the level tags.
	 *
	 * @default Colorette.isColorSupported
	 */
	colors?: boolean
}

/**
 * Create a logger which prefixes each message with its level, e.g. `[INFO] Reading people.txt`.
 */
export function createLogger({
	level = "info",
	sink = console,
	colors = Colorette.isColorSupported,
}: LoggerInit = {}): Logger {
	const threshold = LogLevelPriority[level]
	const tags = createLevelTags(Colorette.createColors({ useColor: colors }))

	const createMethod = (methodLevel: LogLevel): LogMethod => {
		if (LogLevelPriority[methodLevel] < threshold) return () => void 0

		const tag = tags[methodLevel]

		return (message, ...details) => sink[methodLevel](`${tag} ${message}`, ...details)
	}

	return {
		debug: createMethod("debug"),
		info: createMethod("info"),
		warn: createMethod("warn"),
		error: createMethod("error"),
	}
}

/**
 * A logger which discards everything.
 */
export const silentLogger: Logger = {
	debug: () => void 0,
	info: () => void 0,
	warn: () => void 0,
	error: () => void 0,
}
