/**
 * @copyright Sister Software
 * @license AGPL-3.0
 * @author Teffen Ellis, et al.
 */

import * as Colorette from "colorette"
import * as path from "node:path"
import { createInterface } from "node:readline/promises"
import { debugAsVisibleCharacters } from "../../lib/CharacterSequence.js"
import type { ConversionPrompter } from "./run.js"

export interface TerminalPrompterInit {
	input?: NodeJS.ReadableStream
	output?: NodeJS.WritableStream
}

export interface TerminalPrompter extends ConversionPrompter {
	close(): void
}

/**
 * A prompter which asks on the terminal, re-asking until it gets an answer.
 */
export function createTerminalPrompter({
	input = process.stdin,
	output = process.stdout,
}: TerminalPrompterInit = {}): TerminalPrompter {
	const readline = createInterface({ input, output })

	const say = (line: string) => {
		output.write(`${line}\n`)
	}

	const ask = async (question: string, defaultAnswer?: string): Promise<string> => {
		const hint = defaultAnswer === undefined ? "" : ` [${defaultAnswer}]`

		for (;;) {
			const answer = (await readline.question(`${question}${hint}: `)).trim()

			if (answer) return answer
			if (defaultAnswer !== undefined) return defaultAnswer

			say(Colorette.red("Empty input is not allowed."))
		}
	}

	return {
		askSource: () => ask("Path to a .txt file, a directory or a URL"),

		async chooseFile(candidates) {
			say("Text files found:")

			candidates.forEach((candidate, idx) => {
				say(`${Colorette.bold(idx + 1)}) ${path.basename(candidate)}`)
			})

			for (;;) {
				const answer = await ask("Choose a file number", "1")
				const choice = Number(answer)
				const candidate = Number.isInteger(choice) ? candidates[choice - 1] : undefined

				if (candidate) return candidate

				say(Colorette.red(`Enter a number between 1 and ${candidates.length}.`))
			}
		},

		confirmSeparator(suggested, expression) {
			say(`Detected separator: ${Colorette.yellow(debugAsVisibleCharacters(suggested))}`)
			say("Press Enter to accept it, or type another one.")
			say("The separator is a regular expression: escape special characters, e.g. \\| or \\t")

			return ask("Separator (regular expression)", expression)
		},

		askColumns: () => ask("Column names, comma-separated, in order"),

		close: () => readline.close(),
	}
}
