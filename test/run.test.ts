/**
 * @copyright Sister Software
 * @license AGPL-3.0
 * @author Teffen Ellis, et al.
 */

import * as fs from "node:fs/promises"
import * as path from "node:path"
import { test } from "vitest"
import { ConfigurationError, InvalidPatternError } from "../lib/errors.js"
import { createLogger } from "../lib/logger.js"
import { SeparatorCandidate } from "../lib/separators.js"
import { ConversionPrompter, remoteFileName, runConversion } from "../node/cli/run.js"
import { copyFixture, createScratchDirectory, pathExists } from "./utils.js"

interface RecordedPrompter extends ConversionPrompter {
	questions: string[]
}

/**
 * A prompter with canned answers, recording what it was asked.
 */
function createCannedPrompter(answers: { source?: string; separator?: string; columns?: string }): RecordedPrompter {
	const questions: string[] = []

	const answer = (question: string, value: string | undefined): Promise<string> => {
		questions.push(question)

		if (value === undefined) {
			return Promise.reject(new Error(`Unexpected question: ${question}`))
		}

		return Promise.resolve(value)
	}

	return {
		questions,
		askSource: () => answer("source", answers.source),
		chooseFile: (candidates) => answer("file", candidates[0]),
		confirmSeparator: (suggested: SeparatorCandidate, expression: string) =>
			answer(`separator ${expression}`, answers.separator ?? expression),
		askColumns: () => answer("columns", answers.columns),
	}
}

test("Sources and settings are asked for when not given", async ({ expect, onTestFinished }) => {
	const [directory, dispose] = await createScratchDirectory()
	onTestFinished(dispose)

	const source = await copyFixture("people.txt", directory)
	const prompter = createCannedPrompter({ source, columns: "id, name, birthday" })

	const summary = await runConversion({ prompter })

	expect(prompter.questions, "The detected separator is offered").toEqual(["source", "separator \\|", "columns"])
	expect(summary.destination).toBe(path.join(directory, "people_pg.csv"))
	expect(summary.recordCount).toBe(4)

	const content = await fs.readFile(summary.destination, "utf8")
	expect(content.split("\r\n")[1]).toBe("1,Alice,1990-01-01")
})

test("Headless runs ask nothing", async ({ expect, onTestFinished }) => {
	const [directory, dispose] = await createScratchDirectory()
	onTestFinished(dispose)

	const source = await copyFixture("visits.txt", directory)
	const prompter = createCannedPrompter({})

	const summary = await runConversion({
		prompter,
		source,
		acceptDetectedSeparator: true,
		columns: "Visit ID,Name,Visit ID",
		normalizeColumns: true,
		drop: 1,
		output: path.join(directory, "out.csv"),
	})

	expect(prompter.questions).toEqual([])
	expect(summary.destination).toBe(path.join(directory, "out.csv"))

	const content = await fs.readFile(summary.destination, "utf8")
	expect(content).toBe("\uFEFFvisit_id,name,visit_id_2\r\n7,Dana,29.02.2024\r\n")
})

test("Overridden separators and date columns are honoured", async ({ expect, onTestFinished }) => {
	const [directory, dispose] = await createScratchDirectory()
	onTestFinished(dispose)

	const source = await copyFixture("visits.txt", directory)

	const summary = await runConversion({
		prompter: createCannedPrompter({ separator: "[;]" }),
		source,
		columns: "id,name,visited",
		dateColumns: ["visited"],
		nullValue: "NULL",
		suffix: "_copy",
	})

	expect(summary.destination).toBe(path.join(directory, "visits_copy.csv"))
	expect(await fs.readFile(summary.destination, "utf8")).toBe(
		"\uFEFFid,name,visited\r\nid,name,NULL\r\n7,Dana,2024-02-29\r\n"
	)
})

test("Invalid settings abort before anything is written", async ({ expect, onTestFinished }) => {
	const [directory, dispose] = await createScratchDirectory()
	onTestFinished(dispose)

	const source = await copyFixture("people.txt", directory)

	const badSeparator = createCannedPrompter({ separator: "(", columns: "id" })
	await expect(runConversion({ prompter: badSeparator, source })).rejects.toThrow(InvalidPatternError)
	expect(badSeparator.questions, "Columns are not asked for after a bad separator").toEqual(["separator \\|"])

	await expect(
		runConversion({ prompter: createCannedPrompter({}), source, acceptDetectedSeparator: true, columns: " , " })
	).rejects.toThrow(ConfigurationError)

	expect(await pathExists(path.join(directory, "people_pg.csv"))).toBe(false)
})

test("A destination resolving to the source is refused", async ({ expect, onTestFinished }) => {
	const [directory, dispose] = await createScratchDirectory()
	onTestFinished(dispose)

	const source = path.join(directory, "data.csv")
	const content = "1|Alice|01.01.1990\n2|Bob|\n"
	await fs.writeFile(source, content)

	await expect(
		runConversion({
			prompter: createCannedPrompter({}),
			source,
			suffix: "",
			acceptDetectedSeparator: true,
			columns: "id,name,birthday",
		})
	).rejects.toThrow(ConfigurationError)

	expect(await fs.readFile(source, "utf8"), "The source is untouched").toBe(content)
	expect(await fs.readdir(directory)).toEqual(["data.csv"])
})

test("Downloads are removed after a successful conversion", async ({ expect, onTestFinished }) => {
	const [directory, dispose] = await createScratchDirectory()
	onTestFinished(dispose)

	const downloads = path.join(directory, "downloads")
	await fs.mkdir(downloads)

	const messages: string[] = []
	const logger = createLogger({
		colors: false,
		sink: {
			debug: (message: string) => messages.push(message),
			info: (message: string) => messages.push(message),
			warn: (message: string) => messages.push(message),
			error: (message: string) => messages.push(message),
		},
	})

	const summary = await runConversion({
		prompter: createCannedPrompter({}),
		source: "https://example.com/exports/people.txt?v=2",
		acceptDetectedSeparator: true,
		columns: "id,name,birthday",
		temporaryDirectory: downloads,
		workingDirectory: directory,
		fetch: async () => new Response("1|Alice|01.01.1990\n2|Bob|\n"),
		logger,
	})

	expect(summary.destination, "Written to the working directory").toBe(path.join(directory, "people_pg.csv"))
	expect(await fs.readFile(summary.destination, "utf8")).toBe(
		"\uFEFFid,name,birthday\r\n1,Alice,1990-01-01\r\n2,Bob,\\N\r\n"
	)
	expect(await fs.readdir(downloads), "The download is gone").toEqual([])

	expect(messages).toContain("[INFO] Downloading https://example.com/exports/people.txt?v=2")
	expect(messages).toContain("[INFO] Detected separator: |")
})

test("Downloads are removed after a failed conversion", async ({ expect, onTestFinished }) => {
	const [directory, dispose] = await createScratchDirectory()
	onTestFinished(dispose)

	await expect(
		runConversion({
			prompter: createCannedPrompter({ separator: "(" }),
			source: "https://example.com/people.txt",
			temporaryDirectory: directory,
			workingDirectory: directory,
			fetch: async () => new Response("1|Alice\n"),
		})
	).rejects.toThrow(InvalidPatternError)

	expect(await fs.readdir(directory)).toEqual([])
})

test("Remote file names come from the URL path", async ({ expect }) => {
	expect(remoteFileName("https://example.com/exports/people.txt?v=2")).toBe("people.txt")
	expect(remoteFileName("https://example.com/")).toBe("download.txt")
})
