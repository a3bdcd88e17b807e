/**
 * @copyright Sister Software
 * @license AGPL-3.0
 * @author Teffen Ellis, et al.
 */

import * as fs from "node:fs/promises"
import * as path from "node:path"
import { test } from "vitest"
import { SourceResolutionError } from "../lib/errors.js"
import { isRemoteSource, listFiles, resolveSource } from "../node/fs/index.js"
import { createScratchDirectory, fixturesDirectory, pathExists } from "./utils.js"

test("Remote sources are recognized by scheme", async ({ expect }) => {
	expect(isRemoteSource("https://example.com/people.txt")).toBe(true)
	expect(isRemoteSource("HTTP://example.com/people.txt")).toBe(true)
	expect(isRemoteSource("ftp://example.com/people.txt")).toBe(false)
	expect(isRemoteSource("people.txt")).toBe(false)
})

test("Files resolve to themselves", async ({ expect }) => {
	const fixturePath = fixturesDirectory("people.txt")
	const source = await resolveSource(fixturePath)

	expect(source.path).toBe(fixturePath)
	expect(source.remote).toBe(false)

	await source.cleanup()
	expect(await pathExists(fixturePath), "Local files are never removed").toBe(true)
})

test("Directories offer their text files", async ({ expect }) => {
	const inbox = fixturesDirectory("inbox")
	const expectedCandidates = [path.join(inbox, "a.TXT"), path.join(inbox, "b.txt")]

	expect(await listFiles(inbox), "Extensions match case-insensitively").toEqual(expectedCandidates)

	let offered: readonly string[] = []

	const source = await resolveSource(inbox, {
		chooseFile: async (candidates) => {
			offered = candidates
			return candidates[1] ?? ""
		},
	})

	expect(offered).toEqual(expectedCandidates)
	expect(source.path).toBe(path.join(inbox, "b.txt"))

	const unchosen = await resolveSource(inbox)
	expect(unchosen.path, "Without a chooser the first file is used").toBe(path.join(inbox, "a.TXT"))
})

test("Directories without text files are rejected", async ({ expect, onTestFinished }) => {
	const [directory, dispose] = await createScratchDirectory()
	onTestFinished(dispose)

	await fs.writeFile(path.join(directory, "notes.md"), "# notes\n")

	await expect(resolveSource(directory)).rejects.toThrow(SourceResolutionError)
	await expect(
		resolveSource(fixturesDirectory("inbox"), { chooseFile: async () => "/elsewhere/c.txt" }),
		"Choices must be one of the candidates"
	).rejects.toThrow(SourceResolutionError)
})

test("Unresolvable input is rejected", async ({ expect }) => {
	await expect(resolveSource("")).rejects.toThrow(SourceResolutionError)
	await expect(resolveSource(fixturesDirectory("missing.txt"))).rejects.toThrow(/Not a file, directory or URL/)
})

test("Remote sources are downloaded and cleaned up", async ({ expect, onTestFinished }) => {
	const [directory, dispose] = await createScratchDirectory()
	onTestFinished(dispose)

	const requested: string[] = []

	const source = await resolveSource("https://example.com/people.txt", {
		temporaryDirectory: directory,
		fetch: async (input) => {
			requested.push(String(input))
			return new Response("1|Alice|01.01.1990\n")
		},
	})

	expect(requested).toEqual(["https://example.com/people.txt"])
	expect(source.remote).toBe(true)
	expect(path.dirname(source.path)).toBe(directory)
	expect(await fs.readFile(source.path, "utf8")).toBe("1|Alice|01.01.1990\n")

	await source.cleanup()
	expect(await pathExists(source.path), "The download is removed").toBe(false)

	await source.cleanup()
})

test("Failed downloads leave nothing behind", async ({ expect, onTestFinished }) => {
	const [directory, dispose] = await createScratchDirectory()
	onTestFinished(dispose)

	await expect(
		resolveSource("https://example.com/missing.txt", {
			temporaryDirectory: directory,
			fetch: async () => new Response("Not Found", { status: 404, statusText: "Not Found" }),
		})
	).rejects.toThrow("Failed to download https://example.com/missing.txt: HTTP 404 Not Found")

	await expect(
		resolveSource("https://example.com/offline.txt", {
			temporaryDirectory: directory,
			fetch: async () => {
				throw new TypeError("fetch failed")
			},
		})
	).rejects.toThrow(SourceResolutionError)

	expect(await fs.readdir(directory)).toEqual([])
})
