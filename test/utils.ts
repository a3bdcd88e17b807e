/**
 * @copyright Sister Software
 * @license AGPL-3.0
 * @author Teffen Ellis, et al.
 */

import * as fs from "node:fs/promises"
import { tmpdir } from "node:os"
import * as path from "node:path"
import { fileURLToPath } from "node:url"

const fixturesRoot = fileURLToPath(new URL("./fixtures/", import.meta.url))

export function fixturesDirectory(...segments: string[]): string {
	return path.join(fixturesRoot, ...segments)
}

/**
 * Create an empty scratch directory, removed by the returned disposer.
 */
export async function createScratchDirectory(): Promise<[directory: string, dispose: () => Promise<void>]> {
	const directory = await fs.mkdtemp(path.join(tmpdir(), "txt2pg-test-"))

	return [directory, () => fs.rm(directory, { recursive: true, force: true })]
}

/**
 * Copy a fixture into a directory, returning the copy's path.
 */
export async function copyFixture(fixtureName: string, directory: string): Promise<string> {
	const destination = path.join(directory, fixtureName)

	await fs.copyFile(fixturesDirectory(fixtureName), destination)

	return destination
}

export async function pathExists(filePath: string): Promise<boolean> {
	return fs.access(filePath).then(
		() => true,
		() => false
	)
}

/**
 * An async chunk iterator over the given chunks, as a file read in pieces would produce.
 */
export async function* chunksOf(...chunks: Array<string | Uint8Array>): AsyncGenerator<Uint8Array> {
	const encoder = new TextEncoder()

	for (const chunk of chunks) {
		yield typeof chunk === "string" ? encoder.encode(chunk) : chunk
	}
}
