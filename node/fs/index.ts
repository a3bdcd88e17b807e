/**
 * @copyright Sister Software
 * @license AGPL-3.0
 * @author Teffen Ellis, et al.
 */

import { randomUUID } from "node:crypto"
import { open, readdir, rm, stat } from "node:fs/promises"
import { tmpdir } from "node:os"
import * as path from "node:path"
import { SourceResolutionError } from "../../lib/errors.js"
import { Logger, silentLogger } from "../../lib/logger.js"

/**
 * A readable local file, plus whatever it takes to release it.
 */
export interface ResolvedSource {
	/**
	 * Absolute path to a readable file.
	 */
	path: string

	/**
	 * Whether the file is a temporary download of a remote source.
	 */
	remote: boolean

	/**
	 * Release any temporary resources. Safe to call more than once.
	 */
	cleanup(): Promise<void>
}

/**
 * Pick one of several candidate files, e.g. by asking the user.
 *
 * @param candidates Absolute paths, sorted by name.
 * @returns One of the candidates.
 */
export type FileChooser = (candidates: readonly string[]) => Promise<string>

export interface ResolveSourceInit {
	/**
	 * Called when the input is a directory containing text files.
	 *
	 * @default The first candidate.
	 */
	chooseFile?: FileChooser

	/**
	 * The fetch implementation used to download remote sources.
	 *
	 * @default globalThis.fetch
	 */
	fetch?: typeof globalThis.fetch

	/**
	 * Where remote sources are downloaded to.
	 *
	 * @default os.tmpdir()
	 */
	temporaryDirectory?: string

	/**
	 * The extension of the files offered when the input is a directory.
	 *
	 * @default ".txt"
	 */
	extension?: string

	logger?: Logger
}

/**
 * Type-predicate to determine if the input is an HTTP(S) URL.
 */
export function isRemoteSource(input: string): boolean {
	return /^https?:\/\//i.test(input)
}

async function statOrUndefined(input: string) {
	return stat(input).catch((error: unknown) => {
		if (error instanceof Error && "code" in error && error.code === "ENOENT") return undefined

		throw error
	})
}

/**
 * List the files in a directory with the given extension, compared case-insensitively.
 *
 * @returns Absolute paths, sorted by name.
 */
export async function listFiles(directory: string, extension: string = ".txt"): Promise<string[]> {
	const entries = await readdir(directory, { withFileTypes: true })
	const wantedExtension = extension.toLowerCase()

	return entries
		.filter((entry) => entry.isFile() && path.extname(entry.name).toLowerCase() === wantedExtension)
		.map((entry) => path.resolve(directory, entry.name))
		.sort()
}

/**
 * Download a remote source into a temporary file.
 *
 * The partial file is removed if the download fails.
 */
export async function downloadToTemporaryFile(
	url: string,
	{ fetch = globalThis.fetch, temporaryDirectory = tmpdir(), logger = silentLogger }: ResolveSourceInit = {}
): Promise<string> {
	const destination = path.join(temporaryDirectory, `txt2pg-${randomUUID()}.txt`)

	logger.info(`Downloading ${url}`)

	let response: Response

	try {
		response = await fetch(url)
	} catch (error) {
		throw new SourceResolutionError(`Failed to download ${url}`, { cause: error })
	}

	if (!response.ok) {
		throw new SourceResolutionError(`Failed to download ${url}: HTTP ${response.status} ${response.statusText}`)
	}

	const handle = await open(destination, "w")

	try {
		if (response.body) {
			const reader = response.body.getReader()

			try {
				for (;;) {
					const { done, value } = await reader.read()
					if (done) break

					await handle.write(value)
				}
			} finally {
				reader.releaseLock()
			}
		}

		await handle.close()
	} catch (error) {
		await handle.close().catch((closeError: unknown) => {
			logger.debug(`Failed to close ${destination}`, closeError)
		})
		await rm(destination, { force: true })

		throw new SourceResolutionError(`Failed to download ${url}`, { cause: error })
	}

	logger.debug(`Downloaded ${url} to ${destination}`)

	return destination
}

/**
 * Turn a path, directory or URL into a readable local file.
 *
 * - A file resolves to itself. Its cleanup does nothing.
 * - A directory offers its `.txt` files to `chooseFile`.
 * - An HTTP(S) URL is downloaded into a temporary file, which cleanup deletes.
 *
 * @throws {SourceResolutionError} When the input is none of these, or the download fails.
 */
export async function resolveSource(input: string, init: ResolveSourceInit = {}): Promise<ResolvedSource> {
	const { chooseFile, extension = ".txt" } = init
	const trimmedInput = input.trim()

	if (!trimmedInput) {
		throw new SourceResolutionError("No source was provided.")
	}

	const stats = await statOrUndefined(trimmedInput)

	if (stats?.isFile()) {
		return {
			path: path.resolve(trimmedInput),
			remote: false,
			cleanup: async () => void 0,
		}
	}

	if (stats?.isDirectory()) {
		const candidates = await listFiles(trimmedInput, extension)

		if (candidates.length === 0) {
			throw new SourceResolutionError(`No ${extension} files found in ${trimmedInput}`)
		}

		const chosen = chooseFile ? await chooseFile(candidates) : candidates[0]

		if (!chosen || !candidates.includes(chosen)) {
			throw new SourceResolutionError(`Not one of the files in ${trimmedInput}: ${chosen}`)
		}

		return {
			path: chosen,
			remote: false,
			cleanup: async () => void 0,
		}
	}

	if (isRemoteSource(trimmedInput)) {
		const downloadPath = await downloadToTemporaryFile(trimmedInput, init)

		return {
			path: downloadPath,
			remote: true,
			cleanup: () => rm(downloadPath, { force: true }),
		}
	}

	throw new SourceResolutionError(`Not a file, directory or URL: ${trimmedInput}`)
}
