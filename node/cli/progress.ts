/**
 * @copyright Sister Software
 * @license AGPL-3.0
 * @author Teffen Ellis, et al.
 */

import * as Colorette from "colorette"
import type { ProgressObserver } from "../../lib/shared.js"

const ByteUnits = ["B", "KB", "MB", "GB", "TB"] as const

/**
 * Format a byte count for humans, e.g. `1.5 KB`.
 */
export function formatBytes(bytes: number): string {
	if (bytes < 1024) return `${bytes} B`

	let value = bytes
	let unitIndex = 0

	while (value >= 1024 && unitIndex < ByteUnits.length - 1) {
		value /= 1024
		unitIndex++
	}

	return `${value.toFixed(1)} ${ByteUnits[unitIndex]}`
}

/**
 * Where progress is drawn, typically `process.stderr`.
 */
export interface ProgressSink {
	write(chunk: string): unknown
	isTTY?: boolean
}

export interface ProgressReporterInit {
	sink?: ProgressSink
	label?: string

	/**
	 * @default 30
	 */
	width?: number

	/**
	 * @default Colorette.isColorSupported
	 */
	colors?: boolean
}

export interface ProgressReporter extends ProgressObserver {
	/**
	 * End the progress line, if one was drawn.
	 */
	onComplete(): void
}

/**
 * Draw conversion progress as a single line which is rewritten in place.
 *
 * The line is only redrawn when the whole percentage changes.
 */
export function createProgressReporter({
	sink = process.stderr,
	label = "Processing",
	width = 30,
	colors = Colorette.isColorSupported,
}: ProgressReporterInit = {}): ProgressReporter {
	const { green, dim } = Colorette.createColors({ useColor: colors })
	let lastPercent = -1

	return {
		onProgress(bytesRead, totalBytes) {
			if (totalBytes <= 0) return

			const percent = Math.min(100, Math.floor((bytesRead / totalBytes) * 100))
			if (percent === lastPercent) return

			lastPercent = percent

			const filled = Math.round((percent / 100) * width)
			const bar = green("█".repeat(filled)) + dim("░".repeat(width - filled))

			sink.write(`\r${label} ${bar} ${percent}% ${formatBytes(bytesRead)} / ${formatBytes(totalBytes)}`)
		},

		onComplete() {
			if (lastPercent === -1) return

			sink.write("\n")
			lastPercent = -1
		},
	}
}
