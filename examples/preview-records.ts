/**
 * @copyright Sister Software
 * @license AGPL-3.0
 * @author Teffen Ellis, et al.
 */

import * as Colorette from "colorette"
import { createRecordTransformer, debugAsVisibleCharacters, LineReader } from "../index.js"
import { fixturesDirectory } from "../test/utils.js"

const lines = await LineReader.fromAsync(fixturesDirectory("visits.txt"), {
	take: 10,
})

const transform = createRecordTransformer({
	separator: ";",
	columns: ["id", "name", "date"],
})

for await (const line of lines) {
	const record = transform(line.text)

	console.log(`${Colorette.bold(line.index + 1)}, ${Colorette.yellow(debugAsVisibleCharacters(line.text))}`)
	console.table([Object.fromEntries(transform.columns.map((column, idx) => [column, record[idx]]))])
}
