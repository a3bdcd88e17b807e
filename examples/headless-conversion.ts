/**
 * @copyright Sister Software
 * @license AGPL-3.0
 * @author Teffen Ellis, et al.
 */

import { convertFile, createLogger, detectSeparatorFromFile, separatorExpression } from "../index.js"
import { fixturesDirectory } from "../test/utils.js"

const source = fixturesDirectory("people.txt")
const separator = await detectSeparatorFromFile(source)

const summary = await convertFile({
	source,
	destination: "people_pg.csv",
	separator: separatorExpression(separator),
	columns: ["id", "name", "birthday"],
	logger: createLogger({ level: "debug" }),
})

console.log(`Wrote ${summary.recordCount} records (${summary.bytesRead} bytes read) to ${summary.destination}`)
