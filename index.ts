/**
 * @copyright Sister Software
 * @license AGPL-3.0
 * @author Teffen Ellis, et al.
 */

export * from "./lib/casing.js"
export * from "./lib/CharacterSequence.js"
export * from "./lib/convert.js"
export * from "./lib/dates.js"
export * from "./lib/errors.js"
export * from "./lib/LineReader.js"
export * from "./lib/logger.js"
export * from "./lib/RecordTransformer.js"
export * from "./lib/separators.js"
export * from "./lib/shared.js"
export * from "./lib/writer.js"
export * from "./node/cli/run.js"
export * from "./node/fs/index.js"
