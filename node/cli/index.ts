#!/usr/bin/env node

/**
 * @copyright Sister Software
 * @license AGPL-3.0
 * @author Teffen Ellis, et al.
 * @file CLI entry point.
 */

import { hideBin } from "yargs/helpers"
import { createCommandLine } from "./program.js"

await createCommandLine(hideBin(process.argv)).parseAsync()
