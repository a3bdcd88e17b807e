/**
 * @copyright Sister Software
 * @license AGPL-3.0
 * @author Teffen Ellis, et al.
 */

import { test } from "vitest"
import { debugAsVisibleCharacters } from "../lib/CharacterSequence.js"
import { InvalidPatternError } from "../lib/errors.js"
import { compileSeparatorPattern, detectSeparator, separatorExpression } from "../lib/separators.js"

test("Majority delimiter is detected", async ({ expect }) => {
	expect(detectSeparator("a|b|c"), "Vertical bar").toBe("|")
	expect(detectSeparator("a,b,c"), "Comma").toBe(",")
	expect(detectSeparator("a;b;c"), "Semicolon").toBe(";")
	expect(detectSeparator("a\tb\tc"), "Tab").toBe("\t")
	expect(detectSeparator("a;b;c,d"), "Semicolons outnumber the comma").toBe(";")
})

test("Lines without a delimiter fall back to the vertical bar", async ({ expect }) => {
	expect(detectSeparator("abc"), "No candidates").toBe("|")
	expect(detectSeparator(""), "Empty line").toBe("|")
})

test("Ties are broken by priority order", async ({ expect }) => {
	expect(detectSeparator("a,b;c"), "Comma before semicolon").toBe(",")
	expect(detectSeparator("a\tb;c"), "Semicolon before tab").toBe(";")
	expect(detectSeparator("a|b,c;d\te"), "Vertical bar first").toBe("|")
})

test("Candidates have regular expression forms", async ({ expect }) => {
	expect(separatorExpression("|")).toBe("\\|")
	expect(separatorExpression(",")).toBe(",")
	expect(separatorExpression(";")).toBe(";")
	expect(separatorExpression("\t")).toBe("\\t")

	expect(debugAsVisibleCharacters("\t"), "Tabs are made visible").toBe("␉")
})

test("Separator pattern consumes surrounding whitespace", async ({ expect }) => {
	const pattern = compileSeparatorPattern("\\|")

	expect("1 |  Alice\t| x".split(pattern)).toEqual(["1", "Alice", "x"])
	expect(pattern.source, "Pattern source").toBe("\\s*(?:\\|)\\s*")
})

test("Separator expressions may be multi-character patterns", async ({ expect }) => {
	expect("a::b :: c".split(compileSeparatorPattern("::"))).toEqual(["a", "b", "c"])
	expect("a;b,c".split(compileSeparatorPattern("[;,]"))).toEqual(["a", "b", "c"])
	expect("a|b".split(compileSeparatorPattern("x|\\|")), "Alternation stays inside the separator").toEqual(["a", "b"])
})

test("Uncompilable separator expressions are rejected", async ({ expect }) => {
	expect(() => compileSeparatorPattern("("), "Unbalanced group").toThrow(InvalidPatternError)
	expect(() => compileSeparatorPattern("[a-"), "Unterminated class").toThrow(InvalidPatternError)
	expect(() => compileSeparatorPattern(""), "Empty expression").toThrow(InvalidPatternError)

	let caught: unknown

	try {
		compileSeparatorPattern("(")
	} catch (error) {
		caught = error
	}

	expect(caught, "Error keeps the expression and its cause").toMatchObject({
		expression: "(",
		cause: expect.any(SyntaxError),
	})
})
