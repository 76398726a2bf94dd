import { expect, test } from "vitest"
import { assembleContext } from "../../src/retrieval/context"
import type { MergedNode } from "../../src/retrieval/types"
import { makeNode } from "../fixtures"

function entry(id: string, score: number, tokens: number, text: string): MergedNode {
  return { node: makeNode({ id, level: 2, tokens, text, page: 2 }), score, merged_from: [id] }
}

const merged = [
  entry("a", 0.9, 10, "  First passage.\n"),
  entry("b", 0.8, 20, "Second passage."),
  entry("c", 0.7, 30, "Third passage. "),
]

test("everything fits: texts are trimmed and joined by a blank line", () => {
  const context = assembleContext(merged, 100)
  expect(context.text).toBe("First passage.\n\nSecond passage.\n\nThird passage.")
  expect(context.token_count).toBe(60)
  expect(context.dropped).toEqual([])
  expect(context.citations.map((citation) => citation.id)).toEqual(["a", "b", "c"])
})

test("the lowest-scoring entries are dropped until the budget fits", () => {
  const context = assembleContext(merged, 35)
  expect(context.text).toBe("First passage.\n\nSecond passage.")
  expect(context.token_count).toBe(30)
  expect(context.dropped).toEqual(["c"])
})

test("score decides what is dropped, not position", () => {
  const context = assembleContext([entry("late", 0.95, 10, "Late."), entry("low", 0.1, 10, "Low."), entry("mid", 0.5, 10, "Mid.")], 20)
  expect(context.citations.map((citation) => citation.id)).toEqual(["late", "mid"])
  expect(context.dropped).toEqual(["low"])
})

test("citations carry score, level, and source metadata", () => {
  const [citation] = assembleContext(merged, 10).citations
  expect(citation).toEqual({
    id: "a",
    score: 0.9,
    level: 2,
    source_metadata: {
      document_id: "doc",
      page_start: 2,
      page_end: 2,
      offset_start: 0,
      offset_end: 17,
    },
  })
})

test("the best entry survives a budget smaller than every entry", () => {
  const context = assembleContext(merged, 5)
  expect(context.text).toBe("First passage.")
  expect(context.token_count).toBe(3)
  expect(context.citations.map((citation) => citation.id)).toEqual(["a"])
  expect(context.dropped).toEqual(["c", "b"])
})

test("an over-budget top entry is cut at a sentence boundary", () => {
  const root: MergedNode = {
    node: makeNode({ id: "root", level: 1, tokens: 400, text: "Alpha beta gamma. Delta epsilon zeta. Eta theta iota." }),
    score: 0.9,
    merged_from: ["leaf-1", "leaf-2"],
  }
  const context = assembleContext([root, entry("leaf-9", 0.4, 10, "Other passage.")], 8)
  expect(context.text).toBe("Alpha beta gamma. Delta epsilon zeta.")
  expect(context.token_count).toBe(8)
  expect(context.citations.map((citation) => citation.id)).toEqual(["root"])
  expect(context.dropped).toEqual(["leaf-9"])
})

test("a first sentence longer than the budget is cut at a token boundary", () => {
  const context = assembleContext([entry("long", 0.7, 50, "Alpha beta gamma delta epsilon.")], 2)
  expect(context.text).toBe("Alpha beta")
  expect(context.token_count).toBe(2)
  expect(context.citations.map((citation) => citation.id)).toEqual(["long"])
})
