import { expect, test } from "vitest"
import { CHILD_JOINER, HierarchicalChunker, groupUnits } from "../../src/chunker/hierarchical"
import { normalizeDocument, splitUnits } from "../../src/chunker/segment"
import { countTokens } from "../../src/chunker/tokenizer"
import { ChunkingError } from "../../src/error"
import { GUIDE_PAGES, SMALL_LEVELS, smallConfig } from "../fixtures"

const chunker = () => new HierarchicalChunker(smallConfig())

test("tokenizer counts words, punctuation, and CJK ideographs", () => {
  expect(countTokens("Alpha beta gamma.")).toBe(4)
  expect(countTokens("snake_case 42")).toBe(2)
  expect(countTokens("分块测试")).toBe(4)
  expect(countTokens("   ")).toBe(0)
})

test("pages are trimmed, blank pages dropped, and joined by a blank line", () => {
  const doc = normalizeDocument([
    { page_number: 1, text: "  First.\r\n" },
    { page_number: 2, text: "   " },
    { page_number: 3, text: "Third." },
  ])
  expect(doc.text).toBe("First.\n\nThird.")
  expect(doc.pages).toEqual([
    { page_number: 1, start: 0, end: 6 },
    { page_number: 3, start: 8, end: 14 },
  ])
})

test("units own their trailing whitespace", () => {
  const units = splitUnits("One two. Three four!\n\nFive")
  expect(units).toEqual([
    { start: 0, end: 9, tokens: 3 },
    { start: 9, end: 22, tokens: 3 },
    { start: 22, end: 26, tokens: 1 },
  ])
})

test("groupUnits merges a short trailing segment into its predecessor", () => {
  const units = [4, 4, 4, 4, 4, 4].map((tokens, i) => ({ start: i, end: i + 1, tokens }))
  const level = SMALL_LEVELS[0]
  if (!level) throw new Error("missing level")
  expect(groupUnits(units, { from: 0, to: 6 }, level, 1.25)).toEqual([{ from: 0, to: 6 }])
})

test("builds one root, three mid nodes, and six leaves with deterministic ids", () => {
  const tree = chunker().chunk({ documentID: "guide", pages: GUIDE_PAGES })
  expect(tree.root_ids).toEqual(["guide::1-0"])
  expect(tree.nodes.filter((node) => node.level === 2).map((node) => node.id)).toEqual([
    "guide::2-0",
    "guide::2-1",
    "guide::2-2",
  ])
  expect(tree.leaf_ids).toEqual(["guide::3-0", "guide::3-1", "guide::3-2", "guide::3-3", "guide::3-4", "guide::3-5"])

  const leaves = tree.nodes.filter((node) => node.level === 3)
  expect(leaves.map((leaf) => leaf.text)).toEqual([
    "Alpha beta gamma. ",
    "Delta epsilon zeta. ",
    "Eta theta iota.\n\n",
    "Kappa lambda mu. ",
    "Nu xi omicron. ",
    "Pi rho sigma.",
  ])
  expect(leaves.map((leaf) => leaf.token_count)).toEqual([4, 4, 4, 4, 4, 4])
})

test("leaves concatenate back to the normalized document", () => {
  const tree = chunker().chunk({ documentID: "guide", pages: GUIDE_PAGES })
  const leaves = tree.nodes.filter((node) => tree.leaf_ids.includes(node.id))
  expect(leaves.map((leaf) => leaf.text).join(CHILD_JOINER)).toBe(tree.text)
})

test("every parent's text is exactly its children's text joined in order", () => {
  const tree = chunker().chunk({ documentID: "guide", pages: GUIDE_PAGES })
  const byID = new Map(tree.nodes.map((node) => [node.id, node]))
  for (const node of tree.nodes) {
    if (node.children_ids.length === 0) continue
    const children = node.children_ids.map((id) => byID.get(id))
    expect(children.map((child) => child?.text ?? "").join(CHILD_JOINER)).toBe(node.text)
    for (const child of children) {
      expect(child?.parent_id).toBe(node.id)
      expect(child?.level).toBe(node.level + 1)
    }
  }
})

test("source metadata tracks offsets and the pages a node touches", () => {
  const tree = chunker().chunk({ documentID: "guide", pages: GUIDE_PAGES, title: "Guide" })
  const byID = new Map(tree.nodes.map((node) => [node.id, node]))

  expect(byID.get("guide::3-2")?.source_metadata).toEqual({
    document_id: "guide",
    page_start: 1,
    page_end: 1,
    offset_start: 38,
    offset_end: 55,
    title: "Guide",
  })
  expect(byID.get("guide::3-3")?.source_metadata.page_start).toBe(2)
  expect(byID.get("guide::3-3")?.source_metadata.offset_start).toBe(55)

  const spanning = byID.get("guide::2-1")?.source_metadata
  expect(spanning?.page_start).toBe(1)
  expect(spanning?.page_end).toBe(2)
})

test("leaf token counts stay within the tolerance band", () => {
  const pages = [
    {
      page_number: 1,
      text: Array.from({ length: 30 }, (_, i) => `Sentence number ${i} ends here.`).join(" "),
    },
  ]
  const tree = new HierarchicalChunker(smallConfig({ levels: [
    { level: 1, target_token_count: 60, min_token_count: 10 },
    { level: 2, target_token_count: 12, min_token_count: 6 },
  ] })).chunk({ documentID: "long", pages })

  const leaves = tree.nodes.filter((node) => node.level === 2)
  expect(leaves.length).toBeGreaterThan(1)
  for (const leaf of leaves) {
    expect(leaf.token_count).toBeLessThanOrEqual(15)
    expect(leaf.token_count).toBeGreaterThanOrEqual(6)
  }
})

test("empty document yields an empty tree without error", () => {
  const tree = chunker().chunk({ documentID: "empty", pages: [{ page_number: 1, text: " \n " }] })
  expect(tree.nodes).toEqual([])
  expect(tree.root_ids).toEqual([])
  expect(tree.leaf_ids).toEqual([])
})

test("a document below every target becomes a single-child chain", () => {
  const tree = chunker().chunk({ documentID: "short", pages: [{ page_number: 1, text: "Just one sentence." }] })
  expect(tree.nodes.map((node) => node.id)).toEqual(["short::1-0", "short::2-0", "short::3-0"])
  expect(tree.nodes.map((node) => node.text)).toEqual(["Just one sentence.", "Just one sentence.", "Just one sentence."])
  expect(tree.nodes.map((node) => node.children_ids)).toEqual([["short::2-0"], ["short::3-0"], []])
})

test("a single word becomes one node per level", () => {
  const tree = chunker().chunk({ documentID: "word", pages: [{ page_number: 4, text: "Hello" }] })
  expect(tree.nodes).toHaveLength(3)
  expect(tree.leaf_ids).toEqual(["word::3-0"])
  expect(tree.nodes[2]?.token_count).toBe(1)
  expect(tree.nodes[2]?.source_metadata.page_start).toBe(4)
})

test("a blank document id is rejected", () => {
  expect(() => chunker().chunk({ documentID: "  ", pages: GUIDE_PAGES })).toThrow(ChunkingError)
})

test("a negative page number is rejected", () => {
  expect(() => chunker().chunk({ documentID: "bad", pages: [{ page_number: -1, text: "x" }] })).toThrow(ChunkingError)
})
