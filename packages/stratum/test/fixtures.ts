import { parseConfig } from "../src/config/config"
import type { TreeNode } from "../src/tree/types"

/** Three small levels so short test documents still build a full tree. */
export const SMALL_LEVELS = [
  { level: 1, target_token_count: 20, min_token_count: 5 },
  { level: 2, target_token_count: 8, min_token_count: 2 },
  { level: 3, target_token_count: 4, min_token_count: 1 },
]

export const FAST_RETRY = {
  retries: 1,
  min_timeout_ms: 0,
  max_timeout_ms: 0,
  attempt_timeout_ms: 1_000,
}

export function smallConfig(overrides: Record<string, unknown> = {}) {
  return parseConfig({ levels: SMALL_LEVELS, retry: FAST_RETRY, ...overrides })
}

export const GUIDE_PAGES = [
  { page_number: 1, text: "Alpha beta gamma. Delta epsilon zeta. Eta theta iota." },
  { page_number: 2, text: "Kappa lambda mu. Nu xi omicron. Pi rho sigma." },
]

export function makeNode(input: {
  id: string
  level: number
  parent?: string
  children?: string[]
  document?: string
  offset?: number
  page?: number
  tokens?: number
  text?: string
}): TreeNode {
  const offset = input.offset ?? 0
  const text = input.text ?? input.id
  return {
    id: input.id,
    level: input.level,
    text,
    token_count: input.tokens ?? 1,
    ...(input.parent ? { parent_id: input.parent } : {}),
    children_ids: input.children ?? [],
    source_metadata: {
      document_id: input.document ?? "doc",
      page_start: input.page ?? 1,
      page_end: input.page ?? 1,
      offset_start: offset,
      offset_end: offset + text.length,
    },
  }
}

/**
 * R (level 1) → P, Q (level 2); P → L1..L4, Q → L5, L6 (level 3).
 */
export function sampleTree(document = "doc"): TreeNode[] {
  const id = (name: string) => (document === "doc" ? name : `${document}:${name}`)
  const leaf = (name: string, parent: string, offset: number) =>
    makeNode({ id: id(name), level: 3, parent: id(parent), document, offset, tokens: 5 })
  return [
    makeNode({ id: id("R"), level: 1, children: [id("P"), id("Q")], document, tokens: 30 }),
    makeNode({ id: id("P"), level: 2, parent: id("R"), children: ["L1", "L2", "L3", "L4"].map(id), document, tokens: 20 }),
    makeNode({ id: id("Q"), level: 2, parent: id("R"), children: ["L5", "L6"].map(id), document, offset: 40, tokens: 10 }),
    leaf("L1", "P", 0),
    leaf("L2", "P", 10),
    leaf("L3", "P", 20),
    leaf("L4", "P", 30),
    leaf("L5", "Q", 40),
    leaf("L6", "Q", 50),
  ]
}
