import { z } from "zod"

export const SourceMetadata = z.object({
  document_id: z.string().min(1),
  page_start: z.number().int().nonnegative(),
  page_end: z.number().int().nonnegative(),
  offset_start: z.number().int().nonnegative(),
  offset_end: z.number().int().nonnegative(),
  title: z.string().optional(),
  source_path: z.string().optional(),
})
export type SourceMetadata = z.infer<typeof SourceMetadata>

export const TreeNode = z.object({
  id: z.string().min(1),
  level: z.number().int().positive(),
  text: z.string(),
  token_count: z.number().int().nonnegative(),
  parent_id: z.string().optional(),
  children_ids: z.array(z.string()),
  source_metadata: SourceMetadata,
})
export type TreeNode = z.infer<typeof TreeNode>

export const PersistedTree = z.object({
  document_id: z.string().min(1),
  levels: z.number().int().positive(),
  nodes: z.array(TreeNode),
  indexed_at: z.number(),
})
export type PersistedTree = z.infer<typeof PersistedTree>

export type DocumentPage = {
  page_number: number
  text: string
}

export type ChunkTree = {
  document_id: string
  /** Every node, parents before children, siblings in document order. */
  nodes: TreeNode[]
  root_ids: string[]
  leaf_ids: string[]
  /** The normalized text the tree tiles. */
  text: string
}

export function isLeaf(node: TreeNode) {
  return node.children_ids.length === 0
}
