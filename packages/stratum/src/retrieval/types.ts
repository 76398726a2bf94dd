import type { SourceMetadata, TreeNode } from "@/tree/types"

/** A node id with its similarity to the query. */
export type ScoredID = {
  id: string
  score: number
}

export type MergedNode = {
  node: TreeNode
  score: number
  /** Ids from the retrieval results this entry stands for, in document order. */
  merged_from: string[]
}

export type Citation = {
  id: string
  score: number
  level: number
  source_metadata: SourceMetadata
}

export type AssembledContext = {
  text: string
  token_count: number
  citations: Citation[]
  /** Entries dropped to fit the token budget, lowest score first. */
  dropped: string[]
}
