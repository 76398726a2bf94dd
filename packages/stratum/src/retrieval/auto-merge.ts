import type { MergeScoreRule, StratumConfig } from "@/config/config"
import { StaleReferenceWarning } from "@/error"
import type { DocumentTree, NodeStore } from "@/tree/store"
import type { TreeNode } from "@/tree/types"
import { Log } from "@/util/log"
import type { MergedNode, ScoredID } from "./types"

const log = Log.create({ service: "retrieval.merge" })

type Candidate = {
  node: TreeNode
  tree: DocumentTree
  score: number
  merged_from: string[]
}

function mergedScore(rule: MergeScoreRule, scores: number[]) {
  if (rule === "mean") {
    return scores.reduce((sum, score) => sum + score, 0) / scores.length
  }
  return Math.max(...scores)
}

/** Document order: offset, then coarser level first, then id. */
function inDocumentOrder(tree: DocumentTree, ids: string[]) {
  const key = (id: string) => {
    const node = tree.get(id)
    return { offset: node?.source_metadata.offset_start ?? 0, level: node?.level ?? 0 }
  }
  return [...ids].sort((a, b) => {
    const left = key(a)
    const right = key(b)
    return left.offset - right.offset || left.level - right.level || (a < b ? -1 : a > b ? 1 : 0)
  })
}

export function compareMerged(a: MergedNode, b: MergedNode) {
  return (
    b.score - a.score ||
    a.node.source_metadata.page_start - b.node.source_metadata.page_start ||
    a.node.source_metadata.offset_start - b.node.source_metadata.offset_start ||
    (a.node.id < b.node.id ? -1 : a.node.id > b.node.id ? 1 : 0)
  )
}

/**
 * Replaces sibling groups of retrieved nodes with their parent, one level at a
 * time from the deepest level upward. A promoted parent takes part in the
 * grouping of its own level, so merges can cascade up to a root.
 */
export class AutoMergeEngine {
  private readonly threshold: number
  private readonly rule: MergeScoreRule

  constructor(
    private readonly store: NodeStore,
    config: Pick<StratumConfig, "merge_threshold" | "merge_score">,
  ) {
    this.threshold = config.merge_threshold
    this.rule = config.merge_score
  }

  merge(results: readonly ScoredID[]): MergedNode[] {
    if (this.store.isEmpty) return []

    const working = new Map<string, Candidate>()
    // First lookup pins the document's tree for the rest of the pass.
    const pinned = new Map<string, DocumentTree>()

    for (const result of results) {
      const previous = working.get(result.id)
      if (previous) {
        previous.score = Math.max(previous.score, result.score)
        continue
      }
      const tree = this.pin(pinned, result.id)
      const node = tree?.get(result.id)
      if (!tree || !node) {
        const warning = new StaleReferenceWarning(result.id)
        log.warn(warning.message, { code: warning.code, nodeID: warning.nodeID })
        continue
      }
      working.set(node.id, { node, tree, score: result.score, merged_from: [node.id] })
    }

    let deepest = 0
    for (const candidate of working.values()) deepest = Math.max(deepest, candidate.node.level)

    for (let level = deepest; level >= 2; level -= 1) {
      const groups = new Map<string, Candidate[]>()
      for (const candidate of working.values()) {
        if (candidate.node.level !== level || !candidate.node.parent_id) continue
        const group = groups.get(candidate.node.parent_id)
        if (group) group.push(candidate)
        else groups.set(candidate.node.parent_id, [candidate])
      }

      for (const [parentID, members] of groups) {
        if (members.length < this.threshold) continue
        const first = members[0]
        if (!first) continue
        const parent = first.tree.get(parentID)
        if (!parent || parent.source_metadata.document_id !== first.node.source_metadata.document_id) continue

        members.sort((a, b) => a.node.source_metadata.offset_start - b.node.source_metadata.offset_start)
        for (const member of members) working.delete(member.node.id)
        const score = mergedScore(
          this.rule,
          members.map((member) => member.score),
        )
        const mergedFrom = members.flatMap((member) => member.merged_from)
        const existing = working.get(parent.id)
        working.set(parent.id, {
          node: parent,
          tree: first.tree,
          score: existing ? Math.max(existing.score, score) : score,
          merged_from: existing ? inDocumentOrder(first.tree, [...existing.merged_from, ...mergedFrom]) : mergedFrom,
        })
        log.debug("merged", { parentID, members: members.length })
      }
    }

    return Array.from(working.values())
      .map((candidate) => ({ node: candidate.node, score: candidate.score, merged_from: candidate.merged_from }))
      .sort(compareMerged)
  }

  private pin(pinned: Map<string, DocumentTree>, id: string) {
    const current = this.store.treeFor(id)
    if (!current) return undefined
    const existing = pinned.get(current.documentID)
    if (existing) return existing
    pinned.set(current.documentID, current)
    return current
  }
}
