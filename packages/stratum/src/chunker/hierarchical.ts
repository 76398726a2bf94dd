import type { LevelConfig, StratumConfig } from "@/config/config"
import { ChunkingError } from "@/error"
import type { ChunkTree, DocumentPage, TreeNode } from "@/tree/types"
import { normalizeDocument, pageRange, splitUnits, type NormalizedDocument, type TextUnit } from "./segment"

/** Nodes tile their parent's span exactly, so children join with the empty string. */
export const CHILD_JOINER = ""

type UnitRange = {
  from: number
  to: number
}

export type ChunkInput = {
  documentID: string
  pages: DocumentPage[]
  title?: string
  sourcePath?: string
}

export function nodeID(documentID: string, level: number, ordinal: number) {
  return `${documentID}::${level}-${ordinal}`
}

/**
 * Greedy boundary-respecting split of `units[range]` for one level.
 *
 * Units are added until the running total reaches the target. A segment is
 * closed early when the next unit would push it past `target * tolerance` and
 * it already holds `min` tokens. A trailing segment under `min` joins its
 * predecessor.
 */
export function groupUnits(
  units: readonly TextUnit[],
  range: UnitRange,
  level: Readonly<LevelConfig>,
  tolerance: number,
): UnitRange[] {
  let total = 0
  for (let i = range.from; i < range.to; i += 1) total += units[i]?.tokens ?? 0
  if (total <= level.target_token_count) {
    return [{ ...range }]
  }

  const ceiling = level.target_token_count * tolerance
  const groups: UnitRange[] = []
  let start = range.from
  let tokens = 0

  for (let i = range.from; i < range.to; i += 1) {
    const next = units[i]?.tokens ?? 0
    if (i > start && tokens >= level.min_token_count && tokens + next > ceiling) {
      groups.push({ from: start, to: i })
      start = i
      tokens = 0
    }
    tokens += next
    if (tokens >= level.target_token_count) {
      groups.push({ from: start, to: i + 1 })
      start = i + 1
      tokens = 0
    }
  }

  if (start < range.to) {
    const previous = groups[groups.length - 1]
    if (previous && tokens < level.min_token_count) {
      previous.to = range.to
    } else {
      groups.push({ from: start, to: range.to })
    }
  }
  return groups
}

type Draft = {
  node: TreeNode
  range: UnitRange
}

export class HierarchicalChunker {
  private readonly levels: readonly Readonly<LevelConfig>[]
  private readonly tolerance: number

  constructor(config: Pick<StratumConfig, "levels" | "tolerance">) {
    this.levels = config.levels
    this.tolerance = config.tolerance
  }

  get leafLevel() {
    return this.levels.length
  }

  chunk(input: ChunkInput): ChunkTree {
    const documentID = input.documentID.trim()
    if (!documentID) {
      throw new ChunkingError("Document id is required")
    }
    for (const page of input.pages) {
      if (!Number.isInteger(page.page_number) || page.page_number < 0) {
        throw new ChunkingError(`Invalid page number in ${documentID}: ${page.page_number}`)
      }
    }

    const doc = normalizeDocument(input.pages)
    const empty: ChunkTree = { document_id: documentID, nodes: [], root_ids: [], leaf_ids: [], text: doc.text }
    if (doc.text.length === 0) {
      return empty
    }

    const units = splitUnits(doc.text)
    if (units.length === 0) {
      return empty
    }

    const nodes: TreeNode[] = []
    let frontier: Draft[] = []

    this.levels.forEach((level, depth) => {
      let ordinal = 0
      const next: Draft[] = []
      const parents: Array<Draft | undefined> = depth === 0 ? [undefined] : frontier

      for (const parent of parents) {
        const range = parent ? parent.range : { from: 0, to: units.length }
        for (const group of groupUnits(units, range, level, this.tolerance)) {
          const node = this.buildNode({
            doc,
            units,
            range: group,
            documentID,
            level: level.level,
            ordinal,
            parentID: parent?.node.id,
            title: input.title,
            sourcePath: input.sourcePath,
          })
          ordinal += 1
          parent?.node.children_ids.push(node.id)
          nodes.push(node)
          next.push({ node, range: group })
        }
      }
      frontier = next
    })

    const leafLevel = this.leafLevel
    return {
      document_id: documentID,
      nodes,
      root_ids: nodes.filter((node) => node.parent_id === undefined).map((node) => node.id),
      leaf_ids: nodes.filter((node) => node.level === leafLevel).map((node) => node.id),
      text: doc.text,
    }
  }

  private buildNode(input: {
    doc: NormalizedDocument
    units: readonly TextUnit[]
    range: UnitRange
    documentID: string
    level: number
    ordinal: number
    parentID?: string
    title?: string
    sourcePath?: string
  }): TreeNode {
    const first = input.units[input.range.from]
    const last = input.units[input.range.to - 1]
    const start = first?.start ?? 0
    const end = last?.end ?? start
    let tokens = 0
    for (let i = input.range.from; i < input.range.to; i += 1) tokens += input.units[i]?.tokens ?? 0

    return {
      id: nodeID(input.documentID, input.level, input.ordinal),
      level: input.level,
      text: input.doc.text.slice(start, end),
      token_count: tokens,
      ...(input.parentID ? { parent_id: input.parentID } : {}),
      children_ids: [],
      source_metadata: {
        document_id: input.documentID,
        ...pageRange(input.doc, start, end),
        offset_start: start,
        offset_end: end,
        ...(input.title ? { title: input.title } : {}),
        ...(input.sourcePath ? { source_path: input.sourcePath } : {}),
      },
    }
  }
}
