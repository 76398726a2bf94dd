import type { StratumConfig } from "@/config/config"
import { ChunkingError, DocumentLoadError, StratumError, errorMessage } from "@/error"
import type { ChunkInput, HierarchicalChunker } from "@/chunker/hierarchical"
import { listDocuments, loadDocument } from "@/document/loader"
import type { EmbeddingProvider, VectorIndex, VectorRecord } from "@/provider/types"
import { TreeRepository } from "@/tree/repository"
import type { NodeStore } from "@/tree/store"
import { Log } from "@/util/log"

const log = Log.create({ service: "indexing" })

export type IndexedDocument = {
  document_id: string
  nodes: number
  leaves: number
  removed_vectors: number
}

export type SkippedDocument = {
  source: string
  code: string
  message: string
}

export type BatchResult = {
  indexed: IndexedDocument[]
  skipped: SkippedDocument[]
}

/** Progress callbacks for batch indexing. Every method is optional. */
export type IndexProgressSink = {
  onStart?(total: number): void
  onDocument?(result: IndexedDocument, done: number, total: number): void
  onSkip?(skipped: SkippedDocument, done: number, total: number): void
}

export type IndexStats = {
  documents: number
  nodes: number
  leaves: number
  levels: Array<{ level: number; nodes: number }>
  vector_index: string
  embedder: string
}

/**
 * Chunks documents, embeds their leaves, and keeps the node store, the vector
 * index, and the persisted trees in step. Writes to one document run one at a
 * time under the store's document lock.
 */
export class IndexService {
  constructor(
    private readonly input: {
      config: Pick<StratumConfig, "levels">
      store: NodeStore
      chunker: HierarchicalChunker
      embedder: EmbeddingProvider
      index: VectorIndex
      persist?: boolean
    },
  ) {}

  async indexDocument(document: ChunkInput): Promise<IndexedDocument> {
    const { store, chunker, embedder, index } = this.input
    const tree = chunker.chunk(document)

    return store.withDocumentLock(tree.document_id, async () => {
      const timer = log.time("index document", { documentID: tree.document_id })
      const leafIDs = new Set(tree.leaf_ids)
      const leaves = tree.nodes.filter((node) => leafIDs.has(node.id))
      const vectors = await embedder.embedBatch(leaves.map((leaf) => leaf.text))
      if (vectors.length !== leaves.length) {
        throw new StratumError("EMBEDDING_MISMATCH", `Expected ${leaves.length} vectors, got ${vectors.length}`)
      }

      const records: VectorRecord[] = leaves.map((leaf, i) => ({
        id: leaf.id,
        values: vectors[i] ?? [],
        metadata: {
          document_id: leaf.source_metadata.document_id,
          level: leaf.level,
          page_start: leaf.source_metadata.page_start,
          page_end: leaf.source_metadata.page_end,
          ...(leaf.parent_id ? { parent_id: leaf.parent_id } : {}),
        },
      }))

      // Vectors land before the tree swap; until then a new id is a stale reference to readers.
      const current = new Set(store.tree(tree.document_id)?.leaves().map((node) => node.id) ?? [])
      try {
        await index.upsertMany(records)
      } catch (error) {
        const orphaned = records.map((record) => record.id).filter((id) => !current.has(id))
        if (orphaned.length > 0) {
          await index.deleteMany(orphaned).catch((cleanup: unknown) => {
            log.warn("Unable to remove vectors of a failed upsert", { documentID: tree.document_id, error: cleanup })
          })
        }
        throw error
      }
      const previousLeafIDs = store.replaceDocument(tree.document_id, tree.nodes)
      const stale = previousLeafIDs.filter((id) => !leafIDs.has(id))
      if (stale.length > 0) {
        await index.deleteMany(stale)
      }

      if (this.input.persist ?? true) {
        if (tree.nodes.length === 0) {
          await TreeRepository.remove(tree.document_id)
        } else {
          await TreeRepository.save(tree, this.input.config.levels.length)
        }
      }

      timer.stop({ nodes: tree.nodes.length, leaves: leaves.length, removed: stale.length })
      return {
        document_id: tree.document_id,
        nodes: tree.nodes.length,
        leaves: leaves.length,
        removed_vectors: stale.length,
      }
    })
  }

  async removeDocument(documentID: string) {
    const { store, index } = this.input
    return store.withDocumentLock(documentID, async () => {
      const leafIDs = store.deleteDocument(documentID)
      await index.deleteMany(leafIDs)
      if (this.input.persist ?? true) {
        await TreeRepository.remove(documentID)
      }
      return leafIDs.length
    })
  }

  /**
   * Indexes every supported file under `root`. Files that fail to load or
   * chunk are reported and skipped; provider failures stop the batch.
   */
  async indexDirectory(root: string, progress: IndexProgressSink = {}): Promise<BatchResult> {
    const files = await listDocuments(root)
    const result: BatchResult = { indexed: [], skipped: [] }
    progress.onStart?.(files.length)

    for (const [i, file] of files.entries()) {
      try {
        const document = await loadDocument(root, file)
        const indexed = await this.indexDocument({
          documentID: document.documentID,
          pages: document.pages,
          title: document.title,
          sourcePath: document.sourcePath,
        })
        result.indexed.push(indexed)
        progress.onDocument?.(indexed, i + 1, files.length)
      } catch (error) {
        if (!(error instanceof ChunkingError) && !(error instanceof DocumentLoadError)) throw error
        const skipped = { source: file, code: error.code, message: errorMessage(error) }
        log.warn("Skipping document", skipped)
        result.skipped.push(skipped)
        progress.onSkip?.(skipped, i + 1, files.length)
      }
    }
    return result
  }

  /** Clears everything once in-flight writes finish; later writes wait for the reset. */
  async reset() {
    const { store, index } = this.input
    await store.withStoreLock(async () => {
      store.reset()
      await index.reset()
      if (this.input.persist ?? true) {
        await TreeRepository.clear()
      }
    })
    log.info("index reset")
  }

  stats(): IndexStats {
    const { store, index, embedder } = this.input
    const levels = Array.from(store.countsByLevel().entries()).map(([level, nodes]) => ({ level, nodes }))
    return {
      documents: store.documentIDs().length,
      nodes: store.size,
      leaves: store.allLeaves().length,
      levels,
      vector_index: index.name,
      embedder: embedder.name,
    }
  }
}
