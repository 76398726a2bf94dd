import { mkdtemp, mkdir, rm, writeFile } from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { afterAll, beforeAll, expect, test, vi } from "vitest"
import { HierarchicalChunker } from "../../src/chunker/hierarchical"
import { EmbeddingUnavailable } from "../../src/error"
import { IndexService, type IndexedDocument } from "../../src/indexing/service"
import { HashEmbeddingProvider } from "../../src/provider/embedding"
import type { EmbeddingProvider, VectorRecord } from "../../src/provider/types"
import { TreeRepository } from "../../src/tree/repository"
import { NodeStore } from "../../src/tree/store"
import { MemoryVectorIndex } from "../../src/vectorstore/memory"
import { GUIDE_PAGES, smallConfig } from "../fixtures"

vi.mock("pdf-parse", () => {
  class PDFParse {
    async getText(): Promise<never> {
      throw new Error("Invalid PDF structure")
    }

    async destroy() {}
  }
  return { PDFParse }
})

let dataDir = ""
const previousDataDir = process.env.STRATUM_DATA_DIR

beforeAll(async () => {
  dataDir = await mkdtemp(path.join(os.tmpdir(), "stratum-indexing-"))
  process.env.STRATUM_DATA_DIR = path.join(dataDir, "data")
})

afterAll(async () => {
  if (previousDataDir === undefined) delete process.env.STRATUM_DATA_DIR
  else process.env.STRATUM_DATA_DIR = previousDataDir
  if (dataDir) await rm(dataDir, { recursive: true, force: true })
})

function setup(options: { embedder?: EmbeddingProvider; persist?: boolean; index?: MemoryVectorIndex } = {}) {
  const config = smallConfig()
  const store = new NodeStore()
  const index = options.index ?? new MemoryVectorIndex()
  const service = new IndexService({
    config,
    store,
    chunker: new HierarchicalChunker(config),
    embedder: options.embedder ?? new HashEmbeddingProvider(),
    index,
    persist: options.persist ?? false,
  })
  return { store, index, service }
}

test("indexing stores the tree and embeds only the leaves", async () => {
  const { store, index, service } = setup()
  const result = await service.indexDocument({ documentID: "guide", pages: GUIDE_PAGES })
  expect(result).toEqual({ document_id: "guide", nodes: 10, leaves: 6, removed_vectors: 0 })
  expect(store.size).toBe(10)
  expect(index.entries().map((record) => record.id)).toEqual([
    "guide::3-0",
    "guide::3-1",
    "guide::3-2",
    "guide::3-3",
    "guide::3-4",
    "guide::3-5",
  ])
  expect(index.entries()[0]?.metadata).toEqual({
    document_id: "guide",
    level: 3,
    page_start: 1,
    page_end: 1,
    parent_id: "guide::2-0",
  })
})

test("re-indexing a shorter document removes vectors for vanished leaves", async () => {
  const { store, index, service } = setup()
  await service.indexDocument({ documentID: "guide", pages: GUIDE_PAGES })
  const result = await service.indexDocument({
    documentID: "guide",
    pages: [{ page_number: 1, text: "Alpha beta gamma. Delta epsilon zeta." }],
  })
  expect(result.leaves).toBe(2)
  expect(result.removed_vectors).toBe(4)
  expect(index.size).toBe(2)
  expect(store.has("guide::3-5")).toBe(false)
})

test("an empty document indexes to nothing without error", async () => {
  const { store, index, service } = setup()
  const result = await service.indexDocument({ documentID: "blank", pages: [{ page_number: 1, text: "   " }] })
  expect(result).toEqual({ document_id: "blank", nodes: 0, leaves: 0, removed_vectors: 0 })
  expect(store.isEmpty).toBe(true)
  expect(index.size).toBe(0)
})

test("an embedding failure leaves the previous tree in place", async () => {
  const { store, service } = setup({
    embedder: {
      name: "down",
      async embed() {
        throw new EmbeddingUnavailable("embedding failed")
      },
      async embedBatch() {
        throw new EmbeddingUnavailable("embedding failed")
      },
    },
  })
  await expect(service.indexDocument({ documentID: "guide", pages: GUIDE_PAGES })).rejects.toThrow(EmbeddingUnavailable)
  expect(store.isEmpty).toBe(true)
})

test("concurrent re-indexing of one document keeps one consistent tree", async () => {
  const { store, index, service } = setup()
  await Promise.all([
    service.indexDocument({ documentID: "guide", pages: GUIDE_PAGES }),
    service.indexDocument({ documentID: "guide", pages: GUIDE_PAGES }),
    service.indexDocument({ documentID: "other", pages: GUIDE_PAGES }),
  ])
  expect(store.documentIDs().sort()).toEqual(["guide", "other"])
  expect(store.size).toBe(20)
  expect(index.size).toBe(12)
})

test("persisted trees are written and removed with the document", async () => {
  const { service } = setup({ persist: true })
  await service.indexDocument({ documentID: "saved", pages: GUIDE_PAGES })
  expect(await TreeRepository.list()).toEqual(["saved"])
  expect(await service.removeDocument("saved")).toBe(6)
  expect(await TreeRepository.list()).toEqual([])
})

test("documents indexed in parallel all reach the stored vector snapshot", async () => {
  const { store, index, service } = setup({ persist: true, index: new MemoryVectorIndex({ persist: true }) })
  const ids = Array.from({ length: 8 }, (_, i) => `doc-${i}`)
  const results = await Promise.allSettled(ids.map((documentID) => service.indexDocument({ documentID, pages: GUIDE_PAGES })))

  expect(results.filter((result) => result.status === "rejected")).toEqual([])
  expect(store.documentIDs().sort()).toEqual(ids)
  expect(index.size).toBe(48)
  expect(await new MemoryVectorIndex().restore()).toBe(48)
  expect(await TreeRepository.list()).toEqual(ids)
  await service.reset()
})

test("a failed upsert takes back the vectors it added", async () => {
  class FailingIndex extends MemoryVectorIndex {
    override async upsertMany(records: VectorRecord[]) {
      await super.upsertMany(records)
      throw new Error("disk full")
    }
  }
  const { store, index, service } = setup({ index: new FailingIndex() })
  await expect(service.indexDocument({ documentID: "guide", pages: GUIDE_PAGES })).rejects.toThrow("disk full")
  expect(store.isEmpty).toBe(true)
  expect(index.size).toBe(0)
})

test("reset waits for an in-flight write and later writes wait for reset", async () => {
  const { store, index, service } = setup()
  const before = service.indexDocument({ documentID: "before", pages: GUIDE_PAGES })
  const reset = service.reset()
  const after = service.indexDocument({ documentID: "after", pages: GUIDE_PAGES })
  await Promise.all([before, reset, after])

  expect(store.documentIDs()).toEqual(["after"])
  expect(index.size).toBe(6)
})

test("directory indexing reports progress and skips unreadable files", async () => {
  const root = path.join(dataDir, "corpus")
  await mkdir(root, { recursive: true })
  await writeFile(path.join(root, "a.txt"), "Alpha beta gamma. Delta epsilon zeta.", "utf8")
  await writeFile(path.join(root, "b.pdf"), "", "utf8")
  await writeFile(path.join(root, "c.md"), "Kappa lambda mu.", "utf8")

  const { service } = setup()
  const events: string[] = []
  const result = await service.indexDirectory(root, {
    onStart: (total) => events.push(`start:${total}`),
    onDocument: (item: IndexedDocument, done) => events.push(`ok:${item.document_id}:${done}`),
    onSkip: (item, done) => events.push(`skip:${path.basename(item.source)}:${item.code}:${done}`),
  })

  expect(events).toEqual(["start:3", "ok:a.txt:1", "skip:b.pdf:DOCUMENT_LOAD_FAILED:2", "ok:c.md:3"])
  expect(result.indexed.map((item) => item.document_id)).toEqual(["a.txt", "c.md"])
  expect(service.stats()).toEqual({
    documents: 2,
    nodes: 7,
    leaves: 3,
    levels: [
      { level: 1, nodes: 2 },
      { level: 2, nodes: 2 },
      { level: 3, nodes: 3 },
    ],
    vector_index: "memory",
    embedder: "hash",
  })
})

test("reset clears store, index, and stored trees", async () => {
  const { store, index, service } = setup({ persist: true })
  await service.indexDocument({ documentID: "gone", pages: GUIDE_PAGES })
  await service.reset()
  expect(store.isEmpty).toBe(true)
  expect(index.size).toBe(0)
  expect(await TreeRepository.list()).toEqual([])
})
