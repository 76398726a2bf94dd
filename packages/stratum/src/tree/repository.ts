import { Storage } from "@/storage"
import { Log } from "@/util/log"
import { PersistedTree, type ChunkTree } from "./types"
import type { NodeStore } from "./store"

const log = Log.create({ service: "tree.repository" })

const TREE_PREFIX = "tree"

/** Persists each document's chunk tree as one JSON file under the data directory. */
export namespace TreeRepository {
  export async function save(tree: ChunkTree, levels: number) {
    const record: PersistedTree = {
      document_id: tree.document_id,
      levels,
      nodes: tree.nodes,
      indexed_at: Date.now(),
    }
    await Storage.write([TREE_PREFIX, tree.document_id], record)
    return record
  }

  export async function load(documentID: string) {
    const raw = await Storage.read([TREE_PREFIX, documentID])
    return PersistedTree.parse(raw)
  }

  export async function remove(documentID: string) {
    await Storage.remove([TREE_PREFIX, documentID])
  }

  export async function clear() {
    await Storage.removeAll([TREE_PREFIX])
  }

  export async function list() {
    const segments = await Storage.list([TREE_PREFIX])
    return segments.map((segment) => segment[segment.length - 1] ?? "").filter((id) => id.length > 0)
  }

  /** Loads every stored tree into `store`. Unreadable files are logged and skipped. */
  export async function loadInto(store: NodeStore) {
    let loaded = 0
    for (const documentID of await list()) {
      try {
        const tree = await load(documentID)
        store.replaceDocument(tree.document_id, tree.nodes)
        loaded += 1
      } catch (error) {
        log.warn("Skipping unreadable stored tree", { documentID, error })
      }
    }
    return loaded
  }
}
