import { NodeNotFoundError, StratumError } from "@/error"
import { isLeaf, type TreeNode } from "./types"

/** One document's nodes. A tree handed out by `NodeStore.treeFor` is never swapped in place. */
export class DocumentTree {
  private readonly nodes = new Map<string, TreeNode>()
  private readonly order: string[] = []

  constructor(readonly documentID: string) {}

  get size() {
    return this.order.length
  }

  add(node: TreeNode) {
    if (!this.nodes.has(node.id)) {
      this.order.push(node.id)
    }
    this.nodes.set(node.id, node)
  }

  get(id: string) {
    return this.nodes.get(id)
  }

  children(id: string) {
    const node = this.nodes.get(id)
    if (!node) return []
    const result: TreeNode[] = []
    for (const childID of node.children_ids) {
      const child = this.nodes.get(childID)
      if (child) result.push(child)
    }
    return result
  }

  parent(id: string) {
    const parentID = this.nodes.get(id)?.parent_id
    return parentID ? this.nodes.get(parentID) : undefined
  }

  /** Nodes in the order they were added: parents first, siblings in document order. */
  all() {
    const result: TreeNode[] = []
    for (const id of this.order) {
      const node = this.nodes.get(id)
      if (node) result.push(node)
    }
    return result
  }

  leaves() {
    return this.all()
      .filter(isLeaf)
      .sort((a, b) => a.source_metadata.offset_start - b.source_metadata.offset_start)
  }
}

function checkOwnership(documentID: string, node: TreeNode) {
  if (node.source_metadata.document_id !== documentID) {
    throw new StratumError(
      "INVALID_NODE",
      `Node ${node.id} belongs to ${node.source_metadata.document_id}, not ${documentID}`,
    )
  }
  if (node.parent_id === node.id || node.children_ids.includes(node.id)) {
    throw new StratumError("INVALID_NODE", `Node ${node.id} references itself`)
  }
}

/**
 * Flat arena of chunk-tree nodes keyed by id. Links between nodes are ids,
 * never object references.
 *
 * Writers replace a whole document at once through `replaceDocument`, which
 * swaps in a new `DocumentTree`; readers that pinned the previous tree keep a
 * consistent view for the rest of their query.
 */
export class NodeStore {
  private readonly trees = new Map<string, DocumentTree>()
  private readonly owner = new Map<string, DocumentTree>()
  private readonly locks = new Map<string, Promise<void>>()
  private barrier: Promise<void> = Promise.resolve()

  get size() {
    return this.owner.size
  }

  get isEmpty() {
    return this.owner.size === 0
  }

  /** Adds one node to its document's current tree. Indexing uses `replaceDocument` instead. */
  put(node: TreeNode) {
    const documentID = node.source_metadata.document_id
    checkOwnership(documentID, node)
    let tree = this.trees.get(documentID)
    if (!tree) {
      tree = new DocumentTree(documentID)
      this.trees.set(documentID, tree)
    }
    const existing = this.owner.get(node.id)
    if (existing && existing !== tree) {
      throw new StratumError("DUPLICATE_NODE", `Node id already used by ${existing.documentID}: ${node.id}`)
    }
    tree.add(Object.freeze({ ...node }))
    this.owner.set(node.id, tree)
  }

  get(id: string) {
    return this.owner.get(id)?.get(id)
  }

  require(id: string) {
    const node = this.get(id)
    if (!node) throw new NodeNotFoundError(id)
    return node
  }

  has(id: string) {
    return this.owner.has(id)
  }

  childrenOf(id: string) {
    return this.owner.get(id)?.children(id) ?? []
  }

  parentOf(id: string) {
    return this.owner.get(id)?.parent(id)
  }

  /** The tree currently holding `id`, for callers that must read one document consistently. */
  treeFor(id: string) {
    return this.owner.get(id)
  }

  tree(documentID: string) {
    return this.trees.get(documentID)
  }

  allLeaves() {
    const result: TreeNode[] = []
    for (const tree of this.trees.values()) {
      result.push(...tree.leaves())
    }
    return result
  }

  nodesOf(documentID: string) {
    return this.trees.get(documentID)?.all() ?? []
  }

  documentIDs() {
    return Array.from(this.trees.keys())
  }

  /**
   * Swaps in a complete tree for one document and returns the leaf ids of the
   * tree it replaced. An empty node list removes the document.
   */
  replaceDocument(documentID: string, nodes: TreeNode[]) {
    const next = new DocumentTree(documentID)
    for (const node of nodes) {
      checkOwnership(documentID, node)
      const existing = this.owner.get(node.id)
      if (existing && existing.documentID !== documentID) {
        throw new StratumError("DUPLICATE_NODE", `Node id already used by ${existing.documentID}: ${node.id}`)
      }
      const children = [...node.children_ids]
      Object.freeze(children)
      next.add(Object.freeze({ ...node, children_ids: children }))
    }

    const previousLeafIDs = this.deleteDocument(documentID)
    if (next.size === 0) {
      return previousLeafIDs
    }

    this.trees.set(documentID, next)
    for (const node of next.all()) {
      this.owner.set(node.id, next)
    }
    return previousLeafIDs
  }

  deleteDocument(documentID: string) {
    const previous = this.trees.get(documentID)
    if (!previous) return []
    const leafIDs = previous.leaves().map((node) => node.id)
    for (const node of previous.all()) {
      if (this.owner.get(node.id) === previous) {
        this.owner.delete(node.id)
      }
    }
    this.trees.delete(documentID)
    return leafIDs
  }

  reset() {
    this.trees.clear()
    this.owner.clear()
  }

  countsByLevel() {
    const counts = new Map<number, number>()
    for (const tree of this.trees.values()) {
      for (const node of tree.all()) {
        counts.set(node.level, (counts.get(node.level) ?? 0) + 1)
      }
    }
    return new Map(Array.from(counts.entries()).sort((a, b) => a[0] - b[0]))
  }

  /** Runs `task` after every earlier writer of the same document has finished. */
  async withDocumentLock<T>(documentID: string, task: () => Promise<T>): Promise<T> {
    const previous = Promise.all([this.barrier, this.locks.get(documentID) ?? Promise.resolve()])
    const run = previous.then(() => task())
    const tail = run.then(
      () => undefined,
      () => undefined,
    )
    this.locks.set(documentID, tail)
    try {
      return await run
    } finally {
      if (this.locks.get(documentID) === tail) {
        this.locks.delete(documentID)
      }
    }
  }

  /**
   * Runs `task` once every writer already queued has finished. Writers that
   * arrive meanwhile wait for `task`.
   */
  async withStoreLock<T>(task: () => Promise<T>): Promise<T> {
    const pending = [this.barrier, ...this.locks.values()]
    const run = Promise.all(pending).then(() => task())
    const tail = run.then(
      () => undefined,
      () => undefined,
    )
    this.barrier = tail
    try {
      return await run
    } finally {
      if (this.barrier === tail) {
        this.barrier = Promise.resolve()
      }
    }
  }
}
