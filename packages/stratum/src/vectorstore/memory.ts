import { z } from "zod"
import type { VectorIndex, VectorMatch, VectorMetadata, VectorRecord } from "@/provider/types"
import { Storage } from "@/storage"
import { Log } from "@/util/log"

const log = Log.create({ service: "vectorstore.memory" })

const SNAPSHOT_KEY = ["vector", "memory"]

const VectorSnapshot = z.array(
  z.object({
    id: z.string(),
    values: z.array(z.number()),
    metadata: z.record(z.union([z.string(), z.number(), z.boolean()])),
  }),
)

export function cosineSimilarity(left: number[], right: number[]) {
  if (left.length === 0 || right.length === 0 || left.length !== right.length) {
    return 0
  }

  let dot = 0
  let leftNorm = 0
  let rightNorm = 0
  for (let i = 0; i < left.length; i += 1) {
    const l = left[i] ?? 0
    const r = right[i] ?? 0
    dot += l * r
    leftNorm += l * l
    rightNorm += r * r
  }

  if (leftNorm === 0 || rightNorm === 0) {
    return 0
  }

  return dot / (Math.sqrt(leftNorm) * Math.sqrt(rightNorm))
}

/**
 * Exhaustive cosine search held in process memory. With `persist` set, every
 * write is mirrored to one snapshot file so a later process can `restore` it.
 */
export class MemoryVectorIndex implements VectorIndex {
  readonly name = "memory"
  private readonly records = new Map<string, VectorRecord>()
  private readonly persist: boolean

  constructor(options: { persist?: boolean } = {}) {
    this.persist = options.persist ?? false
  }

  get size() {
    return this.records.size
  }

  async upsert(id: string, vector: number[], metadata: VectorMetadata) {
    this.set({ id, values: vector, metadata })
    await this.flush()
  }

  async upsertMany(records: VectorRecord[]) {
    for (const record of records) this.set(record)
    await this.flush()
  }

  async query(vector: number[], k: number): Promise<VectorMatch[]> {
    return Array.from(this.records.values())
      .map((record) => ({
        id: record.id,
        score: cosineSimilarity(vector, record.values),
        metadata: record.metadata,
      }))
      .sort((a, b) => b.score - a.score || a.id.localeCompare(b.id))
      .slice(0, Math.max(0, k))
  }

  async delete(id: string) {
    this.records.delete(id)
    await this.flush()
  }

  async deleteMany(ids: string[]) {
    for (const id of ids) this.records.delete(id)
    await this.flush()
  }

  /** Copies of the stored records in insertion order. */
  entries(): VectorRecord[] {
    return Array.from(this.records.values(), (record) => ({
      id: record.id,
      values: [...record.values],
      metadata: { ...record.metadata },
    }))
  }

  async reset() {
    this.records.clear()
    if (this.persist) {
      await Storage.remove(SNAPSHOT_KEY)
    }
  }

  /** Loads the last snapshot. Returns the number of vectors restored. */
  async restore() {
    let raw: unknown
    try {
      raw = await Storage.read(SNAPSHOT_KEY)
    } catch {
      return 0
    }
    const parsed = VectorSnapshot.safeParse(raw)
    if (!parsed.success) {
      log.warn("Ignoring malformed vector snapshot", { issues: parsed.error.issues.length })
      return 0
    }
    this.records.clear()
    for (const record of parsed.data) this.set(record)
    return this.records.size
  }

  private set(record: VectorRecord) {
    this.records.set(record.id, { id: record.id, values: [...record.values], metadata: { ...record.metadata } })
  }

  private async flush() {
    if (!this.persist) return
    await Storage.write(SNAPSHOT_KEY, this.entries())
  }
}
