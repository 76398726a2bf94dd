import { Pinecone } from "@pinecone-database/pinecone"
import type { PineconeRecord, RecordMetadata } from "@pinecone-database/pinecone"
import type { RetryConfig } from "@/config/config"
import { resolvePineconeEnv, resolveProjectEnv } from "@/config/env"
import { ConfigurationError, RetrievalUnavailable, StratumError } from "@/error"
import { withRetry } from "@/provider/retry"
import type { VectorIndex, VectorMatch, VectorMetadata, VectorRecord } from "@/provider/types"
import { Log } from "@/util/log"

const log = Log.create({ service: "vectorstore.pinecone" })

const PINECONE_MAX_REQUEST_BYTES = 2 * 1024 * 1024
const PINECONE_UPSERT_SAFE_BYTES = Math.floor(PINECONE_MAX_REQUEST_BYTES * 0.9)
const UPSERT_WRAPPER_BYTES = Buffer.byteLength('{"vectors":[]}', "utf8")
const PINECONE_DELETE_BATCH = 1000

/** Splits records into upsert requests that stay under Pinecone's request size limit. */
export function batchUpsertRecords(records: VectorRecord[]) {
  const result: VectorRecord[][] = []
  let current: VectorRecord[] = []
  let currentBytes = UPSERT_WRAPPER_BYTES

  for (const record of records) {
    const bytes = Buffer.byteLength(JSON.stringify(record), "utf8")
    if (UPSERT_WRAPPER_BYTES + bytes > PINECONE_UPSERT_SAFE_BYTES) {
      throw new StratumError(
        "VECTOR_TOO_LARGE",
        `Pinecone upsert record "${record.id}" exceeds safe request size (${UPSERT_WRAPPER_BYTES + bytes} bytes)`,
      )
    }

    const nextBytes = currentBytes + (current.length > 0 ? 1 : 0) + bytes
    if (nextBytes > PINECONE_UPSERT_SAFE_BYTES) {
      result.push(current)
      current = [record]
      currentBytes = UPSERT_WRAPPER_BYTES + bytes
      continue
    }
    current.push(record)
    currentBytes = nextBytes
  }

  if (current.length > 0) {
    result.push(current)
  }
  return result
}

function toMetadata(input: RecordMetadata | undefined): VectorMetadata | undefined {
  if (!input) return undefined
  const metadata: VectorMetadata = {}
  for (const [key, value] of Object.entries(input)) {
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      metadata[key] = value
    }
  }
  return metadata
}

/** Leaf vectors in one Pinecone namespace per project. */
export class PineconeVectorIndex implements VectorIndex {
  readonly name = "pinecone"
  private readonly client: Pinecone
  private readonly indexName: string
  private readonly namespaceName: string

  constructor(
    private readonly retry: Readonly<RetryConfig>,
    input: { apiKey?: string; indexName?: string; namespace?: string } = {},
  ) {
    const env = resolvePineconeEnv()
    const apiKey = input.apiKey ?? env.apiKey
    const indexName = input.indexName ?? env.indexName
    if (!apiKey || !indexName) {
      throw new ConfigurationError("PINECONE_API_KEY and STRATUM_PINECONE_INDEX are required for the Pinecone index")
    }
    this.client = new Pinecone({ apiKey })
    this.indexName = indexName
    this.namespaceName = input.namespace ?? resolveProjectEnv()
  }

  private namespace() {
    return this.client.index(this.indexName).namespace(this.namespaceName)
  }

  private call<T>(operation: string, task: () => Promise<T>) {
    return withRetry(
      {
        operation: `pinecone.${operation}`,
        retry: this.retry,
        log,
        unavailable: (message, cause) => new RetrievalUnavailable(message, { cause }),
      },
      task,
    )
  }

  async upsert(id: string, vector: number[], metadata: VectorMetadata) {
    await this.upsertMany([{ id, values: vector, metadata }])
  }

  async upsertMany(records: VectorRecord[]) {
    if (records.length === 0) return
    const batches = batchUpsertRecords(records)
    for (const batch of batches) {
      const payload: PineconeRecord[] = batch.map((record) => ({
        id: record.id,
        values: record.values,
        metadata: record.metadata,
      }))
      await this.call("upsert", () => this.namespace().upsert(payload))
    }
    log.debug("upserted vectors", { count: records.length, batches: batches.length })
  }

  async query(vector: number[], k: number): Promise<VectorMatch[]> {
    const result = await this.call("query", () =>
      this.namespace().query({
        vector,
        topK: k,
        includeMetadata: true,
        includeValues: false,
      }),
    )
    return (result.matches ?? []).map((match) => {
      const metadata = toMetadata(match.metadata)
      return {
        id: match.id,
        score: match.score ?? 0,
        ...(metadata ? { metadata } : {}),
      }
    })
  }

  async delete(id: string) {
    await this.call("delete", () => this.namespace().deleteOne(id))
  }

  async deleteMany(ids: string[]) {
    for (let i = 0; i < ids.length; i += PINECONE_DELETE_BATCH) {
      const batch = ids.slice(i, i + PINECONE_DELETE_BATCH)
      await this.call("deleteMany", () => this.namespace().deleteMany(batch))
    }
  }

  async reset() {
    await this.call("reset", () => this.namespace().deleteAll())
  }
}
