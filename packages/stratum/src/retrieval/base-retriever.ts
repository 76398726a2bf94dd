import type { RetryConfig } from "@/config/config"
import { ConfigurationError, RetrievalUnavailable } from "@/error"
import { withRetry } from "@/provider/retry"
import type { VectorIndex } from "@/provider/types"
import { Log } from "@/util/log"
import type { ScoredID } from "./types"

const log = Log.create({ service: "retrieval.base" })

export function compareScored(a: ScoredID, b: ScoredID) {
  return b.score - a.score || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)
}

/** Top-k leaf search over the vector index. */
export class BaseRetriever {
  constructor(
    private readonly index: VectorIndex,
    private readonly retry: Readonly<RetryConfig>,
  ) {}

  async retrieve(queryEmbedding: number[], k: number, signal?: AbortSignal): Promise<ScoredID[]> {
    if (!Number.isInteger(k) || k < 1) {
      throw new ConfigurationError(`k must be a positive integer, got ${k}`)
    }
    if (queryEmbedding.length === 0) {
      throw new ConfigurationError("Query embedding is empty")
    }

    const matches = await withRetry(
      {
        operation: `${this.index.name}.query`,
        retry: this.retry,
        log,
        signal,
        unavailable: (message, cause) => new RetrievalUnavailable(message, { cause }),
      },
      () => this.index.query(queryEmbedding, k),
    )

    const results = matches
      .filter((match) => Number.isFinite(match.score))
      .map((match) => ({ id: match.id, score: match.score }))
      .sort(compareScored)
      .slice(0, k)
    log.debug("retrieved", { k, count: results.length })
    return results
  }
}
