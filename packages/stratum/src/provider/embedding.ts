import { createHash } from "node:crypto"
import type { RetryConfig } from "@/config/config"
import { EmbeddingUnavailable } from "@/error"
import { LLM, hasOpenAIKey } from "@/llm"
import { tokenize } from "@/chunker/tokenizer"
import { Log } from "@/util/log"
import { withRetry } from "./retry"
import type { EmbeddingProvider } from "./types"

const log = Log.create({ service: "provider.embedding" })

const DEFAULT_BATCH_SIZE = 32
const HASH_DIMENSIONS = 256

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name = "openai"
  private readonly batchSize: number

  constructor(
    private readonly retry: Readonly<RetryConfig>,
    options: { batchSize?: number } = {},
  ) {
    this.batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE)
  }

  async embed(text: string, signal?: AbortSignal) {
    const [vector] = await this.embedBatch([text], signal)
    if (!vector) {
      throw new EmbeddingUnavailable("Embedding response was empty")
    }
    return vector
  }

  async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) {
      return []
    }
    const llm = LLM.for("text.embedding")
    const vectors: number[][] = []

    for (let start = 0; start < texts.length; start += this.batchSize) {
      const batch = texts.slice(start, start + this.batchSize)
      const result = await withRetry(
        {
          operation: "embedding",
          retry: this.retry,
          log,
          signal,
          unavailable: (message, cause) => new EmbeddingUnavailable(message, { cause }),
        },
        (attemptSignal) => llm.embedMany({
          model: llm.model,
          values: batch,
          abortSignal: attemptSignal,
          maxRetries: 0,
        }),
      )

      if (result.embeddings.length !== batch.length) {
        throw new EmbeddingUnavailable("Embedding output size mismatch")
      }
      for (const values of result.embeddings) {
        if (values.length === 0) {
          throw new EmbeddingUnavailable("Invalid embedding vector in response")
        }
        vectors.push(values)
      }
    }

    return vectors
  }
}

function bucketForToken(token: string, dimensions: number) {
  const digest = createHash("sha1").update(token).digest()
  return digest.readUInt32BE(0) % dimensions
}

/**
 * Offline embedding: a hashed bag of lower-cased tokens, L2-normalized, so
 * texts sharing words land close under cosine similarity. Used when no
 * OpenAI key is configured.
 */
export class HashEmbeddingProvider implements EmbeddingProvider {
  readonly name = "hash"

  constructor(private readonly dimensions = HASH_DIMENSIONS) {}

  async embed(text: string) {
    const values = new Array<number>(this.dimensions).fill(0)
    for (const token of tokenize(text.toLowerCase().normalize("NFKC"))) {
      const index = bucketForToken(token, this.dimensions)
      values[index] = (values[index] ?? 0) + 1
    }
    const norm = Math.sqrt(values.reduce((sum, value) => sum + value * value, 0))
    return norm === 0 ? values : values.map((value) => value / norm)
  }

  async embedBatch(texts: string[]) {
    return Promise.all(texts.map((text) => this.embed(text)))
  }
}

export function createEmbeddingProvider(input: {
  retry: Readonly<RetryConfig>
  batchSize?: number
}): EmbeddingProvider {
  if (hasOpenAIKey()) {
    return new OpenAIEmbeddingProvider(input.retry, { batchSize: input.batchSize })
  }
  log.warn("OPENAI_API_KEY is not set, using offline hash embeddings")
  return new HashEmbeddingProvider()
}
