import type { StratumConfig } from "@/config/config"
import { QueryTimeoutError, StratumError } from "@/error"
import type { EmbeddingProvider, GenerationProvider } from "@/provider/types"
import { Log } from "@/util/log"
import type { AutoMergeEngine } from "./auto-merge"
import type { BaseRetriever } from "./base-retriever"
import { assembleContext } from "./context"
import type { AssembledContext, MergedNode, ScoredID } from "./types"

const log = Log.create({ service: "retrieval.query" })

export type ContextResult = {
  question: string
  retrieved: ScoredID[]
  merged: MergedNode[]
  context: AssembledContext
}

export type QueryResult = ContextResult & {
  answer: string
}

export type QueryOrchestratorInput = {
  config: Pick<StratumConfig, "top_k" | "max_context_tokens" | "query_timeout_ms">
  embedder: EmbeddingProvider
  retriever: BaseRetriever
  merger: AutoMergeEngine
  generator: GenerationProvider
}

/** embed → retrieve → merge → assemble → generate, under one deadline. */
export class QueryOrchestrator {
  constructor(private readonly input: QueryOrchestratorInput) {}

  async retrieveContext(question: string): Promise<ContextResult> {
    return this.withDeadline((signal) => this.buildContext(question, signal))
  }

  async query(question: string): Promise<QueryResult> {
    return this.withDeadline(async (signal) => {
      const result = await this.buildContext(question, signal)
      const timer = log.time("generate", { generator: this.input.generator.name })
      const answer = await this.input.generator.generate(result.context.text, result.question, signal)
      timer.stop({ chars: answer.length })
      return { ...result, answer }
    })
  }

  private async buildContext(question: string, signal: AbortSignal): Promise<ContextResult> {
    const trimmed = question.trim()
    if (!trimmed) {
      throw new StratumError("EMPTY_QUESTION", "Question must not be empty")
    }

    const { config, embedder, retriever, merger } = this.input
    const embedding = await embedder.embed(trimmed, signal)
    const retrieved = await retriever.retrieve(embedding, config.top_k, signal)
    const merged = merger.merge(retrieved)
    const context = assembleContext(merged, config.max_context_tokens)
    log.info("context assembled", {
      retrieved: retrieved.length,
      merged: merged.length,
      kept: context.citations.length,
      tokens: context.token_count,
    })
    return { question: trimmed, retrieved, merged, context }
  }

  private async withDeadline<T>(task: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const timeoutMs = this.input.config.query_timeout_ms
    const controller = new AbortController()
    let timer: ReturnType<typeof setTimeout> | undefined
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new QueryTimeoutError(timeoutMs)
        controller.abort(error)
        reject(error)
      }, timeoutMs)
    })
    try {
      return await Promise.race([task(controller.signal), deadline])
    } catch (error) {
      if (controller.signal.aborted) throw new QueryTimeoutError(timeoutMs)
      throw error
    } finally {
      clearTimeout(timer)
    }
  }
}
