import type { RetryConfig } from "@/config/config"
import { GenerationUnavailable } from "@/error"
import { LLM } from "@/llm"
import { Log } from "@/util/log"
import { withRetry } from "./retry"
import type { GenerationProvider } from "./types"

const log = Log.create({ service: "provider.generation" })

export const GROUNDING_SYSTEM_PROMPT = [
  "Answer the question using only the context passages. Passages are separated by blank lines.",
  "If the context does not contain the answer, say that it is not in the indexed documents.",
].join("\n")

export function buildGroundedPrompt(context: string, question: string) {
  const body = context.trim().length > 0 ? context : "(no matching passages)"
  return `Context:\n${body}\n\nQuestion: ${question.trim()}`
}

export class OpenAIGenerationProvider implements GenerationProvider {
  readonly name = "openai"

  constructor(private readonly retry: Readonly<RetryConfig>) {}

  async generate(context: string, question: string, signal?: AbortSignal) {
    const llm = LLM.for("answer.generate")
    const result = await withRetry(
      {
        operation: "generation",
        retry: this.retry,
        log,
        signal,
        unavailable: (message, cause) => new GenerationUnavailable(message, { cause }),
      },
      (attemptSignal) => llm.generateText({
        model: llm.model,
        system: GROUNDING_SYSTEM_PROMPT,
        prompt: buildGroundedPrompt(context, question),
        abortSignal: attemptSignal,
        maxRetries: 0,
      }),
    )
    return result.text.trim()
  }
}

/**
 * Offline stand-in used without an OpenAI key: answers with the leading
 * sentences of the best passage instead of calling a model.
 */
export class ExtractiveGenerationProvider implements GenerationProvider {
  readonly name = "extractive"

  constructor(private readonly maxSentences = 3) {}

  async generate(context: string) {
    const firstPassage = context.split(/\n{2,}/).find((part) => part.trim().length > 0) ?? ""
    const sentences = firstPassage
      .replace(/\s+/g, " ")
      .split(/(?<=[.?!])\s+/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0)
    if (sentences.length === 0) {
      return "No indexed passage matches the question."
    }
    return sentences.slice(0, this.maxSentences).join(" ")
  }
}

export function createGenerationProvider(input: { retry: Readonly<RetryConfig>; offline: boolean }): GenerationProvider {
  if (input.offline) {
    log.warn("OPENAI_API_KEY is not set, answers are extracted from the top passage")
    return new ExtractiveGenerationProvider()
  }
  return new OpenAIGenerationProvider(input.retry)
}
