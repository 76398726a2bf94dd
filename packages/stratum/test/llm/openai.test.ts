import { afterAll, beforeAll, beforeEach, expect, test, vi } from "vitest"

const calls = vi.hoisted(() => {
  const openAIConfig: Array<{ apiKey: string; baseURL?: string }> = []
  const embedMany: Array<{ values: string[]; model: unknown }> = []
  const generateText: Array<{ system?: string; prompt?: string; model: unknown; maxRetries?: number }> = []
  return { openAIConfig, embedMany, generateText, failures: { embed: 0 } }
})

vi.mock("@ai-sdk/openai", () => ({
  createOpenAI(config: { apiKey: string; baseURL?: string }) {
    calls.openAIConfig.push(config)
    return Object.assign((modelId: string) => ({ type: "language-model", modelId }), {
      textEmbeddingModel: (modelId: string) => ({ type: "embedding-model", modelId }),
    })
  },
}))

vi.mock("ai", () => ({
  async embedMany(input: { values: string[]; model: unknown }) {
    calls.embedMany.push(input)
    if (calls.failures.embed > 0) {
      calls.failures.embed -= 1
      throw new Error("rate limited")
    }
    return { embeddings: input.values.map((value) => [value.length, 1]) }
  },
  async generateText(input: { system?: string; prompt?: string; model: unknown; maxRetries?: number }) {
    calls.generateText.push(input)
    return { text: "  The parent covers both.  " }
  },
}))

const { LLM, resetLLMProvider } = await import("../../src/llm")
const { OpenAIEmbeddingProvider } = await import("../../src/provider/embedding")
const { GROUNDING_SYSTEM_PROMPT, OpenAIGenerationProvider } = await import("../../src/provider/generation")
const { ConfigurationError, EmbeddingUnavailable } = await import("../../src/error")

const retry = { retries: 1, min_timeout_ms: 0, max_timeout_ms: 0, attempt_timeout_ms: 1000 }
const previousKey = process.env.OPENAI_API_KEY

beforeAll(() => {
  process.env.OPENAI_API_KEY = "test-key"
  process.env.OPENAI_BASE_URL = "https://example.openai.local/v1"
})

beforeEach(() => {
  resetLLMProvider()
  calls.openAIConfig.length = 0
  calls.embedMany.length = 0
  calls.generateText.length = 0
  calls.failures.embed = 0
})

afterAll(() => {
  process.env.OPENAI_API_KEY = previousKey ?? ""
  delete process.env.OPENAI_BASE_URL
  resetLLMProvider()
})

test("scenes bind the configured models through one cached provider", () => {
  const language = LLM.for("answer.generate")
  const embedding = LLM.for("text.embedding")
  expect(language.model).toEqual({ type: "language-model", modelId: "gpt-4o-mini" })
  expect(embedding.model).toEqual({ type: "embedding-model", modelId: "text-embedding-3-small" })
  expect(calls.openAIConfig).toEqual([{ apiKey: "test-key", baseURL: "https://example.openai.local/v1" }])
})

test("a scene model can be overridden per binding", () => {
  expect(LLM.for("answer.generate", { modelId: "gpt-4o" }).model).toEqual({ type: "language-model", modelId: "gpt-4o" })
})

test("embedding requests are split into batches and keep input order", async () => {
  const provider = new OpenAIEmbeddingProvider(retry, { batchSize: 2 })
  const vectors = await provider.embedBatch(["a", "bb", "ccc"])
  expect(calls.embedMany.map((call) => call.values)).toEqual([["a", "bb"], ["ccc"]])
  expect(vectors).toEqual([
    [1, 1],
    [2, 1],
    [3, 1],
  ])
})

test("a failed embedding batch is retried once, then reported", async () => {
  const provider = new OpenAIEmbeddingProvider(retry)
  calls.failures.embed = 1
  expect(await provider.embed("abcd")).toEqual([4, 1])
  expect(calls.embedMany).toHaveLength(2)

  calls.failures.embed = 2
  await expect(provider.embed("abcd")).rejects.toThrow(EmbeddingUnavailable)
})

test("generation sends the grounding prompt and trims the answer", async () => {
  const provider = new OpenAIGenerationProvider(retry)
  const answer = await provider.generate("Parent text.", "What is covered?")
  expect(answer).toBe("The parent covers both.")
  expect(calls.generateText).toHaveLength(1)
  expect(calls.generateText[0]?.system).toBe(GROUNDING_SYSTEM_PROMPT)
  expect(calls.generateText[0]?.prompt).toBe("Context:\nParent text.\n\nQuestion: What is covered?")
  expect(calls.generateText[0]?.maxRetries).toBe(0)
})

test("binding a scene without a key is a configuration error", () => {
  process.env.OPENAI_API_KEY = ""
  resetLLMProvider()
  try {
    expect(() => LLM.for("answer.generate")).toThrow(ConfigurationError)
  } finally {
    process.env.OPENAI_API_KEY = "test-key"
  }
})
