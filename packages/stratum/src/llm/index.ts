import { createOpenAI } from "@ai-sdk/openai"
import { embedMany, generateText } from "ai"
import { ConfigurationError } from "@/error"
import { resolveOpenAIEnv } from "@/config/env"
import { LLM_SCENE_DEFINITIONS } from "./scenes"
import type {
  EmbeddingSceneClient,
  EmbeddingSceneId,
  LanguageSceneClient,
  LanguageSceneId,
  LLMSceneId,
  LLMService,
  SceneBindingOptions,
} from "./types"

type OpenAIProvider = ReturnType<typeof createOpenAI>

let openAIProviderCache: OpenAIProvider | undefined

function getOrCreateOpenAIProvider() {
  if (openAIProviderCache) {
    return openAIProviderCache
  }

  const { apiKey, baseURL } = resolveOpenAIEnv()
  if (!apiKey) {
    throw new ConfigurationError("OPENAI_API_KEY is not set")
  }

  openAIProviderCache = createOpenAI({
    apiKey,
    baseURL,
  })
  return openAIProviderCache
}

export function hasOpenAIKey() {
  return resolveOpenAIEnv().apiKey.length > 0
}

/** Drops the cached provider so the next scene picks up changed credentials. */
export function resetLLMProvider() {
  openAIProviderCache = undefined
}

function createLanguageSceneClient(
  sceneId: LanguageSceneId,
  options?: SceneBindingOptions,
): LanguageSceneClient {
  const sceneDefinition = LLM_SCENE_DEFINITIONS.language[sceneId]
  const provider = getOrCreateOpenAIProvider()
  return {
    model: provider(options?.modelId ?? sceneDefinition.modelId),
    generateText,
  }
}

function createEmbeddingSceneClient(
  sceneId: EmbeddingSceneId,
  options?: SceneBindingOptions,
): EmbeddingSceneClient {
  const sceneDefinition = LLM_SCENE_DEFINITIONS.embedding[sceneId]
  const provider = getOrCreateOpenAIProvider()
  return {
    model: provider.textEmbeddingModel(options?.modelId ?? sceneDefinition.modelId),
    embedMany,
  }
}

function isLanguageSceneId(id: LLMSceneId): id is LanguageSceneId {
  return id in LLM_SCENE_DEFINITIONS.language
}

function bindScene(sceneId: LanguageSceneId, options?: SceneBindingOptions): LanguageSceneClient
function bindScene(sceneId: EmbeddingSceneId, options?: SceneBindingOptions): EmbeddingSceneClient
function bindScene(sceneId: LLMSceneId, options?: SceneBindingOptions): LanguageSceneClient | EmbeddingSceneClient {
  if (isLanguageSceneId(sceneId)) {
    return createLanguageSceneClient(sceneId, options)
  }
  return createEmbeddingSceneClient(sceneId, options)
}

export const LLM: LLMService = {
  for: bindScene,
}

export type * from "./types"
