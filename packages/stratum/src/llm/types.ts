import type {
  EmbeddingModel,
  LanguageModel,
  embedMany as sdkEmbedMany,
  generateText as sdkGenerateText,
} from "ai"

export type SDKGenerateTextFn = typeof sdkGenerateText
export type SDKEmbedManyFn = typeof sdkEmbedMany

export type LanguageSceneId = "answer.generate"

export type EmbeddingSceneId = "text.embedding"

export type LLMSceneId = LanguageSceneId | EmbeddingSceneId

export type LanguageSceneDefinition = {
  providerId: "openai"
  modelId: string
}

export type EmbeddingSceneDefinition = {
  providerId: "openai"
  modelId: string
}

export type LLMSceneDefinitions = {
  language: Record<LanguageSceneId, LanguageSceneDefinition>
  embedding: Record<EmbeddingSceneId, EmbeddingSceneDefinition>
}

export type SceneBindingOptions = {
  modelId?: string
}

export type LanguageSceneClient = {
  model: LanguageModel
  generateText: SDKGenerateTextFn
}

export type EmbeddingSceneClient = {
  model: EmbeddingModel<string>
  embedMany: SDKEmbedManyFn
}

export interface LLMService {
  for(sceneId: LanguageSceneId, options?: SceneBindingOptions): LanguageSceneClient
  for(sceneId: EmbeddingSceneId, options?: SceneBindingOptions): EmbeddingSceneClient
}
