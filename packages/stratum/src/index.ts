export { HierarchicalChunker, CHILD_JOINER, groupUnits, nodeID } from "./chunker/hierarchical"
export type { ChunkInput } from "./chunker/hierarchical"
export { countTokens, tokenize } from "./chunker/tokenizer"
export { DEFAULT_LEVELS, loadConfig, parseConfig } from "./config/config"
export type { LevelConfig, MergeScoreRule, RetryConfig, StratumConfig, StratumConfigInput } from "./config/config"
export { loadEnv } from "./config/env"
export { listDocuments, loadDocument } from "./document/loader"
export { parseDocument } from "./document/parser"
export * from "./error"
export { IndexService } from "./indexing/service"
export type { BatchResult, IndexedDocument, IndexProgressSink, IndexStats, SkippedDocument } from "./indexing/service"
export { HashEmbeddingProvider, OpenAIEmbeddingProvider, createEmbeddingProvider } from "./provider/embedding"
export { ExtractiveGenerationProvider, OpenAIGenerationProvider, createGenerationProvider } from "./provider/generation"
export type { EmbeddingProvider, GenerationProvider, VectorIndex, VectorMatch, VectorRecord } from "./provider/types"
export * from "./retrieval"
export { createStratum, openStratum } from "./runtime"
export type { Stratum } from "./runtime"
export { createApp } from "./server/route"
export { TreeRepository } from "./tree/repository"
export { DocumentTree, NodeStore } from "./tree/store"
export type { ChunkTree, DocumentPage, SourceMetadata, TreeNode } from "./tree/types"
export { createVectorIndex, MemoryVectorIndex, PineconeVectorIndex } from "./vectorstore"
