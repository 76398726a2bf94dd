export type VectorMetadata = Record<string, string | number | boolean>

export type VectorRecord = {
  id: string
  values: number[]
  metadata: VectorMetadata
}

export type VectorMatch = {
  id: string
  score: number
  metadata?: VectorMetadata
}

/** Text to fixed-dimension vectors. Failures surface as `EmbeddingUnavailable`. */
export interface EmbeddingProvider {
  readonly name: string
  embed(text: string, signal?: AbortSignal): Promise<number[]>
  /** Vectors in input order. */
  embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]>
}

/** Nearest-neighbour search over leaf vectors. Only leaf node ids are ever upserted. */
export interface VectorIndex {
  readonly name: string
  upsert(id: string, vector: number[], metadata: VectorMetadata): Promise<void>
  upsertMany(records: VectorRecord[]): Promise<void>
  /** Matches ordered by descending similarity. */
  query(vector: number[], k: number): Promise<VectorMatch[]>
  delete(id: string): Promise<void>
  deleteMany(ids: string[]): Promise<void>
  reset(): Promise<void>
}

export interface GenerationProvider {
  readonly name: string
  generate(context: string, question: string, signal?: AbortSignal): Promise<string>
}
