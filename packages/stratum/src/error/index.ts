export class StratumError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = "StratumError"
  }
}

/** Malformed document input. Batch indexing skips the document and continues. */
export class ChunkingError extends StratumError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CHUNKING_FAILED", message, options)
    this.name = "ChunkingError"
  }
}

export class ConfigurationError extends StratumError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INVALID_CONFIGURATION", message, options)
    this.name = "ConfigurationError"
  }
}

export class EmbeddingUnavailable extends StratumError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("EMBEDDING_UNAVAILABLE", message, options)
    this.name = "EmbeddingUnavailable"
  }
}

export class RetrievalUnavailable extends StratumError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("RETRIEVAL_UNAVAILABLE", message, options)
    this.name = "RetrievalUnavailable"
  }
}

export class GenerationUnavailable extends StratumError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("GENERATION_UNAVAILABLE", message, options)
    this.name = "GenerationUnavailable"
  }
}

/**
 * The vector index returned an id the node store does not know. Never thrown
 * by the merge pass; it is logged and the entry is dropped.
 */
export class StaleReferenceWarning extends StratumError {
  constructor(public readonly nodeID: string) {
    super("STALE_REFERENCE", `Node not found in store: ${nodeID}`)
    this.name = "StaleReferenceWarning"
  }
}

export class NodeNotFoundError extends StratumError {
  constructor(public readonly nodeID: string) {
    super("NODE_NOT_FOUND", `Node not found: ${nodeID}`)
    this.name = "NodeNotFoundError"
  }
}

export class QueryTimeoutError extends StratumError {
  constructor(timeoutMs: number) {
    super("QUERY_TIMEOUT", `Query did not finish within ${timeoutMs}ms`)
    this.name = "QueryTimeoutError"
  }
}

export class DocumentLoadError extends StratumError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("DOCUMENT_LOAD_FAILED", message, options)
    this.name = "DocumentLoadError"
  }
}

export function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error)
}
