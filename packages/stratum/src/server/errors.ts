import type { Context } from "hono"
import { StratumError } from "@/error"

export function statusForCode(code: string) {
  switch (code) {
    case "INVALID_CONFIGURATION":
    case "CHUNKING_FAILED":
    case "DOCUMENT_LOAD_FAILED":
    case "EMPTY_QUESTION":
    case "INVALID_NODE":
    case "DUPLICATE_NODE":
      return 400
    case "NODE_NOT_FOUND":
      return 404
    case "EMBEDDING_UNAVAILABLE":
    case "RETRIEVAL_UNAVAILABLE":
    case "GENERATION_UNAVAILABLE":
      return 503
    case "QUERY_TIMEOUT":
      return 504
    default:
      return 500
  }
}

export function errorResponse(c: Context, error: unknown) {
  if (!(error instanceof StratumError)) {
    const message = error instanceof Error ? error.message : "Unknown error"
    return c.json({ error: message }, 500)
  }
  return c.json({ error: error.message, code: error.code }, statusForCode(error.code))
}
