import { existsSync } from "node:fs"
import path from "node:path"
import { config as loadDotenv } from "dotenv"
import { ConfigurationError } from "@/error"

function findEnv(start: string) {
  let dir = start
  while (true) {
    const file = path.join(dir, ".env")
    if (existsSync(file)) return file
    const parent = path.dirname(dir)
    if (parent === dir) return
    dir = parent
  }
}

let loaded = false

/** Loads the nearest `.env` once. Variables already set in the process win. */
export function loadEnv() {
  if (loaded) return
  loaded = true
  const envPath = process.env.STRATUM_ENV_PATH?.trim() || findEnv(process.cwd())
  if (envPath) {
    loadDotenv({ path: envPath })
  }
}

export function readEnv(name: string) {
  const raw = process.env[name]
  if (!raw) return ""
  return raw.trim()
}

export function resolveLogLevelEnv() {
  return readEnv("STRATUM_LOG_LEVEL").toUpperCase()
}

export function resolveProjectEnv() {
  return readEnv("STRATUM_PROJECT") || "default"
}

export function resolveOpenAIEnv() {
  return {
    apiKey: readEnv("OPENAI_API_KEY"),
    baseURL: readEnv("OPENAI_BASE_URL") || undefined,
  }
}

export function resolvePineconeEnv() {
  return {
    apiKey: readEnv("PINECONE_API_KEY"),
    indexName: readEnv("STRATUM_PINECONE_INDEX"),
  }
}

export function validatePineconeEnv() {
  const config = resolvePineconeEnv()
  if ((config.apiKey && !config.indexName) || (!config.apiKey && config.indexName)) {
    throw new ConfigurationError("PINECONE_API_KEY and STRATUM_PINECONE_INDEX must be configured together")
  }
}
