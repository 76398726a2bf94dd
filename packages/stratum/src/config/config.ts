import { existsSync, readFileSync } from "node:fs"
import path from "node:path"
import { z } from "zod"
import { ConfigurationError } from "@/error"

export const LevelConfig = z.object({
  level: z.number().int(),
  target_token_count: z.number().int(),
  min_token_count: z.number().int(),
})
export type LevelConfig = z.infer<typeof LevelConfig>

export const MergeScoreRule = z.enum(["max", "mean"])
export type MergeScoreRule = z.infer<typeof MergeScoreRule>

export const RetryConfig = z.object({
  retries: z.number().int().min(0).max(10).default(2),
  min_timeout_ms: z.number().int().min(0).default(250),
  max_timeout_ms: z.number().int().min(0).default(4_000),
  attempt_timeout_ms: z.number().int().positive().default(20_000),
})
export type RetryConfig = z.infer<typeof RetryConfig>

export const DEFAULT_LEVELS: LevelConfig[] = [
  { level: 1, target_token_count: 2048, min_token_count: 512 },
  { level: 2, target_token_count: 512, min_token_count: 128 },
  { level: 3, target_token_count: 128, min_token_count: 32 },
]

export const StratumConfig = z.object({
  levels: z.array(LevelConfig).default(DEFAULT_LEVELS),
  tolerance: z.number().default(1.25),
  merge_threshold: z.number().int().default(2),
  merge_score: MergeScoreRule.default("max"),
  top_k: z.number().int().default(12),
  max_context_tokens: z.number().int().default(3_000),
  query_timeout_ms: z.number().int().positive().default(60_000),
  embedding_batch_size: z.number().int().positive().default(32),
  retry: RetryConfig.default({}),
})
export type StratumConfigInput = z.input<typeof StratumConfig>
export type StratumConfig = Readonly<Omit<z.infer<typeof StratumConfig>, "levels" | "retry">> & {
  readonly levels: readonly Readonly<LevelConfig>[]
  readonly retry: Readonly<RetryConfig>
}

function checkLevels(levels: LevelConfig[]) {
  if (levels.length === 0) {
    throw new ConfigurationError("At least one chunk level is required")
  }
  levels.forEach((item, index) => {
    if (item.level !== index + 1) {
      throw new ConfigurationError(
        `Levels must be listed coarsest first and numbered from 1: expected level ${index + 1}, got ${item.level}`,
      )
    }
    if (item.target_token_count < 1) {
      throw new ConfigurationError(`Level ${item.level} target_token_count must be at least 1`)
    }
    if (item.min_token_count < 0 || item.min_token_count > item.target_token_count) {
      throw new ConfigurationError(
        `Level ${item.level} min_token_count must be between 0 and target_token_count`,
      )
    }
    const previous = levels[index - 1]
    if (previous && item.target_token_count >= previous.target_token_count) {
      throw new ConfigurationError(
        `Level ${item.level} target_token_count must be smaller than level ${previous.level}`,
      )
    }
  })
}

/** Validates raw configuration and returns a frozen copy. Never corrects bad values. */
export function parseConfig(input: unknown): StratumConfig {
  const parsed = StratumConfig.safeParse(input ?? {})
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ")
    throw new ConfigurationError(`Invalid configuration: ${detail}`)
  }

  const config = parsed.data
  checkLevels(config.levels)
  if (config.tolerance < 1) {
    throw new ConfigurationError("tolerance must be at least 1")
  }
  if (config.merge_threshold < 1) {
    throw new ConfigurationError("merge_threshold must be at least 1")
  }
  if (config.top_k < 1) {
    throw new ConfigurationError("top_k must be at least 1")
  }
  if (config.max_context_tokens < 1) {
    throw new ConfigurationError("max_context_tokens must be at least 1")
  }
  if (config.retry.min_timeout_ms > config.retry.max_timeout_ms) {
    throw new ConfigurationError("retry.min_timeout_ms must not exceed retry.max_timeout_ms")
  }

  return Object.freeze({
    ...config,
    levels: Object.freeze(config.levels.map((item) => Object.freeze({ ...item }))),
    retry: Object.freeze({ ...config.retry }),
  })
}

function readIntEnv(env: NodeJS.ProcessEnv, name: string) {
  const raw = env[name]?.trim()
  if (!raw) return undefined
  const parsed = Number(raw)
  if (!Number.isInteger(parsed)) {
    throw new ConfigurationError(`${name} must be an integer, got: ${raw}`)
  }
  return parsed
}

function readConfigFile(filePath: string): Record<string, unknown> {
  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(filePath, "utf8"))
  } catch (error) {
    throw new ConfigurationError(`Unable to read config file ${filePath}`, { cause: error })
  }
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new ConfigurationError(`Config file must contain a JSON object: ${filePath}`)
  }
  return { ...raw }
}

export function loadConfig(input: { path?: string; env?: NodeJS.ProcessEnv } = {}): StratumConfig {
  const env = input.env ?? process.env
  const explicit = input.path ?? env.STRATUM_CONFIG?.trim()
  const filePath = explicit || path.join(process.cwd(), "stratum.config.json")
  if (explicit && !existsSync(filePath)) {
    throw new ConfigurationError(`Config file not found: ${filePath}`)
  }
  const fromFile = existsSync(filePath) ? readConfigFile(filePath) : {}

  const overrides = {
    top_k: readIntEnv(env, "STRATUM_TOP_K"),
    merge_threshold: readIntEnv(env, "STRATUM_MERGE_THRESHOLD"),
    max_context_tokens: readIntEnv(env, "STRATUM_MAX_CONTEXT_TOKENS"),
  }

  return parseConfig({
    ...fromFile,
    ...Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined)),
  })
}
