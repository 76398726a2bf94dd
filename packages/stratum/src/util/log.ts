import { createWriteStream } from "node:fs"
import fs from "node:fs/promises"
import path from "node:path"
import z from "zod"
import { Global } from "@/global"

export const LogLevel = z.enum(["DEBUG", "INFO", "WARN", "ERROR"])
export type LogLevel = z.infer<typeof LogLevel>

const levelPriority: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
}
const KEEP_LOG_FILES = 10
const LOG_FILE_RE = /^\d{4}-\d{2}-\d{2}T\d{6}\.log$/

let level: LogLevel = levelFromEnv() ?? "INFO"

function levelFromEnv() {
  const parsed = LogLevel.safeParse(process.env.STRATUM_LOG_LEVEL?.trim().toUpperCase())
  return parsed.success ? parsed.data : undefined
}

function shouldLog(input: LogLevel): boolean {
  return levelPriority[input] >= levelPriority[level]
}

type LogExtra = Record<string, unknown>

export type Logger = {
  debug(message?: unknown, extra?: LogExtra): void
  info(message?: unknown, extra?: LogExtra): void
  error(message?: unknown, extra?: LogExtra): void
  warn(message?: unknown, extra?: LogExtra): void
  time(message: string, extra?: LogExtra): { stop(extra?: LogExtra): void }
}

const loggers = new Map<string, Logger>()

export interface LogOptions {
  print: boolean
  level?: LogLevel
}

let write = (msg: string) => {
  process.stderr.write(msg)
}

export async function init(options: LogOptions) {
  if (options.level) level = options.level
  if (options.print) {
    write = (msg: string) => {
      process.stderr.write(msg)
    }
    return
  }

  const dir = Global.Path.log
  await fs.mkdir(dir, { recursive: true })
  await cleanup(dir)

  const logpath = path.join(dir, new Date().toISOString().split(".")[0].replace(/:/g, "") + ".log")
  const stream = createWriteStream(logpath, { flags: "w" })
  write = (msg: string) => {
    stream.write(msg)
  }
}

async function cleanup(dir: string) {
  const entries = await fs.readdir(dir).catch((): string[] => [])
  const files = entries.filter((name) => LOG_FILE_RE.test(name)).sort((a, b) => a.localeCompare(b))
  if (files.length <= KEEP_LOG_FILES) return

  const filesToDelete = files.slice(0, files.length - KEEP_LOG_FILES)
  await Promise.all(filesToDelete.map((name) => fs.rm(path.join(dir, name), { force: true })))
}

function formatError(error: Error, depth = 0): string {
  const result = error.message
  return error.cause instanceof Error && depth < 10
    ? result + " Caused by: " + formatError(error.cause, depth + 1)
    : result
}

function formatValue(value: unknown): string {
  if (value instanceof Error) return formatError(value)
  if (typeof value === "object" && value !== null) {
    try {
      return JSON.stringify(value)
    } catch {
      return "[unserializable]"
    }
  }
  return String(value)
}

let last = Date.now()
export function create(tags: LogExtra = {}) {
  const service = tags["service"]
  if (typeof service === "string" && Object.keys(tags).length === 1) {
    const cached = loggers.get(service)
    if (cached) {
      return cached
    }
  }

  function build(message: unknown, extra?: LogExtra) {
    const prefix = Object.entries({
      ...tags,
      ...extra,
    })
      .filter(([_, value]) => value !== undefined && value !== null)
      .map(([key, value]) => `${key}=${formatValue(value)}`)
      .join(" ")
    const next = new Date()
    const diff = next.getTime() - last
    last = next.getTime()
    const output = message === undefined || message === null ? "" : formatValue(message)
    return [next.toISOString().split(".")[0], "+" + diff + "ms", prefix, output]
      .filter((part) => part.length > 0)
      .join(" ") + "\n"
  }

  const result: Logger = {
    debug(message, extra) {
      if (shouldLog("DEBUG")) write("DEBUG " + build(message, extra))
    },
    info(message, extra) {
      if (shouldLog("INFO")) write("INFO  " + build(message, extra))
    },
    warn(message, extra) {
      if (shouldLog("WARN")) write("WARN  " + build(message, extra))
    },
    error(message, extra) {
      if (shouldLog("ERROR")) write("ERROR " + build(message, extra))
    },
    time(message, extra) {
      const now = Date.now()
      result.debug(message, { status: "started", ...extra })
      return {
        stop(done) {
          result.info(message, {
            status: "completed",
            duration: Date.now() - now,
            ...extra,
            ...done,
          })
        },
      }
    },
  }

  if (typeof service === "string" && Object.keys(tags).length === 1) {
    loggers.set(service, result)
  }

  return result
}

export const Log = {
  Level: LogLevel,
  init,
  create,
}
