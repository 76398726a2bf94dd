import { randomUUID } from "node:crypto"
import fs from "node:fs/promises"
import path from "node:path"
import { dataDir } from "@/global"

function toFilePath(segments: string[]) {
  return path.join(dataDir(), ...segments.map(encodeSegment)) + ".json"
}

function toDirPath(segments: string[]) {
  return path.join(dataDir(), ...segments.map(encodeSegment))
}

function encodeSegment(segment: string) {
  return encodeURIComponent(segment)
}

async function ensureDir(dir: string) {
  await fs.mkdir(dir, { recursive: true })
}

const locks = new Map<string, Promise<void>>()

// Writes to one file land in call order.
async function withFileLock<T>(filePath: string, task: () => Promise<T>): Promise<T> {
  const previous = locks.get(filePath) ?? Promise.resolve()
  const run = previous.then(task)
  const tail = run.then(
    () => undefined,
    () => undefined,
  )
  locks.set(filePath, tail)
  try {
    return await run
  } finally {
    if (locks.get(filePath) === tail) {
      locks.delete(filePath)
    }
  }
}

export namespace Storage {
  /** Writes through a temp file so readers never see a half-written document. */
  export async function write(segments: string[], data: unknown) {
    const filePath = toFilePath(segments)
    const content = JSON.stringify(data, null, 2)
    await withFileLock(filePath, async () => {
      await ensureDir(path.dirname(filePath))
      const temp = `${filePath}.${randomUUID()}.tmp`
      await fs.writeFile(temp, content, "utf8")
      await fs.rename(temp, filePath)
    })
  }

  /** Parsed JSON; callers validate the shape. */
  export async function read(segments: string[]): Promise<unknown> {
    const filePath = toFilePath(segments)
    const content = await fs.readFile(filePath, "utf8")
    return JSON.parse(content)
  }

  export async function remove(segments: string[]) {
    const filePath = toFilePath(segments)
    await withFileLock(filePath, () => fs.rm(filePath, { force: true }))
  }

  export async function removeAll(segments: string[]) {
    await fs.rm(toDirPath(segments), { recursive: true, force: true })
  }

  export async function list(segments: string[]) {
    const dirPath = toDirPath(segments)
    const entries = await fs.readdir(dirPath, { withFileTypes: true }).catch(() => [])
    const result: string[][] = []
    for (const entry of entries) {
      if (!entry.isFile() || !entry.name.endsWith(".json")) continue
      const name = decodeURIComponent(entry.name.replace(/\.json$/, ""))
      result.push([...segments, name])
    }
    result.sort((a, b) => a.join("/").localeCompare(b.join("/")))
    return result
  }
}
