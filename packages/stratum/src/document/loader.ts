import fs from "node:fs/promises"
import path from "node:path"
import { DocumentLoadError, errorMessage } from "@/error"
import type { DocumentPage } from "@/tree/types"
import { inferFormat, parseDocument } from "./parser"

export type LoadedDocument = {
  documentID: string
  title: string
  sourcePath: string
  pages: DocumentPage[]
}

/** Document id for a file: its path relative to the indexed root, with forward slashes. */
export function documentIDFor(root: string, filePath: string) {
  return path.relative(root, filePath).split(path.sep).join("/")
}

/** Supported files under `root`, sorted by path. Hidden entries are skipped. */
export async function listDocuments(root: string): Promise<string[]> {
  const stat = await fs.stat(root).catch((error: unknown) => {
    throw new DocumentLoadError(`Cannot read ${root}: ${errorMessage(error)}`, { cause: error })
  })
  if (stat.isFile()) {
    return inferFormat(root) ? [root] : []
  }

  const found: string[] = []
  const walk = async (dir: string) => {
    const entries = await fs.readdir(dir, { withFileTypes: true })
    for (const entry of entries) {
      if (entry.name.startsWith(".")) continue
      const full = path.join(dir, entry.name)
      if (entry.isDirectory()) {
        await walk(full)
      } else if (entry.isFile() && inferFormat(entry.name)) {
        found.push(full)
      }
    }
  }
  await walk(root)
  return found.sort()
}

export async function loadDocument(root: string, filePath: string): Promise<LoadedDocument> {
  let buffer: Buffer
  try {
    buffer = await fs.readFile(filePath)
  } catch (error) {
    throw new DocumentLoadError(`Cannot read ${filePath}: ${errorMessage(error)}`, { cause: error })
  }
  const base = root === filePath ? path.dirname(root) : root
  return {
    documentID: documentIDFor(base, filePath),
    title: path.basename(filePath, path.extname(filePath)),
    sourcePath: filePath,
    pages: await parseDocument({ fileName: filePath, buffer }),
  }
}
