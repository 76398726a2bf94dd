import { PDFParse } from "pdf-parse"
import { DocumentLoadError, errorMessage } from "@/error"
import type { DocumentPage } from "@/tree/types"

export type DocumentFormat = "pdf" | "txt" | "md"

const PAGE_BREAK = "\f"

export function inferFormat(fileName: string): DocumentFormat | undefined {
  const lower = fileName.trim().toLowerCase()
  if (lower.endsWith(".pdf")) return "pdf"
  if (lower.endsWith(".txt")) return "txt"
  if (lower.endsWith(".md") || lower.endsWith(".markdown")) return "md"
  return undefined
}

/** Plain text pages are separated by form feeds; a file without one is a single page. */
export function splitTextPages(text: string): DocumentPage[] {
  return text.split(PAGE_BREAK).map((page, index) => ({ page_number: index + 1, text: page }))
}

async function parsePDF(buffer: Buffer): Promise<DocumentPage[]> {
  const parser = new PDFParse({ data: new Uint8Array(buffer) })
  try {
    const result = await parser.getText()
    return result.pages.map((page) => ({ page_number: page.num, text: page.text }))
  } finally {
    await parser.destroy()
  }
}

export async function parseDocument(input: { fileName: string; buffer: Buffer }): Promise<DocumentPage[]> {
  const format = inferFormat(input.fileName)
  if (!format) {
    throw new DocumentLoadError(`Only PDF, TXT, or MD files are supported: ${input.fileName}`)
  }
  if (format === "txt" || format === "md") {
    return splitTextPages(input.buffer.toString("utf8"))
  }
  try {
    return await parsePDF(input.buffer)
  } catch (error) {
    throw new DocumentLoadError(`Failed to parse PDF ${input.fileName}: ${errorMessage(error)}`, { cause: error })
  }
}
