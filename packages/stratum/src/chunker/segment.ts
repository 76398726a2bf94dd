import type { DocumentPage } from "@/tree/types"
import { countTokens } from "./tokenizer"

export const PAGE_JOINER = "\n\n"

// A unit ends after sentence punctuation plus the whitespace that follows it, or after a blank line.
const UNIT_END_RE = /[.!?]+["'”’)\]]*\s+|[。！？]+\s*|\n[^\S\n]*\n\s*/g

export type PageSpan = {
  page_number: number
  start: number
  end: number
}

export type NormalizedDocument = {
  text: string
  pages: PageSpan[]
}

/** A sentence-sized span. Units tile the document: each owns its trailing whitespace. */
export type TextUnit = {
  start: number
  end: number
  tokens: number
}

function normalizeNewlines(input: string) {
  return input.replace(/\r\n/g, "\n").replace(/\r/g, "\n")
}

export function normalizeDocument(pages: DocumentPage[]): NormalizedDocument {
  let text = ""
  const spans: PageSpan[] = []
  for (const page of pages) {
    const content = normalizeNewlines(page.text).trim()
    if (!content) continue
    if (text.length > 0) text += PAGE_JOINER
    spans.push({ page_number: page.page_number, start: text.length, end: text.length + content.length })
    text += content
  }
  return { text, pages: spans }
}

export function splitUnits(text: string): TextUnit[] {
  const units: TextUnit[] = []
  let start = 0
  for (const match of text.matchAll(UNIT_END_RE)) {
    const end = (match.index ?? 0) + match[0].length
    if (end <= start) continue
    units.push({ start, end, tokens: countTokens(text.slice(start, end)) })
    start = end
  }
  if (start < text.length) {
    units.push({ start, end: text.length, tokens: countTokens(text.slice(start)) })
  }
  return units
}

function pageIndexAt(pages: PageSpan[], offset: number) {
  let low = 0
  let high = pages.length - 1
  let found = 0
  while (low <= high) {
    const mid = Math.floor((low + high) / 2)
    if ((pages[mid]?.start ?? 0) <= offset) {
      found = mid
      low = mid + 1
    } else {
      high = mid - 1
    }
  }
  return found
}

/** Pages touched by the non-whitespace characters of `text.slice(start, end)`. */
export function pageRange(doc: NormalizedDocument, start: number, end: number) {
  const content = doc.text.slice(start, end)
  const lastVisible = start + content.trimEnd().length - 1
  const first = doc.pages[pageIndexAt(doc.pages, start)]
  const last = doc.pages[pageIndexAt(doc.pages, Math.max(start, lastVisible))]
  return {
    page_start: first?.page_number ?? 0,
    page_end: last?.page_number ?? first?.page_number ?? 0,
  }
}
