import { splitUnits } from "@/chunker/segment"
import { countTokens, truncateToTokens } from "@/chunker/tokenizer"
import type { AssembledContext, MergedNode } from "./types"

export const CONTEXT_JOINER = "\n\n"

/** Whole sentence units that fit `maxTokens`; a raw token cut when not even the first one does. */
function fitText(text: string, maxTokens: number) {
  let end = 0
  let tokens = 0
  for (const unit of splitUnits(text)) {
    if (tokens + unit.tokens > maxTokens) break
    tokens += unit.tokens
    end = unit.end
  }
  return end > 0 ? text.slice(0, end) : truncateToTokens(text, maxTokens)
}

/**
 * Drops the lowest-scoring entries until the summed `token_count` fits
 * `maxTokens`, then joins the survivors' trimmed text in their given order.
 * `merged` must already be in merge output order (best score first).
 *
 * The best entry is never dropped: when it alone exceeds the budget its text
 * is cut to fit and its citation stays.
 */
export function assembleContext(merged: readonly MergedNode[], maxTokens: number): AssembledContext {
  const kept = [...merged]
  const dropped: string[] = []
  let total = kept.reduce((sum, entry) => sum + entry.node.token_count, 0)

  while (kept.length > 1 && total > maxTokens) {
    let lowest = kept.length - 1
    for (let i = kept.length - 2; i >= 0; i -= 1) {
      const candidate = kept[i]
      const current = kept[lowest]
      if (candidate && current && candidate.score < current.score) lowest = i
    }
    const [removed] = kept.splice(lowest, 1)
    if (!removed) break
    total -= removed.node.token_count
    dropped.push(removed.node.id)
  }

  let passages = kept.map((entry) => entry.node.text.trim())
  const [only] = kept
  if (kept.length === 1 && only && total > maxTokens) {
    const text = fitText(only.node.text, maxTokens).trim()
    passages = [text]
    total = countTokens(text)
  }

  return {
    text: passages.filter((text) => text.length > 0).join(CONTEXT_JOINER),
    token_count: total,
    citations: kept.map((entry) => ({
      id: entry.node.id,
      score: entry.score,
      level: entry.node.level,
      source_metadata: entry.node.source_metadata,
    })),
    dropped,
  }
}
