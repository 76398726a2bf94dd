const CJK_CLASS = "\\u3400-\\u4DBF\\u4E00-\\u9FFF\\uF900-\\uFAFF"

// One token per CJK ideograph, per run of letters/digits/underscores, and per other visible character.
const TOKEN_RE = new RegExp(
  `[${CJK_CLASS}]|(?:(?![${CJK_CLASS}])[\\p{L}\\p{N}_])+|[^\\s\\p{L}\\p{N}_]`,
  "gu",
)

export function tokenize(input: string) {
  return input.match(TOKEN_RE) ?? []
}

export function countTokens(input: string) {
  return tokenize(input).length
}

/** The prefix of `input` that ends with its `maxTokens`-th token. */
export function truncateToTokens(input: string, maxTokens: number) {
  let end = 0
  let count = 0
  for (const match of input.matchAll(TOKEN_RE)) {
    if (count >= maxTokens) break
    end = (match.index ?? 0) + match[0].length
    count += 1
  }
  return input.slice(0, end)
}
