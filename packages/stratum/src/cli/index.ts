#!/usr/bin/env tsx
import path from "node:path"
import { parseArgs } from "node:util"
import { loadEnv, resolveLogLevelEnv } from "@/config/env"
import { StratumError, errorMessage } from "@/error"
import type { Citation } from "@/retrieval/types"
import { openStratum, type Stratum } from "@/runtime"
import { Log } from "@/util/log"

function usage() {
  console.log(
    [
      "Usage:",
      "  stratum index <dir|file> [options]",
      "  stratum query \"question\" [--context-only] [options]",
      "  stratum stats [options]",
      "  stratum reset [options]",
      "",
      "Options:",
      "  --config <path>         Config file (default: STRATUM_CONFIG or ./stratum.config.json)",
      "  --context-only          Print the assembled context without generating an answer",
      "  --raw                   Print raw JSON",
      "  --help                  Show this help",
      "",
      "Examples:",
      "  stratum index ./docs",
      "  stratum query \"How are leaves merged into parents?\" --context-only",
    ].join("\n"),
  )
}

function formatCitation(citation: Citation, position: number) {
  const meta = citation.source_metadata
  const pages = meta.page_start === meta.page_end ? `p.${meta.page_start}` : `pp.${meta.page_start}-${meta.page_end}`
  return `[${position}] ${citation.id} (level ${citation.level}, ${pages}, score ${citation.score.toFixed(4)})`
}

async function runIndex(stratum: Stratum, target: string | undefined, raw: boolean) {
  if (!target) {
    throw new StratumError("MISSING_ARGUMENT", "index needs a directory or file")
  }
  const root = path.resolve(target)
  const result = await stratum.indexer.indexDirectory(root, {
    onStart(total) {
      if (!raw) console.log(`Indexing ${total} file(s) from ${root}`)
    },
    onDocument(item, done, total) {
      if (!raw) console.log(`  [${done}/${total}] ${item.document_id}: ${item.nodes} nodes, ${item.leaves} leaves`)
    },
    onSkip(item, done, total) {
      if (!raw) console.log(`  [${done}/${total}] skipped ${item.source}: ${item.message}`)
    },
  })
  if (raw) {
    console.log(JSON.stringify(result, null, 2))
    return
  }
  console.log(`Indexed ${result.indexed.length}, skipped ${result.skipped.length}`)
}

async function runQuery(stratum: Stratum, question: string, contextOnly: boolean, raw: boolean) {
  if (!question) {
    throw new StratumError("MISSING_ARGUMENT", "query needs a question")
  }
  if (contextOnly) {
    const result = await stratum.orchestrator.retrieveContext(question)
    if (raw) {
      console.log(JSON.stringify({ context: result.context.text, citations: result.context.citations }, null, 2))
      return
    }
    console.log(result.context.text || "(no matching passages)")
    console.log("")
    result.context.citations.forEach((citation, i) => console.log(formatCitation(citation, i + 1)))
    return
  }

  const result = await stratum.orchestrator.query(question)
  if (raw) {
    console.log(
      JSON.stringify({ answer: result.answer, context: result.context.text, citations: result.context.citations }, null, 2),
    )
    return
  }
  console.log(result.answer)
  console.log("")
  console.log("Sources:")
  result.context.citations.forEach((citation, i) => console.log(formatCitation(citation, i + 1)))
}

function runStats(stratum: Stratum, raw: boolean) {
  const stats = stratum.indexer.stats()
  if (raw) {
    console.log(JSON.stringify(stats, null, 2))
    return
  }
  console.log(`documents: ${stats.documents}`)
  console.log(`nodes:     ${stats.nodes}`)
  console.log(`leaves:    ${stats.leaves}`)
  for (const item of stats.levels) {
    console.log(`  level ${item.level}: ${item.nodes}`)
  }
  console.log(`index:     ${stats.vector_index}`)
  console.log(`embedder:  ${stats.embedder}`)
}

async function main() {
  const { values, positionals } = parseArgs({
    args: process.argv.slice(2),
    allowPositionals: true,
    options: {
      help: { type: "boolean" },
      config: { type: "string" },
      "context-only": { type: "boolean" },
      raw: { type: "boolean" },
    },
  })

  const [command, ...rest] = positionals
  if (values.help || !command) {
    usage()
    return
  }

  loadEnv()
  const levelResult = Log.Level.safeParse(resolveLogLevelEnv())
  await Log.init({ print: true, level: levelResult.success ? levelResult.data : "WARN" })

  const raw = values.raw ?? false
  const stratum = await openStratum({ configPath: values.config })
  switch (command) {
    case "index":
      await runIndex(stratum, rest[0], raw)
      break
    case "query":
      await runQuery(stratum, rest.join(" ").trim(), values["context-only"] ?? false, raw)
      break
    case "stats":
      runStats(stratum, raw)
      break
    case "reset":
      await stratum.indexer.reset()
      console.log("Index cleared")
      break
    default:
      usage()
      process.exitCode = 1
  }
}

main().catch((error) => {
  console.error(error instanceof StratumError ? `${error.code}: ${error.message}` : errorMessage(error))
  process.exit(1)
})
