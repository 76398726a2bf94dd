import { Hono } from "hono"
import { z } from "zod"
import type { Stratum } from "@/runtime"
import { Log } from "@/util/log"
import { resolveAPIToken } from "./env"
import { errorResponse } from "./errors"

const log = Log.create({ service: "server" })

const API_TOKEN_HEADER = "x-stratum-token"

const queryInput = z.object({
  question: z.string().min(1),
  context_only: z.boolean().optional(),
})

const indexInput = z.object({
  document_id: z.string().min(1),
  title: z.string().optional(),
  source_path: z.string().optional(),
  pages: z
    .array(
      z.object({
        page_number: z.number().int().nonnegative(),
        text: z.string(),
      }),
    )
    .min(1),
})

export function setupRoutes(app: Hono, stratum: Stratum) {
  app.get("/healthz", (c) => c.json({ status: "ok" }))

  app.use("/api/*", async (c, next) => {
    const expected = resolveAPIToken()
    if (!expected) return next()
    const incoming = c.req.header(API_TOKEN_HEADER)?.trim() ?? ""
    if (incoming !== expected) {
      return c.json({ error: "Unauthorized" }, 401)
    }
    return next()
  })

  app.get("/api/stats", (c) => c.json(stratum.indexer.stats()))

  app.post("/api/query", async (c) => {
    const body = await c.req.json().catch(() => undefined)
    const parsed = queryInput.safeParse(body)
    if (!parsed.success) {
      return c.json({ error: "Invalid query body", issues: parsed.error.issues }, 400)
    }
    try {
      if (parsed.data.context_only) {
        const result = await stratum.orchestrator.retrieveContext(parsed.data.question)
        return c.json({ context: result.context.text, citations: result.context.citations })
      }
      const result = await stratum.orchestrator.query(parsed.data.question)
      return c.json({
        answer: result.answer,
        context: result.context.text,
        citations: result.context.citations,
      })
    } catch (error) {
      log.error("query failed", { error })
      return errorResponse(c, error)
    }
  })

  app.post("/api/index", async (c) => {
    const body = await c.req.json().catch(() => undefined)
    const parsed = indexInput.safeParse(body)
    if (!parsed.success) {
      return c.json({ error: "Invalid index body", issues: parsed.error.issues }, 400)
    }
    try {
      const indexed = await stratum.indexer.indexDocument({
        documentID: parsed.data.document_id,
        pages: parsed.data.pages,
        title: parsed.data.title,
        sourcePath: parsed.data.source_path,
      })
      return c.json({ indexed }, 201)
    } catch (error) {
      log.error("index failed", { error })
      return errorResponse(c, error)
    }
  })

  app.delete("/api/documents/:id", async (c) => {
    const documentID = c.req.param("id").trim()
    if (!stratum.store.tree(documentID)) {
      return c.json({ error: `Document not found: ${documentID}`, code: "NODE_NOT_FOUND" }, 404)
    }
    try {
      const removed = await stratum.indexer.removeDocument(documentID)
      return c.json({ document_id: documentID, removed_vectors: removed })
    } catch (error) {
      return errorResponse(c, error)
    }
  })

  app.post("/api/reset", async (c) => {
    try {
      await stratum.indexer.reset()
      return c.json({ status: "ok" })
    } catch (error) {
      return errorResponse(c, error)
    }
  })

  return app
}

export function createApp(stratum: Stratum) {
  return setupRoutes(new Hono(), stratum)
}
