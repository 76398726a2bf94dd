import { serve } from "@hono/node-server"
import { loadEnv, resolveLogLevelEnv } from "@/config/env"
import { openStratum } from "@/runtime"
import { Log } from "@/util/log"
import { resolvePort, validateServerEnv } from "./env"
import { createApp } from "./route"

async function main() {
  loadEnv()
  const isDev = process.env.NODE_ENV !== "production"
  const levelResult = Log.Level.safeParse(resolveLogLevelEnv())
  await Log.init({
    print: isDev,
    level: levelResult.success ? levelResult.data : undefined,
  })

  validateServerEnv()

  const stratum = await openStratum()
  const app = createApp(stratum)
  const log = Log.create({ service: "server" })
  const port = resolvePort()
  const server = serve({ fetch: app.fetch, port }, (info) => {
    log.info("Started server.", { url: `http://localhost:${info.port}` })
  })

  const shutdown = (signal: string) => {
    log.info("Shutting down server", { signal })
    server.close()
  }

  process.on("SIGINT", () => shutdown("SIGINT"))
  process.on("SIGTERM", () => shutdown("SIGTERM"))
}

main().catch((error) => {
  console.error(error)
  process.exit(1)
})
