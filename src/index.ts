// src/index.ts — llm-conductor entry point
// Boot sequence: config → orchestration document → orchestrator → gateway → serve

import { serve } from "@hono/node-server"
import { loadConfig } from "./config.js"
import { Orchestrator } from "./conductor/orchestrator.js"
import { createApp } from "./gateway/server.js"

async function main() {
  const bootStart = Date.now()
  console.log("[conductor] booting llm-conductor...")

  // 1. Load config
  const config = loadConfig()
  console.log(`[conductor] config loaded: port=${config.port}, orchestration=${config.configPath}`)

  // 2. Build the orchestrator from the orchestration document
  const orchestrator = Orchestrator.fromFile(config.configPath)
  console.log(
    `[conductor] orchestrator ready: models=${orchestrator.listModels().length}, templates=${orchestrator.listTemplates().length}`,
  )

  // 3. Gateway
  const { app, sessions } = createApp(config, { conductor: orchestrator })

  const bootDuration = Date.now() - bootStart
  const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
    console.log(`[conductor] llm-conductor ready on :${info.port} (boot: ${bootDuration}ms)`)
  })

  // 4. Graceful shutdown: stop accepting connections, then stop the session sweeper
  let shuttingDown = false
  const shutdown = (signal: string) => {
    if (shuttingDown) return
    shuttingDown = true
    console.log(`[conductor] ${signal} received, shutting down...`)

    setTimeout(() => {
      console.error("[conductor] forced shutdown after 30s timeout")
      process.exit(1)
    }, 30_000).unref()

    sessions.close()
    server.close((err) => {
      if (err) {
        console.error("[conductor] server close error:", err)
        process.exit(1)
      }
      console.log("[conductor] shutdown complete")
      process.exit(0)
    })
  }

  process.on("SIGTERM", () => shutdown("SIGTERM"))
  process.on("SIGINT", () => shutdown("SIGINT"))
}

main().catch((err) => {
  console.error("[conductor] fatal boot error:", err)
  process.exit(1)
})
