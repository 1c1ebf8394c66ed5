/**
 * Thumbspace Server
 *
 * Process entry point:
 * - Loads and validates configuration
 * - Wires the source store, thumbnail cache and resizer into the HTTP app
 * - Handles graceful shutdown
 */

import { serve, type ServerType } from "@hono/node-server"
import { loadEnvFile, loadServerConfig } from "@thumbspace/env"
import { createErrorLogger } from "@thumbspace/error-logger"
import { SharpImageResizer, SourceStore, VariantCache } from "@thumbspace/images"
import { isFatalError } from "@thumbspace/shared"
import { createApp } from "./app.js"
import { initSentry, Sentry } from "./sentry.js"

loadEnvFile()
const config = loadServerConfig()

const logger = createErrorLogger({ minLevel: config.logLevel, component: "thumbspace" })
const sentryEnabled = initSentry({ dsn: config.sentryDsn, environment: config.nodeEnv })

const sources = new SourceStore({
  basePath: config.sourceDir,
  writeChecksums: config.writeChecksums,
  maxBytes: config.maxUploadBytes,
  logger: logger.child("source-store"),
})

const cache = new VariantCache({
  basePath: config.thumbnailDir,
  sources,
  resizer: new SharpImageResizer(),
  buildTimeoutMs: config.buildTimeoutMs,
  logger: logger.child("variant-cache"),
})

const app = createApp({ config, sources, cache, logger })

let server: ServerType | null = null

function startServer() {
  server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, info => {
    logger.info("Server started", {
      address: `${config.host}:${info.port}`,
      sourceDir: config.sourceDir,
      thumbnailDir: config.thumbnailDir,
      resizer: SharpImageResizer.describe(),
      sentry: sentryEnabled,
    })
  })
}

// Graceful shutdown
async function shutdown(signal: string, exitCode = 0) {
  logger.info("Shutting down", { signal, pendingBuilds: cache.pendingBuilds() })

  // Stop accepting new connections; in-flight responses finish
  if (server) {
    server.close()
  }

  await Sentry.flush(2000)
  process.exit(exitCode)
}

process.on("SIGTERM", () => {
  void shutdown("SIGTERM")
})
process.on("SIGINT", () => {
  void shutdown("SIGINT")
})

process.on("uncaughtException", err => {
  logger.fatal("Uncaught exception", err)
  Sentry.captureException(err)
  void shutdown("uncaughtException", 1)
})

process.on("unhandledRejection", reason => {
  Sentry.captureException(reason)
  if (isFatalError(reason)) {
    logger.fatal("Unhandled rejection", reason)
    void shutdown("unhandledRejection", 1)
    return
  }
  // Log and continue
  logger.error("Unhandled rejection", reason)
})

startServer()
