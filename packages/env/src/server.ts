/**
 * Server-side configuration
 *
 * @example
 * ```typescript
 * import { loadEnvFile, loadServerConfig } from "@thumbspace/env"
 *
 * // Optional: explicitly load .env file (call once at app entry)
 * loadEnvFile()
 *
 * const config = loadServerConfig()
 * ```
 */

import { existsSync } from "node:fs"
import { join, resolve } from "node:path"
import { createEnv } from "@t3-oss/env-core"
import { config as loadDotenv } from "dotenv"
import { serverSchema } from "./schema.js"

export type LogLevel = "debug" | "info" | "warn" | "error"

export interface ThumbnailSize {
  width: number
  height: number
}

export interface ServerConfig {
  host: string
  port: number
  /** Absolute path of the source asset root */
  sourceDir: string
  /** Absolute path of the thumbnail root */
  thumbnailDir: string
  allowedExtensions: string[]
  defaultThumbnailWidth: number
  allowedThumbnailSizes: ThumbnailSize[]
  /** Seconds, sent as cache-control max-age on thumbnails */
  thumbnailMaxAge: number
  /** 0 disables the deadline */
  buildTimeoutMs: number
  maxUploadBytes: number
  writeChecksums: boolean
  logLevel: LogLevel
  sentryDsn: string | undefined
  nodeEnv: "development" | "test" | "production"
}

export type RuntimeEnv = Record<string, string | undefined>

/**
 * Explicitly load environment file
 *
 * Call this at your app's entry point if you need dotenv loading.
 * This is NOT called automatically on import (no side effects).
 *
 * @param nodeEnv - Environment name (defaults to NODE_ENV or "development")
 * @returns true if file was loaded, false if not found
 */
export function loadEnvFile(nodeEnv?: string): boolean {
  const envName = nodeEnv || process.env.NODE_ENV || "development"
  const envFile = join(process.cwd(), `.env.${envName}`)

  if (existsSync(envFile)) {
    loadDotenv({ path: envFile })
    return true
  }

  return false
}

function splitList(raw: string): string[] {
  return raw
    .split(",")
    .map(part => part.trim())
    .filter(part => part !== "")
}

/**
 * Parse "100x100,300x0" into size pairs, dropping duplicates.
 * The schema regex has already checked the shape.
 */
export function parseSizeList(raw: string): ThumbnailSize[] {
  const sizes: ThumbnailSize[] = []
  for (const part of splitList(raw)) {
    const [width = "0", height = "0"] = part.split("x")
    const size = { width: Number.parseInt(width, 10), height: Number.parseInt(height, 10) }
    if (size.width === 0 && size.height === 0) {
      throw new Error(`Invalid thumbnail size ${part}: width and height cannot both be 0`)
    }
    if (!sizes.some(s => s.width === size.width && s.height === size.height)) {
      sizes.push(size)
    }
  }
  return sizes
}

/**
 * Validate the runtime environment and map it to a typed config.
 *
 * @throws Error("Invalid environment variables") when a variable fails validation
 */
export function loadServerConfig(runtimeEnv: RuntimeEnv = process.env): ServerConfig {
  const env = createEnv({
    server: serverSchema,
    runtimeEnv,

    /**
     * Custom error handling
     */
    onValidationError: error => {
      console.error("❌ Invalid environment variables:")
      console.error(error.flatten().fieldErrors)
      throw new Error("Invalid environment variables")
    },

    emptyStringAsUndefined: true,
  })

  return {
    host: env.THUMBSPACE_HOST,
    port: env.THUMBSPACE_PORT,
    sourceDir: resolve(env.THUMBSPACE_SOURCE_DIR),
    thumbnailDir: resolve(env.THUMBSPACE_THUMBNAIL_DIR),
    allowedExtensions: [...new Set(splitList(env.THUMBSPACE_ALLOWED_EXTENSIONS))],
    defaultThumbnailWidth: env.THUMBSPACE_DEFAULT_THUMBNAIL_WIDTH,
    allowedThumbnailSizes: parseSizeList(env.THUMBSPACE_ALLOWED_THUMBNAIL_SIZES),
    thumbnailMaxAge: env.THUMBSPACE_THUMBNAIL_MAX_AGE,
    buildTimeoutMs: env.THUMBSPACE_BUILD_TIMEOUT_MS,
    maxUploadBytes: env.THUMBSPACE_MAX_UPLOAD_BYTES,
    writeChecksums: env.THUMBSPACE_WRITE_CHECKSUMS === "true" || env.THUMBSPACE_WRITE_CHECKSUMS === "1",
    logLevel: env.LOG_LEVEL,
    sentryDsn: env.SENTRY_DSN,
    nodeEnv: env.NODE_ENV,
  }
}
