/**
 * Pure Zod schemas for environment variable validation
 *
 * This file contains ONLY schema definitions - no runtime code, no side effects.
 * Safe to import anywhere (server, tests).
 */

import { z } from "zod"

/**
 * Custom validators for common patterns
 *
 * IMPORTANT: Do NOT use .refine() or .transform() here. Both wrap the schema in
 * ZodEffects, which breaks type inference in @t3-oss/env-core.
 * Lists are validated by regex and split in `toServerConfig`.
 */
export const extensionList = z
  .string()
  .regex(/^\s*\.[A-Za-z0-9]+\s*(,\s*\.[A-Za-z0-9]+\s*)*$/, "Must be a comma-separated list like .jpg,.png")

export const sizeList = z
  .string()
  .regex(/^\s*\d{1,5}x\d{1,5}\s*(,\s*\d{1,5}x\d{1,5}\s*)*$/, "Must be a comma-separated list like 100x100,300x0")

export const booleanFlag = z.enum(["true", "false", "1", "0"])

export const port = z.coerce.number().int().min(0).max(65535)

/**
 * Server environment variables schema
 */
export const serverSchema = {
  // Listener
  THUMBSPACE_HOST: z.string().min(1).default("0.0.0.0"),
  THUMBSPACE_PORT: port.default(7664),

  // Storage roots
  THUMBSPACE_SOURCE_DIR: z.string().min(1).default("./data/source"),
  THUMBSPACE_THUMBNAIL_DIR: z.string().min(1).default("./data/thumbnail"),

  // Keys
  THUMBSPACE_ALLOWED_EXTENSIONS: extensionList.default(".jpg,.jpeg,.png,.webp,.gif"),

  // Thumbnails
  THUMBSPACE_DEFAULT_THUMBNAIL_WIDTH: z.coerce.number().int().min(1).max(99999).default(300),
  THUMBSPACE_ALLOWED_THUMBNAIL_SIZES: sizeList.default("300x0,100x100,200x200,600x0"),
  THUMBSPACE_THUMBNAIL_MAX_AGE: z.coerce.number().int().min(0).default(31_536_000),
  THUMBSPACE_BUILD_TIMEOUT_MS: z.coerce.number().int().min(0).default(0),

  // Uploads
  THUMBSPACE_MAX_UPLOAD_BYTES: z.coerce.number().int().min(1).default(10 * 1024 * 1024),
  THUMBSPACE_WRITE_CHECKSUMS: booleanFlag.default("true"),

  // Observability
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  SENTRY_DSN: z.string().url().optional(),
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
}
