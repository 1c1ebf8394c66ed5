/**
 * @thumbspace/env
 *
 * Centralized environment variable validation using @t3-oss/env-core
 *
 * ```typescript
 * import { loadServerConfig } from "@thumbspace/env"
 *
 * const { sourceDir, allowedThumbnailSizes } = loadServerConfig()
 * ```
 */

export { booleanFlag, extensionList, port, serverSchema, sizeList } from "./schema.js"
export {
  loadEnvFile,
  loadServerConfig,
  type LogLevel,
  parseSizeList,
  type RuntimeEnv,
  type ServerConfig,
  type ThumbnailSize,
} from "./server.js"
