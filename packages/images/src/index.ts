// Core
export { createContentHasher } from "./core/hash.js"
export type { ContentHasher } from "./core/hash.js"
export { MAX_KEY_LENGTH, resolveKeyPath, validateKey } from "./core/keys.js"
export type { KeyValidationResult } from "./core/keys.js"
export { SharpImageResizer } from "./core/resize.js"
export type { ImageResizer, SharpResizerOptions } from "./core/resize.js"
export { deriveVariantPath, parseVariantPath } from "./core/variant-path.js"
export { isResizeMode, parseVariantSpec } from "./core/variant-spec.js"
export type { VariantSpecOptions, VariantSpecQuery, VariantSpecResult } from "./core/variant-spec.js"

// Storage
export { SourceStore } from "./storage/source-store.js"
export type { CreateSourceOptions, SourceStoreConfig } from "./storage/source-store.js"
export { VariantCache } from "./storage/variant-cache.js"
export type { VariantCacheConfig } from "./storage/variant-cache.js"

// Types
export { RESIZE_MODES } from "./types/config.js"
export type { CreateSourceResult, ResizeMode, StoredFile, ThumbnailSize, VariantSpec } from "./types/config.js"
export { Rs, StoreError } from "./types/response.js"
export type { ErrorCode, HResponse, ResponseError, Result } from "./types/response.js"

// Validation
export { formatSizeLimit, MAX_UPLOAD_SIZE } from "./validation/size-limits.js"
