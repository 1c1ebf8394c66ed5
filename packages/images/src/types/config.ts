import type { FileHandle } from "node:fs/promises"

/**
 * Resize modes, keyed by their wire value (`m` query parameter)
 */
export const RESIZE_MODES = {
  /** Largest image within width×height, aspect ratio preserved */
  FIT: 1,
  /** Fills width×height, aspect ratio preserved, overflow cropped around the centre */
  COVER: 2,
  /** Exactly width×height, aspect ratio ignored */
  STRETCH: 3,
} as const

export type ResizeMode = (typeof RESIZE_MODES)[keyof typeof RESIZE_MODES]

/**
 * A requested thumbnail. 0 means "unconstrained" for that dimension.
 */
export interface VariantSpec {
  width: number
  height: number
  mode: ResizeMode
}

export interface ThumbnailSize {
  width: number
  height: number
}

/**
 * An opened file ready to be streamed.
 * The caller owns `handle` and must close it (or hand it to a stream that does).
 */
export interface StoredFile {
  handle: FileHandle
  path: string
  size: number
  modifiedAt: Date
  /** Final extension of the stored file, leading dot included */
  extension: string
}

export interface CreateSourceResult {
  bytesWritten: number
  /** Hex MD5 of the body, null when checksums are disabled */
  checksum: string | null
}
