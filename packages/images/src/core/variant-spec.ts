import type { ResizeMode, ThumbnailSize, VariantSpec } from "../types/config.js"
import { RESIZE_MODES } from "../types/config.js"

/**
 * Raw `w`, `h`, `m` query values; absent and empty are the same.
 */
export interface VariantSpecQuery {
  w?: string
  h?: string
  m?: string
}

export interface VariantSpecOptions {
  /** Width used when neither `w` nor `h` is given */
  defaultWidth: number
  /** Every (width, height) pair a thumbnail may be built at */
  allowedSizes: readonly ThumbnailSize[]
}

export type VariantSpecResult = { valid: true; spec: VariantSpec } | { valid: false; error: string }

const DIMENSION_PATTERN = /^(0|[1-9]\d{0,4})$/

const MODES = new Set<number>(Object.values(RESIZE_MODES))

export function isResizeMode(value: number): value is ResizeMode {
  return MODES.has(value)
}

function present(value: string | undefined): value is string {
  return value !== undefined && value !== ""
}

/**
 * Build a VariantSpec from query parameters.
 *
 * The size allow-list bounds how many variants one key can fan out to,
 * so arbitrary query strings cannot fill the disk.
 */
export function parseVariantSpec(query: VariantSpecQuery, options: VariantSpecOptions): VariantSpecResult {
  let width = 0
  let height = 0

  if (!present(query.w) && !present(query.h)) {
    width = options.defaultWidth
  } else {
    if (present(query.w)) {
      if (!DIMENSION_PATTERN.test(query.w)) return { valid: false, error: `invalid width: ${query.w}` }
      width = Number.parseInt(query.w, 10)
    }
    if (present(query.h)) {
      if (!DIMENSION_PATTERN.test(query.h)) return { valid: false, error: `invalid height: ${query.h}` }
      height = Number.parseInt(query.h, 10)
    }
  }

  let mode: ResizeMode = RESIZE_MODES.FIT
  if (present(query.m)) {
    const parsed = /^\d$/.test(query.m) ? Number.parseInt(query.m, 10) : Number.NaN
    if (!isResizeMode(parsed)) return { valid: false, error: `invalid mode: ${query.m}` }
    mode = parsed
  }

  if (width === 0 && height === 0) {
    return { valid: false, error: "width and height cannot both be 0" }
  }

  if (!options.allowedSizes.some(size => size.width === width && size.height === height)) {
    return { valid: false, error: `thumbnail size not allowed: ${width}x${height}` }
  }

  return { valid: true, spec: { width, height, mode } }
}
