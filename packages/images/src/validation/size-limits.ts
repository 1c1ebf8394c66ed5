/**
 * Default upload limit
 */
export const MAX_UPLOAD_SIZE = 10 * 1024 * 1024 // 10MB

/**
 * Human-readable limit for error messages
 */
export function formatSizeLimit(maxSize: number): string {
  if (maxSize >= 1024 * 1024) {
    return `${(maxSize / (1024 * 1024)).toFixed(1)}MB`
  }
  if (maxSize >= 1024) {
    return `${(maxSize / 1024).toFixed(1)}KB`
  }
  return `${maxSize} bytes`
}
