import * as path from "node:path"

/**
 * Checks if a resolved path is within a storage root.
 * Last line of defence against path traversal once a key has been validated.
 *
 * @param resolvedPath - The resolved absolute path to check
 * @param root - The resolved storage root
 * @example
 * const target = path.resolve(root, key)
 * if (!isPathWithinRoot(target, root)) {
 *   throw new Error('Path traversal detected')
 * }
 */
export function isPathWithinRoot(resolvedPath: string, root: string): boolean {
  const separator = path.sep

  // Ensure both paths end with separator for proper comparison
  const normalizedRoot = root.endsWith(separator) ? root : root + separator
  const normalizedPath = resolvedPath.endsWith(separator) ? resolvedPath : resolvedPath + separator

  return normalizedPath.startsWith(normalizedRoot) || resolvedPath === root
}

/**
 * Result of path validation
 */
export interface PathValidationResult {
  /** Whether the path is valid and safe */
  valid: boolean
  /** The resolved absolute path */
  resolvedPath: string
  /** Error message if validation failed */
  error?: string
}

/**
 * Resolves a relative path against a root and checks it stays inside.
 * The root itself is not a valid target: every stored object is a file below it.
 *
 * @example
 * const result = resolveAndValidatePath('a/b/photo.jpg', '/var/lib/thumbspace/source')
 * if (!result.valid) {
 *   throw new Error(result.error)
 * }
 * // Use result.resolvedPath safely
 */
export function resolveAndValidatePath(targetPath: string, root: string): PathValidationResult {
  const resolvedRoot = path.resolve(root)
  const resolvedPath = path.resolve(resolvedRoot, targetPath)

  if (resolvedPath === resolvedRoot || !isPathWithinRoot(resolvedPath, resolvedRoot)) {
    return {
      valid: false,
      resolvedPath,
      error: "Path outside storage root",
    }
  }

  return { valid: true, resolvedPath }
}
