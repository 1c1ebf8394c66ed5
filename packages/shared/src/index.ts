/**
 * @thumbspace/shared
 *
 * Helpers shared by every package in the monorepo.
 *
 * @example
 * ```typescript
 * import { createSingleFlight, isNotFoundError } from "@thumbspace/shared"
 * ```
 */

export {
  errorMessage,
  extractErrorCode,
  isAlreadyExistsError,
  isFatalError,
  isNotFoundError,
} from "./errors.js"
export { isPathWithinRoot, type PathValidationResult, resolveAndValidatePath } from "./path-security.js"
export { createSingleFlight, type SingleFlight } from "./single-flight.js"
