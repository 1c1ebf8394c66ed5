/**
 * HResponse pattern for type-safe error handling
 * Inspired by Rust's Result type
 */

import { errorMessage } from "@thumbspace/shared"

/**
 * Error codes surfaced by the store. The HTTP layer maps each one to a status.
 */
export type ErrorCode =
  | "key:invalid"
  | "spec:invalid"
  | "source:not-found"
  | "variant:not-found"
  | "source:exists"
  | "source:too-large"
  | "build:failed"
  | "io:error"

export type ResponseError = { message: string; code: ErrorCode }

export type Result<T> = { data: T; error: null } | { data: null; error: ResponseError }

export type HResponse<T> = Promise<Result<T>>

/**
 * Error carrying an ErrorCode through code paths that throw,
 * e.g. a shared thumbnail build whose rejection every waiter observes.
 */
export class StoreError extends Error {
  readonly code: ErrorCode

  constructor(message: string, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "StoreError"
    this.code = code
  }

  /**
   * Keep StoreErrors as they are, wrap anything else under `code`.
   */
  static wrap(error: unknown, code: ErrorCode, prefix: string): StoreError {
    if (error instanceof StoreError) {
      return error
    }
    return new StoreError(`${prefix}: ${errorMessage(error)}`, code, { cause: error })
  }
}

/**
 * Response builders
 */
export class Rs {
  static data<T>(data: T): { data: T; error: null } {
    return { data, error: null }
  }

  static error(message: string, code: ErrorCode): { data: null; error: ResponseError } {
    return {
      data: null,
      error: { message, code },
    }
  }

  /**
   * A StoreError keeps its own code; anything else is reported under `code`.
   */
  static fromError(error: unknown, code: ErrorCode): { data: null; error: ResponseError } {
    if (error instanceof StoreError) {
      return Rs.error(error.message, error.code)
    }
    return Rs.error(errorMessage(error), code)
  }
}
