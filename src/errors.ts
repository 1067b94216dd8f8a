/**
 * Error types surfaced to callers.
 * Oversized input and cancellation are not errors and have no class here.
 */

/** A rule or word-list file could not be read or has the wrong shape */
export class RuleDataError extends Error {
  constructor(
    readonly source: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${source}: ${message}`, options)
    this.name = 'RuleDataError'
  }
}

/** The document decoder rejected a file; analysis never starts */
export class DocumentDecodeError extends Error {
  constructor(
    readonly path: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'DocumentDecodeError'
  }
}
