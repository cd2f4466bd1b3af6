/**
 * Base class for term matcher errors.
 */
export class TermMatcherError extends Error {
  constructor(message: string, public readonly code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TermMatcherError";
  }
}

/**
 * The term source is missing or cannot be read.
 */
export class TermSourceUnavailableError extends TermMatcherError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "RESOURCE_UNAVAILABLE", options);
    this.name = "TermSourceUnavailableError";
  }
}

/**
 * Reading the term source failed part way. Terms read before the failure stay loaded.
 */
export class TermLoadError extends TermMatcherError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "PROCESSING_FAILURE", options);
    this.name = "TermLoadError";
  }
}
