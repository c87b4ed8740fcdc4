/**
 * Error taxonomy for the digest pipeline.
 *
 * Only `RunAbortedError` and a non-transient `DeliveryError` end a run; every other
 * error is logged by the stage that caught it and scoped to one URL, image or category.
 */

export class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network failure, timeout or non-success HTTP status on a page or image fetch. */
export class FetchError extends PipelineError {
  readonly url: string;
  readonly status?: number;
  readonly timedOut: boolean;

  constructor(url: string, message: string, options: { status?: number; timedOut?: boolean; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.url = url;
    this.status = options.status;
    this.timedOut = options.timedOut ?? false;
  }
}

/** No layout strategy matched the page, or the matched root lacks a heading. */
export class StructuralMismatchError extends PipelineError {
  readonly url: string;
  readonly layout?: string;

  constructor(url: string, message: string, layout?: string) {
    super(message);
    this.url = url;
    this.layout = layout;
  }
}

export class TranslationError extends PipelineError {}

/** Auth, quota or malformed-request failure reported by the remote document service. */
export class RemoteApiError extends PipelineError {
  readonly status?: number;
  readonly documentId?: string;

  constructor(message: string, options: { status?: number; documentId?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.status = options.status;
    this.documentId = options.documentId;
  }
}

export class DeliveryError extends PipelineError {
  /** Timeouts are transient and retried; anything else aborts the run. */
  readonly transient: boolean;
  readonly attempts?: number;

  constructor(message: string, options: { transient: boolean; attempts?: number; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.transient = options.transient;
    this.attempts = options.attempts;
  }
}

export type RunAbortReason = 'no_urls' | 'no_content' | 'missing_credentials';

export class RunAbortedError extends PipelineError {
  readonly reason: RunAbortReason;

  constructor(reason: RunAbortReason, message: string) {
    super(message);
    this.reason = reason;
  }
}
