/**
 * A call against the key store failed (locked database, I/O error, closed
 * connection). Never retried here; the next scheduled cycle is the retry.
 */
export class TransientStoreError extends Error {
  override readonly name = "TransientStoreError";

  constructor(
    readonly operation: string,
    options?: { readonly cause?: unknown },
  ) {
    const detail =
      options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`key store ${operation} failed${detail}`, options);
  }
}

/**
 * Invalid or missing startup configuration. Fatal.
 */
export class ConfigurationError extends Error {
  override readonly name = "ConfigurationError";
}

/**
 * The chat platform rejected a request or could not be reached.
 */
export class ChatApiError extends Error {
  override readonly name = "ChatApiError";

  constructor(
    readonly method: string,
    readonly description: string,
    options?: { readonly cause?: unknown },
  ) {
    super(`telegram ${method} failed: ${description}`, options);
  }
}
