/**
 * Registry errors
 *
 * Every failure the engine reports is a RegistryError carrying a `code`
 * discriminant. Callers branch on the code, never on the message.
 */

export type RegistryErrorCode =
  | "not_found"
  | "unsupported_registry"
  | "unknown_registry_type"
  | "unknown_registry_format"
  | "invalid_short_type"
  | "invalid_url"
  | "invalid_type"
  | "internal_inconsistency"
  | "request_failed";

export class RegistryError extends Error {
  readonly code: RegistryErrorCode;

  constructor(code: RegistryErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RegistryError";
    this.code = code;
  }
}

export function isRegistryError(err: unknown, code?: RegistryErrorCode): err is RegistryError {
  if (!(err instanceof RegistryError)) {
    return false;
  }
  return code === undefined || err.code === code;
}

export function notFound(message: string, cause?: unknown): RegistryError {
  return new RegistryError("not_found", message, { cause });
}

/**
 * Render an error for display, following the cause chain.
 *
 * @example
 * formatRegistryError(err) → "[not_found] registry not found: charts (caused by: ...)"
 */
export function formatRegistryError(err: unknown): string {
  if (!(err instanceof Error)) {
    return String(err);
  }

  const head = err instanceof RegistryError ? `[${err.code}] ${err.message}` : err.message;
  if (err.cause === undefined) {
    return head;
  }

  return `${head} (caused by: ${formatRegistryError(err.cause)})`;
}
