/**
 * Friendly Errors
 *
 * Parses YAML and validates it against a Zod schema, turning both kinds of
 * failure into a short message plus detail lines.
 *
 * @example
 * ```ts
 * const result = safeParseYaml(content, RegistryFileSchema, "registries.yaml");
 * if (!result.success) {
 *   logger.error(formatParseError(result.error));
 *   return;
 * }
 * const file = result.data;
 * ```
 */

import { parse as parseYaml, YAMLParseError } from "yaml";
import type { ZodType, ZodTypeDef, ZodError } from "zod";

export type ParseErrorType = "yaml" | "validation";

export interface FriendlyError {
  type: ParseErrorType;
  message: string;
  details?: string[];
}

export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; error: FriendlyError };

export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return `${path}${issue.message}`;
  });
}

function formatYamlError(error: YAMLParseError): string {
  // First line only; the rest is a source excerpt
  return error.message.split("\n")[0] ?? error.message;
}

/**
 * Validate an already-parsed value against a Zod schema.
 */
export function safeValidate<Output, Input = Output>(
  raw: unknown,
  schema: ZodType<Output, ZodTypeDef, Input>,
  context: string
): ParseResult<Output> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    return {
      success: false,
      error: {
        type: "validation",
        message: `Invalid ${context}`,
        details: formatZodIssues(result.error),
      },
    };
  }

  return { success: true, data: result.data };
}

/**
 * Parse YAML content and validate against a Zod schema.
 *
 * @param filepath - Optional file path for error context
 */
export function safeParseYaml<Output, Input = Output>(
  content: string,
  schema: ZodType<Output, ZodTypeDef, Input>,
  filepath?: string
): ParseResult<Output> {
  const fileContext = filepath ? ` in ${filepath}` : "";

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    if (err instanceof YAMLParseError) {
      return {
        success: false,
        error: {
          type: "yaml",
          message: `Invalid YAML syntax${fileContext}`,
          details: [formatYamlError(err)],
        },
      };
    }
    return {
      success: false,
      error: {
        type: "yaml",
        message: `Failed to parse YAML${fileContext}`,
        details: [err instanceof Error ? err.message : String(err)],
      },
    };
  }

  return safeValidate(raw, schema, `registry file${fileContext}`);
}

/**
 * Join a friendly error into one multi-line string.
 */
export function formatParseError(error: FriendlyError): string {
  const details = error.details ?? [];
  return [error.message, ...details.map((d) => `  ${d}`)].join("\n");
}
