/**
 * @deploykit/registry-engine
 *
 * Resolves package and template references into download URLs
 * through lazily-built, cached registries.
 */

// Core interfaces
export * from "#/core";

// Errors
export * from "#/errors";

// Configuration
export * from "#/config";

// Logging
export { logger, createLogger, setLogLevel } from "#/logger";
export type { LogLevelName } from "#/logger";

// Schemas (Zod validation)
export * from "#/schemas";

// Friendly errors (YAML + Zod parsing)
export * from "#/friendly-errors";

// URL helpers
export * from "#/url";

// Artifact types
export * from "#/artifact";

// GitHub contents API
export * from "#/github";

// Registry (classification, resolution, factory, cache)
export * from "#/registry";

// Engine wiring
export * from "#/engine";
