/**
 * Registry module
 *
 * Resolves type references into download URLs through cached,
 * lazily-built registries.
 */

// Types
export * from "./registry.types";

// Format tags
export { parseRegistryFormat, hasFormatTags, formatRegistryFormat } from "./format";

// Classifier (short-form detection)
export * from "./classifier";

// Resolver (reference → download URLs)
export { resolveDownloadUrls, resolveTemplateDownloadUrls, resolvePackageDownloadUrls } from "./resolver";

// Factory (registry creation)
export { createGithubRegistry, DefaultGithubRegistryFactory } from "./factory";
export type { GithubRegistryFactoryOptions } from "./factory";

// Provider (cache)
export { CachingRegistryProvider, createDefaultRegistryProvider } from "./provider";
export type { RegistryProviderOptions } from "./provider";

// Metadata services
export * from "./services";

// Registries (direct access if needed)
export { GithubPackageRegistry } from "./clients/package";
export { GithubTemplateRegistry } from "./clients/template";
export { parseGithubRepository } from "./clients/github";
