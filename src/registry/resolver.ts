/**
 * Download URL resolver
 *
 * Turns a type reference into the URLs to fetch:
 * - github.com/owner/repo/qualifier/type:version → template registry lookup
 * - github.com/owner/repo/type → package registry lookup
 * - http(s)://... → the URL itself
 * - anything else (primitive types) → nothing to download
 */

import { createArtifactType } from "#/artifact";
import { RegistryError } from "#/errors";
import { createLogger } from "#/logger";
import { convertUrlsToStrings } from "#/url";
import type { ArtifactType, Registry, RegistryProvider } from "./registry.types";
import {
  detectReferenceKind,
  matchPackageShortForm,
  matchTemplateShortForm,
  type ReferenceKind,
} from "./classifier";

const log = createLogger("resolver");

type ReferenceHandler = (provider: RegistryProvider, reference: string) => Promise<string[]>;

/**
 * Look up the registry owning a short-form reference.
 */
async function requireRegistry(provider: RegistryProvider, reference: string): Promise<Registry> {
  const registry: Registry | undefined = await provider.getRegistryByShortUrl(reference);
  if (!registry) {
    throw new RegistryError(
      "internal_inconsistency",
      `registry provider returned neither a registry nor an error for ${reference}`
    );
  }
  return registry;
}

async function downloadUrlsFor(registry: Registry, type: ArtifactType): Promise<string[]> {
  const urls = await registry.getDownloadUrls(type);
  log.debug(`${registry.name} resolved ${urls.length} download url(s)`);
  return convertUrlsToStrings(urls);
}

/**
 * Resolve github.com/owner/repo/qualifier/type:version
 *
 * @example
 * resolveTemplateDownloadUrls(provider, "github.com/kubernetes/application-dm-templates/storage/redis:v1")
 */
export async function resolveTemplateDownloadUrls(
  provider: RegistryProvider,
  reference: string
): Promise<string[]> {
  const parts = matchTemplateShortForm(reference);
  if (!parts) {
    throw new RegistryError("invalid_short_type", `cannot parse short github url: ${reference}`);
  }

  const [, , qualifier, name, version] = parts;
  const registry = await requireRegistry(provider, reference);
  return downloadUrlsFor(registry, createArtifactType(qualifier, name, version));
}

/**
 * Resolve github.com/owner/repo/type
 *
 * @example
 * resolvePackageDownloadUrls(provider, "github.com/helm/charts/cassandra")
 */
export async function resolvePackageDownloadUrls(
  provider: RegistryProvider,
  reference: string
): Promise<string[]> {
  const parts = matchPackageShortForm(reference);
  if (!parts) {
    throw new RegistryError("invalid_short_type", `cannot parse short github url: ${reference}`);
  }

  const [, , name] = parts;
  const registry = await requireRegistry(provider, reference);
  return downloadUrlsFor(registry, createArtifactType("", name, ""));
}

async function resolveFullUrl(_provider: RegistryProvider, reference: string): Promise<string[]> {
  try {
    return [new URL(reference).toString()];
  } catch (err) {
    throw new RegistryError("invalid_url", `cannot parse download URL ${reference}`, { cause: err });
  }
}

async function resolvePrimitive(): Promise<string[]> {
  return [];
}

// Matchers run in the classifier's order, so template wins over package
const HANDLERS: Record<ReferenceKind, ReferenceHandler> = {
  template: resolveTemplateDownloadUrls,
  package: resolvePackageDownloadUrls,
  url: resolveFullUrl,
  primitive: resolvePrimitive,
};

/**
 * Resolve a type reference into download URLs.
 * Returns an empty list for references that need no download.
 */
export async function resolveDownloadUrls(provider: RegistryProvider, reference: string): Promise<string[]> {
  const kind = detectReferenceKind(reference);
  log.debug(`resolving ${reference} as ${kind}`);
  return HANDLERS[kind](provider, reference);
}
