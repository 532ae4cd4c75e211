/**
 * Registry types and interfaces
 *
 * The provider and resolver only know "a registry" that can turn an
 * artifact type into download URLs. What backs it is the factory's business.
 */

import type { ArtifactType } from "#/artifact";
import type { RegistryRecord } from "#/schemas";
export type { RegistryFormatTag, RegistryKind, RegistryRecord } from "#/schemas";
export type { ArtifactType } from "#/artifact";

/**
 * A live registry instance.
 */
export interface Registry {
  /** Canonical name, used as the cache key */
  readonly name: string;
  /** Location without scheme, e.g. github.com/helm/charts */
  readonly shortUrl: string;

  /**
   * URLs to fetch for one artifact type
   */
  getDownloadUrls(type: ArtifactType): Promise<URL[]>;
}

export type GithubRegistryFormat = "package" | "template";

/**
 * A registry backed by a GitHub repository.
 */
export interface GithubRegistry extends Registry {
  readonly owner: string;
  readonly repository: string;
  readonly format: GithubRegistryFormat;

  /**
   * List the types in the registry, optionally keeping only those whose
   * formatted form (qualifier/name:version) matches the filter.
   */
  listTypes(filter?: RegExp): Promise<ArtifactType[]>;
}

/**
 * Source of persisted registry records.
 * `get` and `getByUrl` throw a not_found RegistryError when nothing matches.
 */
export interface RegistryService {
  list(): Promise<RegistryRecord[]>;
  get(name: string): Promise<RegistryRecord>;
  getByUrl(url: string): Promise<RegistryRecord>;
  create(record: RegistryRecord): Promise<void>;
  delete(name: string): Promise<void>;
}

/**
 * Builds GitHub registries from records. Swappable for tests or custom backends.
 */
export interface GithubRegistryFactory {
  getGithubRegistry(record: RegistryRecord): GithubRegistry;
}

/**
 * Looks up live registries, constructing and caching them on demand.
 */
export interface RegistryProvider {
  getRegistryByName(name: string): Promise<Registry>;
  getRegistryByShortUrl(url: string): Promise<Registry>;
}
