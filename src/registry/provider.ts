/**
 * Registry provider
 *
 * Owns the cache of live registries. Registries are built lazily on first
 * lookup, cached under their own canonical name and never evicted.
 *
 * Construction is single-flight: concurrent misses for the same key share
 * one in-flight lookup, and the cache is re-checked before every insert so
 * one canonical name never maps to two instances.
 */

import { GITHUB_API_URL } from "#/constants";
import { createNodeHttpClient, type HttpClient } from "#/core";
import { RegistryError, isRegistryError, notFound } from "#/errors";
import { GithubContentsClient } from "#/github";
import { createLogger } from "#/logger";
import { hasShortUrlPrefix, trimUrlScheme } from "#/url";
import type {
  GithubRegistry,
  GithubRegistryFactory,
  Registry,
  RegistryProvider,
  RegistryRecord,
  RegistryService,
} from "./registry.types";
import { createGithubRegistry } from "./factory";
import { InMemoryRegistryService } from "./services/memory";

const log = createLogger("provider");

export interface RegistryProviderOptions {
  /** Metadata source. Defaults to an in-memory service seeded with the default registries. */
  service?: RegistryService;
  /** Registry factory. Defaults to the provider's own getGithubRegistry. */
  factory?: GithubRegistryFactory;
  /** Used by the built-in factory only */
  http?: HttpClient;
  apiUrl?: string;
  token?: string;
}

export class CachingRegistryProvider implements RegistryProvider, GithubRegistryFactory {
  private service: RegistryService;
  private factory: GithubRegistryFactory;
  private registries = new Map<string, Registry>();
  private pending = new Map<string, Promise<Registry>>();
  private client?: GithubContentsClient;
  private options: RegistryProviderOptions;

  constructor(options: RegistryProviderOptions = {}) {
    this.options = options;
    this.service = options.service ?? new InMemoryRegistryService();
    this.factory = options.factory ?? this;
  }

  /**
   * Get a registry by its exact canonical name.
   */
  async getRegistryByName(name: string): Promise<Registry> {
    const cached = this.registries.get(name);
    if (cached) {
      log.debug(`cache hit for registry ${name}`);
      return cached;
    }

    log.debug(`cache miss for registry ${name}`);
    return this.singleFlight(`name:${name}`, () => this.service.get(name), `registry not found: ${name}`);
  }

  /**
   * Get the registry whose short URL is a prefix of `url`, ignoring http(s) schemes.
   * When several cached registries match, which one wins is unspecified.
   */
  async getRegistryByShortUrl(url: string): Promise<Registry> {
    const cached = this.findRegistryByShortUrl(url);
    if (cached) {
      log.debug(`cache hit for ${url}: ${cached.name}`);
      return cached;
    }

    log.debug(`cache miss for ${url}`);
    return this.singleFlight(
      `url:${trimUrlScheme(url)}`,
      () => this.service.getByUrl(url),
      `registry not found for url: ${url}`
    );
  }

  /**
   * Built-in factory step, used unless another factory was injected.
   */
  getGithubRegistry(record: RegistryRecord): GithubRegistry {
    this.client ??= new GithubContentsClient(
      {
        apiUrl: this.options.apiUrl ?? GITHUB_API_URL,
        token: this.options.token,
      },
      this.options.http ?? createNodeHttpClient()
    );

    return createGithubRegistry(record, this.client);
  }

  /**
   * Canonical names of the registries built so far
   */
  cachedRegistryNames(): string[] {
    return Array.from(this.registries.keys());
  }

  private findRegistryByShortUrl(url: string): Registry | undefined {
    for (const registry of this.registries.values()) {
      if (hasShortUrlPrefix(url, registry.shortUrl)) {
        return registry;
      }
    }
    return undefined;
  }

  private singleFlight(
    key: string,
    loadRecord: () => Promise<RegistryRecord>,
    notFoundMessage: string
  ): Promise<Registry> {
    const inFlight = this.pending.get(key);
    if (inFlight) {
      log.debug(`joining in-flight construction for ${key}`);
      return inFlight;
    }

    const construction = this.construct(loadRecord, notFoundMessage).finally(() => {
      this.pending.delete(key);
    });
    this.pending.set(key, construction);
    return construction;
  }

  private async construct(
    loadRecord: () => Promise<RegistryRecord>,
    notFoundMessage: string
  ): Promise<Registry> {
    let record: RegistryRecord;
    try {
      record = await loadRecord();
    } catch (err) {
      throw isRegistryError(err) ? err : notFound(notFoundMessage, err);
    }

    let registry: Registry;
    try {
      registry = this.factory.getGithubRegistry(record);
    } catch (err) {
      if (isRegistryError(err)) {
        throw err;
      }
      throw new RegistryError("unsupported_registry", `cannot build registry ${record.name}`, { cause: err });
    }

    return this.register(registry);
  }

  private register(registry: Registry): Registry {
    const existing = this.registries.get(registry.name);
    if (existing) {
      log.debug(`registry ${registry.name} was cached by a concurrent lookup`);
      return existing;
    }

    this.registries.set(registry.name, registry);
    log.info(`registered ${registry.name} (${registry.shortUrl})`);
    return registry;
  }
}

/**
 * Provider over the default registries, using the built-in GitHub factory.
 */
export function createDefaultRegistryProvider(
  options: Omit<RegistryProviderOptions, "service" | "factory"> = {}
): CachingRegistryProvider {
  return new CachingRegistryProvider(options);
}
