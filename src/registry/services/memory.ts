/**
 * In-memory registry metadata service
 *
 * Default metadata source. Seeded with the public chart and template
 * registries unless told otherwise.
 */

import { RegistryError, notFound } from "#/errors";
import { hasShortUrlPrefix } from "#/url";
import type { RegistryRecord, RegistryService } from "../registry.types";

export const DEFAULT_REGISTRIES: readonly RegistryRecord[] = [
  {
    name: "charts",
    url: "github.com/helm/charts",
    type: "github",
    format: "unversioned;one-level",
  },
  {
    name: "application-dm-templates",
    url: "github.com/kubernetes/application-dm-templates",
    type: "github",
    format: "versioned;collection",
  },
];

export class InMemoryRegistryService implements RegistryService {
  private records = new Map<string, RegistryRecord>();

  constructor(initial: readonly RegistryRecord[] = DEFAULT_REGISTRIES) {
    for (const record of initial) {
      this.records.set(record.name, { ...record });
    }
  }

  async list(): Promise<RegistryRecord[]> {
    return Array.from(this.records.values(), (record) => ({ ...record }));
  }

  async get(name: string): Promise<RegistryRecord> {
    const record = this.records.get(name);
    if (!record) {
      throw notFound(`registry not found: ${name}`);
    }
    return { ...record };
  }

  /**
   * Find the record whose URL is a scheme-insensitive prefix of `url`.
   */
  async getByUrl(url: string): Promise<RegistryRecord> {
    for (const record of this.records.values()) {
      if (hasShortUrlPrefix(url, record.url)) {
        return { ...record };
      }
    }
    throw notFound(`registry not found for url: ${url}`);
  }

  async create(record: RegistryRecord): Promise<void> {
    if (this.records.has(record.name)) {
      throw new RegistryError("unsupported_registry", `registry already exists: ${record.name}`);
    }
    this.records.set(record.name, { ...record });
  }

  async delete(name: string): Promise<void> {
    if (!this.records.delete(name)) {
      throw notFound(`registry not found: ${name}`);
    }
  }
}
