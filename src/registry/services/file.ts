/**
 * File-backed registry metadata service
 *
 * Reads registry records from a YAML file:
 *
 * ```yaml
 * registries:
 *   - name: charts
 *     url: github.com/helm/charts
 *     type: github
 *     format: unversioned;one-level
 * ```
 *
 * The file is read on first use and kept once it parses. The service is read-only.
 */

import type { FileSystem } from "#/core";
import { RegistryError } from "#/errors";
import { formatParseError, safeParseYaml } from "#/friendly-errors";
import { RegistryFileSchema } from "#/schemas";
import type { RegistryRecord, RegistryService } from "../registry.types";
import { InMemoryRegistryService } from "./memory";

export class FileRegistryService implements RegistryService {
  private path: string;
  private fs: FileSystem;
  private loaded?: Promise<InMemoryRegistryService>;

  constructor(path: string, fs: FileSystem) {
    this.path = path;
    this.fs = fs;
  }

  private load(): Promise<InMemoryRegistryService> {
    // A failed read is not kept, so the next call tries again
    this.loaded ??= this.read().catch((err: unknown) => {
      this.loaded = undefined;
      throw err;
    });
    return this.loaded;
  }

  private async read(): Promise<InMemoryRegistryService> {
    if (!this.fs.exists(this.path)) {
      throw new RegistryError("not_found", `registry file not found: ${this.path}`);
    }

    const result = safeParseYaml(this.fs.readFile(this.path), RegistryFileSchema, this.path);
    if (!result.success) {
      throw new RegistryError("unsupported_registry", formatParseError(result.error));
    }

    return new InMemoryRegistryService(result.data.registries);
  }

  async list(): Promise<RegistryRecord[]> {
    return (await this.load()).list();
  }

  async get(name: string): Promise<RegistryRecord> {
    return (await this.load()).get(name);
  }

  async getByUrl(url: string): Promise<RegistryRecord> {
    return (await this.load()).getByUrl(url);
  }

  async create(record: RegistryRecord): Promise<void> {
    throw new RegistryError("unsupported_registry", `registry file ${this.path} is read-only: cannot add ${record.name}`);
  }

  async delete(name: string): Promise<void> {
    throw new RegistryError("unsupported_registry", `registry file ${this.path} is read-only: cannot delete ${name}`);
  }
}
