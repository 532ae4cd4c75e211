/**
 * Registry factory
 *
 * Single decision point for turning a persisted record into a live registry.
 * The factory is the ONLY place that knows about specific registry implementations.
 */

import { RegistryError } from "#/errors";
import { GithubContentsClient } from "#/github";
import { createLogger } from "#/logger";
import type { HttpClient } from "#/core";
import type { GithubRegistry, GithubRegistryFactory, RegistryRecord } from "./registry.types";
import { hasFormatTags, parseRegistryFormat } from "./format";
import { GithubPackageRegistry } from "./clients/package";
import { GithubTemplateRegistry } from "./clients/template";

const log = createLogger("factory");

export interface GithubRegistryFactoryOptions {
  http: HttpClient;
  apiUrl: string;
  token?: string;
}

/**
 * Build a GitHub registry for a record.
 *
 * Recognized format tag sets:
 * - unversioned + one-level → GithubPackageRegistry
 * - versioned + collection → GithubTemplateRegistry
 */
export function createGithubRegistry(record: RegistryRecord, client: GithubContentsClient): GithubRegistry {
  if (record.type !== "github") {
    throw new RegistryError("unknown_registry_type", `unknown registry type: ${record.type}`);
  }

  const tags = parseRegistryFormat(record.format);

  if (hasFormatTags(tags, "unversioned", "one-level")) {
    log.debug(`building package registry ${record.name} from ${record.url}`);
    return new GithubPackageRegistry(record.name, record.url, { client });
  }

  if (hasFormatTags(tags, "versioned", "collection")) {
    log.debug(`building template registry ${record.name} from ${record.url}`);
    return new GithubTemplateRegistry(record.name, record.url, { client });
  }

  throw new RegistryError("unknown_registry_format", `unknown registry format: ${record.format}`);
}

/**
 * Default factory: every registry it builds shares one contents client.
 */
export class DefaultGithubRegistryFactory implements GithubRegistryFactory {
  private client: GithubContentsClient;

  constructor(options: GithubRegistryFactoryOptions) {
    this.client = new GithubContentsClient({ apiUrl: options.apiUrl, token: options.token }, options.http);
  }

  getGithubRegistry(record: RegistryRecord): GithubRegistry {
    return createGithubRegistry(record, this.client);
  }
}
