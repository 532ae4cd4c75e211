/**
 * Shared plumbing for GitHub-backed registries
 *
 * A GitHub registry is a repository whose directory layout encodes the
 * artifact types it holds. The package and template variants differ only in
 * that layout.
 */

import { GITHUB_HOST, GITHUB_REPOSITORY_REGEX } from "#/constants";
import { RegistryError } from "#/errors";
import { formatArtifactType } from "#/artifact";
import type { GithubContentEntry, GithubContentsClient, GithubRepository } from "#/github";
import type { ArtifactType, GithubRegistry, GithubRegistryFormat } from "../registry.types";

export interface GithubRegistryOptions {
  client: GithubContentsClient;
}

/**
 * Extract owner and repository from a registry URL.
 *
 * @example
 * parseGithubRepository("https://github.com/helm/charts") → { owner: "helm", repository: "charts" }
 */
export function parseGithubRepository(url: string): GithubRepository {
  const match = url.match(GITHUB_REPOSITORY_REGEX);
  if (!match) {
    throw new RegistryError(
      "unsupported_registry",
      `Invalid GitHub registry URL: ${url}. Expected format: github.com/owner/repo`
    );
  }

  const [, owner = "", repository = ""] = match;
  return { owner, repository };
}

export function isVisibleDirectory(entry: GithubContentEntry): boolean {
  return entry.type === "dir" && !entry.name.startsWith(".");
}

export function toDownloadUrl(entry: GithubContentEntry): URL | null {
  if (entry.type !== "file" || !entry.download_url) {
    return null;
  }

  try {
    return new URL(entry.download_url);
  } catch (err) {
    throw new RegistryError("invalid_url", `Invalid download URL for ${entry.path}: ${entry.download_url}`, {
      cause: err,
    });
  }
}

export abstract class BaseGithubRegistry implements GithubRegistry {
  readonly name: string;
  readonly shortUrl: string;
  readonly owner: string;
  readonly repository: string;
  abstract readonly format: GithubRegistryFormat;

  protected client: GithubContentsClient;

  constructor(name: string, url: string, options: GithubRegistryOptions) {
    const repo = parseGithubRepository(url);

    this.name = name;
    this.owner = repo.owner;
    this.repository = repo.repository;
    this.shortUrl = `${GITHUB_HOST}/${repo.owner}/${repo.repository}`;
    this.client = options.client;
  }

  abstract getDownloadUrls(type: ArtifactType): Promise<URL[]>;

  protected abstract collectTypes(): Promise<ArtifactType[]>;

  async listTypes(filter?: RegExp): Promise<ArtifactType[]> {
    const types = await this.collectTypes();
    if (!filter) {
      return types;
    }

    return types.filter((type) => {
      filter.lastIndex = 0;
      return filter.test(formatArtifactType(type));
    });
  }

  protected listDirectory(path: string): Promise<GithubContentEntry[]> {
    return this.client.listDirectory({ owner: this.owner, repository: this.repository }, path);
  }

  protected async listSubdirectories(path: string): Promise<string[]> {
    const entries = await this.listDirectory(path);
    return entries.filter(isVisibleDirectory).map((entry) => entry.name);
  }
}
