/**
 * GitHub contents API client (read-only)
 *
 * Lists repository directories so registries can find the files that make
 * up a package or template.
 *
 * @see https://docs.github.com/en/rest/repos/contents#get-repository-content
 */

import type { HttpClient } from "#/core";
import { USER_AGENT } from "#/constants";
import { RegistryError, notFound } from "#/errors";
import { safeValidate, formatParseError } from "#/friendly-errors";
import { GithubDirectoryListingSchema } from "#/schemas";
import type { GithubClientConfig, GithubContentEntry, GithubRepository } from "./github.types";

/**
 * Get headers for GitHub API requests.
 */
export function getGitHubHeaders(token?: string): Record<string, string> {
  const headers: Record<string, string> = {
    Accept: "application/vnd.github+json",
    "User-Agent": USER_AGENT,
  };

  if (token) {
    headers.Authorization = `Bearer ${token}`;
  }

  return headers;
}

/**
 * Build the contents API URL for a path inside a repository.
 * Each path segment is encoded separately so "/" stays a separator.
 */
export function buildContentsUrl(apiUrl: string, repo: GithubRepository, path: string): string {
  const encodedPath = path
    .split("/")
    .filter((segment) => segment.length > 0)
    .map(encodeURIComponent)
    .join("/");

  return `${apiUrl}/repos/${encodeURIComponent(repo.owner)}/${encodeURIComponent(repo.repository)}/contents/${encodedPath}`;
}

export class GithubContentsClient {
  private apiUrl: string;
  private token?: string;
  private http: HttpClient;

  constructor(config: GithubClientConfig, http: HttpClient) {
    this.apiUrl = config.apiUrl;
    this.token = config.token;
    this.http = http;
  }

  /**
   * List the entries of a directory. Throws not_found when the path does not exist.
   */
  async listDirectory(repo: GithubRepository, path: string): Promise<GithubContentEntry[]> {
    const url = buildContentsUrl(this.apiUrl, repo, path);
    const where = `${repo.owner}/${repo.repository}/${path}`;

    let response: Response;
    try {
      response = await this.http.fetch(url, { headers: getGitHubHeaders(this.token) });
    } catch (err) {
      const message = err instanceof Error ? err.message : "Unknown error";
      throw new RegistryError("request_failed", `Failed to list ${where}: ${message}`, { cause: err });
    }

    if (response.status === 404) {
      throw notFound(`Path not found in repository: ${where}`);
    }

    if (!response.ok) {
      throw new RegistryError(
        "request_failed",
        `Failed to list ${where}: ${response.status} ${response.statusText}`
      );
    }

    const body: unknown = await response.json();
    const listing = safeValidate(body, GithubDirectoryListingSchema, `directory listing for ${where}`);
    if (!listing.success) {
      throw new RegistryError("request_failed", formatParseError(listing.error));
    }

    return listing.data;
  }
}
