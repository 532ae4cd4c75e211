/**
 * GitHub contents API types
 */

export type { GithubContentEntry } from "#/schemas";

export interface GithubClientConfig {
  /** API root, e.g. https://api.github.com */
  apiUrl: string;
  token?: string;
}

/**
 * Location of a repository on GitHub
 */
export interface GithubRepository {
  owner: string;
  repository: string;
}
