/**
 * Node.js implementations of the core interfaces.
 */

import { existsSync, readFileSync } from "node:fs";
import type { FileSystem, HttpClient, TokenProvider } from "./interfaces";

export function createNodeFileSystem(): FileSystem {
  return {
    readFile(path: string): string {
      return readFileSync(path, "utf-8");
    },

    exists(path: string): boolean {
      return existsSync(path);
    },
  };
}

export function createNodeHttpClient(): HttpClient {
  return {
    fetch(url: string, options?: RequestInit): Promise<Response> {
      return fetch(url, options);
    },
  };
}

/**
 * Token provider backed by a fixed GitHub token (usually GITHUB_TOKEN).
 */
export function createStaticTokenProvider(githubToken?: string): TokenProvider {
  return {
    getGitToken(): string | undefined {
      return githubToken;
    },
  };
}
