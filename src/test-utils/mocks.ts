/**
 * Test utilities - Mock factories for dependency injection interfaces
 */

import type { FileSystem, HttpClient, TokenProvider } from "#/core";
import { notFound } from "#/errors";
import { hasShortUrlPrefix } from "#/url";
import type { GithubContentEntry } from "#/github";
import type {
  ArtifactType,
  GithubRegistry,
  GithubRegistryFactory,
  Registry,
  RegistryRecord,
  RegistryService,
} from "#/registry";

/**
 * Create a mock FileSystem with in-memory storage
 */
export function createMockFileSystem(
  initialFiles: Record<string, string> = {}
): FileSystem & { files: Map<string, string> } {
  const files = new Map(Object.entries(initialFiles));

  return {
    files,

    readFile(path: string): string {
      const content = files.get(path);
      if (content === undefined) {
        throw new Error(`ENOENT: no such file or directory, open '${path}'`);
      }
      return content;
    },

    exists(path: string): boolean {
      return files.has(path);
    },
  };
}

/**
 * Recorded fetch call
 */
interface FetchCall {
  url: string;
  headers: Record<string, string>;
}

/**
 * Create a mock HttpClient with predefined responses.
 * Unknown URLs get a 404.
 */
export function createMockHttpClient(
  responses: Map<string, Response | (() => Response)> = new Map()
): HttpClient & { responses: Map<string, Response | (() => Response)>; calls: FetchCall[] } {
  const calls: FetchCall[] = [];

  return {
    responses,
    calls,

    async fetch(url: string, options?: RequestInit): Promise<Response> {
      const headers: Record<string, string> = {};
      new Headers(options?.headers).forEach((value, key) => {
        headers[key] = value;
      });
      calls.push({ url, headers });

      const responseOrFactory = responses.get(url);

      if (!responseOrFactory) {
        return new Response(null, {
          status: 404,
          statusText: "Not Found",
        });
      }

      return typeof responseOrFactory === "function"
        ? responseOrFactory()
        : responseOrFactory;
    },
  };
}

/**
 * Create a mock TokenProvider
 */
export function createMockTokenProvider(tokens: { github?: string } = {}): TokenProvider {
  return {
    getGitToken(): string | undefined {
      return tokens.github;
    },
  };
}

/**
 * Helper to create a successful JSON response
 */
export function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

/**
 * Helper to create an error response
 */
export function errorResponse(status: number, statusText: string): Response {
  return new Response(null, { status, statusText });
}

/**
 * Contents API entry for a file, with a raw.githubusercontent.com download URL
 */
export function fileEntry(owner: string, repo: string, path: string): GithubContentEntry {
  return {
    name: path.split("/").pop() ?? path,
    path,
    type: "file",
    download_url: `https://raw.githubusercontent.com/${owner}/${repo}/master/${path}`,
  };
}

/**
 * Contents API entry for a directory
 */
export function dirEntry(path: string): GithubContentEntry {
  return {
    name: path.split("/").pop() ?? path,
    path,
    type: "dir",
    download_url: null,
  };
}

/**
 * Registry with canned download URLs that records every type it was asked for
 */
export function createStubRegistry(
  name: string,
  shortUrl: string,
  urls: string[] = []
): Registry & { requested: ArtifactType[] } {
  const requested: ArtifactType[] = [];

  return {
    name,
    shortUrl,
    requested,

    async getDownloadUrls(type: ArtifactType): Promise<URL[]> {
      requested.push(type);
      return urls.map((url) => new URL(url));
    },
  };
}

/**
 * Factory that builds stub GitHub registries and counts how often it was called
 */
export function createStubRegistryFactory(
  urls: Record<string, string[]> = {}
): GithubRegistryFactory & { built: RegistryRecord[] } {
  const built: RegistryRecord[] = [];

  return {
    built,

    getGithubRegistry(record: RegistryRecord): GithubRegistry {
      built.push(record);
      const stub = createStubRegistry(record.name, record.url, urls[record.name] ?? []);

      return {
        ...stub,
        owner: "stub",
        repository: record.name,
        format: record.format.includes("collection") ? "template" : "package",
        async listTypes(): Promise<ArtifactType[]> {
          return [];
        },
      };
    },
  };
}

/**
 * Metadata service over fixed records that counts lookups.
 * `delay` holds every lookup open until it resolves.
 */
export function createMockRegistryService(
  records: RegistryRecord[],
  delay?: Promise<void>
): RegistryService & { calls: { get: string[]; getByUrl: string[] } } {
  const calls: { get: string[]; getByUrl: string[] } = { get: [], getByUrl: [] };

  return {
    calls,

    async list(): Promise<RegistryRecord[]> {
      return [...records];
    },

    async get(name: string): Promise<RegistryRecord> {
      calls.get.push(name);
      await delay;
      const record = records.find((r) => r.name === name);
      if (!record) {
        throw notFound(`registry not found: ${name}`);
      }
      return record;
    },

    async getByUrl(url: string): Promise<RegistryRecord> {
      calls.getByUrl.push(url);
      await delay;
      const record = records.find((r) => hasShortUrlPrefix(url, r.url));
      if (!record) {
        throw notFound(`registry not found for url: ${url}`);
      }
      return record;
    },

    async create(record: RegistryRecord): Promise<void> {
      records.push(record);
    },

    async delete(name: string): Promise<void> {
      const index = records.findIndex((r) => r.name === name);
      if (index >= 0) {
        records.splice(index, 1);
      }
    },
  };
}

/**
 * Mock HttpClient serving contents API listings for one repository,
 * keyed by path inside the repository ("" is the root).
 */
export function createMockGithubApi(
  owner: string,
  repo: string,
  listings: Record<string, GithubContentEntry[]>,
  apiUrl = "https://api.github.com"
): ReturnType<typeof createMockHttpClient> {
  const responses = new Map<string, Response | (() => Response)>();
  for (const [path, entries] of Object.entries(listings)) {
    responses.set(`${apiUrl}/repos/${owner}/${repo}/contents/${path}`, () => jsonResponse(entries));
  }
  return createMockHttpClient(responses);
}
