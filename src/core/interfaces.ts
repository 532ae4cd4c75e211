/**
 * Core interfaces for dependency injection.
 * These abstract away I/O operations for testability and portability.
 */

export interface FileSystem {
  readFile(path: string): string;
  exists(path: string): boolean;
}

export interface HttpClient {
  fetch(url: string, options?: RequestInit): Promise<Response>;
}

export interface TokenProvider {
  getGitToken(type: "github", host?: string): string | undefined;
}

export interface EngineContext {
  fs: FileSystem;
  http: HttpClient;
  tokens: TokenProvider;
}
