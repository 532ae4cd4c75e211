/**
 * Engine wiring
 *
 * config → logger level → metadata source → factory → provider.
 */

import type { EngineConfig } from "#/config";
import {
  createNodeFileSystem,
  createNodeHttpClient,
  createStaticTokenProvider,
  type EngineContext,
} from "#/core";
import { setLogLevel } from "#/logger";
import {
  CachingRegistryProvider,
  DefaultGithubRegistryFactory,
  FileRegistryService,
  InMemoryRegistryService,
  resolveDownloadUrls,
  type RegistryService,
} from "#/registry";

export interface Engine {
  service: RegistryService;
  provider: CachingRegistryProvider;
  resolveDownloadUrls(reference: string): Promise<string[]>;
}

export function createEngine(config: EngineConfig, context: Partial<EngineContext> = {}): Engine {
  setLogLevel(config.logLevel);

  const fs = context.fs ?? createNodeFileSystem();
  const http = context.http ?? createNodeHttpClient();
  const tokens = context.tokens ?? createStaticTokenProvider(config.githubToken);

  const service: RegistryService = config.registriesFile
    ? new FileRegistryService(config.registriesFile, fs)
    : new InMemoryRegistryService();

  const factory = new DefaultGithubRegistryFactory({
    http,
    apiUrl: config.githubApiUrl,
    token: tokens.getGitToken("github"),
  });

  const provider = new CachingRegistryProvider({ service, factory });

  return {
    service,
    provider,
    resolveDownloadUrls: (reference) => resolveDownloadUrls(provider, reference),
  };
}
