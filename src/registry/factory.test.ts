import { describe, test, expect } from "vitest";
import { DefaultGithubRegistryFactory, createGithubRegistry } from "./factory";
import { GithubPackageRegistry } from "./clients/package";
import { GithubTemplateRegistry } from "./clients/template";
import { GithubContentsClient } from "#/github";
import { isRegistryError } from "#/errors";
import { createMockGithubApi, createMockHttpClient, fileEntry } from "#/test-utils/mocks";
import type { RegistryRecord } from "./registry.types";

function record(overrides: Partial<RegistryRecord> = {}): RegistryRecord {
  return {
    name: "charts",
    url: "github.com/helm/charts",
    type: "github",
    format: "unversioned;one-level",
    ...overrides,
  };
}

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe("factory", () => {
  describe("createGithubRegistry", () => {
    const client = new GithubContentsClient({ apiUrl: "https://api.github.com" }, createMockHttpClient());

    test.each(["unversioned;one-level", "one-level;unversioned", "unversioned;one-level;unversioned"])(
      "returns GithubPackageRegistry for %s",
      (format) => {
        expect(createGithubRegistry(record({ format }), client)).toBeInstanceOf(GithubPackageRegistry);
      }
    );

    test.each(["versioned;collection", "collection;versioned", "collection;versioned;collection"])(
      "returns GithubTemplateRegistry for %s",
      (format) => {
        const registry = createGithubRegistry(
          record({ name: "templates", url: "github.com/kubernetes/application-dm-templates", format }),
          client
        );

        expect(registry).toBeInstanceOf(GithubTemplateRegistry);
        expect(registry.name).toBe("templates");
      }
    );

    test.each(["versioned", "unversioned", "one-level;versioned", "unversioned;collection", "flat"])(
      "throws unknown_registry_format for %s",
      (format) => {
        const err = catchError(() => createGithubRegistry(record({ format }), client));

        expect(isRegistryError(err, "unknown_registry_format")).toBe(true);
        expect(err).toHaveProperty("message", `unknown registry format: ${format}`);
      }
    );

    test("throws unknown_registry_type for other registry types", () => {
      const err = catchError(() => createGithubRegistry(record({ type: "gitlab" }), client));

      expect(isRegistryError(err, "unknown_registry_type")).toBe(true);
      expect(err).toHaveProperty("message", "unknown registry type: gitlab");
    });

    test("throws unsupported_registry for a non-GitHub URL", () => {
      const err = catchError(() => createGithubRegistry(record({ url: "gitlab.com/helm/charts" }), client));

      expect(isRegistryError(err, "unsupported_registry")).toBe(true);
    });
  });

  describe("DefaultGithubRegistryFactory", () => {
    test("builds registries that call the configured API with the token", async () => {
      const http = createMockGithubApi(
        "helm",
        "charts",
        { "redis/manifests": [fileEntry("helm", "charts", "redis/manifests/redis.yaml")] },
        "https://ghe.example.com/api/v3"
      );
      const factory = new DefaultGithubRegistryFactory({
        http,
        apiUrl: "https://ghe.example.com/api/v3",
        token: "test-token",
      });

      const registry = factory.getGithubRegistry(record());
      const urls = await registry.getDownloadUrls({ name: "redis" });

      expect(urls.map(String)).toEqual(["https://raw.githubusercontent.com/helm/charts/master/redis/manifests/redis.yaml"]);
      expect(http.calls[0]?.url).toBe("https://ghe.example.com/api/v3/repos/helm/charts/contents/redis/manifests");
      expect(http.calls[0]?.headers.authorization).toBe("Bearer test-token");
    });
  });
});
