import { describe, test, expect } from "vitest";
import { loadEngineConfig } from "./config";

describe("loadEngineConfig", () => {
  test("applies defaults for an empty environment", () => {
    const result = loadEngineConfig({});

    expect(result).toEqual({
      success: true,
      data: {
        githubApiUrl: "https://api.github.com",
        githubToken: undefined,
        registriesFile: undefined,
        logLevel: "info",
      },
    });
  });

  test("reads every variable", () => {
    const result = loadEngineConfig({
      REGISTRY_GITHUB_API_URL: "https://ghe.example.com/api/v3/",
      GITHUB_TOKEN: "test-token",
      REGISTRY_FILE: "/etc/registries.yaml",
      REGISTRY_LOG_LEVEL: "debug",
    });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.githubApiUrl).toBe("https://ghe.example.com/api/v3");
      expect(result.data.githubToken).toBe("test-token");
      expect(result.data.registriesFile).toBe("/etc/registries.yaml");
      expect(result.data.logLevel).toBe("debug");
    }
  });

  test("treats empty strings as unset", () => {
    const result = loadEngineConfig({ GITHUB_TOKEN: "", REGISTRY_FILE: "", REGISTRY_LOG_LEVEL: "" });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.githubToken).toBeUndefined();
      expect(result.data.registriesFile).toBeUndefined();
      expect(result.data.logLevel).toBe("info");
    }
  });

  test("rejects an unknown log level", () => {
    const result = loadEngineConfig({ REGISTRY_LOG_LEVEL: "verbose" });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe("Invalid engine config");
      expect(result.error.details?.[0]).toMatch(/^logLevel: /);
    }
  });

  test("rejects a malformed API URL", () => {
    const result = loadEngineConfig({ REGISTRY_GITHUB_API_URL: "not a url" });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.details).toEqual(["githubApiUrl: Invalid url"]);
    }
  });
});
