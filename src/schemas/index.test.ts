import { describe, test, expect } from "vitest";
import {
  GithubDirectoryListingSchema,
  RegistryFileSchema,
  RegistryKindSchema,
  RegistryRecordSchema,
} from "./index";

describe("schemas", () => {
  describe("RegistryRecordSchema", () => {
    test("parses a record", () => {
      const record = RegistryRecordSchema.parse({
        name: "charts",
        url: "github.com/helm/charts",
        type: "github",
        format: "unversioned;one-level",
      });

      expect(record.name).toBe("charts");
      expect(record.format).toBe("unversioned;one-level");
    });

    test("keeps unknown registry types for the factory to reject", () => {
      const record = RegistryRecordSchema.parse({
        name: "bucket",
        url: "s3://bucket",
        type: "s3",
        format: "versioned;collection",
      });

      expect(record.type).toBe("s3");
    });

    test("rejects empty fields", () => {
      expect(() =>
        RegistryRecordSchema.parse({ name: " ", url: "x", type: "github", format: "versioned" })
      ).toThrow();
    });
  });

  describe("RegistryKindSchema", () => {
    test("accepts github only", () => {
      expect(RegistryKindSchema.safeParse("github").success).toBe(true);
      expect(RegistryKindSchema.safeParse("gitlab").success).toBe(false);
    });
  });

  describe("RegistryFileSchema", () => {
    test("defaults to no registries", () => {
      expect(RegistryFileSchema.parse({})).toEqual({ registries: [] });
    });

    test("rejects duplicate names", () => {
      const result = RegistryFileSchema.safeParse({
        registries: [
          { name: "charts", url: "github.com/a/b", type: "github", format: "unversioned;one-level" },
          { name: "charts", url: "github.com/c/d", type: "github", format: "unversioned;one-level" },
        ],
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues[0]?.message).toBe("Duplicate registry name: charts");
        expect(result.error.issues[0]?.path).toEqual(["registries", 1, "name"]);
      }
    });
  });

  describe("GithubDirectoryListingSchema", () => {
    test("parses contents API entries and ignores extra fields", () => {
      const listing = GithubDirectoryListingSchema.parse([
        { name: "redis.jinja", path: "storage/redis/v1/redis.jinja", type: "file", download_url: "https://raw.example.com/redis.jinja", sha: "abc" },
        { name: "v1", path: "storage/redis/v1", type: "dir", download_url: null },
      ]);

      expect(listing).toEqual([
        { name: "redis.jinja", path: "storage/redis/v1/redis.jinja", type: "file", download_url: "https://raw.example.com/redis.jinja" },
        { name: "v1", path: "storage/redis/v1", type: "dir", download_url: null },
      ]);
    });

    test("rejects a single-file response", () => {
      expect(
        GithubDirectoryListingSchema.safeParse({ name: "a", path: "a", type: "file", download_url: null }).success
      ).toBe(false);
    });
  });
});
