import { describe, test, expect } from "vitest";
import { DEFAULT_REGISTRIES, InMemoryRegistryService } from "./memory";
import { isRegistryError } from "#/errors";

describe("InMemoryRegistryService", () => {
  test("is seeded with the default registries", async () => {
    const service = new InMemoryRegistryService();

    expect((await service.list()).map((r) => r.name)).toEqual(["charts", "application-dm-templates"]);
    expect(DEFAULT_REGISTRIES).toHaveLength(2);
  });

  test("get returns a copy of the record", async () => {
    const service = new InMemoryRegistryService();

    const record = await service.get("charts");
    record.url = "changed";

    expect((await service.get("charts")).url).toBe("github.com/helm/charts");
  });

  test("get throws not_found for unknown names", async () => {
    const err = await new InMemoryRegistryService().get("missing").catch((e: unknown) => e);

    expect(isRegistryError(err, "not_found")).toBe(true);
    expect(err).toHaveProperty("message", "registry not found: missing");
  });

  describe("getByUrl", () => {
    test("matches a record URL prefix", async () => {
      const service = new InMemoryRegistryService();

      expect((await service.getByUrl("github.com/helm/charts/cassandra")).name).toBe("charts");
    });

    test("ignores the scheme on both sides", async () => {
      const service = new InMemoryRegistryService([
        { name: "acme", url: "https://github.com/acme/charts", type: "github", format: "unversioned;one-level" },
      ]);

      expect((await service.getByUrl("http://github.com/acme/charts/redis")).name).toBe("acme");
    });

    test("throws not_found when nothing matches", async () => {
      const err = await new InMemoryRegistryService().getByUrl("github.com/other/repo/x").catch((e: unknown) => e);

      expect(isRegistryError(err, "not_found")).toBe(true);
    });
  });

  describe("create and delete", () => {
    test("adds and removes records", async () => {
      const service = new InMemoryRegistryService([]);

      await service.create({ name: "acme", url: "github.com/acme/charts", type: "github", format: "unversioned;one-level" });
      expect((await service.get("acme")).url).toBe("github.com/acme/charts");

      await service.delete("acme");
      expect(await service.list()).toEqual([]);
    });

    test("rejects duplicate names", async () => {
      const service = new InMemoryRegistryService();

      await expect(
        service.create({ name: "charts", url: "github.com/x/y", type: "github", format: "unversioned;one-level" })
      ).rejects.toThrow("registry already exists: charts");
    });

    test("delete throws not_found for unknown names", async () => {
      await expect(new InMemoryRegistryService().delete("missing")).rejects.toThrow("registry not found: missing");
    });
  });
});
