import { describe, test, expect } from "vitest";
import { FileRegistryService } from "./file";
import { isRegistryError } from "#/errors";
import { createMockFileSystem } from "#/test-utils/mocks";

const PATH = "/etc/deploykit/registries.yaml";

const VALID = `registries:
  - name: acme-charts
    url: github.com/acme/charts
    type: github
    format: unversioned;one-level
  - name: acme-templates
    url: https://github.com/acme/templates
    type: github
    format: versioned;collection
`;

describe("FileRegistryService", () => {
  test("lists records from the file", async () => {
    const service = new FileRegistryService(PATH, createMockFileSystem({ [PATH]: VALID }));

    expect((await service.list()).map((r) => r.name)).toEqual(["acme-charts", "acme-templates"]);
  });

  test("looks up by name and by URL", async () => {
    const service = new FileRegistryService(PATH, createMockFileSystem({ [PATH]: VALID }));

    expect((await service.get("acme-charts")).url).toBe("github.com/acme/charts");
    expect((await service.getByUrl("github.com/acme/templates/storage/redis:v1")).name).toBe("acme-templates");
  });

  test("reads the file once", async () => {
    const fs = createMockFileSystem({ [PATH]: VALID });
    const service = new FileRegistryService(PATH, fs);

    await service.get("acme-charts");
    fs.files.set(PATH, "registries: []\n");

    expect((await service.get("acme-templates")).name).toBe("acme-templates");
  });

  test("throws not_found when the file is missing, and retries later", async () => {
    const fs = createMockFileSystem();
    const service = new FileRegistryService(PATH, fs);

    const err = await service.list().catch((e: unknown) => e);
    expect(isRegistryError(err, "not_found")).toBe(true);
    expect(err).toHaveProperty("message", `registry file not found: ${PATH}`);

    fs.files.set(PATH, VALID);
    expect(await service.list()).toHaveLength(2);
  });

  test("reports validation errors with the file path", async () => {
    const service = new FileRegistryService(
      PATH,
      createMockFileSystem({ [PATH]: "registries:\n  - name: acme\n    type: github\n" })
    );

    const err = await service.list().catch((e: unknown) => e);

    expect(isRegistryError(err, "unsupported_registry")).toBe(true);
    expect(err).toHaveProperty(
      "message",
      `Invalid registry file in ${PATH}\n  registries.0.url: Required\n  registries.0.format: Required`
    );
  });

  test("is read-only", async () => {
    const service = new FileRegistryService(PATH, createMockFileSystem({ [PATH]: VALID }));

    await expect(
      service.create({ name: "x", url: "github.com/x/y", type: "github", format: "versioned;collection" })
    ).rejects.toThrow(`registry file ${PATH} is read-only: cannot add x`);
    await expect(service.delete("acme-charts")).rejects.toThrow(
      `registry file ${PATH} is read-only: cannot delete acme-charts`
    );
  });
});
