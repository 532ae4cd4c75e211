import { z } from "zod";

// Registry kinds the factory knows how to build
export const REGISTRY_KINDS = ["github"] as const;
export const RegistryKindSchema = z.enum(REGISTRY_KINDS);
export type RegistryKind = z.infer<typeof RegistryKindSchema>;

// Format tags, stored joined by ";" (e.g. "versioned;collection")
export const REGISTRY_FORMAT_TAGS = ["versioned", "unversioned", "collection", "one-level"] as const;
export type RegistryFormatTag = (typeof REGISTRY_FORMAT_TAGS)[number];

// Persisted registry record
// `type` stays a plain string so unknown kinds reach the factory and fail there
export const RegistryRecordSchema = z.object({
  name: z.string().trim().min(1),
  url: z.string().trim().min(1),
  type: z.string().trim().min(1),
  format: z.string().trim().min(1),
});
export type RegistryRecord = z.infer<typeof RegistryRecordSchema>;

// Registry file (registries.yaml) read by the file-backed metadata source
export const RegistryFileSchema = z
  .object({
    registries: z.array(RegistryRecordSchema).default([]),
  })
  .superRefine((file, ctx) => {
    const seen = new Set<string>();
    file.registries.forEach((record, index) => {
      if (seen.has(record.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["registries", index, "name"],
          message: `Duplicate registry name: ${record.name}`,
        });
      }
      seen.add(record.name);
    });
  });
export type RegistryFile = z.infer<typeof RegistryFileSchema>;

// One entry of the GitHub contents API directory listing
export const GithubContentEntrySchema = z.object({
  name: z.string(),
  path: z.string(),
  type: z.enum(["file", "dir", "symlink", "submodule"]),
  download_url: z.string().nullable(),
});
export type GithubContentEntry = z.infer<typeof GithubContentEntrySchema>;

export const GithubDirectoryListingSchema = z.array(GithubContentEntrySchema);
