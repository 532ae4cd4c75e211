/**
 * GitHub template registry
 *
 * Versioned and organized in collections:
 *
 *   <qualifier>/<name>/<version>/<name>.jinja
 *   <qualifier>/<name>/<version>/<name>.jinja.schema
 *
 * Python templates (<name>.py) are laid out the same way.
 */

import { RegistryError, notFound } from "#/errors";
import { formatArtifactType } from "#/artifact";
import type { ArtifactType, GithubRegistryFormat } from "../registry.types";
import { BaseGithubRegistry, toDownloadUrl } from "./github";

const TEMPLATE_EXTENSIONS = [".jinja", ".py"] as const;
const SCHEMA_SUFFIX = ".schema";

export class GithubTemplateRegistry extends BaseGithubRegistry {
  readonly format: GithubRegistryFormat = "template";

  /**
   * Repository path of one template version
   */
  makeRepositoryPath(type: ArtifactType): string {
    if (!type.qualifier || !type.version) {
      throw new RegistryError(
        "invalid_type",
        `Template registry ${this.name} requires a qualifier and a version: ${formatArtifactType(type)}`
      );
    }

    return `${type.qualifier}/${type.name}/${type.version}`;
  }

  async getDownloadUrls(type: ArtifactType): Promise<URL[]> {
    const entries = await this.listDirectory(this.makeRepositoryPath(type));
    const byName = new Map(entries.map((entry) => [entry.name, entry]));

    for (const extension of TEMPLATE_EXTENSIONS) {
      const template = byName.get(`${type.name}${extension}`);
      const templateUrl = template ? toDownloadUrl(template) : null;
      if (!template || !templateUrl) continue;

      const urls = [templateUrl];
      const schema = byName.get(`${template.name}${SCHEMA_SUFFIX}`);
      const schemaUrl = schema ? toDownloadUrl(schema) : null;
      if (schemaUrl) {
        urls.push(schemaUrl);
      }

      return urls;
    }

    throw notFound(`No template file found for ${formatArtifactType(type)} in registry ${this.name}`);
  }

  protected async collectTypes(): Promise<ArtifactType[]> {
    const types: ArtifactType[] = [];

    for (const qualifier of await this.listSubdirectories("")) {
      for (const name of await this.listSubdirectories(qualifier)) {
        for (const version of await this.listSubdirectories(`${qualifier}/${name}`)) {
          types.push({ qualifier, name, version });
        }
      }
    }

    return types;
  }
}
