/**
 * GitHub package registry
 *
 * Unversioned, one level deep. Each top-level directory is a package and
 * its manifests live in <name>/manifests/*.yaml:
 *
 *   cassandra/manifests/cassandra-rc.yaml
 *   cassandra/manifests/cassandra-svc.yaml
 */

import { RegistryError } from "#/errors";
import type { ArtifactType, GithubRegistryFormat } from "../registry.types";
import { BaseGithubRegistry, toDownloadUrl } from "./github";

const MANIFESTS_DIR = "manifests";
const MANIFEST_EXTENSION = ".yaml";

export class GithubPackageRegistry extends BaseGithubRegistry {
  readonly format: GithubRegistryFormat = "package";

  /**
   * Repository path holding the manifests of a package
   */
  makeRepositoryPath(type: ArtifactType): string {
    if (type.qualifier || type.version) {
      throw new RegistryError(
        "invalid_type",
        `Package registry ${this.name} does not support qualifiers or versions: ${type.name}`
      );
    }

    return `${type.name}/${MANIFESTS_DIR}`;
  }

  async getDownloadUrls(type: ArtifactType): Promise<URL[]> {
    const entries = await this.listDirectory(this.makeRepositoryPath(type));

    const urls: URL[] = [];
    for (const entry of entries) {
      if (!entry.name.endsWith(MANIFEST_EXTENSION)) continue;
      const url = toDownloadUrl(entry);
      if (url) {
        urls.push(url);
      }
    }

    return urls;
  }

  protected async collectTypes(): Promise<ArtifactType[]> {
    const names = await this.listSubdirectories("");
    return names.map((name) => ({ name }));
  }
}
