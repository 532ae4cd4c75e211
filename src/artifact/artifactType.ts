/**
 * Artifact type value object
 *
 * Identifies one item inside a registry: (qualifier, name, version).
 * Package registries only use the name; template registries use all three.
 */

import { RegistryError } from "#/errors";

export interface ArtifactType {
  qualifier?: string;
  name: string;
  version?: string;
}

const INVALID_COMPONENT_REGEX = /[/\s]/;

function checkComponent(field: string, value: string): void {
  if (INVALID_COMPONENT_REGEX.test(value)) {
    throw new RegistryError(
      "invalid_type",
      `Invalid ${field} "${value}": must not contain slashes or whitespace`
    );
  }
}

/**
 * Create an artifact type. Empty qualifier or version means "not set".
 *
 * @example
 * createArtifactType("storage", "redis", "v1") → { qualifier: "storage", name: "redis", version: "v1" }
 * createArtifactType("", "cassandra", "") → { name: "cassandra" }
 */
export function createArtifactType(qualifier: string, name: string, version: string): ArtifactType {
  if (!name) {
    throw new RegistryError("invalid_type", "Artifact type name must not be empty");
  }

  checkComponent("name", name);
  const type: ArtifactType = { name };

  if (qualifier) {
    checkComponent("qualifier", qualifier);
    type.qualifier = qualifier;
  }

  if (version) {
    checkComponent("version", version);
    type.version = version;
  }

  return type;
}

/**
 * Render a type as qualifier/name:version, leaving out absent parts.
 */
export function formatArtifactType(type: ArtifactType): string {
  const prefix = type.qualifier ? `${type.qualifier}/` : "";
  const suffix = type.version ? `:${type.version}` : "";
  return `${prefix}${type.name}${suffix}`;
}
