/**
 * Global constants for the registry engine
 */

export const GITHUB_HOST = "github.com";
export const GITHUB_API_URL = "https://api.github.com";

export const USER_AGENT = "deploykit-registry-engine";

// Format tags are stored joined by this delimiter, e.g. "versioned;collection"
export const REGISTRY_FORMAT_SEPARATOR = ";";

// Short form for registries that support versions and have collections:
// github.com/owner/repo/qualifier/type:version
export const TEMPLATE_SHORT_FORM_REGEX = /github\.com\/(.*)\/(.*)\/(.*)\/(.*):(.*)/;

// Short form for registries without versions or collections:
// github.com/owner/repo/type
export const PACKAGE_SHORT_FORM_REGEX = /github\.com\/(.*)\/(.*)\/(.*)/;

// Repository location of a GitHub-backed registry: [scheme://]github.com/owner/repo
export const GITHUB_REPOSITORY_REGEX = /^(?:https?:\/\/)?github\.com\/([^/]+)\/([^/]+?)\/?$/;
