/**
 * Reference classifier
 *
 * Decides what kind of reference a type string is. Matchers run in order and
 * the first match wins: the template form must be tested before the package
 * form, because every template reference also has the package form's shape.
 */

import { PACKAGE_SHORT_FORM_REGEX, TEMPLATE_SHORT_FORM_REGEX } from "#/constants";
import { isHttpUrl } from "#/url";

export type ReferenceKind = "template" | "package" | "url" | "primitive";

export type ClassifiedReference =
  | {
      kind: "template";
      owner: string;
      repository: string;
      qualifier: string;
      name: string;
      version: string;
      raw: string;
    }
  | { kind: "package"; owner: string; repository: string; name: string; raw: string }
  | { kind: "url"; raw: string }
  | { kind: "primitive"; raw: string };

/**
 * github.com/owner/repo/qualifier/type:version
 *
 * @example isTemplateShortForm("github.com/kubernetes/application-dm-templates/storage/redis:v1") → true
 */
export function isTemplateShortForm(reference: string): boolean {
  return TEMPLATE_SHORT_FORM_REGEX.test(reference);
}

/**
 * github.com/owner/repo/type
 *
 * @example isPackageShortForm("github.com/helm/charts/cassandra") → true
 */
export function isPackageShortForm(reference: string): boolean {
  return PACKAGE_SHORT_FORM_REGEX.test(reference);
}

/**
 * Captured components of a template reference: owner, repo, qualifier, name, version.
 * Returns null unless exactly five components were captured.
 */
export function matchTemplateShortForm(reference: string): [string, string, string, string, string] | null {
  const match = reference.match(TEMPLATE_SHORT_FORM_REGEX);
  if (!match || match.length !== 6) {
    return null;
  }

  const [, owner = "", repository = "", qualifier = "", name = "", version = ""] = match;
  return [owner, repository, qualifier, name, version];
}

/**
 * Captured components of a package reference: owner, repo, name.
 * Returns null unless exactly three components were captured.
 */
export function matchPackageShortForm(reference: string): [string, string, string] | null {
  const match = reference.match(PACKAGE_SHORT_FORM_REGEX);
  if (!match || match.length !== 4) {
    return null;
  }

  const [, owner = "", repository = "", name = ""] = match;
  return [owner, repository, name];
}

export interface ReferenceMatcher {
  kind: ReferenceKind;
  matches(reference: string): boolean;
}

export const REFERENCE_MATCHERS: readonly ReferenceMatcher[] = [
  { kind: "template", matches: isTemplateShortForm },
  { kind: "package", matches: isPackageShortForm },
  { kind: "url", matches: isHttpUrl },
];

/**
 * First matching kind, or "primitive" when nothing matches.
 */
export function detectReferenceKind(
  reference: string,
  matchers: readonly ReferenceMatcher[] = REFERENCE_MATCHERS
): ReferenceKind {
  for (const matcher of matchers) {
    if (matcher.matches(reference)) {
      return matcher.kind;
    }
  }
  return "primitive";
}

/**
 * Classify a reference and extract its components.
 */
export function classifyReference(reference: string): ClassifiedReference {
  switch (detectReferenceKind(reference)) {
    case "template": {
      const parts = matchTemplateShortForm(reference);
      if (parts) {
        const [owner, repository, qualifier, name, version] = parts;
        return { kind: "template", owner, repository, qualifier, name, version, raw: reference };
      }
      break;
    }
    case "package": {
      const parts = matchPackageShortForm(reference);
      if (parts) {
        const [owner, repository, name] = parts;
        return { kind: "package", owner, repository, name, raw: reference };
      }
      break;
    }
    case "url":
      return { kind: "url", raw: reference };
    case "primitive":
      return { kind: "primitive", raw: reference };
  }

  return { kind: "primitive", raw: reference };
}
