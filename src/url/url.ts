/**
 * URL helpers
 *
 * Pure functions shared by the registry provider, metadata sources and resolver.
 */

const URL_SCHEME_REGEX = /^https?:\/\//i;

/**
 * Remove a leading http:// or https:// from a URL.
 *
 * @example
 * trimUrlScheme("https://github.com/helm/charts") → "github.com/helm/charts"
 */
export function trimUrlScheme(url: string): string {
  return url.replace(URL_SCHEME_REGEX, "");
}

/**
 * Check whether a string is an absolute http(s) URL.
 */
export function isHttpUrl(value: string): boolean {
  if (!URL_SCHEME_REGEX.test(value)) {
    return false;
  }

  try {
    const parsed = new URL(value);
    return (parsed.protocol === "http:" || parsed.protocol === "https:") && parsed.host !== "";
  } catch {
    return false;
  }
}

export function convertUrlsToStrings(urls: readonly URL[]): string[] {
  return urls.map((url) => url.toString());
}

/**
 * Check whether `shortUrl` is a scheme-insensitive prefix of `url`.
 */
export function hasShortUrlPrefix(url: string, shortUrl: string): boolean {
  return trimUrlScheme(url).startsWith(trimUrlScheme(shortUrl));
}
