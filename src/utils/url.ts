/**
 * URL allow-list.
 * Substring match on purpose: anything mentioning an allowed host passes,
 * including URLs that only carry it in a query parameter.
 */

export const ALLOWED_HOSTS = ["youtube.com", "youtu.be"] as const;

export function isAllowedUrl(url: string): boolean {
  const normalized = url.toLowerCase();
  return ALLOWED_HOSTS.some((host) => normalized.includes(host));
}

/**
 * First URL that fails the allow-list, if any.
 */
export function findDisallowedUrl(urls: readonly string[]): string | undefined {
  return urls.find((url) => !isAllowedUrl(url));
}
