/**
 * Normalize a URL for read-state matching and de-duplication:
 * - Lowercase scheme + host (port kept)
 * - Keep the path as-is
 * - Drop query string and fragment
 * - Strip the trailing slash
 */
export function normalizeUrl(raw: string): string {
  const trimmed = raw.trim();
  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    // Not absolute; cut query/fragment by hand
    return stripTrailingSlashes(trimmed.replace(/[?#].*$/, ''));
  }

  const host = url.port ? `${url.hostname}:${url.port}` : url.hostname;
  return stripTrailingSlashes(`${url.protocol}//${host}${url.pathname}`);
}

// Repeated trailing slashes go too, so that normalizing twice changes nothing.
function stripTrailingSlashes(value: string): string {
  return value.replace(/\/+$/, '');
}

/**
 * Key used to compare source homepages: trailing slash and case insensitive.
 */
export function sourceKey(url: string): string {
  return url.trim().replace(/\/+$/, '').toLowerCase();
}
