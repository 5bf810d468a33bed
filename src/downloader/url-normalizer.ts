/**
 * URL clean-up for manifest entries. Dataset sources often omit the scheme.
 */

/** Hosts only the extractor can fetch; never fetched as a plain file */
export const VIDEO_HOSTING_DOMAINS: readonly string[] = ['youtube.com', 'youtu.be'];

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

export interface NormalizedUrl {
  url: string;
  /** Set when the URL was passed through although it looks incomplete */
  warning?: string;
}

export function hasScheme(url: string): boolean {
  return SCHEME_PATTERN.test(url);
}

/**
 * Host part of a URL with or without a scheme, lower-cased, without credentials or port
 */
export function hostOf(url: string): string {
  const rest = url.trim().replace(SCHEME_PATTERN, '');
  const authority = rest.split(/[/?#]/, 1)[0];
  const host = authority.slice(authority.lastIndexOf('@') + 1);
  return host.replace(/:\d+$/, '').toLowerCase();
}

/** Path of a URL with or without a scheme, without query or fragment */
export function pathOf(url: string): string {
  const rest = url.trim().replace(SCHEME_PATTERN, '').split(/[?#]/, 1)[0];
  const slash = rest.indexOf('/');
  return slash < 0 ? '' : rest.slice(slash);
}

export function isVideoHostingUrl(url: string): boolean {
  const host = hostOf(url);
  return VIDEO_HOSTING_DOMAINS.some((domain) => host === domain || host.endsWith(`.${domain}`));
}

/**
 * Whether the direct-stream fallback may try this URL
 */
export function isDirectMediaUrl(url: string): boolean {
  return pathOf(url).toLowerCase().endsWith('.mp4') && !isVideoHostingUrl(url);
}

export function normalizeUrl(raw: string): NormalizedUrl {
  const url = raw.trim();

  if (url.toLowerCase().startsWith('www.')) {
    return { url: `https://${url}` };
  }
  if (hasScheme(url)) {
    return { url };
  }
  if (isVideoHostingUrl(url)) {
    return { url: `https://${url}` };
  }
  return { url, warning: `URL has no scheme and an unrecognised host, using as-is: ${url}` };
}
