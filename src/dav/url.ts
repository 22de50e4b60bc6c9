/**
 * URL helpers for WebDAV hrefs
 */
import { ProtocolError } from '../errors.js';

/**
 * Resolve a possibly relative href against the location it was found at.
 * @throws ProtocolError if the href cannot form a URL
 */
export function resolveReference(base: URL, reference: string): URL {
  try {
    return new URL(reference.trim(), base);
  } catch {
    throw new ProtocolError(`Invalid href "${reference}" at ${base.href}`);
  }
}

/**
 * Absolute URL string whose path ends with "/".
 * Collections are identified by this form so "/cal" and "/cal/" map to one entry.
 */
export function withTrailingSlash(url: URL): string {
  const copy = new URL(url.href);
  if (!copy.pathname.endsWith('/')) {
    copy.pathname = `${copy.pathname}/`;
  }
  return copy.href;
}
