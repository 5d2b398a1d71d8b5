/**
 * File name helpers shared by the listing page and the serve route.
 */

const FALLBACK_FILE_NAME = "download";
const DEFAULT_CONTENT_TYPE = "application/octet-stream";

// Printable ASCII without the double quote and backslash
const QUOTABLE_FILE_NAME = /^[\x20\x21\x23-\x5b\x5d-\x7e]+$/;
const UNQUOTABLE_CHAR = /[^\x20\x21\x23-\x5b\x5d-\x7e]/g;
const CONTENT_TYPE_VALUE = /^[\x21-\x7e][\x20-\x7e]*$/;

/**
 * Percent-encode a file name for a /files/ link. Everything outside the
 * unreserved set is encoded, including !'()* which encodeURIComponent keeps.
 */
export function encodeFileName(name: string): string {
  return encodeURIComponent(name).replace(
    /[!'()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}

/**
 * Decode a percent-encoded path remainder into a file name.
 * Returns null when the encoding is malformed.
 */
export function decodeFileName(encoded: string): string | null {
  try {
    return decodeURIComponent(encoded);
  } catch (error) {
    if (error instanceof URIError) {
      return null;
    }
    throw error;
  }
}

/**
 * Build an inline Content-Disposition value.
 *
 * Names made only of printable ASCII (no `"` or `\`) are quoted as-is.
 * Anything else gets an ASCII fallback with the offending characters
 * replaced by `_`, plus an RFC 5987 `filename*` carrying the real name.
 */
export function buildContentDisposition(name: string): string {
  if (QUOTABLE_FILE_NAME.test(name)) {
    return `inline; filename="${name}"`;
  }
  if (name.length === 0) {
    return `inline; filename="${FALLBACK_FILE_NAME}"`;
  }

  const fallback = name.replace(UNQUOTABLE_CHAR, "_");
  return `inline; filename="${fallback}"; filename*=UTF-8''${encodeFileName(name)}`;
}

/**
 * Use the provider's content type when it is a legal header value.
 */
export function toContentType(mimeType: string): string {
  return CONTENT_TYPE_VALUE.test(mimeType) ? mimeType : DEFAULT_CONTENT_TYPE;
}
