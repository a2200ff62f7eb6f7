/** Percent-encode for an RFC 5987 `filename*` value. */
export function encodeRfc5987(value: string): string {
  return encodeURIComponent(value).replace(/[!'()*]/g, (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`);
}

/**
 * Attachment header carrying both an ASCII-only `filename` and the full
 * UTF-8 name in `filename*`.
 */
export function attachmentHeader(filename: string, fallback: string): string {
  let ascii = filename.replace(/[^\x20-\x7e]/g, "").replace(/["\\]/g, "");
  const stem = ascii.replace(/\.[^.]*$/, "").replace(/[_\s]/g, "");
  if (!stem) {
    ascii = fallback;
  }
  return `attachment; filename="${ascii}"; filename*=UTF-8''${encodeRfc5987(filename)}`;
}
