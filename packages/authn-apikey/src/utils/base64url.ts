/**
 * URL-safe base64 with standard '=' padding
 *
 * Node's 'base64url' encoding drops padding, so the alphabet swap is done by
 * hand on top of plain base64.
 */

import { InvalidEncodingError } from '../errors.js';

const PADDED_BASE64URL = /^(?:[A-Za-z0-9_-]{4})*(?:[A-Za-z0-9_-]{2}==|[A-Za-z0-9_-]{3}=)?$/;

export function encodeBase64Url(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength)
    .toString('base64')
    .replace(/\+/g, '-')
    .replace(/\//g, '_');
}

/**
 * Strict decode: alphabet, padding and canonical trailing bits are all checked.
 *
 * @param what Name of the decoded part, used in the error
 * @throws InvalidEncodingError
 */
export function decodeBase64Url(encoded: string, what: string): Buffer {
  if (!PADDED_BASE64URL.test(encoded)) {
    throw new InvalidEncodingError(what);
  }
  const bytes = Buffer.from(encoded.replace(/-/g, '+').replace(/_/g, '/'), 'base64');
  if (encodeBase64Url(bytes) !== encoded) {
    throw new InvalidEncodingError(what);
  }
  return bytes;
}
