/**
 * Client id generation
 *
 * Client ids are not secret and are safe to log. They only need to be unique
 * and URL-safe, so the 64-character alphabet below is indexed by the low six
 * bits of each random byte (256 is a multiple of 64, so there is no bias).
 */

import { randomBytes } from 'crypto';

const URL_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-_';

export const DEFAULT_CLIENT_ID_LENGTH = 21;

export type IdGenerator = (length: number) => string;

export function generateClientId(length: number = DEFAULT_CLIENT_ID_LENGTH): string {
  let id = '';
  for (const byte of randomBytes(length)) {
    id += URL_ALPHABET.charAt(byte & 63);
  }
  return id;
}
