import * as crypto from 'node:crypto';

const ALPHABET = '0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz';

/**
 * Random base62 identifier used for intents and secondary stacks.
 */
export function newId(length = 10): string {
  let id = '';
  for (let i = 0; i < length; i++) {
    id += ALPHABET[crypto.randomInt(ALPHABET.length)];
  }
  return id;
}
