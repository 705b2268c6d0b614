import { randomInt } from 'node:crypto';

/** No I or O, so a code read off a screen is never misheard as 1 or 0. */
export const HOST_CODE_ALPHABET = 'ABCDEFGHJKLMNPQRSTUVWXYZ';
export const HOST_CODE_LENGTH = 4;

export function generateHostCode(): string {
  let code = '';
  for (let i = 0; i < HOST_CODE_LENGTH; i++) {
    code += HOST_CODE_ALPHABET[randomInt(HOST_CODE_ALPHABET.length)];
  }
  return code;
}
