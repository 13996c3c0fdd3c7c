import { randomInt } from 'crypto';

const GROUP_ALPHABET = 'abcdefghijklmnopqrstuvwxyz0123456789';
export const GROUP_ID_LENGTH = 8;

export function generateGroupId(length = GROUP_ID_LENGTH): string {
  let id = '';
  for (let i = 0; i < length; i++) {
    id += GROUP_ALPHABET[randomInt(GROUP_ALPHABET.length)];
  }
  return id;
}
