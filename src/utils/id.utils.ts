import { RandomSource, defaultRandom, randomInt } from './random';

// no 0/O or 1/I
const ROOM_CODE_ALPHABET = 'ABCDEFGHJKLMNPQRSTUVWXYZ23456789';

export function generateRoomId(length = 5, random: RandomSource = defaultRandom): string {
  let code = '';
  while (code.length < length) {
    code += ROOM_CODE_ALPHABET[randomInt(ROOM_CODE_ALPHABET.length, random)];
  }
  return code;
}
