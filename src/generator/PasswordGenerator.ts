import { webcrypto } from "node:crypto";
import { MPM_CONSTANTS } from "../constants";
import { InvalidLengthError } from "../errors";

/** Returns a uniformly distributed integer in `[0, bound)`. */
export type RandomSource = (bound: number) => number;

export interface CharacterCounts {
  lowercase: number;
  uppercase: number;
  digits: number;
  punctuation: number;
}

const UINT32_RANGE = 2 ** 32;

/** Cryptographically strong source; rejection sampling keeps it free of modulo bias. */
export const cryptoRandom: RandomSource = (bound) => {
  if (!Number.isInteger(bound) || bound < 1 || bound > UINT32_RANGE) {
    throw new RangeError(`bound must be an integer in [1, ${UINT32_RANGE}]`);
  }
  const limit = Math.floor(UINT32_RANGE / bound) * bound;
  const buf = new Uint32Array(1);
  for (;;) {
    webcrypto.getRandomValues(buf);
    const value = buf[0];
    if (value < limit) return value % bound;
  }
};

/**
 * Splits `length` across the four classes: a quarter each to uppercase,
 * digits and punctuation, and the remaining share (quarter plus remainder)
 * to lowercase.
 *
 * @throws {InvalidLengthError} If `length` is not an integer of at least 4.
 */
export function characterCounts(length: number): CharacterCounts {
  if (!Number.isInteger(length) || length < MPM_CONSTANTS.GENERATOR.MIN_LENGTH) {
    throw new InvalidLengthError(
      `Password length must be an integer of at least ${MPM_CONSTANTS.GENERATOR.MIN_LENGTH}`
    );
  }
  const q = Math.floor(length / 4);
  const r = length % 4;
  return { lowercase: q + r, uppercase: q, digits: q, punctuation: q };
}

function pick(alphabet: string, count: number, random: RandomSource): string[] {
  const out: string[] = [];
  for (let i = 0; i < count; i++) {
    out.push(alphabet[random(alphabet.length)]);
  }
  return out;
}

export function generatePassword(length: number, random: RandomSource = cryptoRandom): string {
  const counts = characterCounts(length);
  const { LOWERCASE, UPPERCASE, DIGITS, PUNCTUATION } = MPM_CONSTANTS.GENERATOR;

  const chars = [
    ...pick(UPPERCASE, counts.uppercase, random),
    ...pick(DIGITS, counts.digits, random),
    ...pick(PUNCTUATION, counts.punctuation, random),
    ...pick(LOWERCASE, counts.lowercase, random)
  ];

  // Fisher-Yates
  for (let i = chars.length - 1; i > 0; i--) {
    const j = random(i + 1);
    [chars[i], chars[j]] = [chars[j], chars[i]];
  }
  return chars.join("");
}
