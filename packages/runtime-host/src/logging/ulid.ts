/**
 * Toolgate Runtime Host: ULID Generator
 *
 * Universally Unique Lexicographically Sortable Identifier, used as the
 * `event_id` of decision log lines so a reader can dedupe entries when log
 * files are concatenated or synchronized.
 *
 * ULID format: 26 characters, Crockford Base32.
 *   - 10 chars: 48-bit millisecond timestamp
 *   - 16 chars: 80-bit random component
 *
 * Generators are monotonic: within one millisecond (or if the clock steps
 * backwards) the random component of the previous id is incremented rather
 * than redrawn, so ids from one generator always sort in creation order.
 *
 * @see https://github.com/ulid/spec
 */

import { randomBytes } from 'node:crypto';

/** Excludes I, L, O, U. */
const CROCKFORD_ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

const TIME_CHARS = 10;
const RANDOM_CHARS = 16;
const RANDOM_BYTES = 10;
const MAX_RANDOM = (1n << 80n) - 1n;

function encodeCrockford(value: bigint, length: number): string {
  let out = '';
  let v = value;
  for (let i = 0; i < length; i++) {
    out = CROCKFORD_ALPHABET.charAt(Number(v & 0x1fn)) + out;
    v >>= 5n;
  }
  return out;
}

function randomComponent(): bigint {
  let value = 0n;
  for (const byte of randomBytes(RANDOM_BYTES)) {
    value = (value << 8n) | BigInt(byte);
  }
  return value;
}

export interface UlidOptions {
  /** Milliseconds since the epoch. Defaults to Date.now. */
  readonly now?: (() => number) | undefined;
  /** 80-bit random source. Defaults to crypto.randomBytes. */
  readonly random?: (() => bigint) | undefined;
}

/**
 * Create a monotonic ULID generator.
 *
 * @throws {Error} From the returned function, if more than 2^80 ids are
 *   requested within one millisecond
 */
export function monotonicUlid(options: UlidOptions = {}): () => string {
  const now = options.now ?? Date.now;
  const random = options.random ?? randomComponent;
  let lastTime = -1;
  let lastRandom = 0n;

  return () => {
    const time = now();
    if (time > lastTime) {
      lastTime = time;
      lastRandom = random() & MAX_RANDOM;
    } else {
      if (lastRandom === MAX_RANDOM) {
        throw new Error('ULID random component overflow');
      }
      lastRandom += 1n;
    }
    return encodeCrockford(BigInt(lastTime), TIME_CHARS) + encodeCrockford(lastRandom, RANDOM_CHARS);
  };
}

/** Process-wide default generator. */
export const ulid: () => string = monotonicUlid();
