import { createHash, timingSafeEqual } from 'node:crypto';

/** Header Telegram sets on webhook deliveries when a secret token was registered. */
export const SECRET_TOKEN_HEADER = 'x-telegram-bot-api-secret-token';

/** Telegram accepts 1-256 characters from this set for `secret_token`. */
const SECRET_TOKEN_PATTERN = /^[A-Za-z0-9_-]{1,256}$/;

export function isValidSecretToken(token: string): boolean {
  return SECRET_TOKEN_PATTERN.test(token);
}

/**
 * Compare the webhook secret header against the configured token in constant
 * time. Both sides are hashed first so differing lengths do not leak through
 * an early return.
 */
export function verifySecretToken({
  expected,
  provided,
}: {
  expected: string;
  provided?: string | string[] | null;
}): boolean {
  const header = Array.isArray(provided) ? provided[0] : provided;
  if (!header || !expected) {
    return false;
  }

  const expectedDigest = digest(expected);
  const providedDigest = digest(header);

  return timingSafeEqual(expectedDigest, providedDigest);
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}
