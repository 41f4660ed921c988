import { createHash, timingSafeEqual } from 'node:crypto';

const BASIC_PREFIX = 'Basic ';

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export interface AuthGate {
  authorize(headerValue: string): boolean;
}

/**
 * Strict base64 decode; `undefined` when the text is not canonical base64.
 */
export function decodeBase64(text: string): string | undefined {
  if (!BASE64_PATTERN.test(text)) {
    return undefined;
  }

  return Buffer.from(text, 'base64').toString('utf8');
}

/**
 * Constant-time string equality. Both sides are reduced to digests of equal size first,
 * so the comparison time depends on neither length nor common prefix.
 */
export function timingResistantEqual(left: string, right: string): boolean {
  const leftDigest = createHash('sha256').update(left, 'utf8').digest();
  const rightDigest = createHash('sha256').update(right, 'utf8').digest();
  return timingSafeEqual(leftDigest, rightDigest);
}

/**
 * Checks an `Authorization` header against the `user:pass` credential.
 * An empty credential never authorizes.
 */
export function authorize(credential: string, headerValue: string): boolean {
  if (credential.length === 0) {
    return false;
  }

  if (!headerValue.startsWith(BASIC_PREFIX)) {
    return false;
  }

  const decoded = decodeBase64(headerValue.slice(BASIC_PREFIX.length).trim());
  if (decoded === undefined) {
    return false;
  }

  return timingResistantEqual(decoded, credential);
}

export function createAuthGate(credential: string): AuthGate {
  return {
    authorize: (headerValue) => authorize(credential, headerValue),
  };
}
