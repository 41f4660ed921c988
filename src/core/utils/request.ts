import { DUMMY_BASE_URL } from '../../common/consts.js';

/**
 * Path part of a raw request target, for logging.
 */
export function parseRequestPath(rawUrl: string | undefined): string {
  if (rawUrl === undefined) {
    return '(unknown)';
  }

  try {
    return new URL(rawUrl, DUMMY_BASE_URL).pathname;
  } catch {
    return rawUrl;
  }
}
