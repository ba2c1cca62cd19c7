import { createHash, timingSafeEqual } from 'crypto';

/**
 * Constant-time string comparison. Both sides are hashed first so inputs of
 * different length take the same path.
 */
export function safeEqual(a: string, b: string): boolean {
  const left = createHash('sha256').update(String(a ?? ''), 'utf8').digest();
  const right = createHash('sha256').update(String(b ?? ''), 'utf8').digest();
  return timingSafeEqual(left, right) && String(a ?? '') === String(b ?? '');
}
