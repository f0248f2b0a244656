import * as crypto from 'crypto';

export const FINGERPRINT_PREFIX_LENGTH = 100;

/** Hash of the content prefix; equal prefixes count as the same passage */
export function contentFingerprint(content: string): string {
  return crypto
    .createHash('sha256')
    .update(content.slice(0, FINGERPRINT_PREFIX_LENGTH))
    .digest('hex');
}
