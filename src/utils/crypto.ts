import crypto from 'crypto';

/** Content hash used as the registry key for a certificate document. */
export function computeCertificateHash(document: Buffer | Uint8Array): string {
  return crypto.createHash('sha256').update(document).digest('hex');
}
