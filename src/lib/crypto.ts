import crypto from 'crypto';

// Hash of the exact text handed to the embedder; entries are keyed on it.
export function textHash(text: string): string {
  return crypto.createHash('sha256').update(text, 'utf8').digest('hex');
}
