import { createHash } from 'node:crypto';

/**
 * Computes a SHA-256 hash of an input file's content.
 * Returns the hash prefixed with 'sha256:'.
 */
export function hashContent(content: Uint8Array): string {
    const hash = createHash('sha256').update(content).digest('hex');
    return `sha256:${hash}`;
}
