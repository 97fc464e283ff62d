import * as crypto from 'crypto';

/**
 * Content digest used for change detection. The server compares the same md5
 * hex string against its own copy, so the algorithm is part of the protocol.
 */
export function computeDigest(content: string): string {
    return crypto.createHash('md5').update(content, 'utf8').digest('hex');
}
