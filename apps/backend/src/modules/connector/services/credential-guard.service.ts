import { createHash, timingSafeEqual } from 'node:crypto';
import { UnauthorizedError } from '../../../lib/errors.js';

export type AuthorizationResult =
    | { authorized: true }
    | { authorized: false; error: UnauthorizedError };

function digest(value: string): Buffer {
    return createHash('sha256').update(value, 'utf8').digest();
}

/**
 * Gate for every terminal request.
 *
 * Holds only a SHA-256 digest of the connector credential. Presented values
 * are hashed the same way and compared with `timingSafeEqual`, so the
 * comparison time does not depend on how much of the key matched and digests
 * of different-length inputs still compare at equal length. Missing and wrong
 * credentials produce the same rejection. Nothing is logged here.
 */
export class CredentialGuard {
    private readonly expected: Buffer;

    /**
     * @param credential - Connector credential from configuration
     * @throws Error if the credential is empty
     */
    constructor(credential: string) {
        if (!credential) {
            throw new Error('Connector credential must not be empty');
        }
        this.expected = digest(credential);
    }

    authorize(presented: string | undefined): AuthorizationResult {
        if (!presented) {
            return { authorized: false, error: new UnauthorizedError() };
        }

        if (!timingSafeEqual(digest(presented), this.expected)) {
            return { authorized: false, error: new UnauthorizedError() };
        }

        return { authorized: true };
    }
}
