/// <reference types="vitest" />

import { describe, it, expect } from 'vitest';
import { CredentialGuard } from '../credential-guard.service.js';
import { UnauthorizedError } from '../../../../lib/errors.js';

describe('CredentialGuard', () => {
    const guard = new CredentialGuard('test-secret');

    it('should authorize the configured credential', () => {
        expect(guard.authorize('test-secret')).toEqual({ authorized: true });
    });

    it('should reject a missing credential', () => {
        const result = guard.authorize(undefined);

        expect(result.authorized).toBe(false);
        if (!result.authorized) {
            expect(result.error).toBeInstanceOf(UnauthorizedError);
            expect(result.error.status).toBe(401);
            expect(result.error.code).toBe('UNAUTHORIZED');
        }
    });

    it('should reject wrong and missing credentials with the same message', () => {
        const missing = guard.authorize('');
        const wrong = guard.authorize('test-secret-2');

        expect(missing.authorized).toBe(false);
        expect(wrong.authorized).toBe(false);
        if (!missing.authorized && !wrong.authorized) {
            expect(wrong.error.message).toBe(missing.error.message);
            expect(wrong.error.message).toBe('Unauthorized');
        }
    });

    it('should reject credentials that differ only in case or length', () => {
        expect(guard.authorize('TEST-SECRET').authorized).toBe(false);
        expect(guard.authorize('test-secre').authorized).toBe(false);
        expect(guard.authorize('test-secret ').authorized).toBe(false);
    });

    it('should refuse to start with an empty credential', () => {
        expect(() => new CredentialGuard('')).toThrow('Connector credential must not be empty');
    });
});
