/**
 * Unit tests for the admin login and JWT helpers
 */

import jwt from 'jsonwebtoken';
import { checkCredentials, expiryToSeconds, extractToken, signToken, verifyToken } from '../authCore.js';

const SECRET = 'test-secret';

describe('expiryToSeconds', () => {
    it('reads plain seconds and unit suffixes', () => {
        expect(expiryToSeconds('3600')).toBe(3600);
        expect(expiryToSeconds('45m')).toBe(2700);
        expect(expiryToSeconds(' 12h ')).toBe(43200);
        expect(expiryToSeconds('7d')).toBe(604800);
    });

    it('rejects anything else', () => {
        expect(() => expiryToSeconds('7 days')).toThrow(RangeError);
    });
});

describe('signToken / verifyToken', () => {
    it('round-trips the admin user', () => {
        const token = signToken('admin', SECRET, '1h');

        expect(verifyToken(token, SECRET)).toEqual({ username: 'admin', role: 'admin' });
    });

    it('returns null for a wrong secret or garbage', () => {
        const token = signToken('admin', SECRET, '1h');

        expect(verifyToken(token, 'other-secret')).toBeNull();
        expect(verifyToken('not-a-token', SECRET)).toBeNull();
    });

    it('returns null when the payload has the wrong shape', () => {
        const token = jwt.sign({ sub: 'admin', role: 'viewer' }, SECRET);

        expect(verifyToken(token, SECRET)).toBeNull();
    });

    it('returns null for an expired token', () => {
        const token = jwt.sign({ sub: 'admin', role: 'admin', exp: Math.floor(Date.now() / 1000) - 60 }, SECRET);

        expect(verifyToken(token, SECRET)).toBeNull();
    });
});

describe('checkCredentials', () => {
    const expected = { username: 'admin', password: 'test-password' };

    it('needs both fields to match exactly', () => {
        expect(checkCredentials({ username: 'admin', password: 'test-password' }, expected)).toBe(true);
        expect(checkCredentials({ username: 'admin', password: 'test-passwor' }, expected)).toBe(false);
        expect(checkCredentials({ username: 'Admin', password: 'test-password' }, expected)).toBe(false);
    });
});

describe('extractToken', () => {
    it('prefers the bearer header', () => {
        expect(extractToken('Bearer abc', { auth_token: 'xyz' })).toBe('abc');
    });

    it('falls back to the auth cookie', () => {
        expect(extractToken(undefined, { auth_token: 'xyz' })).toBe('xyz');
        expect(extractToken('Bearer', { auth_token: 'xyz' })).toBe('xyz');
    });

    it('returns null when neither is present', () => {
        expect(extractToken(undefined, {})).toBeNull();
        expect(extractToken(undefined, { auth_token: '' })).toBeNull();
        expect(extractToken(undefined, undefined)).toBeNull();
    });
});
