/**
 * Authentication Core
 *
 * One shared admin login (ADMIN_USER / ADMIN_PASSWORD) exchanged for a JWT.
 * The token travels in the Authorization header or the HttpOnly auth_token cookie.
 */

import jwt from 'jsonwebtoken';
import type { SignOptions } from 'jsonwebtoken';
import { timingSafeEqual } from 'node:crypto';
import { z } from 'zod';

// ============================================
// SCHEMAS & TYPES
// ============================================

/**
 * JWT payload schema - validates token structure
 */
export const JwtPayloadSchema = z.object({
    sub: z.string().min(1),
    role: z.literal('admin'),
    iat: z.number().optional(),
    exp: z.number().optional(),
});

export type JwtPayload = z.infer<typeof JwtPayloadSchema>;

/**
 * Authenticated user context - attached to requests
 */
export interface AuthenticatedUser {
    username: string;
    role: 'admin';
}

export const AUTH_COOKIE = 'auth_token';

// ============================================
// CORE FUNCTIONS
// ============================================

/**
 * Verify and decode a JWT token
 *
 * @returns Decoded user or null if invalid/expired
 */
export function verifyToken(token: string, secret: string): AuthenticatedUser | null {
    try {
        const parsed = JwtPayloadSchema.safeParse(jwt.verify(token, secret));
        return parsed.success ? { username: parsed.data.sub, role: parsed.data.role } : null;
    } catch {
        return null;
    }
}

export function signToken(username: string, secret: string, expiresIn: string): string {
    const options: SignOptions = { expiresIn: expiryToSeconds(expiresIn) };
    return jwt.sign({ sub: username, role: 'admin' }, secret, options);
}

const EXPIRY_UNITS: Record<string, number> = { s: 1, m: 60, h: 3600, d: 86400 };

/** Matches values accepted by expiryToSeconds: "3600", "45m", "12h", "7d" */
const EXPIRY_PATTERN = /^(\d+)([smhd]?)$/;

/**
 * "7d" → 604800. Bare digits are seconds.
 */
export function expiryToSeconds(value: string): number {
    const match = EXPIRY_PATTERN.exec(value.trim());
    if (!match) throw new RangeError(`Invalid token expiry: ${value}`);
    return Number(match[1]) * (EXPIRY_UNITS[match[2] || 's'] ?? 1);
}

function safeEqual(a: string, b: string): boolean {
    const left = Buffer.from(a);
    const right = Buffer.from(b);
    return left.length === right.length && timingSafeEqual(left, right);
}

export function checkCredentials(
    input: { username: string; password: string },
    expected: { username: string; password: string }
): boolean {
    const userOk = safeEqual(input.username, expected.username);
    const passwordOk = safeEqual(input.password, expected.password);
    return userOk && passwordOk;
}

/**
 * Pull the token from "Authorization: Bearer <token>" or the auth cookie.
 */
export function extractToken(authorization: string | undefined, cookies: unknown): string | null {
    const bearer = authorization?.split(' ')[1];
    if (bearer) return bearer;
    if (typeof cookies === 'object' && cookies !== null && AUTH_COOKIE in cookies) {
        const value: unknown = Reflect.get(cookies, AUTH_COOKIE);
        return typeof value === 'string' && value !== '' ? value : null;
    }
    return null;
}
