import { Router } from 'express';
import type { Request, Response } from 'express';
import { LoginSchema } from '@workshop-ledger/shared';
import { env } from '../config/env.js';
import { asyncHandler, typedRoute } from '../middleware/asyncHandler.js';
import { authenticateToken } from '../middleware/auth.js';
import { AUTH_COOKIE, checkCredentials, expiryToSeconds, signToken } from '../utils/authCore.js';
import { UnauthorizedError } from '../utils/errors.js';
import { authLogger } from '../utils/logger.js';

const router: Router = Router();

// ============================================
// ROUTES
// ============================================

// Login with the shared admin account
router.post(
    '/login',
    ...typedRoute(LoginSchema, async (body, _req, res) => {
        const ok = checkCredentials(body, { username: env.ADMIN_USER, password: env.ADMIN_PASSWORD });
        if (!ok) {
            authLogger.warn({ username: body.username }, 'Login rejected');
            throw new UnauthorizedError('Invalid credentials');
        }

        const token = signToken(body.username, env.JWT_SECRET, env.JWT_EXPIRY);

        // HttpOnly cookie for the browser; the token is also returned for API clients
        res.cookie(AUTH_COOKIE, token, {
            httpOnly: true,
            secure: env.NODE_ENV === 'production',
            sameSite: 'lax',
            maxAge: expiryToSeconds(env.JWT_EXPIRY) * 1000,
            path: '/',
        });

        authLogger.info({ username: body.username }, 'Login');
        res.json({ user: { username: body.username, role: 'admin' }, token });
    })
);

// Logout - clear auth cookie
router.post(
    '/logout',
    asyncHandler(async (_req: Request, res: Response) => {
        res.clearCookie(AUTH_COOKIE, { path: '/' });
        res.json({ success: true });
    })
);

// Current user
router.get('/me', authenticateToken, (req: Request, res: Response) => {
    res.json({ user: req.user ?? null });
});

export default router;
