import type { Request, Response, NextFunction } from 'express';
import { env } from '../config/env.js';
import { extractToken, verifyToken } from '../utils/authCore.js';

/**
 * Middleware to authenticate JWT token
 * Supports both Authorization header and HttpOnly cookie
 * Attaches the user to the request
 */
export const authenticateToken = (
    req: Request,
    res: Response,
    next: NextFunction
): void => {
    const token = extractToken(req.headers['authorization'], req.cookies);

    if (!token) {
        res.status(401).json({ error: 'Access token required', type: 'UnauthorizedError' });
        return;
    }

    const user = verifyToken(token, env.JWT_SECRET);
    if (!user) {
        res.status(403).json({ error: 'Invalid or expired token', type: 'ForbiddenError' });
        return;
    }

    req.user = user;
    next();
};
