/**
 * Express application
 *
 * Built around a Store so tests can hand in an in-memory one.
 * Everything under /api except /auth/login, /auth/logout and /health
 * sits behind authenticateToken.
 */

import express from 'express';
import type { Express, Request, Response, NextFunction } from 'express';
import cookieParser from 'cookie-parser';
import type { Store } from './db/store.js';
import { authenticateToken } from './middleware/auth.js';
import { errorHandler } from './middleware/errorHandler.js';
import adminRoutes from './routes/admin.js';
import authRoutes from './routes/auth.js';
import employeeRoutes from './routes/employees.js';
import exportRoutes from './routes/export.js';
import healthRoutes from './routes/health.js';
import inventoryRoutes from './routes/inventory/index.js';
import reportRoutes from './routes/reports.js';
import transactionRoutes from './routes/transactions.js';
import { requestLogger } from './utils/logger.js';

export interface AppOptions {
    store: Store;
}

export function createApp({ store }: AppOptions): Express {
    const app = express();

    app.disable('x-powered-by');
    app.use(express.json({ limit: '1mb' }));
    app.use(cookieParser());
    app.use(requestLogger);
    app.use((req: Request, _res: Response, next: NextFunction) => {
        req.store = store;
        next();
    });

    // Public
    app.use('/api/health', healthRoutes);
    app.use('/api/auth', authRoutes);

    // Authenticated
    app.use('/api/transactions', authenticateToken, transactionRoutes);
    app.use('/api/employees', authenticateToken, employeeRoutes);
    app.use('/api/inventory', authenticateToken, inventoryRoutes);
    app.use('/api/reports', authenticateToken, reportRoutes);
    app.use('/api/export', authenticateToken, exportRoutes);
    app.use('/api/admin', authenticateToken, adminRoutes);

    app.use('/api', (req: Request, res: Response) => {
        res.status(404).json({ error: `Route not found: ${req.method} ${req.originalUrl}`, type: 'NotFoundError' });
    });

    app.use(errorHandler);

    return app;
}
