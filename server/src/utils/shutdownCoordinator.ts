/**
 * Shutdown Coordinator
 *
 * Closes the HTTP server and the database pool on SIGTERM/SIGINT.
 * Handlers run one at a time in reverse registration order, so the server
 * stops accepting requests before the pool it depends on goes away.
 */

import logger from './logger.js';

const shutdownLogger = logger.child({ module: 'shutdown' });

// ============================================
// TYPE DEFINITIONS
// ============================================

interface ShutdownHandler {
    name: string;
    handler: () => Promise<void> | void;
    timeout: number;
}

export interface ShutdownResult {
    name: string;
    success: boolean;
    error?: string;
    duration: number;
}

// ============================================
// SHUTDOWN COORDINATOR CLASS
// ============================================

export class ShutdownCoordinator {
    private handlers = new Map<string, ShutdownHandler>();
    private isShuttingDown = false;

    /**
     * @param timeout - Max time to wait for the handler (ms), default 10s
     */
    register(name: string, handler: () => Promise<void> | void, timeout = 10000): void {
        if (this.handlers.has(name)) {
            shutdownLogger.warn({ name }, 'Shutdown handler already registered, replacing');
            this.handlers.delete(name);
        }
        this.handlers.set(name, { name, handler, timeout });
    }

    isInProgress(): boolean {
        return this.isShuttingDown;
    }

    async shutdown(): Promise<ShutdownResult[]> {
        if (this.isShuttingDown) {
            shutdownLogger.warn('Shutdown already in progress');
            return [];
        }

        this.isShuttingDown = true;
        shutdownLogger.info({ handlerCount: this.handlers.size }, 'Starting graceful shutdown');

        const results: ShutdownResult[] = [];
        for (const { name, handler, timeout } of [...this.handlers.values()].reverse()) {
            const start = Date.now();
            let timer: NodeJS.Timeout | undefined;
            try {
                const timedOut = await Promise.race([
                    Promise.resolve(handler()).then(() => false),
                    new Promise<boolean>((resolve) => {
                        timer = setTimeout(() => resolve(true), timeout);
                    }),
                ]);
                const duration = Date.now() - start;
                if (timedOut) {
                    shutdownLogger.warn({ name, timeout, duration }, 'Shutdown handler timed out');
                    results.push({ name, success: false, error: 'Timeout', duration });
                } else {
                    results.push({ name, success: true, duration });
                }
            } catch (error: unknown) {
                const duration = Date.now() - start;
                const errorMsg = error instanceof Error ? error.message : 'Unknown error';
                shutdownLogger.error({ name, error: errorMsg, duration }, 'Shutdown handler failed');
                results.push({ name, success: false, error: errorMsg, duration });
            } finally {
                clearTimeout(timer);
            }
        }

        const failed = results.filter(r => !r.success).length;
        shutdownLogger.info({ successful: results.length - failed, failed }, 'Shutdown complete');
        return results;
    }
}

// Export singleton instance
export const shutdownCoordinator = new ShutdownCoordinator();
export default shutdownCoordinator;
