// src/types/express.d.ts
import type { Store } from '../db/store.js';
import type { AuthenticatedUser } from '../utils/authCore.js';

declare global {
    namespace Express {
        interface Request {
            /** Request-scoped data access, attached by createApp */
            store: Store;
            user?: AuthenticatedUser;
            /** x-request-id, set by requestLogger */
            id: string;
        }
    }
}

export {};
