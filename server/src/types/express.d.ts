import type { AuthIdentity } from './interfaces.js';

declare global {
    namespace Express {
        interface Request {
            user?: AuthIdentity;
        }
    }
}
