import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { TokenValidator } from '../types/interfaces.js';
import { UnauthorizedError } from '../utils/errors.js';

export const extractBearerToken = (
    authHeader: string | undefined,
): string | null => {
    if (!authHeader?.startsWith('Bearer ')) {
        return null;
    }
    const token = authHeader.substring(7).trim();
    return token.length > 0 ? token : null;
};

const auth =
    (tokens: TokenValidator): RequestHandler =>
    (req: Request, _res: Response, next: NextFunction): void => {
        const token = extractBearerToken(req.headers.authorization);

        if (!token) {
            next(new UnauthorizedError());
            return;
        }

        try {
            req.user = tokens.validate(token);
            next();
        } catch (error) {
            next(error);
        }
    };

export default auth;
