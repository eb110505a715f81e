import type { RequestHandler } from 'express';
import { NotFoundError } from '../utils/errors.js';

const apiVersion =
    (versions: readonly string[]): RequestHandler =>
    (req, _res, next) => {
        if (!versions.includes(req.params.version)) {
            next(new NotFoundError('Invalid version in URL path.'));
            return;
        }
        next();
    };

export default apiVersion;
