import express from 'express';
import type { Express, RequestHandler } from 'express';
import cors from 'cors';
import type { SongRepository } from './types/interfaces.js';
import type { TokenService } from './utils/tokens.js';
import { SongController } from './controllers/songController.js';
import { AuthController } from './controllers/authController.js';
import songRoutes from './routes/songs.js';
import authRoutes from './routes/authRoutes.js';
import auth from './middlewares/auth.js';
import apiVersion from './middlewares/apiVersion.js';
import { errorHandler, notFound } from './middlewares/errorHandler.js';

export interface AppDependencies {
    songs: SongRepository;
    tokens: TokenService;
    apiVersions?: string[];
    corsOrigins?: string[];
    logRequests?: boolean;
}

const requestLogger: RequestHandler = (req, res, next) => {
    const startedAt = Date.now();
    res.on('finish', () => {
        console.log(
            `${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - startedAt}ms user=${req.user?.username ?? '-'}`,
        );
    });
    next();
};

export const createApp = ({
    songs,
    tokens,
    apiVersions = ['v1'],
    corsOrigins = [],
    logRequests = false,
}: AppDependencies): Express => {
    const app = express();

    // CORS configuration
    app.use(
        cors({
            origin: corsOrigins,
            credentials: true,
            methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
            allowedHeaders: ['Content-Type', 'Authorization'],
        }),
    );
    if (logRequests) {
        app.use(requestLogger);
    }

    const api = express.Router({ mergeParams: true });
    // Song bodies are parsed only once the token has been accepted
    api.use('/auth', express.json(), authRoutes(new AuthController(tokens)));
    api.use(
        '/songs',
        auth(tokens),
        express.json(),
        songRoutes(new SongController(songs)),
    );

    app.use('/:version', apiVersion(apiVersions), api);

    app.use(notFound);
    app.use(errorHandler);

    return app;
};

export default createApp;
