import dotenv from 'dotenv';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { DbClient } from './utils/db.js';
import { TokenService } from './utils/tokens.js';

// Load environment variables
dotenv.config();

const start = async (): Promise<void> => {
    const config = loadConfig();

    if (!config.jwtSecret) {
        throw new Error('JWT_SECRET is not defined');
    }

    console.log('Using database path:', config.dbPath);
    const songs = await DbClient.connect({ filename: config.dbPath });
    const tokens = new TokenService({
        secret: config.jwtSecret,
        expiresIn: config.jwtExpiresIn,
    });

    const app = createApp({
        songs,
        tokens,
        apiVersions: config.apiVersions,
        corsOrigins: config.corsOrigins,
        logRequests: config.nodeEnv !== 'test',
    });

    const server = app.listen(config.port, () => {
        console.log(`Server running on port ${config.port}`);
    });

    const shutdown = (): void => {
        server.close(() => {
            songs
                .close()
                .then(() => process.exit(0))
                .catch((error: unknown) => {
                    console.error('Error closing database:', error);
                    process.exit(1);
                });
        });
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
};

start().catch((error: unknown) => {
    console.error('Failed to start server:', error);
    process.exit(1);
});
