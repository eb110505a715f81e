import path from 'path';

export interface AppConfig {
    port: number;
    nodeEnv: string;
    dbPath: string;
    jwtSecret?: string;
    jwtExpiresIn: string;
    apiVersions: string[];
    corsOrigins: string[];
}

type Env = Record<string, string | undefined>;

const parseList = (value: string | undefined, fallback: string[]): string[] => {
    const items = (value ?? '')
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0);
    return items.length > 0 ? items : fallback;
};

export const loadConfig = (env: Env = process.env): AppConfig => {
    const nodeEnv = env.NODE_ENV || 'development';
    const isDev = nodeEnv === 'development';

    const port = parseInt(env.API_PORT ?? '', 10);

    return {
        port: Number.isNaN(port) ? 3000 : port,
        nodeEnv,
        dbPath:
            env.DB_PATH ||
            (isDev
                ? path.join(process.cwd(), 'music.db')
                : '/app/database/music.db'),
        jwtSecret: env.JWT_SECRET || undefined,
        jwtExpiresIn: env.JWT_EXPIRES_IN || '7d',
        apiVersions: parseList(env.API_VERSIONS, ['v1']),
        // Production only accepts the configured client; dev accepts local ports
        corsOrigins:
            nodeEnv === 'production'
                ? parseList(env.CLIENT_URL, [])
                : ['http://localhost:3000', 'http://localhost:5173'],
    };
};
