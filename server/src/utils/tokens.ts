import jwt from 'jsonwebtoken';
import type { JwtPayload, SignOptions } from 'jsonwebtoken';
import type { AuthIdentity, TokenValidator } from '../types/interfaces.js';
import { UnauthorizedError } from './errors.js';

type TokenLifetime = Extract<NonNullable<SignOptions['expiresIn']>, string>;

export interface TokenOptions {
    secret: string;
    expiresIn?: string;
}

// Seconds ("3600") or a count with a unit ("15m", "7d")
const isTokenLifetime = (value: string): value is TokenLifetime =>
    /^\d+(ms|s|m|h|d|w|y)?$/.test(value);

export class TokenService implements TokenValidator {
    private readonly secret: string;
    private readonly expiresIn: TokenLifetime | number;

    constructor({ secret, expiresIn = '7d' }: TokenOptions) {
        if (!secret) {
            throw new Error('JWT_SECRET is not defined');
        }
        if (!isTokenLifetime(expiresIn)) {
            throw new Error(`Invalid token lifetime: ${expiresIn}`);
        }
        this.secret = secret;
        this.expiresIn = /^\d+$/.test(expiresIn)
            ? parseInt(expiresIn, 10)
            : expiresIn;
    }

    /**
     * Signs a bearer token for the given credentials. The password is not
     * checked against anything; whoever logs in gets a token for that name.
     */
    issue(username: string, _password: string): string {
        return jwt.sign({ username }, this.secret, {
            expiresIn: this.expiresIn,
        });
    }

    validate(token: string): AuthIdentity {
        let decoded: string | JwtPayload;
        try {
            decoded = jwt.verify(token, this.secret);
        } catch (error) {
            console.error('JWT verification failed:', error);
            throw new UnauthorizedError('Invalid token');
        }

        if (
            typeof decoded === 'string' ||
            typeof decoded.username !== 'string' ||
            decoded.username.length === 0
        ) {
            throw new UnauthorizedError('Invalid token');
        }

        return { username: decoded.username };
    }
}
