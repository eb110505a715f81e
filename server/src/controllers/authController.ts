import type { RequestHandler } from 'express';
import type { LoginResponse } from '../../../shared/types/common.js';
import { parseCredentials } from '../models/User.js';
import type { TokenService } from '../utils/tokens.js';

export class AuthController {
    constructor(private readonly tokens: TokenService) {}

    login: RequestHandler = (req, res, next) => {
        try {
            const { username, password } = parseCredentials(req.body);
            const body: LoginResponse = {
                token: this.tokens.issue(username, password),
            };
            res.json(body);
        } catch (error) {
            next(error);
        }
    };
}
