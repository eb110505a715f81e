import { z } from 'zod';
import { ValidationError } from '../utils/errors.js';

export const LOGIN_FIELDS_REQUIRED =
    'Both username and password are required to login';

export const CredentialsSchema = z.object({
    username: z.string().min(1),
    password: z.string().min(1),
});

export type Credentials = z.infer<typeof CredentialsSchema>;

export const parseCredentials = (payload: unknown): Credentials => {
    const result = CredentialsSchema.safeParse(payload);
    if (!result.success) {
        throw new ValidationError(LOGIN_FIELDS_REQUIRED);
    }
    return result.data;
};
