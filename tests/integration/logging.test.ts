/**
 * Integration Tests: Request logging
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
    apiRequest,
    login,
    startTestServer,
    type TestServer,
} from '../helpers/api.helper.js';

describe('Integration: Request logging', () => {
    let server: TestServer;

    beforeEach(async () => {
        server = await startTestServer({ logRequests: true });
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await server.close();
    });

    const loggedLines = (spy: { mock: { calls: unknown[][] } }): string[] =>
        spy.mock.calls.map((call) => String(call[0]));

    it('should log method, path, status, duration and user', async () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => {});
        const token = await login(server);

        const response = await apiRequest(server, 'GET', '/v1/songs', {
            accessToken: token,
        });
        expect(response.status).toBe(200);

        await vi.waitFor(() => {
            expect(loggedLines(log)).toContainEqual(
                expect.stringMatching(/^GET \/v1\/songs 200 \d+ms user=test_user$/),
            );
        });
    });

    it('should log a dash for requests without a user', async () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => {});

        const response = await apiRequest(server, 'GET', '/v1/songs');
        expect(response.status).toBe(401);

        await vi.waitFor(() => {
            expect(loggedLines(log)).toContainEqual(
                expect.stringMatching(/^GET \/v1\/songs 401 \d+ms user=-$/),
            );
        });
    });
});
