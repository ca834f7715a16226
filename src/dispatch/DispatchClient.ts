import { z } from 'zod';

import { DispatchAuthError, DispatchError } from '../model/Errors.ts';
import { createLogger } from '../utils/Logger.ts';

import type { DispatchSettings } from '../config/SourceConfig.ts';
import type { DispatchRequest } from '../model/Models.ts';
import type { Logger } from 'pino';

export interface TokenInfo {
    accessToken: string;
    refreshToken: string | null;
    tokenType: string;
    /** unix epoch seconds */
    expiresAt: number | null;
}

const TokenPayloadSchema = z.object({
    access_token: z.string().min(1),
    refresh_token: z.string().nullish(),
    token_type: z.string().nullish(),
    // an unusable lifetime leaves the token without expiry
    expires_in: z.coerce.number().nullish().catch(null),
});

const ResponseObjectSchema = z.record(z.unknown());

export type IncidentResponse = z.infer<typeof ResponseObjectSchema>;

// refresh a little before the service would reject the token
const EXPIRY_SKEW_SECONDS = 30;
const BODY_SNIPPET_LENGTH = 500;

export function isTokenExpired(token: TokenInfo, nowSeconds: number = Date.now() / 1000): boolean {
    if (token.expiresAt === null) return false;
    return nowSeconds >= token.expiresAt - EXPIRY_SKEW_SECONDS;
}

/**
 * Minimal client for the rostering service: OAuth2 password grant with
 * refresh, and incident creation. A 401/403 on create triggers one
 * refresh and one retry, nothing more.
 */
export class DispatchClient {
    private logger: Logger;
    private baseUrl: string;
    private timeoutMs: number;
    private fetchFn: typeof fetch;
    private token: TokenInfo | null = null;

    constructor(settings: Pick<DispatchSettings, 'baseUrl' | 'timeoutMs'>, fetchFn: typeof fetch = fetch) {
        this.logger = createLogger('DispatchClient');
        this.baseUrl = settings.baseUrl.replace(/\/+$/, '');
        this.timeoutMs = settings.timeoutMs;
        this.fetchFn = fetchFn;
    }

    setToken(token: TokenInfo | null): void {
        this.token = token;
    }

    getToken(): TokenInfo | null {
        return this.token;
    }

    async loginWithPassword(username: string, password: string, clientId?: string): Promise<TokenInfo> {
        this.logger.info(`Logging in to ${this.baseUrl} as ${username}`);

        const form = new URLSearchParams({ grant_type: 'password', username, password });
        if (clientId) form.set('client_id', clientId);

        const response = await this.post('/oauth/token', form);
        if (response.status === 401 || response.status === 403) {
            throw new DispatchAuthError(`Login failed (${response.status}). Check credentials.`, response.status);
        }
        if (!response.ok) {
            throw new DispatchError(`Token request failed (${response.status}): ${await response.text()}`, response.status);
        }

        this.token = this.parseToken(await this.readJson(response));
        return this.token;
    }

    async refreshAccessToken(): Promise<TokenInfo> {
        const refreshToken = this.token?.refreshToken;
        if (!refreshToken) {
            throw new DispatchAuthError('No refresh token available. Please log in again.');
        }

        this.logger.info('Refreshing access token');
        const form = new URLSearchParams({ grant_type: 'refresh_token', refresh_token: refreshToken });

        const response = await this.post('/oauth/token', form);
        if (response.status === 401 || response.status === 403) {
            throw new DispatchAuthError('Refresh token rejected. Please log in again.', response.status);
        }
        if (!response.ok) {
            throw new DispatchError(`Token refresh failed (${response.status}): ${await response.text()}`, response.status);
        }

        const token = this.parseToken(await this.readJson(response));
        // the service does not always rotate the refresh token
        this.token = { ...token, refreshToken: token.refreshToken ?? refreshToken };
        return this.token;
    }

    /**
     * POST /api/v2/incidents/ with body, prio, location and task ids.
     */
    async createIncident(request: DispatchRequest): Promise<IncidentResponse> {
        await this.ensureToken();

        const payload = JSON.stringify({
            body: request.body,
            prio: request.prio,
            location: request.location,
            ...(request.taskIds.length > 0 ? { task_ids: request.taskIds } : {}),
        });

        this.logger.info(`Creating incident at '${request.location}' for task ids [${request.taskIds.join(', ')}]`);

        let response = await this.post('/api/v2/incidents/', payload, this.authHeaders());
        if (response.status === 401 || response.status === 403) {
            this.logger.warn(`Create incident rejected (${response.status}), refreshing token and retrying once`);
            await this.refreshAccessToken();
            response = await this.post('/api/v2/incidents/', payload, this.authHeaders());
        }

        if (!response.ok) {
            const err = `Create incident failed (${response.status}): ${await response.text()}`;
            this.logger.error(err);
            throw new DispatchError(err, response.status);
        }

        const parsed = ResponseObjectSchema.safeParse(await this.readJson(response));
        if (!parsed.success) {
            throw new DispatchError(
                `Create incident returned an unexpected body (status ${response.status})`,
                response.status,
                { cause: parsed.error }
            );
        }
        return parsed.data;
    }

    /**
     * [serverOk, authOk]: health endpoint reachable, and token accepted by
     * the heartbeat endpoint.
     */
    async testConnection(): Promise<[boolean, boolean]> {
        const health = await this.request(`${this.baseUrl}/api/v2/health`, { method: 'GET' });
        if (!health.ok) return [false, false];

        await this.ensureToken();

        for (const path of ['/api/v2/users/current/heartbeat', '/api/v2/users/current/heartbeat/']) {
            const response = await this.post(path, '{}', this.authHeaders());
            if (response.status === 401 || response.status === 403) return [true, false];
            if (response.status === 404) continue;
            return [true, true];
        }
        return [true, false];
    }

    private async ensureToken(): Promise<void> {
        if (!this.token) {
            throw new DispatchAuthError('Not authenticated (no token).');
        }
        if (isTokenExpired(this.token)) {
            await this.refreshAccessToken();
        }
    }

    private authHeaders(): Record<string, string> {
        if (!this.token) {
            throw new DispatchAuthError('Not authenticated (no token).');
        }
        return {
            'Authorization': `${this.token.tokenType} ${this.token.accessToken}`,
            'Content-Type': 'application/json',
            'Accept': 'application/json',
        };
    }

    private post(path: string, body: string | URLSearchParams, headers: Record<string, string> = {}): Promise<Response> {
        return this.request(`${this.baseUrl}${path}`, { method: 'POST', body, headers });
    }

    private async request(url: string, init: RequestInit): Promise<Response> {
        try {
            return await this.fetchFn(url, { ...init, signal: AbortSignal.timeout(this.timeoutMs) });
        } catch (err) {
            this.logger.error({ err }, `Request to ${url} failed`);
            throw new DispatchError(`Request to ${url} failed`, null, { cause: err });
        }
    }

    /**
     * JSON body, or a DispatchError showing status and the start of the body.
     */
    private async readJson(response: Response): Promise<unknown> {
        const text = (await response.text()).trim();
        const contentType = response.headers.get('Content-Type') ?? '';

        if (!text) {
            throw new DispatchError(
                `Empty response body (status ${response.status}, Content-Type '${contentType}')`,
                response.status
            );
        }
        if (!contentType.toLowerCase().includes('json')) {
            throw new DispatchError(
                `Non-JSON response (status ${response.status}, Content-Type '${contentType}'): ` +
                text.slice(0, BODY_SNIPPET_LENGTH),
                response.status
            );
        }

        try {
            return JSON.parse(text);
        } catch (err) {
            throw new DispatchError(
                `Failed to parse JSON (status ${response.status}): ${text.slice(0, BODY_SNIPPET_LENGTH)}`,
                response.status,
                { cause: err }
            );
        }
    }

    private parseToken(payload: unknown): TokenInfo {
        const parsed = TokenPayloadSchema.safeParse(payload);
        if (!parsed.success) {
            throw new DispatchError('Token response missing access_token');
        }

        const { access_token, refresh_token, token_type, expires_in } = parsed.data;
        return {
            accessToken: access_token,
            refreshToken: refresh_token ?? null,
            tokenType: token_type ?? 'Bearer',
            expiresAt: typeof expires_in === 'number' ? Math.floor(Date.now() / 1000) + expires_in : null,
        };
    }
}
