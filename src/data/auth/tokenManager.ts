import Joi from 'joi';
import { TokenConfig } from '../../models/config';
import { AuthenticationError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { HttpClient, describeHttpFailure } from '../http';
import { AuthProvider } from './authProvider';

export interface AccessToken {
    value: string;
    /** Epoch milliseconds. */
    expiresAt: number;
    scope?: string;
}

export type TokenState = 'unset' | 'valid' | 'expired';

export interface ClientCredentials {
    instanceUrl: string;
    clientId: string;
    clientSecret: string;
}

interface TokenResponse {
    access_token: string;
    expires_in: number;
    scope?: string;
}

const TERMINAL_STATUSES = new Set([400, 401, 403]);

/**
 * Exchanges client credentials for bearer tokens and keeps the current one
 * fresh. Concurrent callers that find the token missing or expired share a
 * single in-flight exchange.
 */
export class TokenManager implements AuthProvider {
    public readonly kind = 'oauth';
    private token: AccessToken | null = null;
    private inFlight: Promise<AccessToken> | null = null;
    // Bumped by clear() so an exchange that finishes afterwards is not kept.
    private generation: number = 0;
    private readonly responseSchema: Joi.ObjectSchema<TokenResponse>;

    constructor(
        private readonly credentials: ClientCredentials,
        private readonly config: TokenConfig,
        private readonly http: HttpClient,
        private readonly clock: () => number = Date.now
    ) {
        this.responseSchema = Joi.object<TokenResponse>({
            access_token: Joi.string().min(1).required(),
            expires_in: Joi.number().positive().default(config.defaultExpiresIn),
            scope: Joi.string().allow('').optional()
        }).unknown(true);
    }

    public getState(): TokenState {
        if (!this.token) {
            return 'unset';
        }
        return this.isFresh(this.token) ? 'valid' : 'expired';
    }

    public async getToken(): Promise<string> {
        if (this.token && this.isFresh(this.token)) {
            return this.token.value;
        }
        if (!this.inFlight) {
            this.inFlight = this.exchange().finally(() => {
                this.inFlight = null;
            });
        }
        const token = await this.inFlight;
        return token.value;
    }

    public async getAuthorizationHeader(): Promise<string> {
        return `Bearer ${await this.getToken()}`;
    }

    /**
     * Marks the current token unusable, typically after the remote service
     * rejected it. The next call performs a fresh exchange. A rejection of an
     * older token than the current one is ignored.
     */
    public invalidate(rejectedHeader?: string): void {
        if (!this.token) {
            return;
        }
        if (rejectedHeader !== undefined && rejectedHeader !== `Bearer ${this.token.value}`) {
            logger.debug('Ignoring rejection of a superseded token', { operation: 'tokenManager.invalidate' });
            return;
        }
        this.token = { ...this.token, expiresAt: 0 };
    }

    public clear(): void {
        this.token = null;
        this.generation++;
    }

    private isFresh(token: AccessToken): boolean {
        return this.clock() < token.expiresAt - this.config.refreshBufferSeconds * 1000;
    }

    private async exchange(): Promise<AccessToken> {
        const generation = this.generation;
        const basic = Buffer
            .from(`${this.credentials.clientId}:${this.credentials.clientSecret}`)
            .toString('base64');

        logger.debug('Requesting access token', { operation: 'tokenManager.exchange' });

        let data: unknown;
        let status: number;
        try {
            const response = await this.http.request({
                method: 'POST',
                url: `${this.credentials.instanceUrl}/oauth_token.do`,
                headers: {
                    'Authorization': `Basic ${basic}`,
                    'Content-Type': 'application/x-www-form-urlencoded',
                    'Accept': 'application/json'
                },
                data: new URLSearchParams({ grant_type: 'client_credentials' }).toString()
            });
            data = response.data;
            status = response.status;
        } catch (error) {
            const failure = describeHttpFailure(error);
            const terminal = failure.status !== undefined && TERMINAL_STATUSES.has(failure.status);
            throw new AuthenticationError(
                `Token exchange failed: ${failure.message}`,
                !terminal && failure.retryable,
                failure.status,
                { operation: 'tokenManager.exchange' }
            );
        }

        const { error, value } = this.responseSchema.validate(data);
        if (error) {
            throw new AuthenticationError('Token endpoint returned an invalid response', false, status, {
                operation: 'tokenManager.exchange',
                detail: error.message
            });
        }

        const token: AccessToken = {
            value: value.access_token,
            expiresAt: this.clock() + value.expires_in * 1000,
            scope: value.scope
        };
        if (generation === this.generation) {
            this.token = token;
        }

        logger.info('Access token obtained', {
            operation: 'tokenManager.exchange',
            expiresIn: value.expires_in
        });
        return token;
    }
}
