import { AuthenticationError } from '../../utils/errors';

/**
 * Supplies the Authorization header for remote calls.
 */
export interface AuthProvider {
    readonly kind: 'oauth' | 'basic';
    getAuthorizationHeader(): Promise<string>;
    /**
     * Drops the current credential after the remote service rejected it.
     * Given the rejected Authorization header, a credential that has since
     * been replaced is left alone.
     */
    invalidate(rejectedHeader?: string): void;
    clear(): void;
}

/**
 * Static username/password credentials. Nothing to refresh.
 */
export class BasicAuthProvider implements AuthProvider {
    public readonly kind = 'basic';
    private header: string | null;

    constructor(username: string, password: string) {
        this.header = `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`;
    }

    public async getAuthorizationHeader(): Promise<string> {
        if (!this.header) {
            throw new AuthenticationError('Basic credentials were cleared');
        }
        return this.header;
    }

    public invalidate(): void {
        // A rejected password stays rejected; the caller sees the next 401.
    }

    public clear(): void {
        this.header = null;
    }
}
