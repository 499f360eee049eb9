import { InstanceConfig, TokenConfig } from '../../models/config';
import { ConfigurationError } from '../../utils/errors';
import { HttpClient } from '../http';
import { AuthProvider, BasicAuthProvider } from './authProvider';
import { TokenManager } from './tokenManager';

export * from './authProvider';
export * from './tokenManager';

export function createAuthProvider(instance: InstanceConfig, token: TokenConfig, http: HttpClient): AuthProvider {
    if (instance.authType === 'basic') {
        if (!instance.username || !instance.password) {
            throw new ConfigurationError('Basic authentication requires a username and password');
        }
        return new BasicAuthProvider(instance.username, instance.password);
    }

    if (!instance.clientId || !instance.clientSecret) {
        throw new ConfigurationError('OAuth authentication requires a client id and client secret');
    }
    return new TokenManager(
        { instanceUrl: instance.url, clientId: instance.clientId, clientSecret: instance.clientSecret },
        token,
        http
    );
}
