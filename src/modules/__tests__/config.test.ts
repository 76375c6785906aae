import { describe, it, expect } from 'vitest';
import { containerFromEnv, credentialsFromEnv, requireCredentials } from '../config.js';
import { AuthUnavailableError } from '../errors.js';

describe('credentialsFromEnv', () => {
    it('reads the storage URL, project and token', () => {
        expect(credentialsFromEnv({
            SAF_STORAGE_URL: 'https://swift.test/v1/AUTH_p',
            OS_PROJECT_NAME: 'archive',
            OS_AUTH_TOKEN: ' test-token '
        })).toEqual({ endpoint: 'https://swift.test/v1/AUTH_p', project: 'archive', token: 'test-token' });
    });

    it('falls back to OS_STORAGE_URL and an empty project', () => {
        expect(credentialsFromEnv({ OS_STORAGE_URL: 'https://swift.test/v1/AUTH_q', OS_AUTH_TOKEN: 'test-token' }))
            .toEqual({ endpoint: 'https://swift.test/v1/AUTH_q', project: '', token: 'test-token' });
    });

    it('returns null when nothing is configured', () => {
        expect(credentialsFromEnv({})).toBeNull();
        expect(credentialsFromEnv({ SAF_STORAGE_URL: 'https://swift.test' })).toBeNull();
        expect(credentialsFromEnv({ OS_AUTH_TOKEN: 'test-token', SAF_STORAGE_URL: '  ' })).toBeNull();
    });

    it('rejects an endpoint that is not a URL', () => {
        expect(() => credentialsFromEnv({ SAF_STORAGE_URL: 'swift', OS_AUTH_TOKEN: 'test-token' }))
            .toThrow(AuthUnavailableError);
    });
});

describe('requireCredentials', () => {
    it('passes credentials through and refuses absent ones', () => {
        const credentials = { endpoint: 'https://swift.test', project: '', token: 'test-token' };
        expect(requireCredentials(credentials)).toBe(credentials);
        expect(() => requireCredentials(null)).toThrow('No storage credentials: set SAF_STORAGE_URL and OS_AUTH_TOKEN');
    });
});

describe('containerFromEnv', () => {
    it('defaults the container name', () => {
        expect(containerFromEnv({})).toBe('saf-transfer');
        expect(containerFromEnv({ SAF_CONTAINER: 'ingest' })).toBe('ingest');
    });
});
