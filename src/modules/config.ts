/**
 * Runtime configuration from the environment.
 *
 * Credentials arrive already resolved (a storage URL and a token, e.g. from
 * `openstack token issue` or an earlier auth step); nothing here reads
 * credential files.
 */

import { z } from 'zod';
import { UPLOAD } from './constants.js';
import { AuthUnavailableError } from './errors.js';
import type { Credentials } from '../types.js';

export type Environment = Record<string, string | undefined>;

const credentialsSchema = z.object({
    endpoint: z.string().url(),
    project: z.string(),
    token: z.string().min(1)
});

/**
 * Read `{endpoint, project, token}` from SAF_STORAGE_URL (or OS_STORAGE_URL),
 * OS_PROJECT_NAME and OS_AUTH_TOKEN. Returns null when no endpoint or token is
 * set; throws AuthUnavailableError when they are set but unusable.
 */
export function credentialsFromEnv(env: Environment = process.env): Credentials | null {
    const endpoint = env.SAF_STORAGE_URL?.trim() || env.OS_STORAGE_URL?.trim();
    const token = env.OS_AUTH_TOKEN?.trim();
    if (!endpoint || !token) return null;

    const parsed = credentialsSchema.safeParse({
        endpoint,
        project: env.OS_PROJECT_NAME?.trim() ?? '',
        token
    });
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new AuthUnavailableError(`Storage credentials are invalid: ${issue?.path.join('.') ?? ''} ${issue?.message ?? ''}`.trim());
    }
    return parsed.data;
}

export function requireCredentials(credentials: Credentials | null | undefined): Credentials {
    if (!credentials || !credentials.endpoint || !credentials.token) {
        throw new AuthUnavailableError('No storage credentials: set SAF_STORAGE_URL and OS_AUTH_TOKEN');
    }
    return credentials;
}

export function containerFromEnv(env: Environment = process.env): string {
    return env.SAF_CONTAINER?.trim() || UPLOAD.DEFAULT_CONTAINER;
}
