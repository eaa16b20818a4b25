/**
 * pg-geopoint - Connection Configuration
 *
 * Connection parameters are an explicit struct handed to the pool. The
 * environment is only one of the sources it can be filled from.
 */

import { z } from 'zod';
import { ConnectionUnavailableError } from '../types/index.js';
import type { ConnectionConfig } from '../types/index.js';

/** Prefix of the connection environment variables (`tut_user`, `tut_port`, ...) */
export const DEFAULT_ENV_PREFIX = 'tut_';

/** Parameters the verification harness insists on */
export const REQUIRED_CONNECTION_PARAMS = ['user', 'password', 'port', 'dbname'] as const;

export type RequiredConnectionParam = (typeof REQUIRED_CONNECTION_PARAMS)[number];

export const ConnectionConfigSchema = z.object({
    user: z.string().min(1, 'user is required'),
    password: z.string().min(1, 'password is required'),
    port: z.coerce.number().int().min(1).max(65535),
    dbname: z.string().min(1, 'dbname is required'),
    host: z.string().min(1).default('localhost'),
    poolMax: z.coerce.number().int().positive().default(10)
});

/** Raw values as they arrive from the environment or the command line */
export interface ConnectionConfigInput {
    user?: string;
    password?: string;
    port?: number | string;
    dbname?: string;
    host?: string;
    poolMax?: number | string;
}

type Env = Record<string, string | undefined>;

function envKey(prefix: string, param: string): string {
    return `${prefix}${param}`;
}

/**
 * Names of the required variables that are absent or empty
 */
export function findMissingConnectionEnv(env: Env, prefix = DEFAULT_ENV_PREFIX): string[] {
    return REQUIRED_CONNECTION_PARAMS
        .map(param => envKey(prefix, param))
        .filter(key => !env[key]);
}

/**
 * Validate a connection config. Any missing or malformed field means the
 * store cannot be reached, so it surfaces as ConnectionUnavailable.
 */
export function parseConnectionConfig(input: ConnectionConfigInput): ConnectionConfig {
    const result = ConnectionConfigSchema.safeParse(input);
    if (!result.success) {
        const issues = result.error.issues.map(issue => ({
            field: issue.path.join('.'),
            message: issue.message
        }));
        throw new ConnectionUnavailableError('Invalid connection configuration', { issues });
    }
    return result.data;
}

/**
 * Read `<prefix>user`, `<prefix>password`, `<prefix>port`, `<prefix>dbname`
 * plus the optional `<prefix>host` and `<prefix>pool_max`. Explicit
 * overrides win over the environment.
 */
export function loadConnectionConfig(
    env: Env = process.env,
    prefix = DEFAULT_ENV_PREFIX,
    overrides: ConnectionConfigInput = {}
): ConnectionConfig {
    const fromEnv: ConnectionConfigInput = {};
    const pick = (param: string): string | undefined => {
        const value = env[envKey(prefix, param)];
        return value === undefined || value === '' ? undefined : value;
    };

    const user = pick('user');
    const password = pick('password');
    const port = pick('port');
    const dbname = pick('dbname');
    const host = pick('host');
    const poolMax = pick('pool_max');

    if (user !== undefined) fromEnv.user = user;
    if (password !== undefined) fromEnv.password = password;
    if (port !== undefined) fromEnv.port = port;
    if (dbname !== undefined) fromEnv.dbname = dbname;
    if (host !== undefined) fromEnv.host = host;
    if (poolMax !== undefined) fromEnv.poolMax = poolMax;

    return parseConnectionConfig({ ...fromEnv, ...overrides });
}
