#!/usr/bin/env node
/**
 * pg-geopoint - CLI Entry Point
 *
 * Command-line interface for bootstrapping, writing to and verifying the
 * company store, and for serving it as MCP tools.
 */

import { Command, InvalidArgumentError } from 'commander';
import { ConnectionPool } from './pool/ConnectionPool.js';
import { PostgresCompanyStore } from './store/PostgresCompanyStore.js';
import { CompanyService } from './store/CompanyService.js';
import { DEFAULT_ENV_PREFIX, loadConnectionConfig } from './config/connection.js';
import type { ConnectionConfigInput } from './config/connection.js';
import { describeMissing, inspectSchema, installSchema } from './bootstrap/schema.js';
import { assertConnectionEnv, runVerification } from './harness/verify.js';
import { GeoPointMcpServer } from './server/McpServer.js';
import { getCompanyTools } from './tools/company.js';
import { getSchemaTools } from './tools/schema.js';
import { isGeoPointError } from './types/index.js';
import { isLogLevel, logger } from './utils/logger.js';

const VERSION = '0.1.0';

type GlobalOptions = {
    host?: string;
    port?: number;
    user?: string;
    password?: string;
    dbname?: string;
    poolMax?: number;
    envPrefix: string;
    logLevel?: string;
};

interface WriteOptions {
    id?: number;
    name?: string;
    lat?: number;
    lon?: number;
    clearCoordinates?: boolean;
}

interface Services {
    pool: ConnectionPool;
    service: CompanyService;
}

function parseInteger(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
        throw new InvalidArgumentError('Not an integer.');
    }
    return parsed;
}

function parseNumber(value: string): number {
    const parsed = Number(value);
    if (value.trim() === '' || Number.isNaN(parsed)) {
        throw new InvalidArgumentError('Not a number.');
    }
    return parsed;
}

function printJson(value: unknown): void {
    console.log(JSON.stringify(value, null, 2));
}

function globalOptions(command: Command): GlobalOptions {
    const options = command.optsWithGlobals<GlobalOptions>();
    if (options.logLevel !== undefined) {
        if (!isLogLevel(options.logLevel)) {
            throw new InvalidArgumentError(`Unknown log level: ${options.logLevel}`);
        }
        logger.setLevel(options.logLevel);
    }
    return options;
}

function connectionOverrides(options: GlobalOptions): ConnectionConfigInput {
    const overrides: ConnectionConfigInput = {};
    if (options.host !== undefined) overrides.host = options.host;
    if (options.port !== undefined) overrides.port = options.port;
    if (options.user !== undefined) overrides.user = options.user;
    if (options.password !== undefined) overrides.password = options.password;
    if (options.dbname !== undefined) overrides.dbname = options.dbname;
    if (options.poolMax !== undefined) overrides.poolMax = options.poolMax;
    return overrides;
}

/**
 * Open a pool for the duration of `work` and always close it
 */
async function withServices<T>(options: GlobalOptions, work: (services: Services) => Promise<T>): Promise<T> {
    const config = loadConnectionConfig(process.env, options.envPrefix, connectionOverrides(options));
    const pool = new ConnectionPool(config);
    await pool.initialize();
    try {
        return await work({ pool, service: new CompanyService(new PostgresCompanyStore(pool)) });
    } finally {
        await pool.shutdown();
    }
}

/**
 * Report a failed command on stderr and set a failing exit code
 */
function fail(error: unknown): void {
    if (isGeoPointError(error)) {
        logger.error(error.message, { code: error.code, ...(error.details ?? {}) });
    } else {
        logger.error('Command failed', { error: error instanceof Error ? error.message : String(error) });
    }
    process.exitCode = 1;
}

/**
 * Resolve global options, run the command and turn failures into exit codes
 */
async function run(command: Command, work: (options: GlobalOptions) => Promise<void>): Promise<void> {
    try {
        await work(globalOptions(command));
    } catch (error) {
        fail(error);
    }
}

function writeInput(options: WriteOptions): Record<string, unknown> {
    const input: Record<string, unknown> = {};
    if (options.id !== undefined) input['id'] = options.id;
    if (options.name !== undefined) input['name'] = options.name;
    if (options.lat !== undefined) input['latitude'] = options.lat;
    if (options.lon !== undefined) input['longitude'] = options.lon;
    if (options.clearCoordinates) {
        input['latitude'] = null;
        input['longitude'] = null;
    }
    return input;
}

const program = new Command();

program
    .name('pg-geopoint')
    .description('Company store on PostgreSQL/PostGIS with point geometry derived from latitude/longitude')
    .version(VERSION)
    .option('--host <host>', 'PostgreSQL host (default: <prefix>host or localhost)')
    .option('--port <port>', 'PostgreSQL port (default: <prefix>port)', parseInteger)
    .option('--user <user>', 'PostgreSQL username (default: <prefix>user)')
    .option('--password <password>', 'PostgreSQL password (default: <prefix>password)')
    .option('--dbname <dbname>', 'PostgreSQL database name (default: <prefix>dbname)')
    .option('--pool-max <size>', 'Maximum pool connections (default: 10)', parseInteger)
    .option('--env-prefix <prefix>', 'Prefix of the connection environment variables', DEFAULT_ENV_PREFIX)
    .option('--log-level <level>', 'Log level: debug, info, warn, error (default: info)');

program
    .command('serve', { isDefault: true })
    .description('Serve the company tools over MCP stdio')
    .action(async (_opts: object, command: Command) => run(command, async (options) => {
        const config = loadConnectionConfig(process.env, options.envPrefix, connectionOverrides(options));
        const pool = new ConnectionPool(config);
        await pool.initialize();

        const server = new GeoPointMcpServer({
            name: 'pg-geopoint',
            version: VERSION,
            tools: [
                ...getCompanyTools(new CompanyService(new PostgresCompanyStore(pool))),
                ...getSchemaTools(pool)
            ]
        });

        const shutdown = (): void => {
            logger.info('Shutting down...');
            void server.stop()
                .then(() => pool.shutdown())
                .then(() => process.exit(0))
                .catch((error: unknown) => {
                    fail(error);
                    process.exit(1);
                });
        };
        process.on('SIGINT', shutdown);
        process.on('SIGTERM', shutdown);

        try {
            await server.start();
        } catch (error) {
            await pool.shutdown();
            throw error;
        }
    }));

program
    .command('bootstrap')
    .description('Install PostGIS, the company table and the derivation trigger (idempotent)')
    .action(async (_opts: object, command: Command) => run(command, async (options) => {
        await withServices(options, async ({ pool }) => {
            await installSchema(pool);
            printJson(await inspectSchema(pool));
        });
    }));

program
    .command('status')
    .description('Show what the bootstrap has installed')
    .action(async (_opts: object, command: Command) => run(command, async (options) => {
        await withServices(options, async ({ pool }) => {
            const status = await inspectSchema(pool);
            const missing = describeMissing(status);
            printJson({ ...status, missing });
            if (missing.length > 0) {
                process.exitCode = 1;
            }
        });
    }));

program
    .command('insert')
    .description('Insert a company; geom is derived from --lat/--lon')
    .requiredOption('--name <name>', 'Company name')
    .option('--id <id>', 'Explicit id', parseInteger)
    .option('--lat <degrees>', 'Latitude', parseNumber)
    .option('--lon <degrees>', 'Longitude', parseNumber)
    .action(async (writeOptions: WriteOptions, command: Command) => run(command, async (options) => {
        await withServices(options, async ({ service }) => {
            printJson(await service.insert(writeInput(writeOptions)));
        });
    }));

program
    .command('get')
    .description('Fetch a company by id')
    .argument('<id>', 'Company id', parseInteger)
    .action(async (id: number, _opts: object, command: Command) => run(command, async (options) => {
        await withServices(options, async ({ service }) => {
            printJson(await service.select(id));
        });
    }));

program
    .command('update')
    .description('Update a company; changed coordinates re-derive geom')
    .argument('<id>', 'Company id', parseInteger)
    .option('--name <name>', 'New name')
    .option('--lat <degrees>', 'New latitude', parseNumber)
    .option('--lon <degrees>', 'New longitude', parseNumber)
    .option('--clear-coordinates', 'Set latitude, longitude and geom to null')
    .action(async (id: number, writeOptions: WriteOptions, command: Command) => run(command, async (options) => {
        await withServices(options, async ({ service }) => {
            printJson(await service.update(id, writeInput(writeOptions)));
        });
    }));

program
    .command('delete')
    .description('Delete a company by id')
    .argument('<id>', 'Company id', parseInteger)
    .action(async (id: number, _opts: object, command: Command) => run(command, async (options) => {
        await withServices(options, async ({ service }) => {
            await service.delete(id);
            printJson({ success: true, id });
        });
    }));

program
    .command('verify')
    .description('Check connection variables, schema and the derivation round trip')
    .action(async (_opts: object, command: Command) => run(command, async (options) => {
        assertConnectionEnv(process.env, options.envPrefix);
        await withServices(options, async ({ pool, service }) => {
            const report = await runVerification({ pool, service });
            printJson(report);
            if (!report.passed) {
                process.exitCode = 1;
            }
        });
    }));

await program.parseAsync();
