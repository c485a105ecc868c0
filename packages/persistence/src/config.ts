/**
 * Database configuration from environment variables.
 */

import { CommonEnvSchemas, parseEnv, z } from '@tabula/config';
import type { DatabaseConfig } from './connection.js';

export const DatabaseEnvSchema = z.object({
	DATABASE_URL: CommonEnvSchemas.url,
	DATABASE_MAX_CONNECTIONS: CommonEnvSchemas.positiveInt.optional(),
	DATABASE_IDLE_TIMEOUT: CommonEnvSchemas.positiveInt.optional(),
	DATABASE_CONNECT_TIMEOUT: CommonEnvSchemas.positiveInt.optional(),
	DATABASE_DEBUG: CommonEnvSchemas.boolean,
});

/**
 * Read {@link DatabaseConfig} from the environment.
 *
 * @throws Error listing every invalid variable
 */
export function loadDatabaseConfig(env: Record<string, string | undefined> = process.env): DatabaseConfig {
	const parsed = parseEnv(DatabaseEnvSchema, env);

	return {
		url: parsed.DATABASE_URL,
		maxConnections: parsed.DATABASE_MAX_CONNECTIONS,
		idleTimeout: parsed.DATABASE_IDLE_TIMEOUT,
		connectTimeout: parsed.DATABASE_CONNECT_TIMEOUT,
		debug: parsed.DATABASE_DEBUG,
	};
}
